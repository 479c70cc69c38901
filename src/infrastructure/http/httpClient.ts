/**
 * Upstream HTTP Client
 * Layer: Infrastructure
 *
 * One axios instance shared by every adapter. It carries the per-request
 * timeout (FETCH_TIMEOUT_MS), so a hung fund site fails that adapter's fetch
 * instead of stalling the nightly update, and a browser-like User-Agent,
 * because several fund sites answer bot agents with a 403.
 *
 * The helpers below are the only way adapters talk to the network. Whatever
 * goes wrong (timeout, DNS, non-2xx), they throw a TransportError naming the
 * URL and, where there is one, the upstream status.
 */
import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';

import { ParseError, TransportError } from '@shared/errors/AppError';
import { DEFAULT_USER_AGENT } from '@shared/constants';

export type HttpClient = AxiosInstance;

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent?: string;
  /** Swaps the transport; tests answer requests in-process with this. */
  adapter?: AxiosAdapter;
}

export function createHttpClient(options: HttpClientOptions): HttpClient {
  return axios.create({
    timeout: options.timeoutMs,
    maxRedirects: 5,
    headers: {
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      Accept: 'text/html,application/json;q=0.9,*/*;q=0.8',
    },
    ...(options.adapter && { adapter: options.adapter }),
  });
}

export function toTransportError(err: unknown, url: string): TransportError {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
      return new TransportError(`Timed out fetching ${url}`, { url, cause: err });
    }
    if (status !== undefined) {
      return new TransportError(`Upstream responded ${status} for ${url}`, {
        url,
        status,
        cause: err,
      });
    }
    return new TransportError(`Request to ${url} failed: ${err.message}`, { url, cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError(`Request to ${url} failed: ${message}`, { url, cause: err });
}

/** axios hands back the body as a string when it could not parse it as JSON. */
function expectJson(data: unknown, url: string): unknown {
  if (typeof data === 'string') {
    throw new ParseError(`Expected a JSON body from ${url}`);
  }
  return data;
}

export async function getText(
  http: HttpClient,
  url: string,
  params?: Record<string, string>,
): Promise<string> {
  try {
    const response = await http.get<string>(url, { params, responseType: 'text' });
    return response.data;
  } catch (err) {
    throw toTransportError(err, url);
  }
}

export async function getJson(
  http: HttpClient,
  url: string,
  params?: Record<string, string>,
): Promise<unknown> {
  try {
    const response = await http.get<unknown>(url, { params, responseType: 'json' });
    return expectJson(response.data, url);
  } catch (err) {
    throw err instanceof ParseError ? err : toTransportError(err, url);
  }
}

export async function postJson(http: HttpClient, url: string, body: unknown): Promise<unknown> {
  try {
    const response = await http.post<unknown>(url, body, {
      headers: { 'Content-Type': 'application/json' },
      responseType: 'json',
    });
    return expectJson(response.data, url);
  } catch (err) {
    throw err instanceof ParseError ? err : toTransportError(err, url);
  }
}
