/**
 * Unit Tests — Upstream HTTP Client
 *
 * Every failure mode of a fetch must come out as a TransportError naming
 * the URL, and a JSON endpoint answering with something else is a
 * ParseError. The transport is stubbed in-process.
 */
import type { InternalAxiosRequestConfig } from 'axios';

import { createHttpClient, getJson, getText, postJson } from '@infrastructure/http/httpClient';
import { DEFAULT_USER_AGENT } from '@shared/constants';
import { ParseError, TransportError } from '@shared/errors/AppError';

import { answering, failingWith } from '../helpers/axiosStub';

const ENDPOINT = 'https://funds.example.com/list';

describe('httpClient', () => {
  it('should send the browser-like User-Agent and query params', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const http = createHttpClient({ timeoutMs: 5000, adapter: answering(200, { ok: true }, seen) });

    await expect(getJson(http, ENDPOINT, { page: '2' })).resolves.toEqual({ ok: true });
    expect(seen[0].headers.get('User-Agent')).toBe(DEFAULT_USER_AGENT);
    expect(seen[0].params).toEqual({ page: '2' });
    expect(seen[0].timeout).toBe(5000);
  });

  it('should return page text from getText()', async () => {
    const http = createHttpClient({ timeoutMs: 1000, adapter: answering(200, '<html></html>') });

    await expect(getText(http, ENDPOINT)).resolves.toBe('<html></html>');
  });

  it('should report the upstream status on non-2xx answers', async () => {
    const http = createHttpClient({ timeoutMs: 1000, adapter: answering(404, 'missing') });

    const error = await getText(http, ENDPOINT).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: `Upstream responded 404 for ${ENDPOINT}`,
      url: ENDPOINT,
      upstreamStatus: 404,
      statusCode: 502,
    });
  });

  it('should describe timeouts as such', async () => {
    const http = createHttpClient({ timeoutMs: 1000, adapter: failingWith('ECONNABORTED') });

    await expect(postJson(http, ENDPOINT, {})).rejects.toThrow(`Timed out fetching ${ENDPOINT}`);
  });

  it('should wrap connection failures', async () => {
    const http = createHttpClient({ timeoutMs: 1000, adapter: failingWith('ECONNREFUSED') });

    await expect(getJson(http, ENDPOINT)).rejects.toThrow(
      `Request to ${ENDPOINT} failed: transport failed: ECONNREFUSED`,
    );
  });

  it('should reject a JSON endpoint that answers with text', async () => {
    const http = createHttpClient({ timeoutMs: 1000, adapter: answering(200, 'not json') });

    await expect(getJson(http, ENDPOINT)).rejects.toBeInstanceOf(ParseError);
  });
});
