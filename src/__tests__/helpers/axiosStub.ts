/**
 * In-process axios transport. Requests never leave the test process; each
 * one is recorded in `seen` and answered with the scripted status and body.
 * Non-2xx answers reject the way axios' own transports do.
 */
import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';

export function answering(
  status: number,
  data: unknown,
  seen: InternalAxiosRequestConfig[] = [],
): AxiosAdapter {
  return async (requestConfig) => {
    seen.push(requestConfig);
    const response = {
      data,
      status,
      statusText: String(status),
      headers: {},
      config: requestConfig,
    };
    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        AxiosError.ERR_BAD_RESPONSE,
        requestConfig,
        undefined,
        response,
      );
    }
    return response;
  };
}

/** A transport that fails before any response, with the given error code. */
export function failingWith(code: string): AxiosAdapter {
  return async (requestConfig) => {
    throw new AxiosError(`transport failed: ${code}`, code, requestConfig);
  };
}
