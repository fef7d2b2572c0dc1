import { request, errors as undiciErrors } from 'undici';
import { CancellationError, TransportError } from './errors.js';

export type TransportRequest = { url: string; timeoutMs: number; signal?: AbortSignal };
export type TransportResponse = { status: number; body: string };

/** Issues one HTTP GET. Implementations reject with TransportError or CancellationError only. */
export type Transport = (req: TransportRequest) => Promise<TransportResponse>;

function combine(timeoutMs: number, caller?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return caller ? AbortSignal.any([caller, timeout]) : timeout;
}

export const undiciTransport: Transport = async ({ url, timeoutMs, signal }) => {
  try {
    const res = await request(url, {
      method: 'GET',
      headers: { accept: 'application/json' },
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      signal: combine(timeoutMs, signal),
    });
    const body = await res.body.text();
    return { status: res.statusCode, body };
  } catch (e) {
    if (signal?.aborted) throw new CancellationError(signal.reason);
    if (e instanceof undiciErrors.HeadersTimeoutError || e instanceof undiciErrors.BodyTimeoutError) {
      throw new TransportError(url, new Error(`timeout after ${timeoutMs}ms`));
    }
    throw new TransportError(url, e);
  }
};
