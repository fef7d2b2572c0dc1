import type { ZodIssue } from 'zod';

export type ErrorKind = 'transport' | 'remote' | 'decode' | 'cancelled';

export type ApiErrorBody = { error?: string; message?: string };

abstract class PoolscopeError extends Error {
  abstract readonly kind: ErrorKind;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Connection failure or timeout. Retrying is left to the caller.
export class TransportError extends PoolscopeError {
  readonly kind = 'transport' as const;
  constructor(readonly url: string, cause?: unknown) {
    super(`transport failed for ${url}: ${toErrorMessage(cause)}`, { cause });
  }
}

export class RemoteError extends PoolscopeError {
  readonly kind = 'remote' as const;
  constructor(readonly status: number, readonly body: string, readonly apiError?: ApiErrorBody) {
    super(`HTTP ${status}${apiError?.error ? `: ${apiError.error}` : ''}${apiError?.message ? ` (${apiError.message})` : ''}`);
  }
}

export class DecodeError extends PoolscopeError {
  readonly kind = 'decode' as const;
  constructor(readonly endpoint: string, readonly issues: readonly ZodIssue[], cause?: unknown) {
    const first = issues[0];
    const where = first ? ` at ${first.path.join('.') || '<root>'}: ${first.message}` : '';
    super(`unexpected response shape from ${endpoint}${where}`, { cause });
  }
}

export class CancellationError extends PoolscopeError {
  readonly kind = 'cancelled' as const;
  constructor(reason?: unknown) {
    super(reason === undefined ? 'operation cancelled' : `operation cancelled: ${toErrorMessage(reason)}`, { cause: reason });
  }
}

export type AnyPoolscopeError = TransportError | RemoteError | DecodeError | CancellationError;

export function isPoolscopeError(e: unknown): e is AnyPoolscopeError {
  return e instanceof TransportError || e instanceof RemoteError || e instanceof DecodeError || e instanceof CancellationError;
}

export function toErrorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === 'string') return e;
  return String(e ?? 'error');
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancellationError(signal.reason);
}
