import { formatKey, type SourceMessageKey } from './types.js';

/** Connectivity failure, timeout, rate limit or server error. Worth retrying. */
export class TransientNetworkError extends Error {
  constructor(
    message: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'TransientNetworkError';
  }
}

/** The destination rejected the request for a reason retrying will not fix. */
export class DestinationApiError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'DestinationApiError';
  }
}

export class DuplicateKeyError extends Error {
  constructor(public readonly key: SourceMessageKey) {
    super(`Correlation already exists for ${formatKey(key)}`);
    this.name = 'DuplicateKeyError';
  }
}

export function isAbortError(err: unknown): err is Error {
  return err instanceof Error && err.name === 'AbortError';
}
