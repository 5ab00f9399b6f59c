import { TransientNetworkError } from '../bridge/errors.js';
import * as log from './logger.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Bounds each attempt; the attempt's signal aborts when it elapses. */
  attemptTimeoutMs?: number;
  signal?: AbortSignal;
  /** Prefix for retry log lines. */
  label?: string;
}

const DEFAULTS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

/**
 * Retry with exponential backoff + jitter.
 * Only TransientNetworkError is retried; a Retry-After hint wins over backoff.
 * Aborting `signal` stops both the running attempt and the wait between attempts.
 */
export async function retryWithBackoff<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  opts: Partial<RetryOptions> = {},
): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs, attemptTimeoutMs, signal, label } = { ...DEFAULTS, ...opts };

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    signal?.throwIfAborted();

    try {
      return await fn(attemptSignal(signal, attemptTimeoutMs));
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt === maxRetries || !isRetryable(lastError) || signal?.aborted) {
        throw lastError;
      }

      const backoffDelay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
      const jitter = backoffDelay * 0.5 * Math.random();
      const retryAfterMs = lastError instanceof TransientNetworkError ? lastError.retryAfterMs : undefined;
      const waitMs = retryAfterMs ?? (backoffDelay + jitter);

      log.warn(`${label ? `${label}: ` : ''}retry ${attempt + 1}/${maxRetries} after ${Math.round(waitMs)}ms: ${lastError.message}`);
      await sleep(waitMs, signal);
    }
  }

  throw lastError ?? new Error('retryWithBackoff: no attempt made');
}

function isRetryable(err: Error): boolean {
  return err instanceof TransientNetworkError;
}

function attemptSignal(signal: AbortSignal | undefined, timeoutMs: number | undefined): AbortSignal {
  const signals: AbortSignal[] = [];
  if (signal) signals.push(signal);
  if (timeoutMs !== undefined && timeoutMs > 0) signals.push(AbortSignal.timeout(timeoutMs));
  return signals.length === 0 ? new AbortController().signal : AbortSignal.any(signals);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    function onAbort(): void {
      clearTimeout(timer);
      reject(abortReason(signal));
    }

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Settles with `promise`, or rejects with the signal's reason once it aborts first. */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(abortReason(signal));

  return new Promise<T>((resolve, reject) => {
    function onAbort(): void {
      reject(abortReason(signal));
    }
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  const err = new Error('Aborted');
  err.name = 'AbortError';
  return err;
}
