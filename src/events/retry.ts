import {TransientSyncError, describeError} from './errors.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Label used in log lines, e.g. "create 3f2a…". */
  label?: string;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  isRetryable?: (error: unknown) => boolean;
}

/**
 * Thrown once an operation stops being retried. `exhausted` tells a run
 * of transient failures apart from a first non-retryable one.
 */
export class RetryError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
    readonly exhausted: boolean,
  ) {
    super(
      lastError instanceof Error ? lastError.message : String(lastError),
      {cause: lastError},
    );
    this.name = 'RetryError';
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, {once: true});
  });
}

/**
 * Settles with `promise`, or rejects with the signal's reason as soon as
 * it aborts. The underlying work is not cancelled.
 */
export function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, {once: true});
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/** Exponential backoff: base, 2x base, 4x base … capped at maxDelayMs. */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  return Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1));
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const isRetryable =
    options.isRetryable ?? ((error: unknown) => error instanceof TransientSyncError);
  const wait = options.sleep ?? sleep;
  const label = options.label ?? 'operation';

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryable(error)) {
        throw new RetryError(attempt, error, false);
      }
      if (attempt >= options.maxAttempts) {
        console.error(
          `[Retry] [${new Date().toISOString()}] ${label} failed after ${attempt} attempts:`,
          describeError(error),
        );
        throw new RetryError(attempt, error, true);
      }
      const delay = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      console.warn(
        `[Retry] ${label} attempt ${attempt}/${options.maxAttempts} failed, retrying in ${delay}ms:`,
        describeError(error),
      );
      await wait(delay, options.signal);
    }
  }
}
