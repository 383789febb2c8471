/**
 * Search Timeout
 *
 * A search cannot be left running in the background after its caller has
 * given up, so the timeout aborts the search's AbortSignal instead of racing
 * it. The walker and the worker pool stop dispatching, the in-flight file
 * tasks settle, and only then does the call reject with TimeoutError.
 */

import { DEFAULT_TIMEOUT_MS, SEARCH_TIMEOUT_MS } from '../config.js';

/** Maximum timeout in milliseconds */
export const MAX_TIMEOUT = 300000;

/** Minimum timeout to prevent instant failures */
export const MIN_TIMEOUT = 100;

/**
 * Clamp a requested timeout to [MIN_TIMEOUT, MAX_TIMEOUT].
 *
 * @example
 * getEffectiveTimeout(10)      // 100
 * getEffectiveTimeout(1000000) // 300000
 */
export function getEffectiveTimeout(requested: number = SEARCH_TIMEOUT_MS): number {
  if (!Number.isFinite(requested)) return DEFAULT_TIMEOUT_MS;
  return Math.max(MIN_TIMEOUT, Math.min(requested, MAX_TIMEOUT));
}

/**
 * Custom error class for timeout errors
 */
export class TimeoutError extends Error {
  public readonly timeoutMs: number;
  public readonly code = 'TIMEOUT';

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Run `fn` with a signal that aborts after `timeoutMs`.
 *
 * `fn` is expected to honor the signal; the returned promise settles when
 * `fn` does. If the signal fired, the rejection is the TimeoutError, or an
 * AbortError when `parentSignal` aborted first.
 *
 * @example
 * const result = await withTimeout(
 *   (signal) => engine.searchContent(params, signal),
 *   5000,
 *   'search_content'
 * );
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string = 'Operation',
  parentSignal?: AbortSignal
): Promise<T> {
  const effectiveTimeout = getEffectiveTimeout(timeoutMs);
  const controller = new AbortController();

  const timeoutId = setTimeout(() => {
    controller.abort(new TimeoutError(
      `${operation} timed out after ${effectiveTimeout}ms`,
      effectiveTimeout
    ));
  }, effectiveTimeout);

  // A caller's cancellation reaches fn as an AbortError, whatever its reason
  const onParentAbort = (): void => controller.abort(cancellationError(operation));
  if (parentSignal?.aborted) {
    onParentAbort();
  } else {
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  }

  try {
    return await fn(controller.signal);
  } finally {
    clearTimeout(timeoutId);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}

function cancellationError(operation: string): Error {
  const error = new Error(`${operation} was cancelled`);
  error.name = 'AbortError';
  return error;
}

/**
 * Get timeout configuration info for debugging
 */
export function getTimeoutConfig(): {
  timeoutMs: number;
  minTimeout: number;
  maxTimeout: number;
} {
  return {
    timeoutMs: getEffectiveTimeout(SEARCH_TIMEOUT_MS),
    minTimeout: MIN_TIMEOUT,
    maxTimeout: MAX_TIMEOUT,
  };
}
