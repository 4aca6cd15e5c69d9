/**
 * Bounded retry and polling primitives.
 *
 * These are the only places where an operation suspends. Both honour an
 * AbortSignal: an abort rejects with OperationCancelledError and leaves
 * whatever the caller already persisted untouched.
 */

import { OperationCancelledError, toError } from "../errors";

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export interface BackoffOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  maxAttempts: 4,
  initialDelayMs: 1_000,
  maxDelayMs: 15_000,
  backoffMultiplier: 2,
};

export interface RetryOptions extends Partial<BackoffOptions> {
  description?: string;
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
  sleep?: Sleeper;
}

/**
 * Delay before the attempt following `attempt` (1-based), capped at maxDelayMs.
 */
export function backoffDelay(attempt: number, options: BackoffOptions): number {
  const delay = options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt - 1);
  return Math.min(Math.round(delay), options.maxDelayMs);
}

/**
 * Execute an async operation, retrying failures accepted by `shouldRetry`.
 * The last error is rethrown once attempts run out.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const backoff: BackoffOptions = { ...DEFAULT_BACKOFF, ...pickBackoff(options) };
  const shouldRetry = options.shouldRetry ?? (() => true);
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new OperationCancelledError();
    }
    try {
      return await operation();
    } catch (error) {
      const lastError = toError(error);
      if (attempt >= backoff.maxAttempts || !shouldRetry(lastError)) {
        throw lastError;
      }
      const delayMs = backoffDelay(attempt, backoff);
      options.onRetry?.(lastError, attempt, delayMs);
      await wait(delayMs, options.signal);
    }
  }
}

export interface PollOptions extends Partial<BackoffOptions> {
  signal?: AbortSignal;
  sleep?: Sleeper;
  onAttempt?: (attempt: number, maxAttempts: number) => void;
}

export type PollResult<T> = { done: true; value: T; attempts: number } | { done: false; attempts: number };

/**
 * Call `probe` until it yields a value other than undefined, sleeping with
 * exponential backoff between attempts. Resolves `{ done: false }` when the
 * attempt budget is spent so the caller can raise its own timeout error.
 */
export async function pollUntil<T>(
  probe: () => Promise<T | undefined>,
  options: PollOptions = {}
): Promise<PollResult<T>> {
  const backoff: BackoffOptions = { ...DEFAULT_BACKOFF, ...pickBackoff(options) };
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; attempt <= backoff.maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      throw new OperationCancelledError();
    }
    options.onAttempt?.(attempt, backoff.maxAttempts);
    const value = await probe();
    if (value !== undefined) {
      return { done: true, value, attempts: attempt };
    }
    if (attempt < backoff.maxAttempts) {
      await wait(backoffDelay(attempt, backoff), options.signal);
    }
  }

  return { done: false, attempts: backoff.maxAttempts };
}

function pickBackoff(options: Partial<BackoffOptions>): Partial<BackoffOptions> {
  const picked: Partial<BackoffOptions> = {};
  if (options.maxAttempts !== undefined) picked.maxAttempts = options.maxAttempts;
  if (options.initialDelayMs !== undefined) picked.initialDelayMs = options.initialDelayMs;
  if (options.maxDelayMs !== undefined) picked.maxDelayMs = options.maxDelayMs;
  if (options.backoffMultiplier !== undefined) picked.backoffMultiplier = options.backoffMultiplier;
  return picked;
}
