import {
  CancelledError,
  classifyFailure,
  type FailureClass,
  HttpStatusError,
} from "./errors.js";
import type { Pacer } from "./pacing.js";
import { type Clock, sleep, systemClock, throwIfAborted } from "./timing.js";
import type { OutcomeClassification, Surface } from "./types.js";

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  classify?: (err: unknown) => FailureClass;
  /** Runs before every attempt, e.g. to wait for a pacing permit. */
  beforeAttempt?: (attempt: number) => Promise<void>;
  /** Called exactly once per completed attempt. */
  onAttempt?: (
    outcome: OutcomeClassification,
    latencyMs: number,
    err?: unknown,
  ) => void;
  signal?: AbortSignal;
  clock?: Clock;
  random?: () => number;
}

export function outcomeFor(failure: FailureClass): OutcomeClassification {
  return failure === "throttled" ? "throttled" : "error";
}

/**
 * Exponential backoff with 10% jitter, never shorter than a server-sent
 * Retry-After.
 */
export function backoffDelay(
  attempt: number,
  err: unknown,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random,
): number {
  const delay = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
  const jitter = delay * 0.1 * random();
  const retryAfter =
    err instanceof HttpStatusError ? (err.retryAfterMs ?? 0) : 0;
  return Math.max(delay + jitter, retryAfter);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? 3;
  const baseDelay = opts.baseDelayMs ?? 1000;
  const maxDelay = opts.maxDelayMs ?? 30_000;
  const classify = opts.classify ?? classifyFailure;
  const clock = opts.clock ?? systemClock;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    throwIfAborted(opts.signal);
    await opts.beforeAttempt?.(attempt);

    const started = clock();
    try {
      const result = await fn(attempt);
      opts.onAttempt?.("success", clock() - started);
      return result;
    } catch (err) {
      lastError = err;
      // A cancelled attempt never reached the remote side.
      if (err instanceof CancelledError) throw err;

      const failure = classify(err);
      opts.onAttempt?.(outcomeFor(failure), clock() - started, err);
      if (attempt === maxRetries || failure === "fatal") {
        throw err;
      }
      await sleep(
        backoffDelay(attempt, err, baseDelay, maxDelay, opts.random),
        opts.signal,
      );
    }
  }
  throw lastError;
}

export type PacedRetryOptions = Omit<RetryOptions, "beforeAttempt" | "clock">;

/**
 * Runs `fn` under `withRetry`, taking a permit from the surface's controller
 * before each attempt and reporting every attempt's outcome back to it.
 */
export function pacedRetry<T>(
  pacer: Pacer,
  surface: Surface,
  fn: (attempt: number) => Promise<T>,
  opts: PacedRetryOptions = {},
): Promise<T> {
  return withRetry(fn, {
    ...opts,
    clock: pacer.clock,
    beforeAttempt: () => pacer.acquire(surface, opts.signal),
    onAttempt: (classification, latencyMs, err) => {
      pacer.report({ surface, at: pacer.clock(), classification, latencyMs });
      opts.onAttempt?.(classification, latencyMs, err);
    },
  });
}
