import pRetry, { AbortError } from "p-retry";
import { setTimeout as sleep } from "timers/promises";
import { RemoteServiceError, errorMessage, normalizeRemoteError } from "../core/errors.js";
import type { EventSink } from "../runs/events.js";

export interface RetryPolicy {
  /** Retries after the first attempt; total attempts is retries + 1. */
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number; cancelled: boolean };

export interface RetryContext {
  /** Event kind prefix, e.g. "dispatch" or "collect.download". */
  label: string;
  events: EventSink;
  signal?: AbortSignal;
  data?: Record<string, string | number>;
}

export function isRetryableError(err: unknown): boolean {
  return err instanceof RemoteServiceError && err.retryable;
}

/**
 * Extra wait on top of the backoff after failed attempt `attemptNumber`:
 * up to a tenth of the base delay, never past the max delay.
 */
export function jitterDelayMs(policy: RetryPolicy, attemptNumber: number, random: () => number = Math.random): number {
  if (!policy.jitter) return 0;
  const maxDelay = Math.max(policy.maxDelayMs, policy.baseDelayMs);
  const backoff = Math.min(policy.baseDelayMs * 2 ** (attemptNumber - 1), maxDelay);
  return Math.round(Math.min(random() * 0.1 * policy.baseDelayMs, maxDelay - backoff));
}

/**
 * Runs fn under exponential backoff: base * 2^n clamped to max, plus
 * jitter when enabled. Only retryable RemoteServiceErrors are retried, and
 * a failure reports the error of the last attempt.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  ctx: RetryContext
): Promise<RetryOutcome<T>> {
  let attempts = 0;
  let lastError: unknown;
  if (ctx.signal?.aborted) return { ok: false, error: ctx.signal.reason, attempts, cancelled: true };

  try {
    const value = await pRetry(
      async (attempt) => {
        attempts = attempt;
        try {
          return await fn(attempt);
        } catch (raw) {
          const err = normalizeRemoteError(raw);
          lastError = err;
          if (ctx.signal?.aborted || !isRetryableError(err)) {
            throw new AbortError(err instanceof Error ? err : new Error(errorMessage(err)));
          }
          throw err;
        }
      },
      {
        retries: policy.retries,
        factor: 2,
        minTimeout: policy.baseDelayMs,
        maxTimeout: Math.max(policy.maxDelayMs, policy.baseDelayMs),
        randomize: false,
        signal: ctx.signal,
        onFailedAttempt: async (error) => {
          ctx.events.event(
            `${ctx.label}.attempt_failed`,
            error.message,
            {
              ...(ctx.data ?? {}),
              attempt: error.attemptNumber,
              retries_left: error.retriesLeft,
              category: error instanceof RemoteServiceError ? error.category : "unclassified"
            },
            "warn"
          );
          const jitter = error.retriesLeft > 0 ? jitterDelayMs(policy, error.attemptNumber) : 0;
          if (jitter > 0) await sleep(jitter, undefined, { signal: ctx.signal });
        }
      }
    );
    return { ok: true, value, attempts };
  } catch (err) {
    // p-retry rethrows the most frequent error; callers want the last one.
    const error = lastError ?? err;
    return { ok: false, error, attempts, cancelled: ctx.signal?.aborted ?? false };
  }
}
