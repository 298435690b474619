import pLimit from "p-limit";
import { errorMessage, summarizeError, type ErrorSummary } from "../core/errors.js";
import type { ComboHash } from "../core/ids.js";
import type { Combination } from "../combos/builder.js";
import { visibleParams } from "../combos/comboHash.js";
import type { ArtifactReference, RemoteJobClient, SubmissionPayload } from "../remote/types.js";
import { silentEventSink, type EventSink } from "../runs/events.js";
import { DEFAULT_COERCIONS, toSubmissionPayload, type CoercionTable } from "./coerce.js";
import { withRetry, type RetryPolicy } from "./retry.js";

interface JobResultBase {
  hash: ComboHash;
  submittedAt: string;
  durationMs: number;
  attempts: number;
  /** The coerced payload, or the visible parameters when none could be built. */
  params: SubmissionPayload;
}

export interface SucceededJob extends JobResultBase {
  status: "succeeded";
  artifacts: ArtifactReference[];
}

export interface FailedJob extends JobResultBase {
  status: "failed";
  error: ErrorSummary;
  /** false when the payload was rejected before reaching the remote service. */
  submitted: boolean;
  /** Set when the remote job succeeded but collecting its output failed. */
  remoteSucceeded?: boolean;
}

export interface SkippedJob extends JobResultBase {
  status: "skipped";
  reason: string;
}

export type JobResult = SucceededJob | FailedJob | SkippedJob;

export interface DispatchOptions {
  concurrency: number;
  client: RemoteJobClient;
  modelId: string;
  retry: RetryPolicy;
  events?: EventSink;
  signal?: AbortSignal;
  coercions?: CoercionTable;
  /**
   * Runs once the submission slot is free again, e.g. to download outputs.
   * A rejection fails that combination only.
   */
  onResult?: (result: JobResult, combo: Combination) => Promise<void>;
}

function skipped(combo: Combination, reason: string, attempts = 0, durationMs = 0): SkippedJob {
  return {
    status: "skipped",
    hash: combo.hash,
    submittedAt: new Date().toISOString(),
    durationMs,
    attempts,
    params: visibleParams(combo.params),
    reason
  };
}

async function dispatchOne(combo: Combination, opts: DispatchOptions, events: EventSink): Promise<JobResult> {
  if (opts.signal?.aborted) return skipped(combo, "cancelled");

  const submittedAt = new Date().toISOString();
  const started = Date.now();

  let payload: SubmissionPayload;
  try {
    payload = toSubmissionPayload(combo.params, opts.coercions ?? DEFAULT_COERCIONS);
  } catch (err) {
    const error = summarizeError(err);
    events.event("dispatch.failed", error.message, { hash: combo.hash, category: error.category, submitted: false }, "error");
    return {
      status: "failed",
      hash: combo.hash,
      submittedAt,
      durationMs: 0,
      attempts: 0,
      params: visibleParams(combo.params),
      error,
      submitted: false
    };
  }

  events.event("dispatch.submit", `submitting ${combo.hash}`, { hash: combo.hash, model: opts.modelId });
  const outcome = await withRetry(() => opts.client.submit(opts.modelId, payload, { signal: opts.signal }), opts.retry, {
    label: "dispatch",
    events,
    signal: opts.signal,
    data: { hash: combo.hash }
  });
  const durationMs = Date.now() - started;

  if (outcome.ok) {
    events.event("dispatch.succeeded", `job ${combo.hash} succeeded`, {
      hash: combo.hash,
      attempts: outcome.attempts,
      duration_ms: durationMs,
      artifacts: outcome.value.length
    });
    return { status: "succeeded", hash: combo.hash, submittedAt, durationMs, attempts: outcome.attempts, params: payload, artifacts: outcome.value };
  }

  if (outcome.cancelled) {
    events.event("dispatch.skipped", `job ${combo.hash} cancelled`, { hash: combo.hash, attempts: outcome.attempts }, "warn");
    return { ...skipped(combo, "cancelled", outcome.attempts, durationMs), submittedAt, params: payload };
  }

  const error = summarizeError(outcome.error);
  events.event(
    "dispatch.failed",
    error.message,
    { hash: combo.hash, category: error.category, attempts: outcome.attempts, duration_ms: durationMs },
    "error"
  );
  return { status: "failed", hash: combo.hash, submittedAt, durationMs, attempts: outcome.attempts, params: payload, error, submitted: true };
}

async function settle(result: JobResult, combo: Combination, opts: DispatchOptions, events: EventSink): Promise<JobResult> {
  if (!opts.onResult) return result;
  try {
    await opts.onResult(result, combo);
    return result;
  } catch (err) {
    const message = `collect failed: ${errorMessage(err)}`;
    events.event("dispatch.collect_failed", message, { hash: result.hash, status: result.status }, "error");
    return {
      status: "failed",
      hash: result.hash,
      submittedAt: result.submittedAt,
      durationMs: result.durationMs,
      attempts: result.attempts,
      params: result.params,
      error: { category: "persistence", message },
      submitted: result.status === "failed" ? result.submitted : result.status === "succeeded",
      remoteSucceeded: result.status === "succeeded"
    };
  }
}

/**
 * Submits every combination through a pool of at most `concurrency`
 * in-flight jobs. One job's failure never stops the others. Results come
 * back in input order.
 */
export async function dispatchCombinations(pending: readonly Combination[], opts: DispatchOptions): Promise<JobResult[]> {
  if (!Number.isInteger(opts.concurrency) || opts.concurrency < 1) {
    throw new RangeError(`concurrency must be an integer >= 1 (got ${opts.concurrency})`);
  }
  const events = opts.events ?? silentEventSink;
  const limit = pLimit(opts.concurrency);

  events.event("dispatch.start", `dispatching ${pending.length} combinations`, {
    count: pending.length,
    concurrency: opts.concurrency,
    model: opts.modelId
  });

  const results = await Promise.all(
    pending.map(async (combo) => {
      const result = await limit(() => dispatchOne(combo, opts, events));
      return settle(result, combo, opts, events);
    })
  );

  const count = (status: JobResult["status"]) => results.filter((r) => r.status === status).length;
  events.event("dispatch.done", `dispatched ${results.length} combinations`, {
    succeeded: count("succeeded"),
    failed: count("failed"),
    skipped: count("skipped")
  });
  return results;
}
