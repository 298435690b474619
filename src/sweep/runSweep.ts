import { buildCombinationsFromConfig, type Combination } from "../combos/builder.js";
import { renderConfigYaml, type SweepConfig } from "../config/sweepConfig.js";
import { requireApiToken, type SweepEnv } from "../config/env.js";
import { newSweepRunId, type ComboHash, type SweepRunId } from "../core/ids.js";
import { dispatchCombinations } from "../dispatch/dispatcher.js";
import type { PolicyEngine } from "../policy/policy.js";
import { ReplicateClient } from "../remote/replicateClient.js";
import type { RemoteJobClient } from "../remote/types.js";
import { silentEventSink, type EventSink } from "../runs/events.js";
import { ResultCollector, failedRecord, type CollectedResult } from "../store/resultCollector.js";
import type { PersistedResult } from "../store/sweepLog.js";
import { sweepLayout, writeFileAtomic } from "../store/sweepLayout.js";
import { SharpThumbnailer, type Thumbnailer } from "../store/thumbnail.js";

export interface PlanOptions {
  /** Every combination is pending, whatever the log says. */
  overwrite?: boolean;
  /** Hashes whose latest record failed are run again. */
  retryFailed?: boolean;
}

export interface SweepPlan {
  pending: Combination[];
  alreadySucceeded: Combination[];
  previouslyFailed: Combination[];
}

export function planSweep(
  combinations: readonly Combination[],
  priorLatest: ReadonlyMap<ComboHash, PersistedResult>,
  opts: PlanOptions = {}
): SweepPlan {
  const plan: SweepPlan = { pending: [], alreadySucceeded: [], previouslyFailed: [] };
  const seen = new Set<ComboHash>();
  for (const combo of combinations) {
    // Repeated values yield the same hash; it is planned once.
    if (seen.has(combo.hash)) continue;
    seen.add(combo.hash);
    const prior = priorLatest.get(combo.hash);
    if (prior?.status === "succeeded") plan.alreadySucceeded.push(combo);
    if (prior?.status === "failed") plan.previouslyFailed.push(combo);

    if (opts.overwrite || !prior || (prior.status === "failed" && opts.retryFailed)) {
      plan.pending.push(combo);
    }
  }
  return plan;
}

export interface RunSweepInput extends PlanOptions {
  config: SweepConfig;
  client: RemoteJobClient;
  policy: PolicyEngine;
  concurrency?: number;
  /** Takes precedence over meta.output_dir. */
  outputDir?: string | null;
  thumbnailer?: Thumbnailer;
  events?: EventSink;
  signal?: AbortSignal;
  runId?: SweepRunId;
  /** Prebuilt combinations; built from the config when absent. */
  combinations?: readonly Combination[];
}

export interface SweepSummary {
  runId: SweepRunId;
  sweepDir: string;
  total: number;
  pending: number;
  alreadySucceeded: number;
  succeeded: number;
  failed: number;
  skipped: number;
  results: CollectedResult[];
  exitCode: 0 | 1;
}

export function createSweepClient(env: SweepEnv, policy: PolicyEngine): ReplicateClient {
  const remote = policy.remoteSettings();
  return new ReplicateClient({
    apiToken: requireApiToken(env),
    baseUrl: remote.apiBaseUrl,
    pollIntervalMs: remote.pollIntervalMs,
    requestTimeoutMs: remote.requestTimeoutMs
  });
}

/**
 * Runs every combination the log does not already account for, collecting
 * outputs as jobs finish. Re-running with nothing pending dispatches nothing.
 */
export async function runSweep(input: RunSweepInput): Promise<SweepSummary> {
  const { config, policy } = input;
  const events = input.events ?? silentEventSink;
  const runId = input.runId ?? newSweepRunId();

  policy.assertModelAllowed(config.meta.base_model);
  const concurrency = policy.enforceConcurrency(input.concurrency ?? config.meta.concurrency);
  const combinations = input.combinations ?? buildCombinationsFromConfig(config, { events });
  policy.enforceCombinationCount(combinations.length);

  const layout = sweepLayout(input.outputDir ?? config.meta.output_dir, config.meta.name);
  await writeFileAtomic(layout.configPath, renderConfigYaml(config));

  const collector = new ResultCollector({
    layout,
    runId,
    client: input.client,
    downloadRetry: policy.downloadRetry(),
    thumbnailer: input.thumbnailer ?? new SharpThumbnailer(),
    overwrite: input.overwrite,
    events,
    signal: input.signal
  });

  const plan = planSweep(combinations, await collector.loadLatest(), input);
  events.event("sweep.plan", `${plan.pending.length} of ${combinations.length} combinations pending`, {
    run_id: runId,
    sweep: config.meta.name,
    total: combinations.length,
    pending: plan.pending.length,
    already_succeeded: plan.alreadySucceeded.length,
    previously_failed: plan.previouslyFailed.length
  });

  const collected = new Map<ComboHash, CollectedResult>();
  const jobs = await dispatchCombinations(plan.pending, {
    concurrency,
    client: input.client,
    modelId: config.meta.base_model,
    retry: policy.submitRetry(),
    events,
    signal: input.signal,
    onResult: async (result) => {
      collected.set(result.hash, await collector.collect(result));
    }
  });

  const results = jobs.map((job): CollectedResult => {
    const r = collected.get(job.hash);
    if (r) return r;
    // Collecting threw, so the dispatcher already turned the job into a persistence failure.
    return job.status === "failed"
      ? failedRecord(job, runId)
      : { status: "skipped", _hash: job.hash, params: job.params, reason: "not_collected" };
  });

  const count = (status: CollectedResult["status"]) => results.filter((r) => r.status === status).length;
  const summary: SweepSummary = {
    runId,
    sweepDir: layout.rootDir,
    total: combinations.length,
    pending: plan.pending.length,
    alreadySucceeded: plan.alreadySucceeded.length,
    succeeded: count("succeeded"),
    failed: count("failed"),
    skipped: count("skipped"),
    results,
    exitCode: count("failed") > 0 ? 1 : 0
  };

  events.event("sweep.done", `sweep ${config.meta.name} finished`, {
    run_id: runId,
    succeeded: summary.succeeded,
    failed: summary.failed,
    skipped: summary.skipped
  });
  return summary;
}
