import { promises as fs } from "fs";
import path from "path";
import { PersistenceError, errorMessage, summarizeError } from "../core/errors.js";
import type { ComboHash } from "../core/ids.js";
import type { FailedJob, JobResult, SucceededJob } from "../dispatch/dispatcher.js";
import { withRetry, type RetryPolicy } from "../dispatch/retry.js";
import type { RemoteJobClient, SubmissionValue } from "../remote/types.js";
import { silentEventSink, type EventSink } from "../runs/events.js";
import { SweepLog, latestPerHash, type PersistedResult } from "./sweepLog.js";
import { fileExists, outputExtension, writeFileAtomic, type SweepLayout } from "./sweepLayout.js";
import type { Thumbnailer } from "./thumbnail.js";

export interface SkippedRecord {
  status: "skipped";
  _hash: ComboHash;
  params: Record<string, SubmissionValue>;
  reason: string;
}

export type CollectedResult = PersistedResult | SkippedRecord;

export interface ResultCollectorOptions {
  layout: SweepLayout;
  runId: string;
  client: RemoteJobClient;
  downloadRetry: RetryPolicy;
  thumbnailer: Thumbnailer;
  overwrite?: boolean;
  events?: EventSink;
  signal?: AbortSignal;
}

function relativeTo(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join("/");
}

/** Log record for a job that ended failed, before or after reaching the remote service. */
export function failedRecord(result: FailedJob, runId: string): PersistedResult {
  return {
    status: "failed",
    _hash: result.hash,
    params: result.params,
    timestamp: new Date().toISOString(),
    duration_ms: result.durationMs,
    attempts: result.attempts,
    run_id: runId,
    remote_status: result.remoteSucceeded ? "succeeded" : result.submitted ? "failed" : "not_submitted",
    error: result.error
  };
}

export class ResultCollector {
  readonly log: SweepLog;
  private readonly events: EventSink;

  constructor(private readonly opts: ResultCollectorOptions) {
    this.events = opts.events ?? silentEventSink;
    this.log = new SweepLog(opts.layout.logPath, this.events);
  }

  /** A hash is complete once its params.json marker exists. */
  isComplete(hash: ComboHash): Promise<boolean> {
    return fileExists(this.opts.layout.paramsPath(hash));
  }

  async collect(result: JobResult): Promise<CollectedResult> {
    switch (result.status) {
      case "skipped":
        return { status: "skipped", _hash: result.hash, params: result.params, reason: result.reason };
      case "failed": {
        const record = failedRecord(result, this.opts.runId);
        await this.log.append(record);
        return record;
      }
      case "succeeded":
        return this.collectSucceeded(result);
    }
  }

  private async collectSucceeded(result: SucceededJob): Promise<CollectedResult> {
    const { layout } = this.opts;
    const hash = result.hash;

    if (!this.opts.overwrite && (await this.isComplete(hash))) {
      this.events.event("collect.exists", `output for ${hash} already exists`, { hash });
      return { status: "skipped", _hash: hash, params: result.params, reason: "already_exists" };
    }
    const base = {
      _hash: hash,
      params: result.params,
      duration_ms: result.durationMs,
      attempts: result.attempts,
      run_id: this.opts.runId,
      remote_status: "succeeded" as const
    };

    const reference = result.artifacts[0];
    let record: PersistedResult;
    try {
      if (reference === undefined) {
        throw new PersistenceError("remote job returned no output", "download");
      }

      const download = await withRetry(() => this.opts.client.fetch(reference, { signal: this.opts.signal }), this.opts.downloadRetry, {
        label: "collect.download",
        events: this.events,
        signal: this.opts.signal,
        data: { hash }
      });
      if (!download.ok && download.cancelled) {
        return { status: "skipped", _hash: hash, params: result.params, reason: "cancelled" };
      }
      if (!download.ok) {
        throw new PersistenceError(`download failed: ${errorMessage(download.error)}`, "download", download.error);
      }

      const outputPath = layout.outputPath(hash, outputExtension(reference));
      await this.writeStage("write", () => writeFileAtomic(outputPath, download.value));
      // New output is on disk; the old marker must not vouch for it until params.json is rewritten.
      await this.writeStage("write", () => fs.rm(layout.paramsPath(hash), { force: true }));

      const thumbPath = layout.thumbPath(hash);
      const thumb = await this.writeStage("thumbnail", () => this.opts.thumbnailer.thumbnail(download.value));
      await this.writeStage("write", () => writeFileAtomic(thumbPath, thumb));

      const marker = { _hash: hash, ...result.params };
      await this.writeStage("write", () => writeFileAtomic(layout.paramsPath(hash), `${JSON.stringify(marker, null, 2)}\n`));

      record = {
        status: "succeeded",
        ...base,
        timestamp: new Date().toISOString(),
        result_url: reference,
        output_path: relativeTo(layout.rootDir, outputPath),
        thumb_path: relativeTo(layout.rootDir, thumbPath)
      };
      this.events.event("collect.saved", `saved output for ${hash}`, { hash, output_path: record.output_path ?? null });
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      record = {
        status: "failed",
        ...base,
        timestamp: new Date().toISOString(),
        ...(reference !== undefined ? { result_url: reference } : {}),
        error: summarizeError(err)
      };
      this.events.event("collect.failed", err.message, { hash, stage: err.stage }, "error");
    }

    await this.log.append(record);
    return record;
  }

  private async writeStage<T>(stage: PersistenceError["stage"], fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new PersistenceError(`${stage} failed: ${errorMessage(err)}`, stage, err);
    }
  }

  /** Latest succeeded record per hash, by log order. */
  async load(): Promise<Map<ComboHash, PersistedResult>> {
    return latestPerHash(await this.log.replay(), "succeeded");
  }

  /** Latest record of any status per hash, by log order. */
  async loadLatest(): Promise<Map<ComboHash, PersistedResult>> {
    return latestPerHash(await this.log.replay());
  }
}
