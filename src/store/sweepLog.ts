import { promises as fs } from "fs";
import path from "path";
import pLimit from "p-limit";
import * as z from "zod/v4";
import { PersistenceError, errorMessage, type ErrorCategory } from "../core/errors.js";
import { isComboHash, type ComboHash } from "../core/ids.js";
import type { SubmissionValue } from "../remote/types.js";
import { silentEventSink, type EventSink } from "../runs/events.js";

export type RemoteStatus = "succeeded" | "failed" | "not_submitted";

/** One line of sweep_log.jsonl. Written once, never edited. */
export interface PersistedResult {
  status: "succeeded" | "failed";
  _hash: ComboHash;
  params: Record<string, SubmissionValue>;
  timestamp: string;
  duration_ms: number;
  attempts: number;
  run_id: string;
  remote_status: RemoteStatus;
  result_url?: string;
  output_path?: string;
  thumb_path?: string;
  error?: { category: ErrorCategory; message: string };
}

const zErrorCategory = z.enum([
  "rate_limited",
  "transient_transport",
  "server_fault",
  "invalid_input",
  "auth",
  "persistence",
  "unclassified"
]);

const zPersistedResult = z.looseObject({
  status: z.enum(["succeeded", "failed"]),
  _hash: z.string(),
  params: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])),
  timestamp: z.string(),
  duration_ms: z.number(),
  attempts: z.number().int(),
  run_id: z.string(),
  remote_status: z.enum(["succeeded", "failed", "not_submitted"]),
  result_url: z.string().optional(),
  output_path: z.string().optional(),
  thumb_path: z.string().optional(),
  error: z.object({ category: zErrorCategory, message: z.string() }).optional()
});

export function parseLogLine(line: string): PersistedResult | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line) as unknown;
  } catch {
    return null;
  }
  const parsed = zPersistedResult.safeParse(raw);
  if (!parsed.success) return null;
  const { _hash, ...rest } = parsed.data;
  if (!isComboHash(_hash)) return null;
  return {
    status: rest.status,
    _hash,
    params: rest.params,
    timestamp: rest.timestamp,
    duration_ms: rest.duration_ms,
    attempts: rest.attempts,
    run_id: rest.run_id,
    remote_status: rest.remote_status,
    ...(rest.result_url !== undefined ? { result_url: rest.result_url } : {}),
    ...(rest.output_path !== undefined ? { output_path: rest.output_path } : {}),
    ...(rest.thumb_path !== undefined ? { thumb_path: rest.thumb_path } : {}),
    ...(rest.error !== undefined ? { error: rest.error } : {})
  };
}

/** Last-write-wins view of replayed records, keyed by combination hash. */
export function latestPerHash(
  records: readonly PersistedResult[],
  status?: PersistedResult["status"]
): Map<ComboHash, PersistedResult> {
  const out = new Map<ComboHash, PersistedResult>();
  for (const record of records) {
    if (status === undefined || record.status === status) out.set(record._hash, record);
  }
  return out;
}

/**
 * Append-only JSONL log. Appends go through a single-writer queue so
 * concurrent collectors never interleave partial lines.
 */
export class SweepLog {
  private readonly queue = pLimit(1);

  constructor(
    readonly logPath: string,
    private readonly events: EventSink = silentEventSink
  ) {}

  append(record: PersistedResult): Promise<void> {
    const line = `${JSON.stringify(record)}\n`;
    return this.queue(async () => {
      try {
        await fs.mkdir(path.dirname(this.logPath), { recursive: true });
        await fs.appendFile(this.logPath, line, "utf8");
      } catch (err) {
        throw new PersistenceError(`cannot append to ${this.logPath}: ${errorMessage(err)}`, "write", err);
      }
    });
  }

  /** Records in log order; unparseable lines are reported and skipped. */
  async replay(): Promise<PersistedResult[]> {
    let text: string;
    try {
      text = await fs.readFile(this.logPath, "utf8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw new PersistenceError(`cannot read ${this.logPath}: ${errorMessage(err)}`, "read", err);
    }

    const out: PersistedResult[] = [];
    const lines = text.split("\n");
    lines.forEach((line, index) => {
      if (!line.trim()) return;
      const record = parseLogLine(line);
      if (record) {
        out.push(record);
      } else {
        this.events.event("store.log_line_invalid", `skipping unparseable log line ${index + 1}`, { line: index + 1 }, "warn");
      }
    });
    return out;
  }
}
