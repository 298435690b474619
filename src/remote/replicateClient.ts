import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { setTimeout as sleep } from "timers/promises";
import * as z from "zod/v4";
import { FatalRemoteError, RemoteServiceError, remoteError } from "../core/errors.js";
import { isPlainObject } from "../core/json.js";
import type { ArtifactReference, RemoteCallOptions, RemoteJobClient, SubmissionPayload } from "./types.js";

const zPrediction = z.looseObject({
  id: z.string(),
  status: z.enum(["starting", "processing", "succeeded", "failed", "canceled", "aborted"]),
  output: z.unknown().optional(),
  error: z.unknown().optional(),
  urls: z.looseObject({ get: z.string().optional() }).optional()
});

type Prediction = z.infer<typeof zPrediction>;

const TERMINAL = new Set<Prediction["status"]>(["succeeded", "failed", "canceled", "aborted"]);

export interface ReplicateClientOptions {
  apiToken: string;
  baseUrl?: string;
  pollIntervalMs?: number;
  requestTimeoutMs?: number;
  /** Swaps the HTTP transport; tests use an in-process adapter. */
  adapter?: AxiosAdapter;
}

function detailOf(data: unknown): string | null {
  if (typeof data === "string") return data.slice(0, 500);
  if (isPlainObject(data)) {
    const detail = data["detail"] ?? data["error"];
    if (typeof detail === "string") return detail.slice(0, 500);
  }
  return null;
}

/**
 * Maps transport failures onto the closed category set. Cancellations are
 * rethrown untouched so the caller sees its own abort.
 */
export function classifyHttpError(err: unknown, context: string): unknown {
  if (err instanceof RemoteServiceError) return err;
  if (axios.isCancel(err)) return err;
  if (!axios.isAxiosError(err)) return err;

  const response = err.response;
  if (!response) {
    return remoteError("transient_transport", `${context}: ${err.code ?? "network error"}: ${err.message}`);
  }

  const status = response.status;
  const detail = detailOf(response.data);
  const message = `${context}: HTTP ${status}${detail ? `: ${detail}` : ""}`;
  if (status === 429) return remoteError("rate_limited", message, status);
  if (status === 408) return remoteError("transient_transport", message, status);
  if (status >= 500) return remoteError("server_fault", message, status);
  if (status === 401 || status === 403) return remoteError("auth", message, status);
  return remoteError("invalid_input", message, status);
}

export function outputReferences(output: unknown): ArtifactReference[] {
  if (typeof output === "string") return [output];
  if (Array.isArray(output)) return output.filter((o): o is string => typeof o === "string");
  return [];
}

function predictionPath(modelId: string): { url: string; version: string | null } {
  const [model, version] = modelId.split(":");
  if (!model || !/^[^/\s]+\/[^/\s]+$/.test(model)) {
    throw new FatalRemoteError("invalid_input", `invalid model id: ${modelId}`);
  }
  if (version) return { url: "/predictions", version };
  return { url: `/models/${model}/predictions`, version: null };
}

export class ReplicateClient implements RemoteJobClient {
  private readonly api: AxiosInstance;
  private readonly downloads: AxiosInstance;
  private readonly pollIntervalMs: number;

  constructor(opts: ReplicateClientOptions) {
    const timeout = opts.requestTimeoutMs ?? 60_000;
    this.pollIntervalMs = opts.pollIntervalMs ?? 1000;
    this.api = axios.create({
      baseURL: opts.baseUrl ?? "https://api.replicate.com/v1",
      timeout,
      headers: {
        Authorization: `Bearer ${opts.apiToken}`,
        "Content-Type": "application/json"
      },
      ...(opts.adapter ? { adapter: opts.adapter } : {})
    });
    // Delivery URLs are public; the token stays on the API instance.
    this.downloads = axios.create({ timeout, ...(opts.adapter ? { adapter: opts.adapter } : {}) });
  }

  async submit(modelId: string, input: SubmissionPayload, opts: RemoteCallOptions = {}): Promise<ArtifactReference[]> {
    const target = predictionPath(modelId);
    const body = target.version ? { version: target.version, input } : { input };

    let prediction: Prediction;
    try {
      const res = await this.api.post<unknown>(target.url, body, { headers: { Prefer: "wait" }, signal: opts.signal });
      prediction = this.parsePrediction(res.data);
      while (!TERMINAL.has(prediction.status)) {
        await sleep(this.pollIntervalMs, undefined, { signal: opts.signal });
        const getUrl = prediction.urls?.get ?? `/predictions/${prediction.id}`;
        const poll = await this.api.get<unknown>(getUrl, { signal: opts.signal });
        prediction = this.parsePrediction(poll.data);
      }
    } catch (err) {
      throw classifyHttpError(err, `submit ${modelId}`);
    }

    if (prediction.status !== "succeeded") {
      const reason = typeof prediction.error === "string" ? prediction.error : prediction.status;
      throw new FatalRemoteError("invalid_input", `prediction ${prediction.id} ${prediction.status}: ${reason}`);
    }
    return outputReferences(prediction.output);
  }

  async fetch(reference: ArtifactReference, opts: RemoteCallOptions = {}): Promise<Buffer> {
    try {
      const res = await this.downloads.get<ArrayBuffer>(reference, { responseType: "arraybuffer", signal: opts.signal });
      return Buffer.from(res.data);
    } catch (err) {
      throw classifyHttpError(err, `fetch ${reference}`);
    }
  }

  private parsePrediction(data: unknown): Prediction {
    const parsed = zPrediction.safeParse(data);
    if (!parsed.success) {
      throw remoteError("server_fault", `unexpected prediction payload: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }
}
