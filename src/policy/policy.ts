import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { ConfigurationError } from "../core/errors.js";
import type { RetryPolicy } from "../dispatch/retry.js";

const zRetry = z.strictObject({
  retries: z.number().int().min(0).max(20),
  base_delay_ms: z.number().int().min(0),
  max_delay_ms: z.number().int().min(0),
  jitter: z.boolean().optional()
});

const zPolicyConfig = z.strictObject({
  version: z.literal(1),
  tool_allowlist: z.array(z.string()),
  quotas: z.strictObject({
    max_concurrency: z.number().int().min(1),
    max_combinations: z.number().int().min(1),
    max_plan_preview: z.number().int().min(0).optional()
  }),
  models: z
    .strictObject({
      allowlist: z.array(z.string())
    })
    .optional(),
  retry: z.strictObject({
    submit: zRetry,
    download: zRetry
  }),
  remote: z
    .strictObject({
      api_base_url: z.string().url().optional(),
      poll_interval_ms: z.number().int().min(1).optional(),
      request_timeout_ms: z.number().int().min(1).optional()
    })
    .optional()
});

export type PolicyConfig = z.infer<typeof zPolicyConfig>;

function toRetryPolicy(raw: z.infer<typeof zRetry>): RetryPolicy {
  return {
    retries: raw.retries,
    baseDelayMs: raw.base_delay_ms,
    maxDelayMs: Math.max(raw.max_delay_ms, raw.base_delay_ms),
    jitter: raw.jitter ?? true
  };
}

export class PolicyEngine {
  readonly policyHash: `sha256:${string}`;

  constructor(private readonly policy: PolicyConfig) {
    this.policyHash = sha256Prefixed(stableJsonStringify(policy));
  }

  static parse(raw: unknown, source = "policy"): PolicyEngine {
    const parsed = zPolicyConfig.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `invalid policy at ${source}`,
        parsed.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
      );
    }
    return new PolicyEngine(parsed.data);
  }

  static async loadFromFile(filePath: string): Promise<PolicyEngine> {
    const raw = await fs.readFile(filePath, "utf8");
    return PolicyEngine.parse(YAML.parse(raw) as unknown, filePath);
  }

  assertToolAllowed(toolName: string): void {
    if (!this.policy.tool_allowlist.includes(toolName)) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied tool: ${toolName}`);
    }
  }

  assertModelAllowed(modelId: string): void {
    const allowlist = this.policy.models?.allowlist ?? [];
    if (!allowlist.length) return;
    const base = modelId.split(":")[0] ?? modelId;
    if (!allowlist.includes(modelId) && !allowlist.includes(base)) {
      throw new ConfigurationError(`policy denied model: ${modelId}`);
    }
  }

  enforceConcurrency(requested: number | undefined): number {
    const max = this.policy.quotas.max_concurrency;
    const concurrency = requested ?? Math.min(8, max);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`concurrency must be an integer >= 1 (got ${concurrency})`);
    }
    if (concurrency > max) {
      throw new ConfigurationError(`policy denied concurrency=${concurrency} (max ${max})`);
    }
    return concurrency;
  }

  enforceCombinationCount(count: number): void {
    const max = this.policy.quotas.max_combinations;
    if (count > max) {
      throw new ConfigurationError(`policy denied sweep of ${count} combinations (max ${max})`);
    }
  }

  planPreviewLimit(): number {
    return this.policy.quotas.max_plan_preview ?? 20;
  }

  submitRetry(): RetryPolicy {
    return toRetryPolicy(this.policy.retry.submit);
  }

  downloadRetry(): RetryPolicy {
    return toRetryPolicy(this.policy.retry.download);
  }

  remoteSettings(): { apiBaseUrl: string; pollIntervalMs: number; requestTimeoutMs: number } {
    return {
      apiBaseUrl: this.policy.remote?.api_base_url ?? "https://api.replicate.com/v1",
      pollIntervalMs: this.policy.remote?.poll_interval_ms ?? 1000,
      requestTimeoutMs: this.policy.remote?.request_timeout_ms ?? 60_000
    };
  }
}
