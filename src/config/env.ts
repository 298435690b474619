import { ConfigurationError } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";

export const API_TOKEN_ENV = "REPLICATE_API_TOKEN";

export interface SweepEnv {
  apiToken: string | null;
  policyPath: string;
  /** Overrides meta.output_dir when set. */
  outputDir: string | null;
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): SweepEnv {
  return {
    apiToken: nonEmpty(env[API_TOKEN_ENV]),
    policyPath: nonEmpty(env.SWEEP_POLICY_PATH) ?? "policies/default.policy.yaml",
    outputDir: nonEmpty(env.SWEEP_OUTPUT_DIR)
  };
}

export function requireApiToken(env: SweepEnv): string {
  if (!env.apiToken) {
    throw new ConfigurationError(`${API_TOKEN_ENV} is not set; it is required to run sweeps`);
  }
  return env.apiToken;
}

export function envSnapshot(env: SweepEnv): JsonObject {
  return {
    node: process.version,
    policy_path: env.policyPath,
    output_dir_override: env.outputDir,
    api_token_present: env.apiToken !== null
  };
}
