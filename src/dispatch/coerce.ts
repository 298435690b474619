import { FatalRemoteError } from "../core/errors.js";
import { isReservedKey } from "../combos/comboHash.js";
import type { ScalarValue } from "../combos/builder.js";
import type { SubmissionPayload, SubmissionValue } from "../remote/types.js";

export type CoercionKind = "integer" | "float" | "string";

export type CoercionTable = Readonly<Record<string, CoercionKind>>;

export const DEFAULT_COERCIONS: CoercionTable = {
  steps: "integer",
  width: "integer",
  height: "integer",
  seed: "integer",
  num_outputs: "integer",
  num_inference_steps: "integer",
  cfg: "float",
  guidance_scale: "float",
  prompt_strength: "float",
  sampler_name: "string",
  scheduler: "string",
  prompt: "string",
  negative_prompt: "string"
};

const INTEGER_TEXT = /^[+-]?\d+$/;

function coerceValue(name: string, value: ScalarValue, kind: CoercionKind): SubmissionValue {
  switch (kind) {
    case "string":
      return String(value);
    case "integer":
      if (typeof value === "number" && Number.isFinite(value)) return Math.trunc(value);
      if (typeof value === "string" && INTEGER_TEXT.test(value.trim())) return Number.parseInt(value.trim(), 10);
      break;
    case "float":
      if (typeof value === "number" && Number.isFinite(value)) return value;
      if (typeof value === "string" && value.trim() !== "") {
        const n = Number(value.trim());
        if (Number.isFinite(n)) return n;
      }
      break;
  }
  throw new FatalRemoteError("invalid_input", `parameter ${name}: cannot coerce ${JSON.stringify(value)} to ${kind}`);
}

/**
 * Derives what is actually sent for a combination: reserved keys dropped,
 * known parameters coerced to the types the remote model expects. The
 * combination itself is left untouched.
 */
export function toSubmissionPayload(
  params: Readonly<Record<string, ScalarValue>>,
  coercions: CoercionTable = DEFAULT_COERCIONS
): SubmissionPayload {
  const out: SubmissionPayload = {};
  for (const [name, value] of Object.entries(params)) {
    if (isReservedKey(name)) continue;
    const kind = coercions[name];
    out[name] = kind ? coerceValue(name, value, kind) : value;
  }
  return out;
}
