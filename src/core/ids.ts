import { ulid } from "ulid";

export type SweepRunId = `run_${string}`;

/** Hex SHA-256 over the canonical JSON of a combination's visible parameters. */
export type ComboHash = string & { readonly __brand: "ComboHash" };

const COMBO_HASH_RE = /^[a-f0-9]{64}$/;

export function newSweepRunId(): SweepRunId {
  return `run_${ulid()}` as const;
}

export function isComboHash(value: unknown): value is ComboHash {
  return typeof value === "string" && COMBO_HASH_RE.test(value);
}
