import { sha256Hex, stableJsonStringify } from "../core/canonicalJson.js";
import type { ComboHash } from "../core/ids.js";

/** Keys carrying this prefix are bookkeeping: never hashed, never submitted. */
export const RESERVED_KEY_PREFIX = "_";

export function isReservedKey(key: string): boolean {
  return key.startsWith(RESERVED_KEY_PREFIX);
}

export function visibleParams<T>(params: Readonly<Record<string, T>>): Record<string, T> {
  const out: Record<string, T> = {};
  for (const [k, v] of Object.entries(params)) {
    if (!isReservedKey(k)) out[k] = v;
  }
  return out;
}

export function canonicalParamsJson(params: Readonly<Record<string, unknown>>): string {
  return stableJsonStringify(visibleParams(params));
}

export function deriveComboHash(params: Readonly<Record<string, unknown>>): ComboHash {
  return sha256Hex(canonicalParamsJson(params)) as ComboHash;
}
