import { createHash } from "crypto";
import { isPlainObject, type JsonValue } from "./json.js";

export function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export function sha256Prefixed(data: string | Buffer): `sha256:${string}` {
  return `sha256:${sha256Hex(data)}` as const;
}

export function canonicalizeJson(value: unknown): unknown {
  if (value === undefined) return undefined;
  if (value === null) return null;

  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    if (Object.is(value, -0)) return 0;
    return value;
  }

  if (typeof value === "string" || typeof value === "boolean") return value;

  if (typeof value === "bigint") return value.toString();

  if (value instanceof Date) return value.toISOString();

  if (Array.isArray(value)) {
    return value.map((v) => {
      const c = canonicalizeJson(v);
      return c === undefined ? null : c;
    });
  }

  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    const keys = Object.keys(value).sort();
    for (const key of keys) {
      const c = canonicalizeJson(value[key]);
      if (c !== undefined) out[key] = c;
    }
    return out;
  }

  // Anything else goes through its JSON form; a value with none would hash differently per process.
  let json: unknown;
  try {
    json = JSON.parse(JSON.stringify(value)) as unknown;
  } catch {
    throw new Error("value is not JSON-serializable");
  }
  return canonicalizeJson(json);
}

export function stableJsonStringify(value: unknown): string {
  const canonical = canonicalizeJson(value);
  return canonical === undefined ? "null" : JSON.stringify(canonical);
}

export function toJsonValue(value: unknown): JsonValue {
  return JSON.parse(stableJsonStringify(value)) as JsonValue;
}
