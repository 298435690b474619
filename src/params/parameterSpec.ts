import * as z from "zod/v4";
import { ConfigurationError } from "../core/errors.js";
import { isPlainObject } from "../core/json.js";

export const RANGE_MAX_VALUES = 1000;

export const PARAMETER_KINDS = ["static", "list", "range", "random_int"] as const;
export type ParameterKind = (typeof PARAMETER_KINDS)[number];

export interface StaticSpec {
  kind: "static";
  value: unknown;
}

export interface ListSpec {
  kind: "list";
  values: readonly unknown[];
}

export interface RangeSpec {
  kind: "range";
  start: number;
  end: number;
  step: number;
}

export interface RandomIntSpec {
  kind: "random_int";
  min: number;
  max: number;
}

export type ParameterSpec = StaticSpec | ListSpec | RangeSpec | RandomIntSpec;

/** Parameters in declaration order. */
export type ParameterSet = ReadonlyArray<readonly [name: string, spec: ParameterSpec]>;

const zRange = z.strictObject({
  start: z.number().refine(Number.isFinite, "start must be finite"),
  end: z.number().refine(Number.isFinite, "end must be finite"),
  step: z.number().refine(Number.isFinite, "step must be finite")
});

const zRandomInt = z.strictObject({
  min: z.number().int(),
  max: z.number().int()
});

const zList = z.array(z.unknown()).min(1, "list must not be empty");

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join(", ");
}

/**
 * Number of values a range produces. A small epsilon absorbs float error so
 * that e.g. range(0, 0.3, 0.1) still reaches 0.3.
 */
export function rangeCount(start: number, end: number, step: number): number {
  return Math.floor((end - start) / step + 1e-9) + 1;
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function variantKeysOf(raw: Record<string, unknown>): ParameterKind[] {
  return PARAMETER_KINDS.filter((k) => raw[k] !== undefined && raw[k] !== null);
}

/** True when the object is shaped like a spec: only variant keys, at least one of them set. */
function looksLikeSpec(value: unknown): value is Record<string, unknown> {
  if (!isPlainObject(value)) return false;
  const keys = Object.keys(value);
  if (keys.length === 0) return false;
  return keys.every((k) => (PARAMETER_KINDS as readonly string[]).includes(k));
}

function parseVariant(name: string, raw: Record<string, unknown>, depth: number): ParameterSpec {
  const unknownKeys = Object.keys(raw).filter((k) => !(PARAMETER_KINDS as readonly string[]).includes(k));
  if (unknownKeys.length) {
    throw new ConfigurationError(`parameter ${name}: unknown keys ${unknownKeys.sort().join(", ")}`);
  }

  const set = variantKeysOf(raw);
  if (set.length !== 1) {
    throw new ConfigurationError(
      `parameter ${name}: exactly one of ${PARAMETER_KINDS.join(", ")} must be set (got ${set.length ? set.join(", ") : "none"})`
    );
  }
  const kind = set[0];

  switch (kind) {
    case "static": {
      const value = raw.static;
      if (looksLikeSpec(value)) {
        if (depth >= 1) {
          throw new ConfigurationError(`parameter ${name}: specs may be nested at most one level deep`);
        }
        return parseVariant(name, value, depth + 1);
      }
      return { kind: "static", value };
    }

    case "list": {
      const parsed = zList.safeParse(raw.list);
      if (!parsed.success) throw new ConfigurationError(`parameter ${name}: ${formatZodIssues(parsed.error)}`);
      return { kind: "list", values: parsed.data };
    }

    case "range": {
      const parsed = zRange.safeParse(raw.range);
      if (!parsed.success) throw new ConfigurationError(`parameter ${name}: range ${formatZodIssues(parsed.error)}`);
      const { start, end, step } = parsed.data;
      if (step <= 0) throw new ConfigurationError(`parameter ${name}: range step must be positive (got ${step})`);
      if (end < start) throw new ConfigurationError(`parameter ${name}: range end ${end} is below start ${start}`);
      const count = rangeCount(start, end, step);
      if (count > RANGE_MAX_VALUES) {
        throw new ConfigurationError(
          `parameter ${name}: range would produce ${count} values (max ${RANGE_MAX_VALUES})`
        );
      }
      return { kind: "range", start, end, step };
    }

    case "random_int": {
      const parsed = zRandomInt.safeParse(raw.random_int);
      if (!parsed.success) {
        throw new ConfigurationError(`parameter ${name}: random_int ${formatZodIssues(parsed.error)}`);
      }
      const { min, max } = parsed.data;
      if (min > max) throw new ConfigurationError(`parameter ${name}: random_int min ${min} exceeds max ${max}`);
      return { kind: "random_int", min, max };
    }

    default:
      throw new ConfigurationError(`parameter ${name}: no variant set`);
  }
}

export function parseParameterSpec(name: string, raw: unknown): ParameterSpec {
  if (isScalar(raw)) return { kind: "static", value: raw };
  if (raw === null || raw === undefined) {
    throw new ConfigurationError(`parameter ${name}: value must not be null`);
  }
  if (Array.isArray(raw)) {
    throw new ConfigurationError(`parameter ${name}: bare arrays are ambiguous, use {list: [...]}`);
  }
  if (!isPlainObject(raw)) {
    throw new ConfigurationError(`parameter ${name}: unsupported value of type ${typeof raw}`);
  }
  return parseVariant(name, raw, 0);
}

/** Parses every entry, reporting all invalid parameters at once. */
export function parseParameters(raw: Record<string, unknown>): ParameterSet {
  const out: Array<readonly [string, ParameterSpec]> = [];
  const issues: string[] = [];
  for (const [name, value] of Object.entries(raw)) {
    if (name.trim().length === 0) {
      issues.push("parameter names must be non-empty");
      continue;
    }
    try {
      out.push([name, parseParameterSpec(name, value)] as const);
    } catch (e) {
      if (!(e instanceof ConfigurationError)) throw e;
      issues.push(e.message);
    }
  }
  if (issues.length) throw new ConfigurationError("invalid parameters", issues);
  return out;
}
