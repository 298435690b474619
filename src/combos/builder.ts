import { stableJsonStringify } from "../core/canonicalJson.js";
import { ResolutionError } from "../core/errors.js";
import type { ComboHash } from "../core/ids.js";
import type { SweepConfig } from "../config/sweepConfig.js";
import { rangeCount, type ParameterKind, type ParameterSet, type ParameterSpec } from "../params/parameterSpec.js";
import { seededRandom, systemRandom, type RandomSource } from "../params/random.js";
import { silentEventSink, type EventSink } from "../runs/events.js";
import { deriveComboHash } from "./comboHash.js";

export type ScalarValue = string | number | boolean;

export interface Combination {
  readonly hash: ComboHash;
  /** Declaration order. */
  readonly params: Readonly<Record<string, ScalarValue>>;
}

export interface BuildOptions {
  random?: RandomSource;
  /**
   * When set, a value that cannot be used as a scalar is replaced by its
   * canonical JSON text (logged as combos.degraded_value) instead of failing
   * the build.
   */
  allowDegradedValues?: boolean;
  events?: EventSink;
}

export interface ParameterDescription {
  kind: ParameterKind;
  isStatic: boolean;
  /** null for random_int, whose value is only known once drawn. */
  values: unknown[] | null;
}

export function rangeValues(start: number, end: number, step: number): number[] {
  const count = rangeCount(start, end, step);
  const out: number[] = [];
  for (let i = 0; i < count; i++) {
    out.push(Number((start + i * step).toPrecision(12)));
  }
  return out;
}

export function resolveParameterValues(spec: ParameterSpec, random: RandomSource = systemRandom): unknown[] {
  switch (spec.kind) {
    case "static":
      return [spec.value];
    case "list":
      return [...spec.values];
    case "range":
      return rangeValues(spec.start, spec.end, spec.step);
    case "random_int":
      return [random.nextInt(spec.min, spec.max)];
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function toScalar(name: string, value: unknown, index: number, opts: BuildOptions): ScalarValue {
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number" && Number.isFinite(value)) return value;

  const err = new ResolutionError(name, `value #${index} is not a finite scalar (${describeValue(value)})`);
  if (!opts.allowDegradedValues) throw err;

  const degraded = typeof value === "number" ? String(value) : stableJsonStringify(value);
  (opts.events ?? silentEventSink).event(
    "combos.degraded_value",
    err.message,
    { parameter: name, index, fallback: degraded },
    "warn"
  );
  return degraded;
}

/**
 * Expands parameters into the Cartesian product of every varying parameter
 * (two or more values), each merged with the fixed ones. Random draws happen
 * once per call, so a random_int behaves as a fixed value within one build.
 */
export function buildCombinations(params: ParameterSet, options: BuildOptions = {}): Combination[] {
  const random = options.random ?? systemRandom;
  const events = options.events ?? silentEventSink;

  const resolved: Array<{ name: string; values: ScalarValue[] }> = [];
  for (const [name, spec] of params) {
    const values = resolveParameterValues(spec, random).map((v, i) => toScalar(name, v, i, options));
    resolved.push({ name, values });
  }

  const varying = resolved.filter((r) => r.values.length > 1);
  const expected = varying.reduce((n, r) => n * r.values.length, 1);
  events.event("combos.build", `expanding ${varying.length} varying of ${resolved.length} parameters`, {
    varying: varying.map((r) => r.name),
    expected
  });

  const out: Combination[] = [];
  const seen = new Set<ComboHash>();
  const cursor = varying.map(() => 0);

  for (;;) {
    const assignment = new Map<string, ScalarValue>();
    varying.forEach((r, i) => {
      const value = r.values[cursor[i] ?? 0];
      if (value !== undefined) assignment.set(r.name, value);
    });

    const combo: Record<string, ScalarValue> = {};
    for (const r of resolved) {
      const value = assignment.get(r.name) ?? r.values[0];
      if (value !== undefined) combo[r.name] = value;
    }

    const hash = deriveComboHash(combo);
    if (seen.has(hash)) {
      events.event("combos.duplicate", `duplicate combination ${hash}`, { hash }, "warn");
    }
    seen.add(hash);
    out.push(Object.freeze({ hash, params: Object.freeze(combo) }));

    // Odometer over the varying axes; the last declared axis turns fastest.
    let axis = varying.length - 1;
    while (axis >= 0) {
      const next = (cursor[axis] ?? 0) + 1;
      const size = varying[axis]?.values.length ?? 0;
      if (next < size) {
        cursor[axis] = next;
        break;
      }
      cursor[axis] = 0;
      axis--;
    }
    if (axis < 0) break;
  }

  events.event("combos.built", `built ${out.length} combinations`, { count: out.length });
  return out;
}

/** meta.random_seed, when present, makes random_int draws reproducible. */
export function buildCombinationsFromConfig(config: SweepConfig, options: BuildOptions = {}): Combination[] {
  const seed = config.meta.random_seed;
  const random = options.random ?? (seed !== undefined ? seededRandom(String(seed)) : systemRandom);
  return buildCombinations(config.params, { ...options, random });
}

export function describeParameters(params: ParameterSet): Record<string, ParameterDescription> {
  const out: Record<string, ParameterDescription> = {};
  for (const [name, spec] of params) {
    if (spec.kind === "random_int") {
      out[name] = { kind: spec.kind, isStatic: true, values: null };
      continue;
    }
    const values = resolveParameterValues(spec);
    out[name] = { kind: spec.kind, isStatic: values.length === 1, values };
  }
  return out;
}
