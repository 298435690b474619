import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigurationError } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import { toJsonValue } from "../core/canonicalJson.js";
import { parseParameters, rangeCount, type ParameterSet, type ParameterSpec } from "../params/parameterSpec.js";

const SWEEP_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const zSweepMeta = z.looseObject({
  name: z.string().regex(SWEEP_NAME_RE, "name must be a plain directory name"),
  base_model: z.string().min(1),
  output_dir: z.string().min(1),
  random_seed: z.union([z.string().min(1), z.number().int()]).optional(),
  concurrency: z.number().int().min(1).optional()
});

const zGridAxes = z.strictObject({
  rows: z.string(),
  cols: z.string()
});

const zRawSweepConfig = z.strictObject({
  meta: zSweepMeta,
  params: z.record(z.string(), z.unknown()),
  grid_axes: zGridAxes.optional()
});

export type SweepMeta = z.infer<typeof zSweepMeta>;
export type GridAxes = z.infer<typeof zGridAxes>;

export interface SweepConfig {
  meta: SweepMeta;
  params: ParameterSet;
  /** Parameter entries as written, kept for the cfg.yaml snapshot. */
  rawParams: Record<string, unknown>;
  gridAxes: GridAxes;
}

function varies(spec: ParameterSpec): boolean {
  if (spec.kind === "list") return spec.values.length > 1;
  if (spec.kind === "range") return rangeCount(spec.start, spec.end, spec.step) > 1;
  return false;
}

/** First two parameters with more than one value become rows and cols. */
export function defaultGridAxes(params: ParameterSet): GridAxes {
  const varying = params.filter(([, spec]) => varies(spec)).map(([name]) => name);
  return { rows: varying[0] ?? "", cols: varying[1] ?? "" };
}

export function parseSweepConfig(raw: unknown, source = "config"): SweepConfig {
  const parsed = zRawSweepConfig.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `invalid sweep config at ${source}`,
      parsed.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    );
  }

  const params = parseParameters(parsed.data.params);
  if (params.length === 0) throw new ConfigurationError(`invalid sweep config at ${source}: params is empty`);

  const gridAxes = parsed.data.grid_axes ?? defaultGridAxes(params);
  const names = new Set(params.map(([name]) => name));
  for (const axis of [gridAxes.rows, gridAxes.cols]) {
    if (axis && !names.has(axis)) {
      throw new ConfigurationError(`invalid sweep config at ${source}: grid axis ${axis} is not a parameter`);
    }
  }

  return { meta: parsed.data.meta, params, rawParams: parsed.data.params, gridAxes };
}

export async function loadSweepConfig(filePath: string): Promise<SweepConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new ConfigurationError(`cannot read sweep config ${filePath}`, [(err as NodeJS.ErrnoException).code ?? String(err)]);
  }

  // YAML 1.2 is a superset of JSON, so .json configs parse here too.
  let raw: unknown;
  try {
    raw = YAML.parse(text) as unknown;
  } catch (err) {
    throw new ConfigurationError(`invalid sweep config at ${filePath}`, [err instanceof Error ? err.message : String(err)]);
  }
  return parseSweepConfig(raw, filePath);
}

export function configSnapshot(config: SweepConfig): JsonObject {
  return {
    meta: toJsonValue(config.meta),
    params: toJsonValue(config.rawParams),
    grid_axes: { rows: config.gridAxes.rows, cols: config.gridAxes.cols }
  };
}

export function renderConfigYaml(config: SweepConfig): string {
  return YAML.stringify(configSnapshot(config));
}

export function templateConfigYaml(): string {
  const template = {
    meta: {
      name: "example-sweep",
      base_model: "owner/model-name",
      output_dir: "./runs",
      random_seed: "example-seed"
    },
    params: {
      prompt: "a lighthouse on a cliff at dusk, oil painting",
      width: 1024,
      height: 1024,
      steps: { list: [20, 40, 60] },
      cfg: { range: { start: 4, end: 16, step: 4 } },
      seed: { random_int: { min: 1, max: 1000000 } },
      sampler_name: "euler"
    },
    grid_axes: { rows: "steps", cols: "cfg" }
  };
  return YAML.stringify(template);
}
