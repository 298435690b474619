import * as z from "zod/v4";

export const zComboHash = z.string().regex(/^[a-f0-9]{64}$/, "invalid combination hash");
export const zSweepRunId = z.string().regex(/^run_[0-9A-HJKMNP-TV-Z]{26}$/, "invalid run_id");

const zScalar = z.union([z.string(), z.number(), z.boolean()]);

/** Either a path to a YAML/JSON sweep config or the config object inline. */
const zConfigSource = {
  config_path: z.string().min(1).optional(),
  config: z.record(z.string(), z.unknown()).optional(),
  output_dir: z.string().min(1).optional()
};

const zResumeFlags = {
  overwrite: z.boolean().default(false),
  retry_failed: z.boolean().default(false)
};

export const zErrorSummary = z.object({
  category: z.string(),
  message: z.string()
});

export const zCombination = z.object({
  hash: zComboHash,
  params: z.record(z.string(), zScalar)
});

export const zParameterDescription = z.object({
  kind: z.enum(["static", "list", "range", "random_int"]),
  is_static: z.boolean(),
  values: z.array(z.unknown()).nullable()
});

export const zResultRecord = z.object({
  status: z.enum(["succeeded", "failed", "skipped"]),
  _hash: zComboHash,
  params: z.record(z.string(), zScalar),
  timestamp: z.string().optional(),
  duration_ms: z.number().optional(),
  attempts: z.number().int().optional(),
  run_id: z.string().optional(),
  remote_status: z.enum(["succeeded", "failed", "not_submitted"]).optional(),
  result_url: z.string().optional(),
  output_path: z.string().optional(),
  thumb_path: z.string().optional(),
  error: zErrorSummary.optional(),
  reason: z.string().optional()
});

export const zSweepPlanInput = z.object({
  ...zConfigSource,
  ...zResumeFlags
});

export const zSweepPlanOutput = z.object({
  sweep: z.string(),
  sweep_dir: z.string(),
  model: z.string(),
  total: z.number().int(),
  pending: z.number().int(),
  already_succeeded: z.number().int(),
  previously_failed: z.number().int(),
  varying: z.array(z.string()),
  grid_axes: z.object({ rows: z.string(), cols: z.string() }),
  parameters: z.record(z.string(), zParameterDescription),
  sample: z.array(zCombination)
});

export const zSweepRunInput = z.object({
  ...zConfigSource,
  ...zResumeFlags,
  concurrency: z.number().int().min(1).optional()
});

export const zSweepRunOutput = z.object({
  run_id: zSweepRunId,
  sweep_dir: z.string(),
  total: z.number().int(),
  pending: z.number().int(),
  already_succeeded: z.number().int(),
  succeeded: z.number().int(),
  failed: z.number().int(),
  skipped: z.number().int(),
  exit_code: z.union([z.literal(0), z.literal(1)]),
  results: z.array(zResultRecord)
});

export const zSweepResultsInput = z.object({
  ...zConfigSource,
  status: z.enum(["succeeded", "failed"]).optional(),
  /** Every record in log order instead of the latest per combination. */
  history: z.boolean().default(false),
  limit: z.number().int().min(1).max(5000).default(500)
});

export const zSweepResultsOutput = z.object({
  sweep_dir: z.string(),
  record_count: z.number().int(),
  truncated: z.boolean(),
  records: z.array(zResultRecord)
});
