import "dotenv/config";
import { buildCombinationsFromConfig } from "../src/combos/builder.js";
import { readEnv } from "../src/config/env.js";
import { loadSweepConfig } from "../src/config/sweepConfig.js";
import { PolicyEngine } from "../src/policy/policy.js";
import { ConsoleEventSink } from "../src/runs/events.js";
import { SweepLog, latestPerHash } from "../src/store/sweepLog.js";
import { sweepLayout } from "../src/store/sweepLayout.js";
import { createSweepClient, planSweep, runSweep } from "../src/sweep/runSweep.js";

const FLAGS = new Set(["overwrite", "retry-failed", "plan", "help"]);

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/sweep_run.ts --config <sweep.yaml> [--output-dir <dir>] [--concurrency <n>] [--overwrite] [--retry-failed] [--plan]",
    "",
    "  --plan          print what would run, submit nothing",
    "  --overwrite     rerun every combination, even ones already saved",
    "  --retry-failed  rerun combinations whose latest attempt failed",
    "",
    "env:",
    "  REPLICATE_API_TOKEN (required unless --plan)",
    "  SWEEP_POLICY_PATH (optional, default policies/default.policy.yaml)",
    "  SWEEP_OUTPUT_DIR (optional, overrides meta.output_dir)",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (FLAGS.has(key)) {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }

  const configPath = args.config;
  if (typeof configPath !== "string") throw new Error(`--config is required\n\n${usage()}`);

  let concurrency: number | undefined;
  if (typeof args.concurrency === "string") {
    if (!/^[0-9]+$/.test(args.concurrency)) throw new Error(`invalid --concurrency: ${args.concurrency}`);
    concurrency = Number(args.concurrency);
  }

  const env = readEnv();
  const policy = await PolicyEngine.loadFromFile(env.policyPath);
  const config = await loadSweepConfig(configPath);
  const outputDir = (typeof args["output-dir"] === "string" ? args["output-dir"] : null) ?? env.outputDir ?? config.meta.output_dir;
  const events = new ConsoleEventSink({ sweep: config.meta.name });
  const overwrite = Boolean(args.overwrite);
  const retryFailed = Boolean(args["retry-failed"]);

  if (args.plan) {
    const combinations = buildCombinationsFromConfig(config, { events });
    policy.enforceCombinationCount(combinations.length);
    const layout = sweepLayout(outputDir, config.meta.name);
    const prior = latestPerHash(await new SweepLog(layout.logPath, events).replay());
    const plan = planSweep(combinations, prior, { overwrite, retryFailed });
    process.stdout.write(`${combinations.length} combinations, ${plan.pending.length} pending\n`);
    for (const combo of plan.pending) process.stdout.write(`${combo.hash}  ${JSON.stringify(combo.params)}\n`);
    return;
  }

  const client = createSweepClient(env, policy);
  const controller = new AbortController();
  process.once("SIGINT", () => {
    events.event("sweep.cancel", "interrupted, finishing collected results", null, "warn");
    controller.abort(new Error("interrupted"));
  });

  const summary = await runSweep({
    config,
    client,
    policy,
    concurrency,
    outputDir,
    overwrite,
    retryFailed,
    events,
    signal: controller.signal
  });

  process.stdout.write(
    `${summary.runId}  total=${summary.total} pending=${summary.pending} succeeded=${summary.succeeded} failed=${summary.failed} skipped=${summary.skipped}\n`
  );
  process.stdout.write(`${summary.sweepDir}\n`);
  process.exitCode = summary.exitCode;
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
