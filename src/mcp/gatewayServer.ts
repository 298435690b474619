import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { buildCombinationsFromConfig, describeParameters } from "../combos/builder.js";
import type { SweepEnv } from "../config/env.js";
import { loadSweepConfig, parseSweepConfig, type SweepConfig } from "../config/sweepConfig.js";
import { ConfigurationError, ResolutionError } from "../core/errors.js";
import type { PolicyEngine } from "../policy/policy.js";
import type { RemoteJobClient } from "../remote/types.js";
import { silentEventSink, type EventSink } from "../runs/events.js";
import { SweepLog, latestPerHash } from "../store/sweepLog.js";
import { sweepLayout } from "../store/sweepLayout.js";
import type { Thumbnailer } from "../store/thumbnail.js";
import { createSweepClient, planSweep, runSweep } from "../sweep/runSweep.js";
import {
  zSweepPlanInput,
  zSweepPlanOutput,
  zSweepResultsInput,
  zSweepResultsOutput,
  zSweepRunInput,
  zSweepRunOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  policy: PolicyEngine;
  env: SweepEnv;
  /** Builds the remote client for sweep_run; defaults to the HTTP client, which needs the API token. */
  clientFactory?: (env: SweepEnv, policy: PolicyEngine) => RemoteJobClient;
  thumbnailer?: Thumbnailer;
  events?: EventSink;
}

interface ConfigSourceArgs {
  config_path?: string;
  config?: Record<string, unknown>;
  output_dir?: string;
}

async function resolveConfig(args: ConfigSourceArgs): Promise<SweepConfig> {
  if (args.config_path && args.config) {
    throw new ConfigurationError("pass either config_path or config, not both");
  }
  if (args.config_path) return loadSweepConfig(args.config_path);
  if (args.config) return parseSweepConfig(args.config, "inline config");
  throw new ConfigurationError("one of config_path or config is required");
}

function errorResult(message: string) {
  return {
    content: [{ type: "text" as const, text: message }],
    isError: true
  };
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "paramsweep-gateway",
    version: "0.1.0"
  });
  const events = deps.events ?? silentEventSink;
  const clientFactory = deps.clientFactory ?? createSweepClient;

  function outputDirFor(args: ConfigSourceArgs, config: SweepConfig): string {
    return args.output_dir ?? deps.env.outputDir ?? config.meta.output_dir;
  }

  // Config and quota problems come back as tool errors; tool denials stay protocol errors.
  function handleToolError(e: unknown) {
    if (e instanceof ConfigurationError || e instanceof ResolutionError) return errorResult(e.message);
    throw e;
  }

  mcp.registerTool(
    "sweep_plan",
    {
      description: "Expand a sweep config into combinations and report what a run would do, without submitting anything.",
      inputSchema: zSweepPlanInput,
      outputSchema: zSweepPlanOutput
    },
    async (args) => {
      const toolName = "sweep_plan";
      try {
        deps.policy.assertToolAllowed(toolName);
        const config = await resolveConfig(args);
        deps.policy.assertModelAllowed(config.meta.base_model);

        const combinations = buildCombinationsFromConfig(config, { events });
        deps.policy.enforceCombinationCount(combinations.length);

        const layout = sweepLayout(outputDirFor(args, config), config.meta.name);
        const prior = latestPerHash(await new SweepLog(layout.logPath, events).replay());
        const plan = planSweep(combinations, prior, { overwrite: args.overwrite, retryFailed: args.retry_failed });

        const descriptions = describeParameters(config.params);
        const parameters: Record<string, { kind: string; is_static: boolean; values: unknown[] | null }> = {};
        for (const [name, d] of Object.entries(descriptions)) {
          parameters[name] = { kind: d.kind, is_static: d.isStatic, values: d.values };
        }

        const structured = {
          sweep: config.meta.name,
          sweep_dir: layout.rootDir,
          model: config.meta.base_model,
          total: combinations.length,
          pending: plan.pending.length,
          already_succeeded: plan.alreadySucceeded.length,
          previously_failed: plan.previouslyFailed.length,
          varying: Object.entries(descriptions)
            .filter(([, d]) => !d.isStatic)
            .map(([name]) => name),
          grid_axes: config.gridAxes,
          parameters,
          sample: plan.pending.slice(0, deps.policy.planPreviewLimit()).map((c) => ({ hash: c.hash, params: { ...c.params } }))
        };
        return {
          content: [
            {
              type: "text",
              text: `Sweep ${config.meta.name}: ${structured.total} combinations, ${structured.pending} pending`
            }
          ],
          structuredContent: structured
        };
      } catch (e) {
        return handleToolError(e);
      }
    }
  );

  mcp.registerTool(
    "sweep_run",
    {
      description: "Run every pending combination of a sweep against the remote model and collect the outputs.",
      inputSchema: zSweepRunInput,
      outputSchema: zSweepRunOutput
    },
    async (args, extra) => {
      const toolName = "sweep_run";
      try {
        deps.policy.assertToolAllowed(toolName);
        const config = await resolveConfig(args);
        const client = clientFactory(deps.env, deps.policy);

        const summary = await runSweep({
          config,
          client,
          policy: deps.policy,
          concurrency: args.concurrency,
          outputDir: outputDirFor(args, config),
          overwrite: args.overwrite,
          retryFailed: args.retry_failed,
          thumbnailer: deps.thumbnailer,
          events,
          signal: extra.signal
        });

        const structured = {
          run_id: summary.runId,
          sweep_dir: summary.sweepDir,
          total: summary.total,
          pending: summary.pending,
          already_succeeded: summary.alreadySucceeded,
          succeeded: summary.succeeded,
          failed: summary.failed,
          skipped: summary.skipped,
          exit_code: summary.exitCode,
          results: summary.results
        };
        return {
          content: [
            {
              type: "text",
              text: `Sweep ${config.meta.name} (${summary.runId}): ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped`
            }
          ],
          structuredContent: structured
        };
      } catch (e) {
        return handleToolError(e);
      }
    }
  );

  mcp.registerTool(
    "sweep_results",
    {
      description: "List persisted results of a sweep, latest per combination unless history is requested.",
      inputSchema: zSweepResultsInput,
      outputSchema: zSweepResultsOutput
    },
    async (args) => {
      const toolName = "sweep_results";
      try {
        deps.policy.assertToolAllowed(toolName);
        const config = await resolveConfig(args);
        const layout = sweepLayout(outputDirFor(args, config), config.meta.name);

        const replayed = await new SweepLog(layout.logPath, events).replay();
        const view = args.history ? replayed : [...latestPerHash(replayed).values()];
        const matching = args.status ? view.filter((r) => r.status === args.status) : view;
        const records = matching.slice(0, args.limit);

        return {
          content: [{ type: "text", text: `${matching.length} records in ${layout.logPath}` }],
          structuredContent: {
            sweep_dir: layout.rootDir,
            record_count: matching.length,
            truncated: matching.length > records.length,
            records
          }
        };
      } catch (e) {
        return handleToolError(e);
      }
    }
  );

  return mcp;
}
