import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import YAML from "yaml";
import { buildCombinations } from "../src/combos/builder.js";
import { parseSweepConfig, type SweepConfig } from "../src/config/sweepConfig.js";
import { ConfigurationError, FatalRemoteError } from "../src/core/errors.js";
import { parseParameters } from "../src/params/parameterSpec.js";
import { PolicyEngine, type PolicyConfig } from "../src/policy/policy.js";
import type { ArtifactReference, RemoteJobClient, SubmissionPayload } from "../src/remote/types.js";
import type { PersistedResult } from "../src/store/sweepLog.js";
import type { Thumbnailer } from "../src/store/thumbnail.js";
import { planSweep, runSweep } from "../src/sweep/runSweep.js";

class FakeRemote implements RemoteJobClient {
  submits: SubmissionPayload[] = [];
  failSteps = new Set<number>();

  async submit(_modelId: string, input: SubmissionPayload): Promise<ArtifactReference[]> {
    this.submits.push(input);
    if (typeof input.steps === "number" && this.failSteps.has(input.steps)) {
      throw new FatalRemoteError("invalid_input", `steps ${input.steps} rejected`);
    }
    return [`https://cdn.test/${String(input.steps)}.png`];
  }

  async fetch(reference: ArtifactReference): Promise<Buffer> {
    return Buffer.from(reference);
  }
}

const thumbnailer: Thumbnailer = {
  async thumbnail(source: Buffer): Promise<Buffer> {
    return source;
  }
};

function policy(overrides: Partial<PolicyConfig["quotas"]> = {}): PolicyEngine {
  return new PolicyEngine({
    version: 1,
    tool_allowlist: [],
    quotas: { max_concurrency: 4, max_combinations: 100, ...overrides },
    retry: {
      submit: { retries: 0, base_delay_ms: 0, max_delay_ms: 0 },
      download: { retries: 0, base_delay_ms: 0, max_delay_ms: 0 }
    }
  });
}

describe("planSweep", () => {
  const combos = buildCombinations(parseParameters({ steps: { list: [1, 2, 3] } }));
  const [a, b] = combos;

  function prior(status: PersistedResult["status"], hash: PersistedResult["_hash"]): PersistedResult {
    return {
      status,
      _hash: hash,
      params: {},
      timestamp: "t",
      duration_ms: 0,
      attempts: 1,
      run_id: "run_x",
      remote_status: status === "succeeded" ? "succeeded" : "failed"
    };
  }

  it("excludes succeeded and failed hashes by default", () => {
    if (!a || !b) throw new Error("fixture");
    const latest = new Map([
      [a.hash, prior("succeeded", a.hash)],
      [b.hash, prior("failed", b.hash)]
    ]);
    const plan = planSweep(combos, latest);
    expect(plan.pending.map((c) => c.params.steps)).toEqual([3]);
    expect(plan.alreadySucceeded.map((c) => c.params.steps)).toEqual([1]);
    expect(plan.previouslyFailed.map((c) => c.params.steps)).toEqual([2]);

    expect(planSweep(combos, latest, { retryFailed: true }).pending.map((c) => c.params.steps)).toEqual([2, 3]);
    expect(planSweep(combos, latest, { overwrite: true }).pending).toHaveLength(3);
  });

  it("plans a repeated combination once", () => {
    const repeated = buildCombinations(parseParameters({ steps: { list: [20, 20, 30] } }));
    expect(repeated).toHaveLength(3);
    expect(planSweep(repeated, new Map()).pending.map((c) => c.params.steps)).toEqual([20, 30]);
  });
});

describe("runSweep", () => {
  let dir: string;
  let config: SweepConfig;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "paramsweep-run-"));
    config = parseSweepConfig({
      meta: { name: "demo", base_model: "owner/model", output_dir: dir },
      params: { prompt: "p", steps: { list: [1, 2, 3] } }
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("runs every combination, saves the config and resumes with nothing to do", async () => {
    const remote = new FakeRemote();
    const first = await runSweep({ config, client: remote, policy: policy(), thumbnailer });

    expect(first).toMatchObject({ total: 3, pending: 3, succeeded: 3, failed: 0, skipped: 0, exitCode: 0 });
    expect(first.runId).toMatch(/^run_[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(first.sweepDir).toBe(path.join(dir, "demo"));
    const saved: unknown = YAML.parse(await readFile(path.join(dir, "demo", "cfg.yaml"), "utf8"));
    expect(saved).toMatchObject({ meta: { name: "demo" }, params: { prompt: "p", steps: { list: [1, 2, 3] } } });

    const second = await runSweep({ config, client: remote, policy: policy(), thumbnailer });
    expect(second).toMatchObject({ total: 3, pending: 0, alreadySucceeded: 3, succeeded: 0, exitCode: 0 });
    expect(remote.submits).toHaveLength(3);
  });

  it("reports failures through the exit code and retries them only on request", async () => {
    const remote = new FakeRemote();
    remote.failSteps.add(2);
    const first = await runSweep({ config, client: remote, policy: policy(), thumbnailer });
    expect(first).toMatchObject({ succeeded: 2, failed: 1, exitCode: 1 });

    const resumed = await runSweep({ config, client: remote, policy: policy(), thumbnailer });
    expect(resumed.pending).toBe(0);

    remote.failSteps.clear();
    const retried = await runSweep({ config, client: remote, policy: policy(), thumbnailer, retryFailed: true });
    expect(retried).toMatchObject({ pending: 1, succeeded: 1, failed: 0, exitCode: 0 });
    expect(remote.submits).toHaveLength(4);
    expect(remote.submits.filter((s) => s.steps === 2)).toHaveLength(2);
  });

  it("reruns everything with overwrite", async () => {
    const remote = new FakeRemote();
    await runSweep({ config, client: remote, policy: policy(), thumbnailer });
    const again = await runSweep({ config, client: remote, policy: policy(), thumbnailer, overwrite: true });
    expect(again).toMatchObject({ pending: 3, succeeded: 3 });
    expect(remote.submits).toHaveLength(6);
  });

  it("refuses sweeps over the policy limits before dispatching", async () => {
    const remote = new FakeRemote();
    await expect(runSweep({ config, client: remote, policy: policy({ max_combinations: 2 }), thumbnailer })).rejects.toThrow(
      "policy denied sweep of 3 combinations (max 2)"
    );
    await expect(runSweep({ config, client: remote, policy: policy(), thumbnailer, concurrency: 9 })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(remote.submits).toHaveLength(0);
  });

  it("honours an output directory override", async () => {
    const other = path.join(dir, "elsewhere");
    const summary = await runSweep({ config, client: new FakeRemote(), policy: policy(), thumbnailer, outputDir: other });
    expect(summary.sweepDir).toBe(path.join(other, "demo"));
  });

  it("skips everything when cancelled up front", async () => {
    const remote = new FakeRemote();
    const controller = new AbortController();
    controller.abort(new Error("stop"));
    const summary = await runSweep({ config, client: remote, policy: policy(), thumbnailer, signal: controller.signal });
    expect(summary).toMatchObject({ pending: 3, skipped: 3, succeeded: 0, exitCode: 0 });
    expect(remote.submits).toHaveLength(0);
  });
});
