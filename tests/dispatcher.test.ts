import { describe, it, expect, afterEach, vi } from "vitest";
import { setTimeout as sleep } from "timers/promises";
import { buildCombinations } from "../src/combos/builder.js";
import { FatalRemoteError, TransientRemoteError } from "../src/core/errors.js";
import { DEFAULT_COERCIONS, toSubmissionPayload } from "../src/dispatch/coerce.js";
import { dispatchCombinations } from "../src/dispatch/dispatcher.js";
import { jitterDelayMs, type RetryPolicy } from "../src/dispatch/retry.js";
import { parseParameters } from "../src/params/parameterSpec.js";
import type { ArtifactReference, RemoteCallOptions, RemoteJobClient, SubmissionPayload } from "../src/remote/types.js";
import { RecordingEventSink } from "../src/runs/events.js";

type Behavior = (input: SubmissionPayload, call: number, opts: RemoteCallOptions) => Promise<ArtifactReference[]>;

class FakeClient implements RemoteJobClient {
  readonly calls: SubmissionPayload[] = [];
  readonly callTimes: number[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly behavior: Behavior) {}

  async submit(_modelId: string, input: SubmissionPayload, opts: RemoteCallOptions = {}): Promise<ArtifactReference[]> {
    const call = this.calls.length;
    this.calls.push(input);
    this.callTimes.push(Date.now());
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.behavior(input, call, opts);
    } finally {
      this.inFlight--;
    }
  }

  async fetch(): Promise<Buffer> {
    return Buffer.alloc(0);
  }
}

const noRetry: RetryPolicy = { retries: 0, baseDelayMs: 0, maxDelayMs: 0, jitter: false };

function combos(values: number[]) {
  return buildCombinations(parseParameters({ prompt: "p", steps: { list: values } }));
}

afterEach(() => {
  vi.useRealTimers();
});

describe("toSubmissionPayload", () => {
  it("coerces known parameters and drops reserved keys", () => {
    expect(toSubmissionPayload({ steps: "20", cfg: "7.5", seed: 3.9, prompt: 5, _hash: "x", custom: true })).toEqual({
      steps: 20,
      cfg: 7.5,
      seed: 3,
      prompt: "5",
      custom: true
    });
  });

  it("rejects values that cannot be coerced", () => {
    expect(() => toSubmissionPayload({ steps: "many" })).toThrow('parameter steps: cannot coerce "many" to integer');
    expect(() => toSubmissionPayload({ cfg: true })).toThrow(FatalRemoteError);
  });

  it("covers the standard diffusion inputs", () => {
    expect(DEFAULT_COERCIONS["num_inference_steps"]).toBe("integer");
    expect(DEFAULT_COERCIONS["guidance_scale"]).toBe("float");
    expect(DEFAULT_COERCIONS["negative_prompt"]).toBe("string");
  });
});

describe("dispatchCombinations", () => {
  it("never exceeds the concurrency bound", async () => {
    const client = new FakeClient(async (input) => {
      await sleep(5);
      return [`https://example.test/${String(input.steps)}.png`];
    });
    const results = await dispatchCombinations(combos([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]), {
      concurrency: 3,
      client,
      modelId: "owner/model",
      retry: noRetry
    });
    expect(client.maxInFlight).toBe(3);
    expect(results.every((r) => r.status === "succeeded")).toBe(true);
  });

  it("returns results in input order", async () => {
    const client = new FakeClient(async (input) => {
      await sleep(input.steps === 1 ? 30 : 1);
      return [`https://example.test/${String(input.steps)}.png`];
    });
    const results = await dispatchCombinations(combos([1, 2, 3]), { concurrency: 3, client, modelId: "owner/model", retry: noRetry });
    expect(results.map((r) => r.params.steps)).toEqual([1, 2, 3]);
    const first = results[0];
    if (first?.status !== "succeeded") throw new Error("expected success");
    expect(first.artifacts).toEqual(["https://example.test/1.png"]);
    expect(first.attempts).toBe(1);
  });

  it("makes retries + 1 attempts on a persistent retryable failure", async () => {
    const events = new RecordingEventSink();
    const client = new FakeClient(async () => {
      throw new TransientRemoteError("server_fault", "HTTP 503");
    });
    const [result] = await dispatchCombinations(combos([1]), {
      concurrency: 1,
      client,
      modelId: "owner/model",
      retry: { retries: 3, baseDelayMs: 0, maxDelayMs: 0, jitter: false },
      events
    });
    expect(client.calls).toHaveLength(4);
    expect(result?.status).toBe("failed");
    expect(result?.attempts).toBe(4);
    if (result?.status !== "failed") throw new Error("expected failure");
    expect(result.error).toEqual({ category: "server_fault", message: "HTTP 503" });
    expect(result.submitted).toBe(true);
    expect(events.ofKind("dispatch.attempt_failed")).toHaveLength(4);
    expect(events.ofKind("dispatch.failed")).toHaveLength(1);
  });

  it("does not retry fatal errors", async () => {
    const client = new FakeClient(async () => {
      throw new FatalRemoteError("auth", "HTTP 401");
    });
    const [result] = await dispatchCombinations(combos([1]), {
      concurrency: 1,
      client,
      modelId: "owner/model",
      retry: { retries: 5, baseDelayMs: 0, maxDelayMs: 0, jitter: false }
    });
    expect(client.calls).toHaveLength(1);
    if (result?.status !== "failed") throw new Error("expected failure");
    expect(result.error.category).toBe("auth");
    expect(result.attempts).toBe(1);
  });

  it("treats unknown errors as fatal and socket errors as retryable", async () => {
    let calls = 0;
    const client = new FakeClient(async () => {
      calls++;
      if (calls === 1) throw Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
      throw new Error("boom");
    });
    const [result] = await dispatchCombinations(combos([1]), {
      concurrency: 1,
      client,
      modelId: "owner/model",
      retry: { retries: 5, baseDelayMs: 0, maxDelayMs: 0, jitter: false }
    });
    expect(client.calls).toHaveLength(2);
    if (result?.status !== "failed") throw new Error("expected failure");
    expect(result.error).toEqual({ category: "unclassified", message: "boom" });
  });

  it("reports the error of the last attempt", async () => {
    const errors = [
      new TransientRemoteError("server_fault", "HTTP 503"),
      new TransientRemoteError("server_fault", "HTTP 503"),
      new TransientRemoteError("rate_limited", "HTTP 429")
    ];
    const client = new FakeClient(async (_input, call) => {
      throw errors[call] ?? new Error("unexpected call");
    });
    const [result] = await dispatchCombinations(combos([1]), {
      concurrency: 1,
      client,
      modelId: "owner/model",
      retry: { retries: 2, baseDelayMs: 0, maxDelayMs: 0, jitter: false }
    });
    expect(client.calls).toHaveLength(3);
    if (result?.status !== "failed") throw new Error("expected failure");
    expect(result.error).toEqual({ category: "rate_limited", message: "HTTP 429" });
  });

  it("backs off exponentially up to the cap", async () => {
    vi.useFakeTimers();
    const client = new FakeClient(async () => {
      throw new TransientRemoteError("rate_limited", "HTTP 429");
    });
    const pending = dispatchCombinations(combos([1]), {
      concurrency: 1,
      client,
      modelId: "owner/model",
      retry: { retries: 4, baseDelayMs: 100, maxDelayMs: 350, jitter: false }
    });
    await vi.runAllTimersAsync();
    const [result] = await pending;

    expect(result?.attempts).toBe(5);
    const gaps = client.callTimes.slice(1).map((t, i) => t - (client.callTimes[i] ?? t));
    expect(gaps).toEqual([100, 200, 350, 350]);
  });

  it("keeps going after one combination fails", async () => {
    const client = new FakeClient(async (input) => {
      if (input.steps === 2) throw new FatalRemoteError("invalid_input", "bad steps");
      return ["https://example.test/out.png"];
    });
    const results = await dispatchCombinations(combos([1, 2, 3]), { concurrency: 2, client, modelId: "owner/model", retry: noRetry });
    expect(results.map((r) => r.status)).toEqual(["succeeded", "failed", "succeeded"]);
  });

  it("fails a combination whose payload cannot be coerced without submitting it", async () => {
    const client = new FakeClient(async () => ["https://example.test/out.png"]);
    const bad = buildCombinations(parseParameters({ steps: "lots" }));
    const [result] = await dispatchCombinations(bad, { concurrency: 1, client, modelId: "owner/model", retry: noRetry });
    expect(client.calls).toHaveLength(0);
    if (result?.status !== "failed") throw new Error("expected failure");
    expect(result.submitted).toBe(false);
    expect(result.attempts).toBe(0);
    expect(result.error.category).toBe("invalid_input");
    expect(result.params).toEqual({ steps: "lots" });
  });

  it("skips in-flight and queued combinations on cancellation", async () => {
    const controller = new AbortController();
    const client = new FakeClient(
      (_input, _call, opts) =>
        new Promise<ArtifactReference[]>((_resolve, reject) => {
          opts.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
          controller.abort(new Error("stop"));
        })
    );
    const results = await dispatchCombinations(combos([1, 2, 3]), {
      concurrency: 1,
      client,
      modelId: "owner/model",
      retry: { retries: 3, baseDelayMs: 0, maxDelayMs: 0, jitter: false },
      signal: controller.signal
    });
    expect(client.calls).toHaveLength(1);
    expect(results.map((r) => (r.status === "skipped" ? r.reason : r.status))).toEqual(["cancelled", "cancelled", "cancelled"]);
    expect(results.map((r) => r.attempts)).toEqual([1, 0, 0]);
  });

  it("runs onResult after releasing the submission slot", async () => {
    let secondStarted: () => void = () => {};
    const second = new Promise<void>((resolve) => {
      secondStarted = resolve;
    });
    const client = new FakeClient(async (_input, call) => {
      if (call === 1) secondStarted();
      return ["https://example.test/out.png"];
    });
    const seen: number[] = [];
    const results = await dispatchCombinations(combos([1, 2]), {
      concurrency: 1,
      client,
      modelId: "owner/model",
      retry: noRetry,
      onResult: async (result) => {
        if (result.params.steps === 1) await second;
        seen.push(Number(result.params.steps));
      }
    });
    // With the slot still held, the second submission could never start and this would hang.
    expect(results).toHaveLength(2);
    expect(client.calls).toHaveLength(2);
    expect([...seen].sort()).toEqual([1, 2]);
  });

  it("fails only the combination whose collection throws", async () => {
    const events = new RecordingEventSink();
    const client = new FakeClient(async (input) => [`https://example.test/${String(input.steps)}.png`]);
    let collected = 0;
    const results = await dispatchCombinations(combos([1, 2, 3, 4, 5, 6, 7, 8]), {
      concurrency: 1,
      client,
      modelId: "owner/model",
      retry: noRetry,
      events,
      onResult: async (result) => {
        if (result.params.steps === 1) throw new Error("ENOSPC on log append");
        collected++;
      }
    });

    expect(client.calls).toHaveLength(8);
    expect(collected).toBe(7);
    expect(results.map((r) => r.status)).toEqual(["failed", ...Array<string>(7).fill("succeeded")]);
    const first = results[0];
    if (first?.status !== "failed") throw new Error("expected failure");
    expect(first.error).toEqual({ category: "persistence", message: "collect failed: ENOSPC on log append" });
    expect(first.submitted).toBe(true);
    expect(first.remoteSucceeded).toBe(true);
    expect(events.ofKind("dispatch.collect_failed")).toHaveLength(1);
  });

  it("rejects a non-positive concurrency", async () => {
    const client = new FakeClient(async () => []);
    await expect(dispatchCombinations(combos([1]), { concurrency: 0, client, modelId: "owner/model", retry: noRetry })).rejects.toThrow(
      "concurrency must be an integer >= 1 (got 0)"
    );
  });
});

describe("jitterDelayMs", () => {
  const policy: RetryPolicy = { retries: 4, baseDelayMs: 100, maxDelayMs: 350, jitter: true };

  it("adds at most a tenth of the base delay", () => {
    expect(jitterDelayMs(policy, 1, () => 0.5)).toBe(5);
    expect(jitterDelayMs(policy, 2, () => 0.999)).toBe(10);
  });

  it("never pushes a capped delay past the max", () => {
    expect(jitterDelayMs(policy, 3, () => 0.999)).toBe(0);
  });

  it("is zero when jitter is off", () => {
    expect(jitterDelayMs({ ...policy, jitter: false }, 1, () => 0.9)).toBe(0);
  });
});
