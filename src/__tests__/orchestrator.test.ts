import { log } from "apify";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { StrategyOrchestrator, type OrchestratorConfig } from "../acquisition/orchestrator";
import { StrategyRunner } from "../acquisition/strategy-runner";
import type { AcquisitionResult } from "../acquisition/types";
import { ResponseAnalyzer } from "../detection/response-analyzer";
import type { DetectionConfig } from "../detection/types";
import { MemoryResultSink, type ResultSink } from "../persistence/result-sink";
import { FingerprintRotator } from "../reliability/fingerprint-rotation";
import { IdentityPool } from "../reliability/identity-pool";
import { ValidationError } from "../runtime/errors";
import { FakeStrategy } from "./fake-strategy";
import { poolConfig, quietDetection } from "./helpers";

const orchestratorConfig = (overrides: Partial<OrchestratorConfig> = {}): OrchestratorConfig => ({
  strategyOrder: ["alpha", "beta", "gamma"],
  disabledStrategies: [],
  escalationEnabled: true,
  escalationStrategy: "gamma",
  concurrencyLimit: 5,
  targetTimeoutMs: 10_000,
  sessionMaxUses: 50,
  sessionShutdownTimeoutMs: 1000,
  ...overrides,
});

const build = (
  strategies: FakeStrategy[],
  options: { config?: Partial<OrchestratorConfig>; detection?: Partial<DetectionConfig>; sink?: ResultSink } = {},
) => {
  const analyzer = new ResponseAnalyzer(quietDetection(options.detection));
  const runner = new StrategyRunner(
    { maxAttempts: 2, requestTimeoutMs: 1000, matchThreshold: 0.6, preferPaid: true },
    {
      pool: new IdentityPool(poolConfig(), async () => ({ ok: true, latencyMs: 1 })),
      analyzer,
      fingerprints: new FingerprintRotator({ enabled: true }),
    },
  );
  const sink = options.sink ?? new MemoryResultSink();
  const orchestrator = new StrategyOrchestrator(orchestratorConfig(options.config), {
    strategies,
    runner,
    analyzer,
    sink,
    runId: "run-test",
  });
  return { orchestrator, analyzer, sink };
};

const outcomes = (result: AcquisitionResult): string[] =>
  result.attempts.map((attempt) => `${attempt.strategy}:${attempt.outcome}`);

// Trips a ban on the first hostile response.
const banOnFirstBlock: Partial<DetectionConfig> = { rotateThreshold: 1, banThreshold: 1 };

beforeEach(() => {
  vi.spyOn(log, "info").mockImplementation(() => undefined);
  vi.spyOn(log, "debug").mockImplementation(() => undefined);
});

describe("StrategyOrchestrator construction", () => {
  it("rejects an unregistered strategy in the order", () => {
    expect(() => build([new FakeStrategy("alpha", "hit")])).toThrow(ValidationError);
  });

  it("rejects a configuration with every strategy disabled", () => {
    expect(() =>
      build([new FakeStrategy("alpha", "hit")], {
        config: { strategyOrder: ["alpha"], disabledStrategies: ["alpha"] },
      }),
    ).toThrow("At least one strategy must be enabled.");
  });

  it("accepts disabled strategies that were never built", () => {
    const { orchestrator } = build([new FakeStrategy("alpha", "hit"), new FakeStrategy("gamma", "hit")], {
      config: { disabledStrategies: ["beta"] },
    });
    expect(orchestrator.enabledStrategies).toEqual(["alpha", "gamma"]);
  });

  it("warns when the escalation strategy is not enabled", () => {
    const warning = vi.spyOn(log, "warning").mockImplementation(() => undefined);
    build([new FakeStrategy("alpha", "hit"), new FakeStrategy("beta", "hit")], {
      config: { strategyOrder: ["alpha", "beta"] },
    });
    expect(warning).toHaveBeenCalledWith("Escalation strategy is not enabled; ban signals will not escalate.", {
      strategy: "gamma",
    });
  });
});

describe("StrategyOrchestrator.acquire", () => {
  it("falls back in priority order and stops at the first resolution", async () => {
    const alpha = new FakeStrategy("alpha", "miss");
    const beta = new FakeStrategy("beta", "hit");
    const gamma = new FakeStrategy("gamma", "hit");
    const { orchestrator, sink } = build([alpha, beta, gamma]);

    const result = await orchestrator.acquire("  数据安全法 ");
    expect(result).toMatchObject({
      targetName: "数据安全法",
      found: true,
      strategyUsed: "beta",
      matchScore: 1,
      error: null,
      escalated: false,
    });
    expect(result.record?.source).toBe("beta");
    expect(outcomes(result)).toEqual(["alpha:no_match", "beta:success"]);
    expect(gamma.calls).toHaveLength(0);
    expect(sink instanceof MemoryResultSink ? sink.results : []).toEqual([result]);
  });

  it("tries every enabled strategy before reporting not found", async () => {
    const strategies = ["alpha", "beta", "gamma"].map((name) => new FakeStrategy(name, "miss"));
    const { orchestrator } = build(strategies);

    const result = await orchestrator.acquire("数据安全法");
    expect(result.found).toBe(false);
    expect(result.error).toEqual({ code: "NOT_FOUND", message: "No enabled strategy produced an accepted match." });
    expect(outcomes(result)).toEqual(["alpha:no_match", "beta:no_match", "gamma:no_match"]);
  });

  it("never calls a disabled strategy", async () => {
    const alpha = new FakeStrategy("alpha", "miss");
    const beta = new FakeStrategy("beta", "hit");
    const gamma = new FakeStrategy("gamma", "hit");
    const { orchestrator } = build([alpha, beta, gamma], { config: { disabledStrategies: ["beta"] } });

    const result = await orchestrator.acquire("数据安全法");
    expect(result.strategyUsed).toBe("gamma");
    expect(beta.calls).toHaveLength(0);
  });

  it("reports the last strategy error when nothing resolves", async () => {
    vi.spyOn(log, "warning").mockImplementation(() => undefined);
    const { orchestrator } = build(
      [new FakeStrategy("alpha", "miss"), new FakeStrategy("beta", "network"), new FakeStrategy("gamma", "miss")],
      { config: { escalationEnabled: false } },
    );

    const result = await orchestrator.acquire("数据安全法");
    expect(outcomes(result)).toEqual(["alpha:no_match", "beta:failed", "gamma:no_match"]);
    expect(result.error).toEqual({ code: "FETCH_ERROR", message: "Request failed: ECONNRESET" });
  });

  it("jumps to the escalation strategy on a ban signal", async () => {
    const warning = vi.spyOn(log, "warning").mockImplementation(() => undefined);
    const alpha = new FakeStrategy("alpha", "hostile");
    const beta = new FakeStrategy("beta", "hit");
    const gamma = new FakeStrategy("gamma", "hit");
    const { orchestrator } = build([alpha, beta, gamma], { detection: banOnFirstBlock });

    const result = await orchestrator.acquire("数据安全法");
    expect(result).toMatchObject({ found: true, strategyUsed: "gamma", escalated: true });
    expect(outcomes(result)).toEqual(["alpha:banned", "gamma:success"]);
    expect(result.attempts[0].error?.code).toBe("IDENTITY_BANNED");
    expect(beta.calls).toHaveLength(0);
    expect(warning).toHaveBeenCalledWith(
      "Ban signal observed; escalating to the harder-to-detect strategy.",
      expect.objectContaining({ from: "alpha", to: "gamma", targets: 1 }),
    );
  });

  it("still tries the overtaken strategies when escalation does not resolve", async () => {
    vi.spyOn(log, "warning").mockImplementation(() => undefined);
    const beta = new FakeStrategy("beta", "hit");
    const { orchestrator } = build(
      [new FakeStrategy("alpha", "hostile"), beta, new FakeStrategy("gamma", "miss")],
      { detection: banOnFirstBlock },
    );

    const result = await orchestrator.acquire("数据安全法");
    expect(outcomes(result)).toEqual(["alpha:banned", "gamma:no_match", "beta:success"]);
    expect(result.strategyUsed).toBe("beta");
  });

  it("does not escalate when escalation is disabled", async () => {
    vi.spyOn(log, "warning").mockImplementation(() => undefined);
    const { orchestrator } = build(
      [new FakeStrategy("alpha", "hostile"), new FakeStrategy("beta", "hit"), new FakeStrategy("gamma", "hit")],
      { detection: banOnFirstBlock, config: { escalationEnabled: false } },
    );

    const result = await orchestrator.acquire("数据安全法");
    expect(result).toMatchObject({ strategyUsed: "beta", escalated: false });
  });

  it("returns a validation failure for a blank target", async () => {
    const alpha = new FakeStrategy("alpha", "hit");
    const { orchestrator } = build([alpha, new FakeStrategy("beta", "hit"), new FakeStrategy("gamma", "hit")]);

    const result = await orchestrator.acquire("   ");
    expect(result).toMatchObject({ found: false, error: { code: "VALIDATION_ERROR" }, attempts: [] });
    expect(alpha.calls).toHaveLength(0);
  });

  it("cuts a strategy off at the per-target time budget", async () => {
    const { orchestrator } = build(
      [
        new FakeStrategy("alpha", "hit", { delayMs: 5000 }),
        new FakeStrategy("beta", "miss"),
        new FakeStrategy("gamma", "miss"),
      ],
      { config: { targetTimeoutMs: 30 } },
    );

    const result = await orchestrator.acquire("数据安全法");
    expect(result.found).toBe(false);
    expect(result.attempts[0].outcome).toBe("timeout");
    expect(result.error?.code).toBe("TARGET_TIMEOUT");
  });

  it("freezes the result it returns", async () => {
    const { orchestrator } = build(["alpha", "beta", "gamma"].map((name) => new FakeStrategy(name, "hit")));
    const result = await orchestrator.acquire("数据安全法");
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.record)).toBe(true);
    expect(Object.isFrozen(result.attempts)).toBe(true);
  });

  it("tags strategy calls with the acquisition context", async () => {
    const alpha = new FakeStrategy("alpha", "hit");
    const { orchestrator } = build([alpha, new FakeStrategy("beta", "hit"), new FakeStrategy("gamma", "hit")]);
    await orchestrator.acquire("数据安全法");
    expect(alpha.calls[0]).toMatchObject({ strategy: "alpha", attempt: 1 });
  });
});

describe("StrategyOrchestrator.acquireBatch", () => {
  it("runs one phase per strategy over the targets still pending", async () => {
    const alpha = new FakeStrategy("alpha", (target) => (target === "甲法" ? "hit" : "miss"));
    const beta = new FakeStrategy("beta", (target) => (target === "乙法" ? "hit" : "miss"));
    const gamma = new FakeStrategy("gamma", "miss");
    const { orchestrator } = build([alpha, beta, gamma]);

    const results = await orchestrator.acquireBatch(["甲法", "乙法", "丙法"]);
    expect(results.map((result) => [result.targetName, result.strategyUsed])).toEqual([
      ["甲法", "alpha"],
      ["乙法", "beta"],
      ["丙法", null],
    ]);
    expect(alpha.searched.sort()).toEqual(["丙法", "乙法", "甲法"].sort());
    expect(beta.searched.sort()).toEqual(["丙法", "乙法"].sort());
    expect(gamma.searched).toEqual(["丙法"]);

    expect(orchestrator.getLastSummary()).toMatchObject({
      run_id: "run-test",
      targets: 3,
      found: 2,
      not_found: 1,
      escalated: false,
      by_strategy: { alpha: 1, beta: 1 },
      phases: [
        { phase: 1, strategy: "alpha", attempted: 3, resolved: 1, ban_signal: false },
        { phase: 2, strategy: "beta", attempted: 2, resolved: 1, ban_signal: false },
        { phase: 3, strategy: "gamma", attempted: 1, resolved: 0, ban_signal: false },
      ],
    });
  });

  it("stops early once every target is resolved", async () => {
    const beta = new FakeStrategy("beta", "hit");
    const { orchestrator } = build([new FakeStrategy("alpha", "hit"), beta, new FakeStrategy("gamma", "hit")]);

    await orchestrator.acquireBatch(["甲法", "乙法"]);
    expect(beta.calls).toHaveLength(0);
    expect(orchestrator.getLastSummary()?.phases).toHaveLength(1);
  });

  it("acquires duplicate names once and keeps first-occurrence order", async () => {
    const alpha = new FakeStrategy("alpha", "hit");
    const sink = new MemoryResultSink();
    const { orchestrator } = build([alpha, new FakeStrategy("beta", "hit"), new FakeStrategy("gamma", "hit")], {
      sink,
    });

    const results = await orchestrator.acquireBatch(["乙法", "甲法", " 乙法 ", "乙法"]);
    expect(results.map((result) => result.targetName)).toEqual(["乙法", "甲法"]);
    expect(alpha.calls).toHaveLength(2);
    expect(sink.results.map((result) => result.targetName)).toEqual(["乙法", "甲法"]);
  });

  it("keeps at most concurrencyLimit targets in flight", async () => {
    const alpha = new FakeStrategy("alpha", "hit", { delayMs: 5 });
    const { orchestrator } = build([alpha, new FakeStrategy("beta", "hit"), new FakeStrategy("gamma", "hit")]);
    const targets = Array.from({ length: 50 }, (_, index) => `法规${index}`);

    const results = await orchestrator.acquireBatch(targets, 5);
    expect(results.every((result) => result.found)).toBe(true);
    expect(alpha.peakInflight).toBe(5);
    expect(orchestrator.getLastSummary()?.phases[0].peak_inflight).toBe(5);
  });

  it("holds the slot until a timed-out call that ignores cancellation has settled", async () => {
    const alpha = new FakeStrategy("alpha", "hit", { delayMs: 150, ignoreSignal: true });
    const { orchestrator } = build([alpha, new FakeStrategy("beta", "miss"), new FakeStrategy("gamma", "miss")], {
      config: { targetTimeoutMs: 20 },
    });
    const targets = Array.from({ length: 10 }, (_, index) => `慢法${index}`);

    const results = await orchestrator.acquireBatch(targets, 2);
    expect(alpha.calls).toHaveLength(10);
    expect(alpha.peakInflight).toBe(2);
    for (const result of results) {
      expect(result.attempts[0]).toMatchObject({ strategy: "alpha", outcome: "timeout" });
      expect(result.attempts[0].elapsedMs).toBeLessThan(150);
      expect(result.error?.code).toBe("TARGET_TIMEOUT");
    }
  });

  it("escalates the remaining targets after a phase with a ban signal", async () => {
    vi.spyOn(log, "warning").mockImplementation(() => undefined);
    const alpha = new FakeStrategy("alpha", "hostile");
    const beta = new FakeStrategy("beta", "hit");
    const gamma = new FakeStrategy("gamma", "hit");
    const { orchestrator } = build([alpha, beta, gamma], { detection: banOnFirstBlock });

    const results = await orchestrator.acquireBatch(["甲法", "乙法", "丙法"], 1);
    expect(results.map((result) => [result.strategyUsed, result.escalated])).toEqual([
      ["gamma", true],
      ["gamma", true],
      ["gamma", true],
    ]);
    expect(beta.calls).toHaveLength(0);
    expect(orchestrator.getLastSummary()).toMatchObject({
      escalated: true,
      by_strategy: { gamma: 3 },
      phases: [
        { strategy: "alpha", ban_signal: true, resolved: 0 },
        { strategy: "gamma", resolved: 3 },
      ],
    });
  });

  it("shares one session per phase and replaces it after the use limit", async () => {
    const alpha = new FakeStrategy("alpha", "hit", { batchSession: true });
    const { orchestrator } = build([alpha, new FakeStrategy("beta", "hit"), new FakeStrategy("gamma", "hit")], {
      config: { sessionMaxUses: 2 },
    });

    await orchestrator.acquireBatch(["一", "二", "三", "四", "五"], 1);
    expect(alpha.calls.map((call) => call.session)).toEqual([1, 1, 2, 2, 3]);
    expect(alpha.closed).toEqual([1, 2, 3]);
  });

  it("gives every blank name a validation failure without running it", async () => {
    const { orchestrator } = build(["alpha", "beta", "gamma"].map((name) => new FakeStrategy(name, "hit")));
    const results = await orchestrator.acquireBatch(["甲法", "", "  "]);
    expect(results.map((result) => result.error?.code ?? null)).toEqual([null, "VALIDATION_ERROR"]);
  });

  it("rejects an invalid concurrency limit", async () => {
    const { orchestrator } = build(["alpha", "beta", "gamma"].map((name) => new FakeStrategy(name, "hit")));
    await expect(orchestrator.acquireBatch(["甲法"], 0)).rejects.toBeInstanceOf(ValidationError);
    await expect(orchestrator.acquireBatch(["甲法"], 2.5)).rejects.toBeInstanceOf(ValidationError);
  });

  it("runs nothing when the batch is aborted up front", async () => {
    const alpha = new FakeStrategy("alpha", "hit");
    const { orchestrator } = build([alpha, new FakeStrategy("beta", "hit"), new FakeStrategy("gamma", "hit")]);
    const controller = new AbortController();
    controller.abort();

    const results = await orchestrator.acquireBatch(["甲法"], 5, controller.signal);
    expect(results[0]).toMatchObject({ found: false, error: { code: "NOT_FOUND" } });
    expect(alpha.calls).toHaveLength(0);
  });

  it("logs a sink failure and still returns the result", async () => {
    const warning = vi.spyOn(log, "warning").mockImplementation(() => undefined);
    const failingSink: ResultSink = {
      write: async () => {
        throw new Error("dataset unavailable");
      },
    };
    const { orchestrator } = build(["alpha", "beta", "gamma"].map((name) => new FakeStrategy(name, "hit")), {
      sink: failingSink,
    });

    const results = await orchestrator.acquireBatch(["甲法"]);
    expect(results[0].found).toBe(true);
    expect(warning).toHaveBeenCalledWith("Failed to persist acquisition result.", {
      target: "甲法",
      error: "dataset unavailable",
    });
  });
});
