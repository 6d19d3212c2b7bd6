import { Actor, log } from "apify";
import { StrategyOrchestrator } from "./acquisition/orchestrator";
import { createStrategies } from "./acquisition/strategies";
import { StrategyRunner } from "./acquisition/strategy-runner";
import { buildRuntimeConfig, ConfigValidationError } from "./config";
import { ResponseAnalyzer } from "./detection/response-analyzer";
import { createInputValidator } from "./input-validation";
import { installCorrelationLogging } from "./observability/correlation-log";
import { DatasetResultSink } from "./persistence/result-sink";
import { FingerprintRotator } from "./reliability/fingerprint-rotation";
import { loadIdentityFeeds } from "./reliability/identity-feed";
import { IdentityPool } from "./reliability/identity-pool";
import { createIdentityProbe } from "./reliability/identity-probe";
import { ValidationError } from "./runtime/errors";

const run = async (): Promise<void> => {
  await Actor.init();

  const input = createInputValidator()(await Actor.getInput());
  const runtime = buildRuntimeConfig(input);

  log.setLevel(log.LEVELS[runtime.logLevel]);
  installCorrelationLogging(log, runtime.correlationLogging);

  const analyzer = new ResponseAnalyzer(runtime.detection);
  const pool = new IdentityPool(runtime.identityPool, createIdentityProbe(runtime.identityCheckUrls));
  if (runtime.identityFeedUrls.length > 0) {
    pool.ingest(await loadIdentityFeeds(runtime.identityFeedUrls, runtime.identityFeedTimeoutMs));
  }
  await pool.refreshIfStale();

  const fingerprints = new FingerprintRotator({ enabled: runtime.fingerprintRotation });
  const runner = new StrategyRunner(runtime.runner, { pool, analyzer, fingerprints });
  const enabledNames = runtime.strategyOrder.filter((name) => !runtime.disabledStrategies.includes(name));
  const sink = new DatasetResultSink(runtime.datasetName);
  await sink.init();

  const orchestrator = new StrategyOrchestrator(runtime.orchestrator, {
    strategies: createStrategies(enabledNames, runtime.strategies),
    runner,
    analyzer,
    sink,
  });

  log.info("Actor initialized.", {
    targets: runtime.targets.length,
    strategies: orchestrator.enabledStrategies,
    escalation: runtime.orchestrator.escalationEnabled ? runtime.orchestrator.escalationStrategy : null,
    concurrencyLimit: runtime.orchestrator.concurrencyLimit,
    requestTimeoutMs: runtime.runner.requestTimeoutMs,
    targetTimeoutMs: runtime.orchestrator.targetTimeoutMs,
    sessionMaxUses: runtime.orchestrator.sessionMaxUses,
    identities: pool.size,
    aliveIdentities: pool.aliveCount(),
    feedUrls: runtime.identityFeedUrls.length,
    datasetName: runtime.datasetName ?? "default",
  });

  // Aborting the batch stops new phases and cuts in-flight attempts; open sessions are still closed.
  const controller = new AbortController();
  const stop = (reason: string): void => {
    if (controller.signal.aborted) return;
    log.warning("Shutdown requested; abandoning remaining work.", { reason });
    controller.abort();
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));
  Actor.on("aborting", () => stop("aborting"));

  if (runtime.targets.length === 0) {
    log.warning("No targets given; nothing to acquire.");
  }

  const results = await orchestrator.acquireBatch(
    runtime.targets,
    runtime.orchestrator.concurrencyLimit,
    controller.signal,
  );

  await Actor.setValue("OUTPUT", {
    summary: orchestrator.getLastSummary(),
    interrupted: controller.signal.aborted,
    detection: analyzer.snapshot(),
    identity_pool: pool.snapshot(),
    fingerprints: fingerprints.snapshot(),
    results: results.map((result) => ({
      target_name: result.targetName,
      found: result.found,
      strategy_used: result.strategyUsed,
      url: result.record?.url ?? null,
      escalated: result.escalated,
      elapsed_ms: result.elapsedMs,
      error: result.error,
    })),
  });

  await Actor.exit();
};

run().catch(async (error: unknown) => {
  if (error instanceof ConfigValidationError) {
    log.error("Actor bootstrap failed due to invalid configuration.", {
      issues: error.issues,
    });
    await Actor.fail(error.message);
    return;
  }
  if (error instanceof ValidationError) {
    log.error("Actor input is invalid.", { details: error.details });
    await Actor.fail(error.message);
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof Error) log.exception(error, "Actor run failed");
  else log.error("Actor run failed.", { error: message });
  await Actor.fail(message);
});
