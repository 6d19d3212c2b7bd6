import { randomUUID } from "node:crypto";
import { log } from "apify";
import type { ResponseAnalyzer } from "../detection/response-analyzer";
import { withAcquisitionContext } from "../observability/acquisition-context";
import type { ResultSink } from "../persistence/result-sink";
import { childSignal } from "../runtime/abort";
import { AdmissionQueue } from "../runtime/admission-queue";
import {
  describeError,
  IdentityBannedError,
  TargetTimeoutError,
  ValidationError,
} from "../runtime/errors";
import { SessionLifecycle } from "../runtime/session-lifecycle";
import { withoutSession, type SessionScope, type StrategyRunner } from "./strategy-runner";
import type { AcquisitionResult, AcquisitionStrategy, AttemptTrace, RawRecord } from "./types";

export interface OrchestratorConfig {
  strategyOrder: string[];
  disabledStrategies: string[];
  escalationEnabled: boolean;
  escalationStrategy: string | null;
  concurrencyLimit: number;
  targetTimeoutMs: number;
  sessionMaxUses: number;
  sessionShutdownTimeoutMs: number;
}

export interface OrchestratorDeps {
  strategies: Array<AcquisitionStrategy<unknown>>;
  runner: StrategyRunner;
  analyzer: ResponseAnalyzer;
  sink?: ResultSink;
  runId?: string;
}

export interface BatchSummary {
  run_id: string;
  targets: number;
  found: number;
  not_found: number;
  escalated: boolean;
  phases: Array<{
    phase: number;
    strategy: string;
    attempted: number;
    resolved: number;
    ban_signal: boolean;
    duration_ms: number;
    peak_inflight: number;
  }>;
  by_strategy: Record<string, number>;
}

type Strategy = AcquisitionStrategy<unknown>;

interface TargetState {
  name: string;
  spentMs: number;
  attempts: AttemptTrace[];
  resolution: { record: RawRecord; strategy: string; matchScore: number } | null;
  lastError: AttemptTrace["error"];
  escalated: boolean;
}

const NOT_FOUND_ERROR = {
  code: "NOT_FOUND",
  message: "No enabled strategy produced an accepted match.",
} as const;

/**
 * Walks the enabled strategies in priority order. A ban signal makes the
 * escalation strategy jump the queue once; the strategies it overtook are
 * still tried afterwards.
 */
class FallbackPlan {
  private readonly order: Strategy[];
  private readonly escalation: Strategy | null;
  private readonly tried = new Set<string>();
  private escalationPending = false;
  private jumped = false;

  public constructor(order: Strategy[], escalation: Strategy | null) {
    this.order = order;
    this.escalation = escalation;
  }

  /** Whether the strategy last handed out by `next` was an escalation jump. */
  public get lastWasEscalation(): boolean {
    return this.jumped;
  }

  public next(): Strategy | null {
    this.jumped = false;
    if (this.escalationPending && this.escalation) {
      this.escalationPending = false;
      this.jumped = true;
      this.tried.add(this.escalation.name);
      return this.escalation;
    }
    const strategy = this.order.find((entry) => !this.tried.has(entry.name)) ?? null;
    if (strategy) this.tried.add(strategy.name);
    return strategy;
  }

  /** Returns true when the escalation strategy was moved to the front. */
  public escalate(): boolean {
    if (!this.escalation || this.tried.has(this.escalation.name)) return false;
    const nextInOrder = this.order.find((entry) => !this.tried.has(entry.name));
    if (nextInOrder === this.escalation) return false;
    this.escalationPending = true;
    return true;
  }
}

const newTargetState = (name: string): TargetState => ({
  name,
  spentMs: 0,
  attempts: [],
  resolution: null,
  lastError: null,
  escalated: false,
});

const finalize = (state: TargetState): AcquisitionResult => {
  const resolution = state.resolution;
  return Object.freeze({
    targetName: state.name,
    found: resolution !== null,
    record: resolution ? Object.freeze({ ...resolution.record }) : null,
    strategyUsed: resolution?.strategy ?? null,
    matchScore: resolution?.matchScore ?? null,
    elapsedMs: state.spentMs,
    error: resolution ? null : (state.lastError ?? { ...NOT_FOUND_ERROR }),
    escalated: state.escalated,
    attempts: Object.freeze([...state.attempts]),
  });
};

/**
 * Drives targets through the strategy fallback chain, one target at a time
 * (`acquire`) or as a batch in strategy phases (`acquireBatch`). Neither
 * entry point throws for a target-level failure; every outcome is a result.
 */
export class StrategyOrchestrator {
  private readonly config: OrchestratorConfig;
  private readonly deps: OrchestratorDeps;
  private readonly runId: string;
  private readonly enabled: Strategy[];
  private readonly escalation: Strategy | null;
  private lastSummary: BatchSummary | null = null;

  public constructor(config: OrchestratorConfig, deps: OrchestratorDeps) {
    this.config = config;
    this.deps = deps;
    this.runId = deps.runId ?? randomUUID();

    const registry = new Map(deps.strategies.map((strategy) => [strategy.name, strategy]));
    const disabled = new Set(config.disabledStrategies);
    const enabled: Strategy[] = [];
    for (const name of config.strategyOrder) {
      if (disabled.has(name)) {
        log.info("Strategy disabled by configuration.", { strategy: name });
        continue;
      }
      const strategy = registry.get(name);
      if (!strategy) {
        throw new ValidationError(`Strategy '${name}' is in the priority order but was not registered.`, { name });
      }
      enabled.push(strategy);
    }
    if (enabled.length === 0) {
      throw new ValidationError("At least one strategy must be enabled.");
    }
    this.enabled = enabled;

    const escalationName = config.escalationEnabled ? config.escalationStrategy : null;
    this.escalation = escalationName ? (enabled.find((strategy) => strategy.name === escalationName) ?? null) : null;
    if (escalationName && !this.escalation) {
      log.warning("Escalation strategy is not enabled; ban signals will not escalate.", {
        strategy: escalationName,
      });
    }
  }

  public get enabledStrategies(): string[] {
    return this.enabled.map((strategy) => strategy.name);
  }

  public getLastSummary(): BatchSummary | null {
    return this.lastSummary;
  }

  /** Sequential fallback for one target under the per-target time budget. */
  public async acquire(targetName: string, signal?: AbortSignal): Promise<AcquisitionResult> {
    const state = newTargetState(targetName.trim());
    if (!state.name) return this.emit(this.invalidTarget(state));

    await withAcquisitionContext({ run_id: this.runId, target_name: state.name }, async () => {
      const plan = new FallbackPlan(this.enabled, this.escalation);
      for (let strategy = plan.next(); strategy; strategy = plan.next()) {
        if (signal?.aborted) break;
        const lifecycle = this.lifecycleFor(strategy);
        try {
          await this.attemptStrategy(strategy, state, lifecycle ? this.scopeOf(lifecycle) : withoutSession, signal);
        } finally {
          if (lifecycle) await lifecycle.shutdown(this.config.sessionShutdownTimeoutMs);
        }
        if (state.resolution) break;
        if (this.sawBanSignal(state) && plan.escalate()) {
          state.escalated = true;
          this.logEscalation(strategy.name, [state.name]);
        }
      }
    });

    return this.emit(finalize(state));
  }

  /**
   * Runs one phase per strategy over the targets still unresolved, each phase
   * fanned out behind an admission gate of `concurrencyLimit`. Duplicate names
   * are acquired once. Results come back in first-occurrence order.
   */
  public async acquireBatch(
    targets: string[],
    concurrencyLimit = this.config.concurrencyLimit,
    signal?: AbortSignal,
  ): Promise<AcquisitionResult[]> {
    if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1) {
      throw new ValidationError("concurrencyLimit must be a positive integer.", { concurrencyLimit });
    }

    const states = new Map<string, TargetState>();
    for (const raw of targets) {
      const name = raw.trim();
      if (!states.has(name)) states.set(name, newTargetState(name));
    }
    const ordered = [...states.values()];
    const valid = ordered.filter((state) => state.name.length > 0);
    const summary: BatchSummary = {
      run_id: this.runId,
      targets: ordered.length,
      found: 0,
      not_found: 0,
      escalated: false,
      phases: [],
      by_strategy: {},
    };

    log.info("Batch acquisition started.", {
      runId: this.runId,
      targets: ordered.length,
      duplicatesDropped: targets.length - ordered.length,
      strategies: this.enabledStrategies,
      concurrencyLimit,
    });

    await withAcquisitionContext({ run_id: this.runId }, async () => {
      const plan = new FallbackPlan(this.enabled, this.escalation);
      let phase = 0;
      for (let strategy = plan.next(); strategy; strategy = plan.next()) {
        if (signal?.aborted) break;
        const pending = valid.filter((state) => state.resolution === null);
        if (pending.length === 0) break;

        phase += 1;
        const report = await this.runPhase(phase, strategy, pending, concurrencyLimit, signal, plan.lastWasEscalation);
        summary.phases.push(report);

        if (report.ban_signal && plan.escalate()) {
          summary.escalated = true;
          this.logEscalation(strategy.name, pending.filter((state) => !state.resolution).map((state) => state.name));
        }
      }
    });

    const results = ordered.map((state) => (state.name ? finalize(state) : this.invalidTarget(state)));
    for (const result of results) {
      if (result.found && result.strategyUsed) {
        summary.by_strategy[result.strategyUsed] = (summary.by_strategy[result.strategyUsed] ?? 0) + 1;
        summary.found += 1;
      } else {
        summary.not_found += 1;
      }
      await this.emit(result);
    }
    this.lastSummary = summary;

    log.info("Batch acquisition finished.", {
      runId: this.runId,
      found: summary.found,
      notFound: summary.not_found,
      phases: summary.phases.length,
      escalated: summary.escalated,
    });
    return results;
  }

  private async runPhase(
    phase: number,
    strategy: Strategy,
    pending: TargetState[],
    concurrencyLimit: number,
    signal: AbortSignal | undefined,
    escalatedPhase: boolean,
  ): Promise<BatchSummary["phases"][number]> {
    const started = Date.now();
    const queue = new AdmissionQueue({ concurrency: concurrencyLimit, name: `phase-${phase}-${strategy.name}` });
    const lifecycle = this.lifecycleFor(strategy);
    const scope = lifecycle ? this.scopeOf(lifecycle) : withoutSession;
    let banSignal = false;
    let resolved = 0;

    log.info("Phase started.", { phase, strategy: strategy.name, targets: pending.length, escalatedPhase });

    try {
      await withAcquisitionContext({ phase, strategy: strategy.name }, async () =>
        Promise.all(
          pending.map(async (state) =>
            queue.run(async () =>
              withAcquisitionContext({ target_name: state.name }, async () => {
                if (escalatedPhase) state.escalated = true;
                const started: Promise<unknown>[] = [];
                await this.attemptStrategy(strategy, state, scope, signal, (task) => started.push(task));
                if (state.resolution) resolved += 1;
                if (this.sawBanSignal(state)) banSignal = true;
                // The slot stays taken until calls abandoned on timeout have settled.
                await Promise.allSettled(started);
              }),
            ),
          ),
        ),
      );
    } finally {
      if (lifecycle) await lifecycle.shutdown(this.config.sessionShutdownTimeoutMs);
    }

    const stats = queue.getStats();
    const report = {
      phase,
      strategy: strategy.name,
      attempted: pending.length,
      resolved,
      ban_signal: banSignal,
      duration_ms: Date.now() - started,
      peak_inflight: stats.peakInflight,
    };
    log.info("Phase finished.", { ...report, session: lifecycle?.getStats() ?? null });
    return report;
  }

  /** One strategy against one target. Never throws; the outcome lands in the target's trace. */
  private async attemptStrategy(
    strategy: Strategy,
    state: TargetState,
    scope: SessionScope<unknown>,
    signal: AbortSignal | undefined,
    track?: (task: Promise<unknown>) => void,
  ): Promise<void> {
    const remainingMs = this.config.targetTimeoutMs - state.spentMs;
    if (remainingMs <= 0) {
      state.attempts.push({ strategy: strategy.name, outcome: "skipped", elapsedMs: 0, matchScore: null, error: null });
      state.lastError = describeError(new TargetTimeoutError(state.name, this.config.targetTimeoutMs));
      return;
    }

    const budget = childSignal(signal, remainingMs);
    const started = Date.now();
    try {
      const result = await withAcquisitionContext({ strategy: strategy.name }, async () =>
        this.deps.runner.run(strategy, state.name, { signal: budget.signal, session: scope, track }),
      );
      const elapsedMs = Date.now() - started;

      if (result.outcome === "success") {
        state.resolution = { record: result.record, strategy: strategy.name, matchScore: result.matchScore };
        state.attempts.push({
          strategy: strategy.name,
          outcome: "success",
          elapsedMs,
          matchScore: result.matchScore,
          error: null,
        });
        log.info("Target resolved.", {
          strategy: strategy.name,
          matchScore: Math.round(result.matchScore * 1000) / 1000,
          title: result.record.title,
          elapsedMs,
        });
        return;
      }

      state.attempts.push({ strategy: strategy.name, outcome: "no_match", elapsedMs, matchScore: null, error: null });
      log.info("Strategy found no accepted match.", { strategy: strategy.name, candidates: result.candidates });
    } catch (error) {
      const elapsedMs = Date.now() - started;
      const timedOut = budget.signal.aborted && !signal?.aborted;
      const failure = timedOut ? new TargetTimeoutError(state.name, this.config.targetTimeoutMs) : error;
      const described = describeError(failure);
      state.lastError = described;
      state.attempts.push({
        strategy: strategy.name,
        outcome: error instanceof IdentityBannedError ? "banned" : timedOut ? "timeout" : "failed",
        elapsedMs,
        matchScore: null,
        error: described,
      });
      log.info("Strategy failed for target; moving on.", {
        strategy: strategy.name,
        code: described.code,
        error: described.message,
        elapsedMs,
      });
    } finally {
      budget.dispose();
      state.spentMs += Date.now() - started;
    }
  }

  private lifecycleFor(strategy: Strategy): SessionLifecycle<unknown> | null {
    if (!strategy.supportsBatchSession()) return null;
    const open = strategy.openSession?.bind(strategy);
    const close = strategy.closeSession?.bind(strategy);
    if (!open || !close) return null;

    return new SessionLifecycle<unknown>({
      name: strategy.name,
      maxUses: this.config.sessionMaxUses,
      open,
      close,
    });
  }

  private scopeOf(lifecycle: SessionLifecycle<unknown>): SessionScope<unknown> {
    return async (fn) => lifecycle.use(fn);
  }

  private sawBanSignal(state: TargetState): boolean {
    const last = state.attempts[state.attempts.length - 1];
    return last?.outcome === "banned" || this.deps.analyzer.shouldTreatAsBanned();
  }

  private logEscalation(from: string, targets: string[]): void {
    log.warning("Ban signal observed; escalating to the harder-to-detect strategy.", {
      from,
      to: this.escalation?.name ?? null,
      level: this.deps.analyzer.anticrawlerLevel,
      targets: targets.length,
    });
  }

  private invalidTarget(state: TargetState): AcquisitionResult {
    return Object.freeze({
      targetName: state.name,
      found: false,
      record: null,
      strategyUsed: null,
      matchScore: null,
      elapsedMs: 0,
      error: describeError(new ValidationError("Target name must be a non-empty string.")),
      escalated: false,
      attempts: Object.freeze([]),
    });
  }

  private async emit(result: AcquisitionResult): Promise<AcquisitionResult> {
    if (!this.deps.sink) return result;
    try {
      await this.deps.sink.write(result);
    } catch (error) {
      log.warning("Failed to persist acquisition result.", {
        target: result.targetName,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return result;
  }
}
