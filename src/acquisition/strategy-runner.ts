import { log } from "apify";
import type { ResponseAnalyzer } from "../detection/response-analyzer";
import type { DetectionVerdict } from "../detection/types";
import { resolve } from "../matching/match-resolver";
import type { MatchCandidate } from "../matching/types";
import { withAcquisitionContext } from "../observability/acquisition-context";
import type { BrowserFingerprint, FingerprintRotator } from "../reliability/fingerprint-rotation";
import { DIRECT_IDENTITY, type IdentityPool, type NetworkIdentity } from "../reliability/identity-pool";
import { classifyRetryCategory, executeWithAdaptiveRetry } from "../reliability/retry-policy";
import { raceWithSignal, sleep, throwIfAborted } from "../runtime/abort";
import { supportsBrowserProxy } from "../runtime/browser-session";
import { IdentityBannedError, SourceBlockedError } from "../runtime/errors";
import { supportsHttpDispatch, type FetchLike } from "../runtime/http-fetch";
import { HttpClient, screenResponse } from "./http-client";
import type { AcquisitionStrategy, RawRecord, StrategyContext, StrategyTransport } from "./types";

export interface StrategyRunnerConfig {
  maxAttempts: number;
  requestTimeoutMs: number;
  matchThreshold: number;
  preferPaid: boolean;
}

export interface StrategyRunnerDeps {
  pool: IdentityPool;
  analyzer: ResponseAnalyzer;
  fingerprints: FingerprintRotator;
  fetcher?: FetchLike;
}

/** Lends a session for the duration of one attempt; strategies without sessions get null. */
export type SessionScope<TSession> = <T>(fn: (session: TSession | null) => Promise<T>) => Promise<T>;

export const withoutSession: SessionScope<never> = async (fn) => fn(null);

export type StrategyRunResult =
  | { outcome: "success"; record: RawRecord; candidate: MatchCandidate; matchScore: number; attempts: number }
  | { outcome: "no_match"; candidates: number; attempts: number };

export interface StrategyRunOptions<TSession> {
  signal: AbortSignal;
  session: SessionScope<TSession>;
  /** Sees every attempt's task, including ones the signal later abandons. */
  track?: (task: Promise<unknown>) => void;
}

// Verdicts that point at the egress address rather than at the request rate.
const IDENTITY_VERDICTS: ReadonlySet<DetectionVerdict> = new Set(["ip_banned", "waf_detected", "cloudflare_challenge"]);

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const transportFilter = (transport: StrategyTransport): ((identity: NetworkIdentity) => boolean) =>
  transport === "browser" ? supportsBrowserProxy : supportsHttpDispatch;

interface Lease {
  identity: NetworkIdentity | null;
  rotate: boolean;
  pending: Promise<unknown>;
}

/**
 * Runs one strategy against one target: search, resolve, fetch the detail,
 * with identity selection, adaptive pacing and bounded retries of transient
 * failures. Throws when the strategy fails; returns `no_match` when the
 * source answered but nothing cleared the match threshold.
 */
export class StrategyRunner {
  private readonly config: StrategyRunnerConfig;
  private readonly deps: StrategyRunnerDeps;

  public constructor(config: StrategyRunnerConfig, deps: StrategyRunnerDeps) {
    this.config = config;
    this.deps = deps;
  }

  public async run<TSession>(
    strategy: AcquisitionStrategy<TSession>,
    targetName: string,
    options: StrategyRunOptions<TSession>,
  ): Promise<StrategyRunResult> {
    const { signal } = options;
    const lease: Lease = { identity: null, rotate: true, pending: Promise.resolve() };

    try {
      return await executeWithAdaptiveRetry(
        { maxAttempts: this.config.maxAttempts },
        async (attempt) =>
          withAcquisitionContext({ attempt }, async () => {
            throwIfAborted(signal);
            if (lease.rotate) {
              const previous = lease.identity;
              if (previous) this.deps.pool.release(previous);
              lease.identity = await this.acquireIdentity(strategy, previous);
              lease.rotate = false;
            }

            const identity = lease.identity;
            const fingerprint = this.deps.fingerprints.next();
            const task = options.session(async (session) =>
              this.attempt(strategy, targetName, { identity, fingerprint, session, signal }, attempt),
            );
            lease.pending = task;
            options.track?.(task);

            try {
              return await raceWithSignal(task, signal);
            } catch (error) {
              lease.rotate = this.absorbFailure(strategy, error, identity, fingerprint);
              throw error;
            }
          }),
        {
          delayMs: () => this.deps.analyzer.adaptiveDelay("retry"),
          onRetry: (ctx) => {
            log.info("Retrying strategy after a transient failure.", {
              strategy: strategy.name,
              target: targetName,
              attempt: ctx.attempt,
              maxAttempts: ctx.maxAttempts,
              category: ctx.category,
              delayMs: ctx.delayMs,
              rotateIdentity: lease.rotate,
              error: errorMessage(ctx.error),
            });
          },
          signal,
        },
      );
    } finally {
      const held = lease.identity;
      if (held) {
        // An abandoned attempt may still be using the identity; hand it back once that settles.
        const release = (): void => this.deps.pool.release(held);
        void lease.pending.then(release, release);
      }
    }
  }

  /** Prefers an identity other than `previous`, falling back to it when nothing else qualifies. */
  private async acquireIdentity<TSession>(
    strategy: AcquisitionStrategy<TSession>,
    previous: NetworkIdentity | null,
  ): Promise<NetworkIdentity | null> {
    const { pool } = this.deps;
    if (pool.size === 0) return null;

    await pool.refreshIfStale();
    const accept = strategy.acceptsIdentity
      ? (identity: NetworkIdentity) => strategy.acceptsIdentity?.(identity) ?? false
      : transportFilter(strategy.transport);
    const fresh = previous
      ? pool.acquire(this.config.preferPaid, (identity) => identity.id !== previous.id && accept(identity))
      : null;
    const identity = fresh ?? pool.acquire(this.config.preferPaid, accept);
    if (!identity) {
      log.debug("No eligible identity; going out directly.", { strategy: strategy.name, alive: pool.aliveCount() });
    }
    return identity;
  }

  private async attempt<TSession>(
    strategy: AcquisitionStrategy<TSession>,
    targetName: string,
    lease: {
      identity: NetworkIdentity | null;
      fingerprint: BrowserFingerprint;
      session: TSession | null;
      signal: AbortSignal;
    },
    attempt: number,
  ): Promise<StrategyRunResult> {
    const { analyzer, fingerprints, pool } = this.deps;
    const started = Date.now();
    const ctx: StrategyContext<TSession> = {
      targetName,
      identity: lease.identity,
      http: new HttpClient({
        analyzer,
        identity: lease.identity,
        headers: fingerprints.headersFor(lease.fingerprint),
        timeoutMs: this.config.requestTimeoutMs,
        signal: lease.signal,
        fetcher: this.deps.fetcher,
      }),
      fingerprint: lease.fingerprint,
      session: lease.session,
      signal: lease.signal,
      timeoutMs: this.config.requestTimeoutMs,
      screen: (sample) => screenResponse(analyzer, sample),
    };

    if (attempt === 1) await sleep(analyzer.adaptiveDelay("search"), lease.signal);
    const candidates = await strategy.search(targetName, ctx);
    const winner = resolve(targetName, candidates, { threshold: this.config.matchThreshold });

    if (!winner) {
      if (lease.identity) pool.reportSuccess(lease.identity, Date.now() - started);
      log.debug("No candidate cleared the match threshold.", {
        strategy: strategy.name,
        candidates: candidates.length,
        threshold: this.config.matchThreshold,
      });
      return { outcome: "no_match", candidates: candidates.length, attempts: attempt };
    }

    await sleep(analyzer.adaptiveDelay("detail"), lease.signal);
    const record = await strategy.fetchDetail(winner.candidate, ctx);
    if (lease.identity) pool.reportSuccess(lease.identity, Date.now() - started);

    return {
      outcome: "success",
      record,
      candidate: winner.candidate,
      matchScore: winner.score,
      attempts: attempt,
    };
  }

  /** Books a failed attempt against the identity and fingerprint. Returns whether to rotate the identity. */
  private absorbFailure<TSession>(
    strategy: AcquisitionStrategy<TSession>,
    error: unknown,
    identity: NetworkIdentity | null,
    fingerprint: BrowserFingerprint,
  ): boolean {
    const { analyzer, fingerprints, pool } = this.deps;
    const category = classifyRetryCategory(error);
    if (category === "aborted" || category === "not_found" || category === "internal") return false;

    if (identity) pool.reportFailure(identity, { reason: errorMessage(error) });

    let rotate = analyzer.shouldRotateIdentity() || (category === "network" && identity !== null);
    let quarantined = false;
    if (error instanceof SourceBlockedError) {
      fingerprints.reportBlocked(fingerprint.id);
      if (IDENTITY_VERDICTS.has(error.verdict)) {
        rotate = true;
        if (identity) {
          pool.quarantine(identity, `source verdict ${error.verdict}`);
          quarantined = true;
        }
      }

      if (analyzer.shouldTreatAsBanned()) {
        if (identity && !quarantined) pool.quarantine(identity, "ban signal");
        log.warning("Ban signal observed; abandoning strategy.", {
          strategy: strategy.name,
          verdict: error.verdict,
          level: analyzer.anticrawlerLevel,
          identityId: (identity ?? DIRECT_IDENTITY).id,
        });
        throw new IdentityBannedError(strategy.name, {
          verdict: error.verdict,
          level: analyzer.anticrawlerLevel,
        });
      }
    }

    return rotate;
  }
}
