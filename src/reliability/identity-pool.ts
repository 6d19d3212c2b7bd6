import { log } from "apify";
import { AdmissionQueue, withTimeout } from "../runtime/admission-queue";

export type IdentityKind = "direct" | "proxied";
export type IdentityProtocol = "http" | "https" | "socks4" | "socks5" | "tls_tunnel";
export type IdentityTier = "free" | "paid";
export type IdentitySource = "config" | "feed" | "direct";
export type RotationMode = "round_robin" | "random";

export const IDENTITY_PROTOCOLS: readonly IdentityProtocol[] = ["http", "https", "socks4", "socks5", "tls_tunnel"];

export interface IdentitySeed {
  host: string;
  port: number;
  protocol: IdentityProtocol;
  tier: IdentityTier;
  username?: string | null;
  password?: string | null;
}

export interface NetworkIdentity {
  readonly id: string;
  readonly kind: IdentityKind;
  readonly protocol: IdentityProtocol;
  readonly host: string;
  readonly port: number;
  readonly username: string | null;
  readonly password: string | null;
  readonly tier: IdentityTier;
  readonly source: IdentitySource;
}

export interface IdentityStats {
  successCount: number;
  failureCount: number;
  consecutiveFailures: number;
  lastUsedAt: number | null;
  lastCheckedAt: number | null;
  observedLatencyMs: number | null;
  alive: boolean;
  cooldownUntil: number | null;
  inFlight: number;
  lastError: string | null;
}

type IdentityState = NetworkIdentity & IdentityStats;

export interface ProbeResult {
  ok: boolean;
  latencyMs: number;
  error?: string;
}

export type IdentityProbe = (identity: NetworkIdentity, timeoutMs: number) => Promise<ProbeResult>;

export interface IdentityPoolConfig {
  identities: IdentitySeed[];
  rotation: RotationMode;
  deathThresholds: Record<IdentityTier, number>;
  cooldownMs: number;
  healthCheckIntervalMs: number;
  minAliveIdentities: number;
  minSweepGapMs: number;
  checkConcurrency: number;
  checkTimeoutMs: number;
  maxConcurrentPerIdentity: number;
}

export interface IdentityPoolSnapshot {
  total: number;
  alive: number;
  coolingDown: number;
  byTier: Record<IdentityTier, { total: number; alive: number }>;
  lastSweepAt: string | null;
  identities: Array<{
    id: string;
    tier: IdentityTier;
    protocol: IdentityProtocol;
    source: IdentitySource;
    alive: boolean;
    success_rate: number | null;
    success_count: number;
    failure_count: number;
    consecutive_failures: number;
    latency_ms: number | null;
    in_flight: number;
    cooldown_until: string | null;
    last_error: string | null;
  }>;
}

export const DIRECT_IDENTITY: NetworkIdentity = {
  id: "direct",
  kind: "direct",
  protocol: "https",
  host: "",
  port: 0,
  username: null,
  password: null,
  tier: "free",
  source: "direct",
};

const LATENCY_SMOOTHING = 0.3;
const UNMEASURED_LATENCY = Number.MAX_SAFE_INTEGER;

export const identityKey = (host: string, port: number): string => `${host.toLowerCase()}:${port}`;

export const identityUrl = (identity: NetworkIdentity): string => {
  const scheme = identity.protocol === "tls_tunnel" ? "https" : identity.protocol;
  const auth =
    identity.username !== null
      ? `${encodeURIComponent(identity.username)}:${encodeURIComponent(identity.password ?? "")}@`
      : "";
  return `${scheme}://${auth}${identity.host}:${identity.port}`;
};

const successRate = (state: IdentityStats): number | null => {
  const total = state.successCount + state.failureCount;
  return total === 0 ? null : state.successCount / total;
};

const toView = (state: IdentityState): NetworkIdentity => ({
  id: state.id,
  kind: state.kind,
  protocol: state.protocol,
  host: state.host,
  port: state.port,
  username: state.username,
  password: state.password,
  tier: state.tier,
  source: state.source,
});

/**
 * Owns every proxy identity of a run with its health statistics.
 *
 * Selection and reporting are synchronous so that concurrent strategy
 * invocations never interleave inside a read-modify-write. Only health
 * sweeps suspend, and they are single-flight.
 */
export class IdentityPool {
  private readonly config: IdentityPoolConfig;
  private readonly probe: IdentityProbe;
  private readonly random: () => number;
  private readonly identities: IdentityState[] = [];
  private readonly cursors: Record<IdentityTier, number> = { free: 0, paid: 0 };
  private lastSweepAt: number | null = null;
  private sweeping: Promise<void> | null = null;
  private sequence = 0;

  public constructor(config: IdentityPoolConfig, probe: IdentityProbe, random: () => number = Math.random) {
    this.config = config;
    this.probe = probe;
    this.random = random;
    for (const seed of config.identities) {
      this.add(seed, "config", true);
    }
  }

  public get size(): number {
    return this.identities.length;
  }

  public aliveCount(): number {
    return this.identities.filter((entry) => entry.alive).length;
  }

  /**
   * Picks an identity by tier policy, or returns null when the caller should
   * go out directly. `accept` narrows the candidates, e.g. to protocols a
   * transport can speak.
   */
  public acquire(preferPaid: boolean, accept?: (identity: NetworkIdentity) => boolean): NetworkIdentity | null {
    const now = Date.now();
    const eligible = this.identities.filter(
      (entry) =>
        entry.alive &&
        !this.isCoolingDown(entry, now) &&
        entry.inFlight < this.config.maxConcurrentPerIdentity &&
        (!accept || accept(entry)),
    );
    if (eligible.length === 0) return null;

    const paid = eligible.filter((entry) => entry.tier === "paid");
    const free = eligible.filter((entry) => entry.tier === "free");

    let tier: IdentityTier;
    let candidates: IdentityState[];
    if (preferPaid && paid.length > 0) {
      tier = "paid";
      candidates = paid;
    } else if (free.length > 0) {
      tier = "free";
      candidates = free;
    } else {
      tier = "paid";
      candidates = paid;
    }

    const picked = this.pick(tier, candidates);
    picked.inFlight += 1;
    picked.lastUsedAt = now;
    return toView(picked);
  }

  public release(identity: NetworkIdentity): void {
    const state = this.find(identity.id);
    if (!state) return;
    state.inFlight = Math.max(0, state.inFlight - 1);
  }

  public reportSuccess(identity: NetworkIdentity, latencyMs: number): void {
    const state = this.find(identity.id);
    if (!state) return;
    state.successCount += 1;
    state.consecutiveFailures = 0;
    state.lastError = null;
    state.observedLatencyMs =
      state.observedLatencyMs === null
        ? latencyMs
        : Math.round(state.observedLatencyMs * (1 - LATENCY_SMOOTHING) + latencyMs * LATENCY_SMOOTHING);
  }

  public reportFailure(identity: NetworkIdentity, params: { reason?: string } = {}): void {
    const state = this.find(identity.id);
    if (!state) return;
    state.failureCount += 1;
    state.consecutiveFailures += 1;
    state.lastError = params.reason ?? "unknown";

    const threshold = this.config.deathThresholds[state.tier];
    if (state.alive && state.consecutiveFailures >= threshold) {
      state.alive = false;
      state.cooldownUntil = Date.now() + this.config.cooldownMs;
      log.warning("Identity marked dead.", {
        identityId: state.id,
        tier: state.tier,
        consecutiveFailures: state.consecutiveFailures,
        reason: state.lastError,
      });
    }
  }

  /** Parks an identity that a source has flagged, without killing it. */
  public quarantine(identity: NetworkIdentity, reason: string): void {
    const state = this.find(identity.id);
    if (!state) return;
    state.cooldownUntil = Date.now() + this.config.cooldownMs;
    state.lastError = reason;
    log.info("Identity quarantined.", {
      identityId: state.id,
      reason,
      cooldownMs: this.config.cooldownMs,
    });
  }

  /** Adds untrusted identities from a discovery feed. They stay dead until a sweep clears them. */
  public ingest(
    tuples: Array<{ host: string; port: number; protocol: IdentityProtocol }>,
  ): number {
    let added = 0;
    for (const tuple of tuples) {
      if (this.add({ ...tuple, tier: "free" }, "feed", false)) added += 1;
    }
    if (added > 0) {
      log.info("Identities ingested from discovery feed.", { added, total: this.identities.length });
    }
    return added;
  }

  public needsRefresh(now = Date.now()): boolean {
    if (this.identities.length === 0) return false;
    if (this.lastSweepAt === null) return true;
    if (now - this.lastSweepAt >= this.config.healthCheckIntervalMs) return true;
    return (
      this.aliveCount() < this.config.minAliveIdentities &&
      now - this.lastSweepAt >= this.config.minSweepGapMs
    );
  }

  /** Runs a health sweep when one is due. Concurrent callers share the same sweep. */
  public async refreshIfStale(): Promise<boolean> {
    if (this.sweeping) {
      await this.sweeping;
      return true;
    }
    if (!this.needsRefresh()) return false;

    this.sweeping = this.sweep().finally(() => {
      this.sweeping = null;
    });
    await this.sweeping;
    return true;
  }

  public snapshot(): IdentityPoolSnapshot {
    const now = Date.now();
    const byTier: IdentityPoolSnapshot["byTier"] = {
      free: { total: 0, alive: 0 },
      paid: { total: 0, alive: 0 },
    };
    for (const entry of this.identities) {
      byTier[entry.tier].total += 1;
      if (entry.alive) byTier[entry.tier].alive += 1;
    }

    return {
      total: this.identities.length,
      alive: this.aliveCount(),
      coolingDown: this.identities.filter((entry) => this.isCoolingDown(entry, now)).length,
      byTier,
      lastSweepAt: this.lastSweepAt ? new Date(this.lastSweepAt).toISOString() : null,
      identities: this.identities.map((entry) => ({
        id: entry.id,
        tier: entry.tier,
        protocol: entry.protocol,
        source: entry.source,
        alive: entry.alive,
        success_rate: successRate(entry),
        success_count: entry.successCount,
        failure_count: entry.failureCount,
        consecutive_failures: entry.consecutiveFailures,
        latency_ms: entry.observedLatencyMs,
        in_flight: entry.inFlight,
        cooldown_until:
          entry.cooldownUntil && entry.cooldownUntil > now ? new Date(entry.cooldownUntil).toISOString() : null,
        last_error: entry.lastError,
      })),
    };
  }

  private async sweep(): Promise<void> {
    const started = Date.now();
    const queue = new AdmissionQueue({ concurrency: this.config.checkConcurrency, name: "identity-sweep" });
    const targets = this.identities.filter((entry) => !this.isCoolingDown(entry, started));

    await Promise.all(targets.map((entry) => queue.run(async () => this.check(entry))));

    this.lastSweepAt = Date.now();
    log.info("Identity health sweep finished.", {
      checked: targets.length,
      alive: this.aliveCount(),
      total: this.identities.length,
      durationMs: this.lastSweepAt - started,
    });
  }

  private async check(state: IdentityState): Promise<void> {
    const timeoutMs = this.config.checkTimeoutMs;
    let result: ProbeResult;
    try {
      result = await withTimeout(
        this.probe(toView(state), timeoutMs),
        timeoutMs,
        () => new Error(`Health check timed out after ${timeoutMs}ms.`),
      );
    } catch (error) {
      result = { ok: false, latencyMs: timeoutMs, error: error instanceof Error ? error.message : String(error) };
    }

    state.lastCheckedAt = Date.now();
    if (result.ok) {
      const revived = !state.alive;
      state.alive = true;
      state.cooldownUntil = null;
      this.reportSuccess(state, result.latencyMs);
      if (revived) {
        log.info("Identity passed health check.", { identityId: state.id, latencyMs: result.latencyMs });
      }
      return;
    }

    this.reportFailure(state, { reason: result.error ?? "health check failed" });
  }

  private pick(tier: IdentityTier, candidates: IdentityState[]): IdentityState {
    if (this.config.rotation === "random") {
      const index = Math.min(candidates.length - 1, Math.floor(this.random() * candidates.length));
      return candidates[index];
    }

    const ordered = [...candidates].sort((a, b) => {
      const rateDelta = (successRate(b) ?? 1) - (successRate(a) ?? 1);
      if (rateDelta !== 0) return rateDelta;
      return (a.observedLatencyMs ?? UNMEASURED_LATENCY) - (b.observedLatencyMs ?? UNMEASURED_LATENCY);
    });
    const index = this.cursors[tier] % ordered.length;
    this.cursors[tier] = (this.cursors[tier] + 1) % Number.MAX_SAFE_INTEGER;
    return ordered[index];
  }

  private add(seed: IdentitySeed, source: IdentitySource, alive: boolean): boolean {
    const key = identityKey(seed.host, seed.port);
    if (this.identities.some((entry) => identityKey(entry.host, entry.port) === key)) return false;

    this.sequence += 1;
    this.identities.push({
      id: `${seed.tier}_${this.sequence}`,
      kind: "proxied",
      protocol: seed.protocol,
      host: seed.host,
      port: seed.port,
      username: seed.username ?? null,
      password: seed.password ?? null,
      tier: seed.tier,
      source,
      successCount: 0,
      failureCount: 0,
      consecutiveFailures: 0,
      lastUsedAt: null,
      lastCheckedAt: null,
      observedLatencyMs: null,
      alive,
      cooldownUntil: null,
      inFlight: 0,
      lastError: null,
    });
    return true;
  }

  private isCoolingDown(state: IdentityState, now: number): boolean {
    return state.cooldownUntil !== null && now < state.cooldownUntil;
  }

  private find(id: string): IdentityState | undefined {
    return this.identities.find((entry) => entry.id === id);
  }
}
