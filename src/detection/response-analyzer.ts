import { log } from "apify";
import { matchBodyPattern, matchHeaderSignature } from "./signatures";
import type {
  AnticrawlerLevel,
  Classification,
  DetectionConfig,
  DetectionSnapshot,
  DetectionVerdict,
  LevelThresholds,
  OperationKind,
  ResponseSample,
  SiteStats,
} from "./types";

export const DEFAULT_DETECTION_CONFIG: DetectionConfig = {
  statusCodes: {
    rateLimited: [429, 503],
    ipBanned: [403, 451],
    blocked: [520, 521, 522, 523, 524],
  },
  fastRejectMaxBytes: 1000,
  fastRejectMaxMs: 100,
  slowResponseMs: 30_000,
  levelThresholds: {
    extreme: { consecutiveBlocks: 10, blockRate: 0.8 },
    high: { consecutiveBlocks: 5, blockRate: 0.5 },
    medium: { consecutiveBlocks: 3, blockRate: 0.3 },
    low: { consecutiveBlocks: 1, blockRate: 0.1 },
  },
  rotateThreshold: 3,
  banThreshold: 5,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  levelMultipliers: { none: 1, low: 2, medium: 3, high: 5, extreme: 10 },
  kindMultipliers: { search: 1.5, retry: 2, detail: 1.2 },
  jitterMin: 0.8,
  jitterMax: 1.5,
  windowSize: 50,
  minRateSamples: 10,
};

const LEVELS_BY_SEVERITY = ["extreme", "high", "medium", "low"] as const;

export const deriveAnticrawlerLevel = (
  consecutiveBlocks: number,
  blockRate: number,
  thresholds: LevelThresholds,
): AnticrawlerLevel => {
  for (const level of LEVELS_BY_SEVERITY) {
    const threshold = thresholds[level];
    if (consecutiveBlocks >= threshold.consecutiveBlocks || blockRate > threshold.blockRate) {
      return level;
    }
  }
  return "none";
};

const emptyCounts = (): Record<DetectionVerdict, number> => ({
  normal: 0,
  blocked: 0,
  captcha: 0,
  rate_limited: 0,
  waf_detected: 0,
  ip_banned: 0,
  cloudflare_challenge: 0,
});

const siteKey = (url: string | null | undefined): string => {
  if (!url || !URL.canParse(url)) return "unknown";
  return new URL(url).hostname || "unknown";
};

interface SiteState {
  total: number;
  blocked: number;
  lastVerdict: DetectionVerdict;
}

/**
 * Classifies responses from hostile sources and keeps the process-wide
 * detection metrics. One instance is shared by every strategy in a run.
 *
 * All state changes happen synchronously inside `classify`, so concurrent
 * callers on the event loop cannot interleave a read-modify-write.
 */
export class ResponseAnalyzer {
  private readonly config: DetectionConfig;
  private readonly random: () => number;
  private counts = emptyCounts();
  private totalRequests = 0;
  private consecutiveBlocks = 0;
  private lastBlockedAt: number | null = null;
  private window: boolean[] = [];
  private level: AnticrawlerLevel = "none";
  private readonly sites = new Map<string, SiteState>();

  public constructor(config: DetectionConfig = DEFAULT_DETECTION_CONFIG, random: () => number = Math.random) {
    this.config = config;
    this.random = random;
  }

  public classify(sample: ResponseSample): Classification {
    const { verdict, evidence } = this.detect(sample);
    this.record(verdict, sample.url);
    return { verdict, level: this.level, evidence };
  }

  public get anticrawlerLevel(): AnticrawlerLevel {
    return this.level;
  }

  public adaptiveDelay(kind: OperationKind): number {
    const levelMultiplier = this.config.levelMultipliers[this.level];
    const kindMultiplier = this.config.kindMultipliers[kind];
    const jitter =
      this.config.jitterMin + this.random() * (this.config.jitterMax - this.config.jitterMin);
    const delay = this.config.baseDelayMs * levelMultiplier * kindMultiplier * jitter;
    return Math.round(Math.min(this.config.maxDelayMs, delay));
  }

  public shouldRotateIdentity(): boolean {
    return (
      this.consecutiveBlocks >= this.config.rotateThreshold ||
      this.level === "high" ||
      this.level === "extreme"
    );
  }

  public shouldTreatAsBanned(): boolean {
    return this.consecutiveBlocks >= this.config.banThreshold || this.level === "extreme";
  }

  public reset(): void {
    this.counts = emptyCounts();
    this.totalRequests = 0;
    this.consecutiveBlocks = 0;
    this.lastBlockedAt = null;
    this.window = [];
    this.level = "none";
    this.sites.clear();
  }

  public snapshot(): DetectionSnapshot {
    const sites: Record<string, SiteStats> = {};
    for (const [key, state] of this.sites) {
      sites[key] = {
        total: state.total,
        blocked: state.blocked,
        blockRate: state.total > 0 ? state.blocked / state.total : 0,
        lastVerdict: state.lastVerdict,
      };
    }

    return {
      totalRequests: this.totalRequests,
      successful: this.counts.normal,
      counts: { ...this.counts },
      consecutiveBlocks: this.consecutiveBlocks,
      lastBlockedAt: this.lastBlockedAt ? new Date(this.lastBlockedAt).toISOString() : null,
      rollingBlockRate: this.rollingBlockRate(),
      anticrawlerLevel: this.level,
      sites,
    };
  }

  private detect(sample: ResponseSample): { verdict: DetectionVerdict; evidence: string | null } {
    const { statusCodes } = this.config;
    if (statusCodes.rateLimited.includes(sample.statusCode)) {
      return { verdict: "rate_limited", evidence: `http-status-${sample.statusCode}` };
    }
    if (statusCodes.ipBanned.includes(sample.statusCode)) {
      return { verdict: "ip_banned", evidence: `http-status-${sample.statusCode}` };
    }
    if (statusCodes.blocked.includes(sample.statusCode)) {
      return { verdict: "blocked", evidence: `http-status-${sample.statusCode}` };
    }

    const header = matchHeaderSignature(sample.headers);
    if (header) return header;

    const body = matchBodyPattern(sample.body);
    if (body) return body;

    const size = Buffer.byteLength(sample.body, "utf8");
    if (
      !sample.structured &&
      size < this.config.fastRejectMaxBytes &&
      sample.responseTimeMs < this.config.fastRejectMaxMs
    ) {
      return { verdict: "blocked", evidence: "instant small response" };
    }
    if (sample.responseTimeMs > this.config.slowResponseMs) {
      return { verdict: "rate_limited", evidence: "deliberately slow response" };
    }

    return { verdict: "normal", evidence: null };
  }

  private record(verdict: DetectionVerdict, url: string | null | undefined): void {
    const hostile = verdict !== "normal";
    this.totalRequests += 1;
    this.counts[verdict] += 1;

    if (hostile) {
      this.consecutiveBlocks += 1;
      this.lastBlockedAt = Date.now();
    } else {
      this.consecutiveBlocks = 0;
    }

    this.window.push(hostile);
    if (this.window.length > this.config.windowSize) this.window.shift();

    const key = siteKey(url);
    const site = this.sites.get(key) ?? { total: 0, blocked: 0, lastVerdict: verdict };
    site.total += 1;
    if (hostile) site.blocked += 1;
    site.lastVerdict = verdict;
    this.sites.set(key, site);

    const previous = this.level;
    const rate = this.window.length >= this.config.minRateSamples ? this.rollingBlockRate() : 0;
    this.level = deriveAnticrawlerLevel(this.consecutiveBlocks, rate, this.config.levelThresholds);
    if (this.level !== previous) {
      log.info("Anticrawler level changed.", {
        from: previous,
        to: this.level,
        consecutiveBlocks: this.consecutiveBlocks,
        site: key,
      });
    }
  }

  private rollingBlockRate(): number {
    if (this.window.length === 0) return 0;
    return this.window.filter(Boolean).length / this.window.length;
  }
}
