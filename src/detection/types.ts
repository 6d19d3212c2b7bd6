export const DETECTION_VERDICTS = [
  "normal",
  "blocked",
  "captcha",
  "rate_limited",
  "waf_detected",
  "ip_banned",
  "cloudflare_challenge",
] as const;

export type DetectionVerdict = (typeof DETECTION_VERDICTS)[number];

export const ANTICRAWLER_LEVELS = ["none", "low", "medium", "high", "extreme"] as const;

export type AnticrawlerLevel = (typeof ANTICRAWLER_LEVELS)[number];

export type OperationKind = "search" | "detail" | "retry";

export type HeaderBag = Record<string, string | string[] | undefined>;

export interface ResponseSample {
  statusCode: number;
  headers: HeaderBag;
  body: string;
  responseTimeMs: number;
  url?: string | null;
  /** A structured API reply; small and fast is its normal shape, so the instant-response rule skips it. */
  structured?: boolean;
}

export interface Classification {
  verdict: DetectionVerdict;
  level: AnticrawlerLevel;
  evidence: string | null;
}

export interface LevelThreshold {
  consecutiveBlocks: number;
  blockRate: number;
}

export type LevelThresholds = Record<Exclude<AnticrawlerLevel, "none">, LevelThreshold>;

export interface DetectionConfig {
  statusCodes: {
    rateLimited: number[];
    ipBanned: number[];
    blocked: number[];
  };
  fastRejectMaxBytes: number;
  fastRejectMaxMs: number;
  slowResponseMs: number;
  levelThresholds: LevelThresholds;
  rotateThreshold: number;
  banThreshold: number;
  baseDelayMs: number;
  maxDelayMs: number;
  levelMultipliers: Record<AnticrawlerLevel, number>;
  kindMultipliers: Record<OperationKind, number>;
  jitterMin: number;
  jitterMax: number;
  windowSize: number;
  /** Outcomes the window must hold before its block rate counts toward the level. */
  minRateSamples: number;
}

export interface SiteStats {
  total: number;
  blocked: number;
  blockRate: number;
  lastVerdict: DetectionVerdict;
}

export interface DetectionSnapshot {
  totalRequests: number;
  successful: number;
  counts: Record<DetectionVerdict, number>;
  consecutiveBlocks: number;
  lastBlockedAt: string | null;
  rollingBlockRate: number;
  anticrawlerLevel: AnticrawlerLevel;
  sites: Record<string, SiteStats>;
}
