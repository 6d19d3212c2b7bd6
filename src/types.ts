import type { OrchestratorConfig } from "./acquisition/orchestrator";
import type { StrategySettings } from "./acquisition/strategies";
import type { StrategyRunnerConfig } from "./acquisition/strategy-runner";
import type { KnownStrategyName } from "./acquisition/types";
import type { AnticrawlerLevel, DetectionConfig, LevelThreshold } from "./detection/types";
import type { IdentityPoolConfig, IdentityProtocol, IdentityTier, RotationMode } from "./reliability/identity-pool";

export type LogLevelName = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export interface IdentityInput {
  host: string;
  port: number | string;
  protocol?: IdentityProtocol;
  tier?: IdentityTier;
  username?: string;
  password?: string;
}

export interface ActorInput {
  targets?: string[];
  logLevel?: LogLevelName;
  correlationLogging?: boolean;

  strategyOrder?: string[];
  disabledStrategies?: string[];
  escalationEnabled?: boolean;
  escalationStrategy?: string;
  concurrencyLimit?: number;
  maxStrategyAttempts?: number;
  matchThreshold?: number;

  requestTimeoutMs?: number;
  targetTimeoutMs?: number;
  sessionMaxUses?: number;
  sessionShutdownTimeoutMs?: number;

  identities?: IdentityInput[];
  preferPaidIdentities?: boolean;
  rotationMode?: RotationMode;
  freeDeathThreshold?: number;
  paidDeathThreshold?: number;
  identityCooldownMs?: number;
  healthCheckIntervalMs?: number;
  minAliveIdentities?: number;
  minSweepGapMs?: number;
  healthCheckConcurrency?: number;
  healthCheckTimeoutMs?: number;
  maxConcurrentPerIdentity?: number;
  identityCheckUrls?: string[];
  identityFeedUrls?: string[];
  identityFeedTimeoutMs?: number;

  rateLimitedStatusCodes?: number[];
  ipBannedStatusCodes?: number[];
  blockedStatusCodes?: number[];
  fastRejectMaxBytes?: number;
  fastRejectMaxMs?: number;
  slowResponseMs?: number;
  levelThresholds?: Partial<Record<Exclude<AnticrawlerLevel, "none">, LevelThreshold>>;
  rotateThreshold?: number;
  banThreshold?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterMin?: number;
  jitterMax?: number;
  detectionWindowSize?: number;
  detectionMinRateSamples?: number;

  structuredApiBaseUrl?: string;
  structuredApiPageSize?: number;
  knownUrlsPath?: string;
  searchEngineUrl?: string;
  searchSiteFilter?: string;
  searchMaxResults?: number;
  browserHeadless?: boolean;
  browserLaunchTimeoutMs?: number;
  fingerprintRotation?: boolean;

  datasetName?: string;
}

export interface RuntimeConfig {
  logLevel: LogLevelName;
  correlationLogging: boolean;
  targets: string[];
  strategyOrder: KnownStrategyName[];
  disabledStrategies: KnownStrategyName[];
  orchestrator: OrchestratorConfig;
  runner: StrategyRunnerConfig;
  identityPool: IdentityPoolConfig;
  identityCheckUrls: string[];
  identityFeedUrls: string[];
  identityFeedTimeoutMs: number;
  detection: DetectionConfig;
  strategies: StrategySettings;
  fingerprintRotation: boolean;
  datasetName: string | null;
}
