import { config as loadDotEnv } from "dotenv";
import type { OrchestratorConfig } from "./acquisition/orchestrator";
import { DEFAULT_KNOWN_URLS_PATH } from "./acquisition/strategies/direct-url";
import { KNOWN_STRATEGIES, type KnownStrategyName } from "./acquisition/types";
import { DEFAULT_DETECTION_CONFIG } from "./detection/response-analyzer";
import type { DetectionConfig, LevelThresholds } from "./detection/types";
import { DEFAULT_MATCH_THRESHOLD } from "./matching/match-resolver";
import { DEFAULT_CHECK_URLS } from "./reliability/identity-probe";
import {
  IDENTITY_PROTOCOLS,
  type IdentityProtocol,
  type IdentitySeed,
  type IdentityTier,
  type RotationMode,
} from "./reliability/identity-pool";
import type { ActorInput, IdentityInput, LogLevelName, RuntimeConfig } from "./types";

loadDotEnv();

const ALLOWED_LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR"] as const;
const ROTATION_MODES = ["round_robin", "random"] as const;
const TRUE_VALUES = new Set(["1", "true", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "n", "off"]);
const LEVEL_ORDER = ["low", "medium", "high", "extreme"] as const;

export const DEFAULT_STRATEGY_ORDER: KnownStrategyName[] = [
  "structured_api",
  "direct_url",
  "search_engine",
  "browser_search",
];

export class ConfigValidationError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((issue) => `- ${issue}`).join("\n")}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

const isLogLevel = (value: string): value is LogLevelName => ALLOWED_LOG_LEVELS.some((level) => level === value);

const isStrategyName = (value: string): value is KnownStrategyName =>
  KNOWN_STRATEGIES.some((name) => name === value);

const isRotationMode = (value: string): value is RotationMode => ROTATION_MODES.some((mode) => mode === value);

const isProtocol = (value: string): value is IdentityProtocol =>
  IDENTITY_PROTOCOLS.some((protocol) => protocol === value);

const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
};

const splitList = (raw: string): string[] =>
  raw
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);

const parseStringList = (
  inputList: string[] | undefined,
  envList: string | undefined,
  fallback: string[],
): string[] => {
  if (Array.isArray(inputList)) {
    return [...new Set(inputList.map((entry) => entry.trim()).filter(Boolean))];
  }
  if (envList === undefined) return [...fallback];
  return [...new Set(splitList(envList))];
};

const parseBooleanWithValidation = (
  value: boolean | string | undefined,
  fieldName: string,
  issues: string[],
  fallback: boolean,
): boolean => {
  if (typeof value === "boolean") return value;
  if (typeof value !== "string") return fallback;

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;

  issues.push(`\`${fieldName}\` must be a boolean (true/false, 1/0, yes/no). Received: ${JSON.stringify(value)}.`);
  return fallback;
};

const parseIntegerWithRangeValidation = (
  value: number | string | undefined,
  fieldName: string,
  issues: string[],
  fallback: number,
  min: number,
  max: number,
): number => {
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number(value) : fallback;

  if (!Number.isInteger(parsed)) {
    issues.push(`\`${fieldName}\` must be an integer. Received: ${JSON.stringify(value)}.`);
    return fallback;
  }
  if (parsed < min || parsed > max) {
    issues.push(`\`${fieldName}\` must be within ${min}-${max}. Received: ${parsed}.`);
    return fallback;
  }
  return parsed;
};

const parseNumberWithRangeValidation = (
  value: number | string | undefined,
  fieldName: string,
  issues: string[],
  fallback: number,
  min: number,
  max: number,
): number => {
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number(value) : fallback;

  if (!Number.isFinite(parsed)) {
    issues.push(`\`${fieldName}\` must be a number. Received: ${JSON.stringify(value)}.`);
    return fallback;
  }
  if (parsed < min || parsed > max) {
    issues.push(`\`${fieldName}\` must be within ${min}-${max}. Received: ${parsed}.`);
    return fallback;
  }
  return parsed;
};

const parseNonEmptyString = (
  value: string | undefined,
  fieldName: string,
  issues: string[],
  fallback: string,
): string => {
  if (typeof value !== "string") return fallback;
  const normalized = value.trim();
  if (!normalized) {
    issues.push(`\`${fieldName}\` must be a non-empty string.`);
    return fallback;
  }
  return normalized;
};

const parseHttpUrl = (value: string | undefined, fieldName: string, issues: string[], fallback: string): string => {
  const raw = parseNonEmptyString(value, fieldName, issues, fallback);
  if (!URL.canParse(raw) || !/^https?:$/.test(new URL(raw).protocol)) {
    issues.push(`\`${fieldName}\` must be an http(s) URL. Received: ${JSON.stringify(raw)}.`);
    return fallback;
  }
  return raw;
};

const parseStrategyList = (
  names: string[],
  fieldName: string,
  issues: string[],
): KnownStrategyName[] => {
  const parsed: KnownStrategyName[] = [];
  for (const name of names) {
    if (!isStrategyName(name)) {
      issues.push(`\`${fieldName}\` names an unknown strategy ${JSON.stringify(name)}. Known: ${KNOWN_STRATEGIES.join(", ")}.`);
      continue;
    }
    parsed.push(name);
  }
  return parsed;
};

const parseStatusCodes = (
  inputList: number[] | undefined,
  envList: string | undefined,
  fieldName: string,
  issues: string[],
  fallback: number[],
): number[] => {
  const raw: Array<number | string> = Array.isArray(inputList)
    ? inputList
    : envList !== undefined
      ? splitList(envList)
      : fallback;
  const codes: number[] = [];
  for (const entry of raw) {
    const code = typeof entry === "number" ? entry : Number(entry);
    if (!Number.isInteger(code) || code < 100 || code > 599) {
      issues.push(`\`${fieldName}\` must list HTTP status codes. Received: ${JSON.stringify(entry)}.`);
      continue;
    }
    codes.push(code);
  }
  return [...new Set(codes)];
};

/** `protocol://[user:pass@]host:port[#paid|#free]`, the form used by the IDENTITIES variable; `trojan://` means a TLS tunnel. */
export const parseIdentityUrl = (raw: string): IdentityInput | null => {
  if (!URL.canParse(raw)) return null;
  const url = new URL(raw);
  const scheme = url.protocol.replace(/:$/, "");
  const protocol = scheme === "trojan" ? "tls_tunnel" : scheme;
  const tier = url.hash.replace(/^#/, "");
  // Special schemes drop their default port from `url.port`.
  const port = url.port || (protocol === "http" ? "80" : protocol === "https" ? "443" : "");
  if (!url.hostname || !port) return null;
  return {
    host: url.hostname,
    port,
    ...(isProtocol(protocol) ? { protocol } : {}),
    ...(tier === "paid" || tier === "free" ? { tier } : {}),
    ...(url.username ? { username: decodeURIComponent(url.username) } : {}),
    ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
  };
};

const parseIdentities = (
  inputList: IdentityInput[] | undefined,
  envList: string | undefined,
  issues: string[],
): IdentitySeed[] => {
  let raw: IdentityInput[] = [];
  if (Array.isArray(inputList)) {
    raw = inputList;
  } else if (envList !== undefined) {
    for (const entry of splitList(envList)) {
      const parsed = parseIdentityUrl(entry);
      if (!parsed) {
        issues.push(`\`identities\` entry ${JSON.stringify(entry)} is not a proxy URL with host and port.`);
        continue;
      }
      raw.push(parsed);
    }
  }

  const seeds: IdentitySeed[] = [];
  raw.forEach((entry, index) => {
    const field = `identities[${index}]`;
    const host = typeof entry.host === "string" ? entry.host.trim() : "";
    if (!host) {
      issues.push(`\`${field}.host\` must be a non-empty string.`);
      return;
    }
    const port = parseIntegerWithRangeValidation(entry.port, `${field}.port`, issues, 0, 1, 65535);
    const protocol = entry.protocol ?? "http";
    if (!isProtocol(protocol)) {
      issues.push(`\`${field}.protocol\` must be one of ${IDENTITY_PROTOCOLS.join(", ")}.`);
      return;
    }
    const tier: IdentityTier = entry.tier ?? "paid";
    if (tier !== "paid" && tier !== "free") {
      issues.push(`\`${field}.tier\` must be "paid" or "free".`);
      return;
    }
    if (port === 0) return;
    seeds.push({
      host,
      port,
      protocol,
      tier,
      username: entry.username ?? null,
      password: entry.password ?? null,
    });
  });
  return seeds;
};

const parseLevelThresholds = (input: ActorInput["levelThresholds"], issues: string[]): LevelThresholds => {
  const defaults = DEFAULT_DETECTION_CONFIG.levelThresholds;
  const thresholds: LevelThresholds = {
    low: { ...defaults.low },
    medium: { ...defaults.medium },
    high: { ...defaults.high },
    extreme: { ...defaults.extreme },
  };

  for (const level of LEVEL_ORDER) {
    const override = input?.[level];
    if (!override) continue;
    thresholds[level] = {
      consecutiveBlocks: parseIntegerWithRangeValidation(
        override.consecutiveBlocks,
        `levelThresholds.${level}.consecutiveBlocks`,
        issues,
        defaults[level].consecutiveBlocks,
        1,
        1000,
      ),
      blockRate: parseNumberWithRangeValidation(
        override.blockRate,
        `levelThresholds.${level}.blockRate`,
        issues,
        defaults[level].blockRate,
        0,
        1,
      ),
    };
  }

  for (let index = 1; index < LEVEL_ORDER.length; index += 1) {
    const lower = LEVEL_ORDER[index - 1];
    const upper = LEVEL_ORDER[index];
    if (
      thresholds[upper].consecutiveBlocks <= thresholds[lower].consecutiveBlocks ||
      thresholds[upper].blockRate <= thresholds[lower].blockRate
    ) {
      issues.push(`\`levelThresholds.${upper}\` must be strictly above \`levelThresholds.${lower}\` on both fields.`);
    }
  }
  return thresholds;
};

export const buildRuntimeConfig = (input: ActorInput, env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const issues: string[] = [];

  const rawLogLevel = input.logLevel ?? env.LOG_LEVEL ?? "INFO";
  const normalizedLogLevel = String(rawLogLevel).toUpperCase();
  let logLevel: LogLevelName = "INFO";
  if (isLogLevel(normalizedLogLevel)) {
    logLevel = normalizedLogLevel;
  } else {
    issues.push(
      `\`logLevel\` must be one of ${ALLOWED_LOG_LEVELS.join(", ")}. Received: ${JSON.stringify(rawLogLevel)} (input \`logLevel\` or env \`LOG_LEVEL\`).`,
    );
  }

  const correlationLogging = parseBooleanWithValidation(
    input.correlationLogging ?? env.CORRELATION_LOGGING,
    "correlationLogging",
    issues,
    true,
  );

  const targets = parseStringList(input.targets, env.TARGETS, []);

  // Strategies
  const rawOrder = Array.isArray(input.strategyOrder)
    ? input.strategyOrder.map((entry) => entry.trim()).filter(Boolean)
    : env.STRATEGY_ORDER !== undefined
      ? splitList(env.STRATEGY_ORDER)
      : [...DEFAULT_STRATEGY_ORDER];
  if (rawOrder.length === 0) {
    issues.push("`strategyOrder` must name at least one strategy.");
  }
  if (new Set(rawOrder).size !== rawOrder.length) {
    issues.push("`strategyOrder` must not name a strategy twice.");
  }
  const strategyOrder = parseStrategyList([...new Set(rawOrder)], "strategyOrder", issues);
  const disabledStrategies = parseStrategyList(
    parseStringList(input.disabledStrategies, env.DISABLED_STRATEGIES, []),
    "disabledStrategies",
    issues,
  );
  if (strategyOrder.length > 0 && strategyOrder.every((name) => disabledStrategies.includes(name))) {
    issues.push("At least one strategy in `strategyOrder` must stay enabled.");
  }

  const escalationEnabled = parseBooleanWithValidation(
    input.escalationEnabled ?? env.ESCALATION_ENABLED,
    "escalationEnabled",
    issues,
    true,
  );
  const rawEscalation = parseNonEmptyString(
    input.escalationStrategy ?? env.ESCALATION_STRATEGY,
    "escalationStrategy",
    issues,
    "browser_search",
  );
  let escalationStrategy: KnownStrategyName | null = null;
  if (isStrategyName(rawEscalation)) {
    escalationStrategy = rawEscalation;
  } else {
    issues.push(`\`escalationStrategy\` must be a known strategy. Received: ${JSON.stringify(rawEscalation)}.`);
  }

  const concurrencyLimit = parseIntegerWithRangeValidation(
    input.concurrencyLimit ?? env.CONCURRENCY_LIMIT,
    "concurrencyLimit",
    issues,
    5,
    1,
    50,
  );
  const maxStrategyAttempts = parseIntegerWithRangeValidation(
    input.maxStrategyAttempts ?? env.MAX_STRATEGY_ATTEMPTS,
    "maxStrategyAttempts",
    issues,
    3,
    1,
    10,
  );
  const matchThreshold = parseNumberWithRangeValidation(
    input.matchThreshold ?? env.MATCH_THRESHOLD,
    "matchThreshold",
    issues,
    DEFAULT_MATCH_THRESHOLD,
    0,
    1,
  );

  // Timeouts and sessions
  const requestTimeoutMs = parseIntegerWithRangeValidation(
    input.requestTimeoutMs ?? env.REQUEST_TIMEOUT_MS,
    "requestTimeoutMs",
    issues,
    20000,
    1000,
    300000,
  );
  const targetTimeoutMs = parseIntegerWithRangeValidation(
    input.targetTimeoutMs ?? env.TARGET_TIMEOUT_MS,
    "targetTimeoutMs",
    issues,
    180000,
    1000,
    3600000,
  );
  if (requestTimeoutMs > targetTimeoutMs) {
    issues.push("`requestTimeoutMs` must be less than or equal to `targetTimeoutMs`.");
  }
  const sessionMaxUses = parseIntegerWithRangeValidation(
    input.sessionMaxUses ?? env.SESSION_MAX_USES,
    "sessionMaxUses",
    issues,
    50,
    1,
    10000,
  );
  const sessionShutdownTimeoutMs = parseIntegerWithRangeValidation(
    input.sessionShutdownTimeoutMs ?? env.SESSION_SHUTDOWN_TIMEOUT_MS,
    "sessionShutdownTimeoutMs",
    issues,
    15000,
    1000,
    600000,
  );

  // Identity pool
  const identities = parseIdentities(input.identities, env.IDENTITIES, issues);
  const preferPaid = parseBooleanWithValidation(
    input.preferPaidIdentities ?? env.PREFER_PAID_IDENTITIES,
    "preferPaidIdentities",
    issues,
    true,
  );
  const rawRotation = parseNonEmptyString(input.rotationMode ?? env.ROTATION_MODE, "rotationMode", issues, "round_robin");
  let rotation: RotationMode = "round_robin";
  if (isRotationMode(rawRotation)) {
    rotation = rawRotation;
  } else {
    issues.push(`\`rotationMode\` must be one of ${ROTATION_MODES.join(", ")}. Received: ${JSON.stringify(rawRotation)}.`);
  }
  const freeDeathThreshold = parseIntegerWithRangeValidation(
    input.freeDeathThreshold ?? env.FREE_DEATH_THRESHOLD,
    "freeDeathThreshold",
    issues,
    5,
    1,
    100,
  );
  const paidDeathThreshold = parseIntegerWithRangeValidation(
    input.paidDeathThreshold ?? env.PAID_DEATH_THRESHOLD,
    "paidDeathThreshold",
    issues,
    10,
    1,
    100,
  );
  if (paidDeathThreshold <= freeDeathThreshold) {
    issues.push("`paidDeathThreshold` must be strictly greater than `freeDeathThreshold`.");
  }
  const identityCooldownMs = parseIntegerWithRangeValidation(
    input.identityCooldownMs ?? env.IDENTITY_COOLDOWN_MS,
    "identityCooldownMs",
    issues,
    300000,
    0,
    86400000,
  );
  const healthCheckIntervalMs = parseIntegerWithRangeValidation(
    input.healthCheckIntervalMs ?? env.HEALTH_CHECK_INTERVAL_MS,
    "healthCheckIntervalMs",
    issues,
    1800000,
    1000,
    86400000,
  );
  const minAliveIdentities = parseIntegerWithRangeValidation(
    input.minAliveIdentities ?? env.MIN_ALIVE_IDENTITIES,
    "minAliveIdentities",
    issues,
    3,
    0,
    1000,
  );
  const minSweepGapMs = parseIntegerWithRangeValidation(
    input.minSweepGapMs ?? env.MIN_SWEEP_GAP_MS,
    "minSweepGapMs",
    issues,
    60000,
    0,
    86400000,
  );
  const checkConcurrency = parseIntegerWithRangeValidation(
    input.healthCheckConcurrency ?? env.HEALTH_CHECK_CONCURRENCY,
    "healthCheckConcurrency",
    issues,
    10,
    1,
    100,
  );
  const checkTimeoutMs = parseIntegerWithRangeValidation(
    input.healthCheckTimeoutMs ?? env.HEALTH_CHECK_TIMEOUT_MS,
    "healthCheckTimeoutMs",
    issues,
    10000,
    500,
    120000,
  );
  const maxConcurrentPerIdentity = parseIntegerWithRangeValidation(
    input.maxConcurrentPerIdentity ?? env.MAX_CONCURRENT_PER_IDENTITY,
    "maxConcurrentPerIdentity",
    issues,
    2,
    1,
    100,
  );
  const identityCheckUrls = parseStringList(input.identityCheckUrls, env.IDENTITY_CHECK_URLS, DEFAULT_CHECK_URLS);
  if (identityCheckUrls.length === 0) {
    issues.push("`identityCheckUrls` must name at least one URL.");
  }
  const identityFeedUrls = parseStringList(input.identityFeedUrls, env.IDENTITY_FEED_URLS, []);
  for (const url of [...identityCheckUrls, ...identityFeedUrls]) {
    if (!URL.canParse(url)) issues.push(`Identity check/feed URL ${JSON.stringify(url)} is not a valid URL.`);
  }
  const identityFeedTimeoutMs = parseIntegerWithRangeValidation(
    input.identityFeedTimeoutMs ?? env.IDENTITY_FEED_TIMEOUT_MS,
    "identityFeedTimeoutMs",
    issues,
    30000,
    1000,
    300000,
  );

  // Detection
  const defaults = DEFAULT_DETECTION_CONFIG;
  const baseDelayMs = parseIntegerWithRangeValidation(
    input.baseDelayMs ?? env.BASE_DELAY_MS,
    "baseDelayMs",
    issues,
    defaults.baseDelayMs,
    0,
    600000,
  );
  const maxDelayMs = parseIntegerWithRangeValidation(
    input.maxDelayMs ?? env.MAX_DELAY_MS,
    "maxDelayMs",
    issues,
    defaults.maxDelayMs,
    0,
    600000,
  );
  if (baseDelayMs > maxDelayMs) {
    issues.push("`baseDelayMs` must be less than or equal to `maxDelayMs`.");
  }
  const jitterMin = parseNumberWithRangeValidation(
    input.jitterMin ?? env.JITTER_MIN,
    "jitterMin",
    issues,
    defaults.jitterMin,
    0,
    10,
  );
  const jitterMax = parseNumberWithRangeValidation(
    input.jitterMax ?? env.JITTER_MAX,
    "jitterMax",
    issues,
    defaults.jitterMax,
    0,
    10,
  );
  if (jitterMin > jitterMax) {
    issues.push("`jitterMin` must be less than or equal to `jitterMax`.");
  }
  const rotateThreshold = parseIntegerWithRangeValidation(
    input.rotateThreshold ?? env.ROTATE_THRESHOLD,
    "rotateThreshold",
    issues,
    defaults.rotateThreshold,
    1,
    1000,
  );
  const banThreshold = parseIntegerWithRangeValidation(
    input.banThreshold ?? env.BAN_THRESHOLD,
    "banThreshold",
    issues,
    defaults.banThreshold,
    1,
    1000,
  );
  if (banThreshold < rotateThreshold) {
    issues.push("`banThreshold` must be greater than or equal to `rotateThreshold`.");
  }

  const windowSize = parseIntegerWithRangeValidation(
    input.detectionWindowSize ?? env.DETECTION_WINDOW_SIZE,
    "detectionWindowSize",
    issues,
    defaults.windowSize,
    1,
    10000,
  );
  const minRateSamples = parseIntegerWithRangeValidation(
    input.detectionMinRateSamples ?? env.DETECTION_MIN_RATE_SAMPLES,
    "detectionMinRateSamples",
    issues,
    defaults.minRateSamples,
    1,
    10000,
  );
  if (minRateSamples > windowSize) {
    issues.push("`detectionMinRateSamples` must be less than or equal to `detectionWindowSize`.");
  }

  const detection: DetectionConfig = {
    ...defaults,
    statusCodes: {
      rateLimited: parseStatusCodes(
        input.rateLimitedStatusCodes,
        env.RATE_LIMITED_STATUS_CODES,
        "rateLimitedStatusCodes",
        issues,
        defaults.statusCodes.rateLimited,
      ),
      ipBanned: parseStatusCodes(
        input.ipBannedStatusCodes,
        env.IP_BANNED_STATUS_CODES,
        "ipBannedStatusCodes",
        issues,
        defaults.statusCodes.ipBanned,
      ),
      blocked: parseStatusCodes(
        input.blockedStatusCodes,
        env.BLOCKED_STATUS_CODES,
        "blockedStatusCodes",
        issues,
        defaults.statusCodes.blocked,
      ),
    },
    // 0 bytes turns the instant small response rule off.
    fastRejectMaxBytes: parseIntegerWithRangeValidation(
      input.fastRejectMaxBytes ?? env.FAST_REJECT_MAX_BYTES,
      "fastRejectMaxBytes",
      issues,
      defaults.fastRejectMaxBytes,
      0,
      1000000,
    ),
    fastRejectMaxMs: parseIntegerWithRangeValidation(
      input.fastRejectMaxMs ?? env.FAST_REJECT_MAX_MS,
      "fastRejectMaxMs",
      issues,
      defaults.fastRejectMaxMs,
      0,
      60000,
    ),
    slowResponseMs: parseIntegerWithRangeValidation(
      input.slowResponseMs ?? env.SLOW_RESPONSE_MS,
      "slowResponseMs",
      issues,
      defaults.slowResponseMs,
      1000,
      600000,
    ),
    levelThresholds: parseLevelThresholds(input.levelThresholds, issues),
    rotateThreshold,
    banThreshold,
    baseDelayMs,
    maxDelayMs,
    levelMultipliers: { ...defaults.levelMultipliers },
    kindMultipliers: { ...defaults.kindMultipliers },
    jitterMin,
    jitterMax,
    windowSize,
    minRateSamples,
  };

  // Strategy endpoints
  const structuredApiBaseUrl = parseHttpUrl(
    input.structuredApiBaseUrl ?? env.STRUCTURED_API_BASE_URL,
    "structuredApiBaseUrl",
    issues,
    "https://flk.npc.gov.cn",
  );
  const structuredApiPageSize = parseIntegerWithRangeValidation(
    input.structuredApiPageSize ?? env.STRUCTURED_API_PAGE_SIZE,
    "structuredApiPageSize",
    issues,
    20,
    1,
    100,
  );
  const knownUrlsPath = parseNonEmptyString(
    input.knownUrlsPath ?? env.KNOWN_URLS_PATH,
    "knownUrlsPath",
    issues,
    DEFAULT_KNOWN_URLS_PATH,
  );
  const searchEngineUrl = parseHttpUrl(
    input.searchEngineUrl ?? env.SEARCH_ENGINE_URL,
    "searchEngineUrl",
    issues,
    "https://www.bing.com/search",
  );
  const searchSiteFilter = parseNonEmptyString(
    input.searchSiteFilter ?? env.SEARCH_SITE_FILTER,
    "searchSiteFilter",
    issues,
    "gov.cn",
  );
  const searchMaxResults = parseIntegerWithRangeValidation(
    input.searchMaxResults ?? env.SEARCH_MAX_RESULTS,
    "searchMaxResults",
    issues,
    10,
    1,
    50,
  );
  const browserHeadless = parseBooleanWithValidation(
    input.browserHeadless ?? env.BROWSER_HEADLESS,
    "browserHeadless",
    issues,
    true,
  );
  const browserLaunchTimeoutMs = parseIntegerWithRangeValidation(
    input.browserLaunchTimeoutMs ?? env.BROWSER_LAUNCH_TIMEOUT_MS,
    "browserLaunchTimeoutMs",
    issues,
    30000,
    1000,
    120000,
  );
  const fingerprintRotation = parseBooleanWithValidation(
    input.fingerprintRotation ?? env.FINGERPRINT_ROTATION,
    "fingerprintRotation",
    issues,
    true,
  );

  const rawDatasetName = input.datasetName ?? env.DATASET_NAME;
  const datasetName = typeof rawDatasetName === "string" && rawDatasetName.trim() ? rawDatasetName.trim() : null;

  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }

  const orchestrator: OrchestratorConfig = {
    strategyOrder,
    disabledStrategies,
    escalationEnabled,
    escalationStrategy,
    concurrencyLimit,
    targetTimeoutMs,
    sessionMaxUses,
    sessionShutdownTimeoutMs,
  };

  return deepFreeze<RuntimeConfig>({
    logLevel,
    correlationLogging,
    targets,
    strategyOrder,
    disabledStrategies,
    orchestrator,
    runner: {
      maxAttempts: maxStrategyAttempts,
      requestTimeoutMs,
      matchThreshold,
      preferPaid,
    },
    identityPool: {
      identities,
      rotation,
      deathThresholds: { free: freeDeathThreshold, paid: paidDeathThreshold },
      cooldownMs: identityCooldownMs,
      healthCheckIntervalMs,
      minAliveIdentities,
      minSweepGapMs,
      checkConcurrency,
      checkTimeoutMs,
      maxConcurrentPerIdentity,
    },
    identityCheckUrls,
    identityFeedUrls,
    identityFeedTimeoutMs,
    detection,
    strategies: {
      structuredApi: { baseUrl: structuredApiBaseUrl, pageSize: structuredApiPageSize },
      directUrl: { knownUrlsPath },
      searchEngine: { searchUrl: searchEngineUrl, siteFilter: searchSiteFilter, maxResults: searchMaxResults },
      browserSearch: {
        headless: browserHeadless,
        launchTimeoutMs: browserLaunchTimeoutMs,
        searchUrl: searchEngineUrl,
        siteFilter: searchSiteFilter,
        maxResults: searchMaxResults,
      },
    },
    fingerprintRotation,
    datasetName,
  });
};
