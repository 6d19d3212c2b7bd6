import Ajv, { type ErrorObject } from "ajv";
import { KNOWN_STRATEGIES } from "./acquisition/types";
import { IDENTITY_PROTOCOLS } from "./reliability/identity-pool";
import { ValidationError } from "./runtime/errors";
import type { ActorInput } from "./types";

const integer = (minimum: number, maximum?: number): Record<string, unknown> => ({
  type: "integer",
  minimum,
  ...(maximum !== undefined ? { maximum } : {}),
});

const stringList = { type: "array", items: { type: "string" } };
const strategyList = { type: "array", items: { type: "string", enum: [...KNOWN_STRATEGIES] } };
const statusCodeList = { type: "array", items: integer(100, 599) };
const levelThreshold = {
  type: "object",
  additionalProperties: false,
  properties: {
    consecutiveBlocks: integer(1),
    blockRate: { type: "number", minimum: 0, maximum: 1 },
  },
  required: ["consecutiveBlocks", "blockRate"],
};

export const ACTOR_INPUT_SCHEMA: Record<string, unknown> = {
  $id: "ActorInputV1",
  type: "object",
  additionalProperties: false,
  properties: {
    targets: { type: "array", items: { type: "string", minLength: 1 } },
    logLevel: { type: "string", enum: ["DEBUG", "INFO", "WARNING", "ERROR"] },
    correlationLogging: { type: "boolean" },

    strategyOrder: { ...strategyList, minItems: 1, uniqueItems: true },
    disabledStrategies: strategyList,
    escalationEnabled: { type: "boolean" },
    escalationStrategy: { type: "string", enum: [...KNOWN_STRATEGIES] },
    concurrencyLimit: integer(1, 50),
    maxStrategyAttempts: integer(1, 10),
    matchThreshold: { type: "number", minimum: 0, maximum: 1 },

    requestTimeoutMs: integer(1000),
    targetTimeoutMs: integer(1000),
    sessionMaxUses: integer(1),
    sessionShutdownTimeoutMs: integer(1000),

    identities: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["host", "port"],
        properties: {
          host: { type: "string", minLength: 1 },
          port: { anyOf: [integer(1, 65535), { type: "string", pattern: "^[0-9]+$" }] },
          protocol: { type: "string", enum: [...IDENTITY_PROTOCOLS] },
          tier: { type: "string", enum: ["free", "paid"] },
          username: { type: "string" },
          password: { type: "string" },
        },
      },
    },
    preferPaidIdentities: { type: "boolean" },
    rotationMode: { type: "string", enum: ["round_robin", "random"] },
    freeDeathThreshold: integer(1),
    paidDeathThreshold: integer(1),
    identityCooldownMs: integer(0),
    healthCheckIntervalMs: integer(1000),
    minAliveIdentities: integer(0),
    minSweepGapMs: integer(0),
    healthCheckConcurrency: integer(1),
    healthCheckTimeoutMs: integer(500),
    maxConcurrentPerIdentity: integer(1),
    identityCheckUrls: stringList,
    identityFeedUrls: stringList,
    identityFeedTimeoutMs: integer(1000),

    rateLimitedStatusCodes: statusCodeList,
    ipBannedStatusCodes: statusCodeList,
    blockedStatusCodes: statusCodeList,
    fastRejectMaxBytes: integer(0),
    fastRejectMaxMs: integer(0),
    slowResponseMs: integer(1000),
    levelThresholds: {
      type: "object",
      additionalProperties: false,
      properties: {
        low: levelThreshold,
        medium: levelThreshold,
        high: levelThreshold,
        extreme: levelThreshold,
      },
    },
    rotateThreshold: integer(1),
    banThreshold: integer(1),
    baseDelayMs: integer(0),
    maxDelayMs: integer(0),
    jitterMin: { type: "number", minimum: 0 },
    jitterMax: { type: "number", minimum: 0 },
    detectionWindowSize: integer(1),
    detectionMinRateSamples: integer(1),

    structuredApiBaseUrl: { type: "string", minLength: 1 },
    structuredApiPageSize: integer(1, 100),
    knownUrlsPath: { type: "string", minLength: 1 },
    searchEngineUrl: { type: "string", minLength: 1 },
    searchSiteFilter: { type: "string", minLength: 1 },
    searchMaxResults: integer(1, 50),
    browserHeadless: { type: "boolean" },
    browserLaunchTimeoutMs: integer(1000),
    fingerprintRotation: { type: "boolean" },

    datasetName: { type: "string" },
  },
};

const formatAjvError = (error: ErrorObject): string => {
  const location = error.instancePath || "/";
  if (error.keyword === "required") {
    return `${location} missing required field '${String(error.params.missingProperty ?? "")}'.`;
  }
  if (error.keyword === "additionalProperties") {
    return `${location} has unknown field '${String(error.params.additionalProperty ?? "")}'.`;
  }
  return `${location} ${error.message ?? "is invalid"}.`;
};

export const createInputValidator = (): ((payload: unknown) => ActorInput) => {
  const ajv = new Ajv({
    allErrors: true,
    strict: false,
  });
  const validate = ajv.compile<ActorInput>(ACTOR_INPUT_SCHEMA);

  return (payload: unknown): ActorInput => {
    const candidate = payload ?? {};
    if (!validate(candidate)) {
      const issues = (validate.errors ?? []).map(formatAjvError);
      throw new ValidationError("Actor input failed schema validation.", {
        schema: "ActorInputV1",
        issues,
      });
    }
    return candidate;
  };
};
