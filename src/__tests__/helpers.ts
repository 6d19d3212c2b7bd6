import { HttpClient, screenResponse } from "../acquisition/http-client";
import type { StrategyContext } from "../acquisition/types";
import { DEFAULT_DETECTION_CONFIG, ResponseAnalyzer } from "../detection/response-analyzer";
import type { DetectionConfig } from "../detection/types";
import { FingerprintRotator } from "../reliability/fingerprint-rotation";
import type { IdentityPoolConfig, NetworkIdentity } from "../reliability/identity-pool";
import type { FetchInit, FetchLike, FetchResponseLike } from "../runtime/http-fetch";

export const fakeResponse = (
  status: number,
  body: string,
  headers: Record<string, string> = {},
): FetchResponseLike => ({
  status,
  headers: {
    forEach(callback) {
      for (const [key, value] of Object.entries(headers)) callback(value, key);
    },
  },
  text: async () => body,
});

export interface RecordedRequest {
  url: string;
  init: FetchInit;
}

/** Answers each URL from a routing function and records every call. */
export const routedFetch = (
  route: (url: string) => FetchResponseLike | Error,
): { fetcher: FetchLike; calls: RecordedRequest[] } => {
  const calls: RecordedRequest[] = [];
  const fetcher: FetchLike = async (url, init) => {
    calls.push({ url, init });
    const answer = route(url);
    if (answer instanceof Error) throw answer;
    return answer;
  };
  return { fetcher, calls };
};

export const poolConfig = (overrides: Partial<IdentityPoolConfig> = {}): IdentityPoolConfig => ({
  identities: [],
  rotation: "round_robin",
  deathThresholds: { free: 3, paid: 5 },
  cooldownMs: 60_000,
  healthCheckIntervalMs: 1_800_000,
  minAliveIdentities: 0,
  minSweepGapMs: 0,
  checkConcurrency: 2,
  checkTimeoutMs: 50,
  maxConcurrentPerIdentity: 2,
  ...overrides,
});

export const identityView = (overrides: Partial<NetworkIdentity> & { id: string }): NetworkIdentity => ({
  kind: "proxied",
  protocol: "http",
  host: "10.0.0.1",
  port: 8080,
  username: null,
  password: null,
  tier: "free",
  source: "config",
  ...overrides,
});

/** Detection without waits or timing heuristics, for tests that drive fake sources. */
export const quietDetection = (overrides: Partial<DetectionConfig> = {}): DetectionConfig => ({
  ...DEFAULT_DETECTION_CONFIG,
  fastRejectMaxBytes: 0,
  baseDelayMs: 0,
  ...overrides,
});

export const LONG_BODY = `<html><body>${"法规正文".repeat(200)}</body></html>`;

/** A strategy context over a fake fetcher, direct connection, no session. Quiet detection unless an analyzer is given. */
export const strategyContext = (
  fetcher: FetchLike,
  targetName = "target",
  analyzer = new ResponseAnalyzer(quietDetection()),
): StrategyContext => {
  const signal = new AbortController().signal;
  return {
    targetName,
    identity: null,
    http: new HttpClient({ analyzer, identity: null, headers: {}, timeoutMs: 1_000, signal, fetcher }),
    fingerprint: new FingerprintRotator({ enabled: false }).next(),
    session: null,
    signal,
    timeoutMs: 1_000,
    screen: (sample) => screenResponse(analyzer, sample),
  };
};
