import { sleep } from "../runtime/abort";
import { AppError } from "../runtime/errors";

export type RetryCategory =
  | "blocked"
  | "banned"
  | "timeout"
  | "network"
  | "aborted"
  | "not_found"
  | "internal";

export interface RetryPolicyConfig {
  maxAttempts: number;
}

export interface RetryDecision {
  retry: boolean;
  category: RetryCategory;
}

const NETWORK_MARKERS = ["network", "econnreset", "econnrefused", "enotfound", "etimedout", "socket", "fetch failed", "proxy"];

const looksLikeTimeout = (message: string): boolean => message.includes("timed out") || message.includes("timeout");

const looksLikeNetwork = (message: string): boolean => NETWORK_MARKERS.some((marker) => message.includes(marker));

export const classifyRetryCategory = (error: unknown): RetryCategory => {
  if (error instanceof AppError) {
    switch (error.code) {
      case "SOURCE_BLOCKED":
        return "blocked";
      case "IDENTITY_BANNED":
        return "banned";
      case "TARGET_TIMEOUT":
        return "timeout";
      case "ABORTED":
        return "aborted";
      case "NOT_FOUND":
        return "not_found";
      case "FETCH_ERROR":
      case "NAVIGATION_ERROR":
      case "SESSION_ERROR": {
        const message = error.message.toLowerCase();
        return looksLikeTimeout(message) ? "timeout" : "network";
      }
      default:
        return "internal";
    }
  }

  if (error instanceof Error) {
    if (error.name === "AbortError") return "aborted";
    const message = error.message.toLowerCase();
    if (looksLikeTimeout(message)) return "timeout";
    if (looksLikeNetwork(message)) return "network";
  }

  return "internal";
};

/** Only transient categories are retried; a ban, an abort or a miss ends the strategy at once. */
export const decideRetry = (config: RetryPolicyConfig, error: unknown, attempt: number): RetryDecision => {
  const category = classifyRetryCategory(error);
  const maxAttempts = Math.max(1, config.maxAttempts);
  const retry =
    attempt < maxAttempts && (category === "blocked" || category === "timeout" || category === "network");
  return { retry, category };
};

export interface RetryAttemptContext {
  attempt: number;
  maxAttempts: number;
  category: RetryCategory;
  delayMs: number;
  error: unknown;
}

export const executeWithAdaptiveRetry = async <T>(
  config: RetryPolicyConfig,
  run: (attempt: number) => Promise<T>,
  hooks: {
    delayMs?: (category: RetryCategory, attempt: number) => number;
    onRetry?: (ctx: RetryAttemptContext) => Promise<void> | void;
    onFinalFailure?: (ctx: RetryAttemptContext) => Promise<void> | void;
    signal?: AbortSignal;
  } = {},
): Promise<T> => {
  let attempt = 1;
  const maxAttempts = Math.max(1, config.maxAttempts);
  while (attempt <= maxAttempts) {
    try {
      return await run(attempt);
    } catch (error) {
      const decision = decideRetry(config, error, attempt);
      const delayMs = decision.retry && hooks.delayMs ? hooks.delayMs(decision.category, attempt) : 0;
      const ctx: RetryAttemptContext = { attempt, maxAttempts, category: decision.category, delayMs, error };

      if (!decision.retry) {
        if (hooks.onFinalFailure) await hooks.onFinalFailure(ctx);
        throw error;
      }

      if (hooks.onRetry) await hooks.onRetry(ctx);
      await sleep(delayMs, hooks.signal);
      attempt += 1;
    }
  }

  throw new Error("Retry loop exited unexpectedly.");
};
