import { describe, expect, it, vi } from "vitest";
import { classifyRetryCategory, decideRetry, executeWithAdaptiveRetry } from "../reliability/retry-policy";
import {
  AbortedError,
  describeError,
  FetchError,
  IdentityBannedError,
  NotFoundError,
  SourceBlockedError,
  TargetTimeoutError,
} from "../runtime/errors";

describe("classifyRetryCategory", () => {
  it("maps application errors by code", () => {
    expect(classifyRetryCategory(new SourceBlockedError("captcha"))).toBe("blocked");
    expect(classifyRetryCategory(new IdentityBannedError("direct_url"))).toBe("banned");
    expect(classifyRetryCategory(new TargetTimeoutError("数据安全法", 1000))).toBe("timeout");
    expect(classifyRetryCategory(new AbortedError())).toBe("aborted");
    expect(classifyRetryCategory(new NotFoundError("gone"))).toBe("not_found");
    expect(classifyRetryCategory(new FetchError("Request failed: ECONNRESET"))).toBe("network");
    expect(classifyRetryCategory(new FetchError("Request timed out after 20ms."))).toBe("timeout");
  });

  it("reads plain errors by name and message", () => {
    const abort = new Error("stopped");
    abort.name = "AbortError";
    expect(classifyRetryCategory(abort)).toBe("aborted");
    expect(classifyRetryCategory(new Error("socket hang up"))).toBe("network");
    expect(classifyRetryCategory(new Error("Operation timeout"))).toBe("timeout");
    expect(classifyRetryCategory(new Error("undefined is not a function"))).toBe("internal");
    expect(classifyRetryCategory("boom")).toBe("internal");
  });
});

describe("decideRetry", () => {
  it("retries transient failures until the attempt bound", () => {
    const blocked = new SourceBlockedError("rate_limited");
    expect(decideRetry({ maxAttempts: 3 }, blocked, 2)).toEqual({ retry: true, category: "blocked" });
    expect(decideRetry({ maxAttempts: 3 }, blocked, 3)).toEqual({ retry: false, category: "blocked" });
    expect(decideRetry({ maxAttempts: 3 }, new NotFoundError("gone"), 1)).toEqual({
      retry: false,
      category: "not_found",
    });
  });
});

describe("executeWithAdaptiveRetry", () => {
  it("retries with the hook's delay and returns the first success", async () => {
    const run = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new FetchError("Request failed: ECONNRESET"))
      .mockResolvedValueOnce("ok");
    const onRetry = vi.fn();

    const result = await executeWithAdaptiveRetry({ maxAttempts: 3 }, run, { delayMs: () => 0, onRetry });

    expect(result).toBe("ok");
    expect(run.mock.calls).toEqual([[1], [2]]);
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, category: "network", delayMs: 0 }));
  });

  it("stops at once on a final failure", async () => {
    const banned = new IdentityBannedError("direct_url");
    const run = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(banned);
    const onFinalFailure = vi.fn();

    await expect(executeWithAdaptiveRetry({ maxAttempts: 3 }, run, { onFinalFailure })).rejects.toBe(banned);
    expect(run).toHaveBeenCalledTimes(1);
    expect(onFinalFailure).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, category: "banned" }));
  });
});

describe("describeError", () => {
  it("reduces any thrown value to a code and message", () => {
    expect(describeError(new NotFoundError("gone"))).toEqual({ code: "NOT_FOUND", message: "gone" });
    expect(describeError(new Error("bad"))).toEqual({ code: "INTERNAL_ERROR", message: "bad" });
    expect(describeError(42)).toEqual({ code: "INTERNAL_ERROR", message: "Unknown error." });
  });
});
