import { describe, expect, it } from "vitest";
import { HttpClient, screenResponse } from "../acquisition/http-client";
import { ResponseAnalyzer } from "../detection/response-analyzer";
import { AbortedError, FetchError, NotFoundError, SourceBlockedError } from "../runtime/errors";
import type { FetchLike, FetchResponseLike } from "../runtime/http-fetch";
import { LONG_BODY, fakeResponse, identityView, quietDetection, routedFetch } from "./helpers";

const client = (
  fetcher: FetchLike,
  overrides: { signal?: AbortSignal; timeoutMs?: number; analyzer?: ResponseAnalyzer } = {},
): HttpClient =>
  new HttpClient({
    analyzer: overrides.analyzer ?? new ResponseAnalyzer(quietDetection()),
    identity: null,
    headers: { "user-agent": "test-agent" },
    timeoutMs: overrides.timeoutMs ?? 1000,
    signal: overrides.signal ?? new AbortController().signal,
    fetcher,
  });

/** Never answers; rejects once the request signal aborts. */
const hangingFetch: FetchLike = async (_url, init) =>
  new Promise<FetchResponseLike>((_, reject) => {
    init.signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });

describe("HttpClient.get", () => {
  it("returns a classified page and sends the fingerprint headers", async () => {
    const { fetcher, calls } = routedFetch(() => fakeResponse(200, LONG_BODY, { "Content-Type": "text/html" }));
    const page = await client(fetcher).get("https://flk.npc.gov.cn/detail?id=1", "detail");

    expect(page.statusCode).toBe(200);
    expect(page.body).toBe(LONG_BODY);
    expect(page.classification).toEqual({ verdict: "normal", level: "none", evidence: null });
    expect(calls[0].init.method).toBe("GET");
    expect(calls[0].init.headers).toEqual({ "user-agent": "test-agent" });
    expect(calls[0].init.dispatcher).toBeUndefined();
  });

  it("routes through a proxy dispatcher when an identity is held", async () => {
    const { fetcher, calls } = routedFetch(() => fakeResponse(200, LONG_BODY));
    const proxied = new HttpClient({
      analyzer: new ResponseAnalyzer(quietDetection()),
      identity: identityView({ id: "paid_1", tier: "paid" }),
      headers: {},
      timeoutMs: 1000,
      signal: new AbortController().signal,
      fetcher,
    });

    await proxied.get("https://flk.npc.gov.cn/", "search");
    expect(calls[0].init.dispatcher).toBeDefined();
    expect(proxied.identity?.id).toBe("paid_1");
  });

  it("throws SourceBlockedError for a hostile response and records it", async () => {
    const analyzer = new ResponseAnalyzer(quietDetection());
    const { fetcher } = routedFetch(() => fakeResponse(403, LONG_BODY));

    const error = await client(fetcher, { analyzer })
      .get("https://flk.npc.gov.cn/", "search")
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SourceBlockedError);
    if (error instanceof SourceBlockedError) {
      expect(error.verdict).toBe("ip_banned");
      expect(error.details).toMatchObject({ statusCode: 403, evidence: "http-status-403" });
    }
    expect(analyzer.snapshot().consecutiveBlocks).toBe(1);
  });

  it("maps 404 to NotFoundError and other failures to FetchError", async () => {
    const missing = routedFetch(() => fakeResponse(404, LONG_BODY));
    await expect(client(missing.fetcher).get("https://flk.npc.gov.cn/x", "detail")).rejects.toBeInstanceOf(
      NotFoundError,
    );

    const broken = routedFetch(() => fakeResponse(500, LONG_BODY));
    await expect(client(broken.fetcher).get("https://flk.npc.gov.cn/x", "detail")).rejects.toThrow(
      "Source returned HTTP 500.",
    );

    const refused = routedFetch(() => new Error("ECONNREFUSED"));
    await expect(client(refused.fetcher).get("https://flk.npc.gov.cn/x", "detail")).rejects.toThrow(
      "Request failed: ECONNREFUSED",
    );
  });

  it("reports a timeout as a fetch failure", async () => {
    const error = await client(hangingFetch, { timeoutMs: 20 })
      .get("https://flk.npc.gov.cn/slow", "search")
      .catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toHaveProperty("message", "Request timed out after 20ms.");
  });

  it("reports cancellation by the caller as AbortedError", async () => {
    const controller = new AbortController();
    const pending = client(hangingFetch, { signal: controller.signal }).get("https://flk.npc.gov.cn/", "search");
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });
});

describe("HttpClient.getJson", () => {
  it("parses an object payload and asks for JSON", async () => {
    const payload = JSON.stringify({ result: { data: [] }, padding: "x".repeat(50) });
    const { fetcher, calls } = routedFetch(() => fakeResponse(200, payload));

    await expect(client(fetcher).getJson("https://flk.npc.gov.cn/api", "search")).resolves.toEqual({
      result: { data: [] },
      padding: "x".repeat(50),
    });
    expect(calls[0].init.headers).toEqual({
      "user-agent": "test-agent",
      accept: "application/json, text/plain, */*",
    });
  });

  it("exempts JSON replies from the instant small response rule that still applies to pages", async () => {
    const analyzer = new ResponseAnalyzer();
    const { fetcher } = routedFetch(() => fakeResponse(200, '{"success":true}'));

    await expect(client(fetcher, { analyzer }).getJson("https://flk.npc.gov.cn/api", "search")).resolves.toEqual({
      success: true,
    });
    await expect(client(fetcher, { analyzer }).get("https://flk.npc.gov.cn/page", "search")).rejects.toBeInstanceOf(
      SourceBlockedError,
    );
    expect(analyzer.snapshot().counts).toMatchObject({ normal: 1, blocked: 1 });
  });

  it("rejects malformed and non-object JSON", async () => {
    const garbled = routedFetch(() => fakeResponse(200, "{not json"));
    await expect(client(garbled.fetcher).getJson("https://flk.npc.gov.cn/api", "search")).rejects.toThrow(
      "Source returned malformed JSON.",
    );

    const list = routedFetch(() => fakeResponse(200, "[1,2]"));
    await expect(client(list.fetcher).getJson("https://flk.npc.gov.cn/api", "search")).rejects.toThrow(
      "Source returned a JSON payload that is not an object.",
    );
  });
});

describe("screenResponse", () => {
  it("passes a normal response through", () => {
    const analyzer = new ResponseAnalyzer(quietDetection());
    expect(
      screenResponse(analyzer, { statusCode: 200, headers: {}, body: LONG_BODY, responseTimeMs: 5, url: null }).verdict,
    ).toBe("normal");
  });

  it("throws for a captcha page", () => {
    const analyzer = new ResponseAnalyzer(quietDetection());
    expect(() =>
      screenResponse(analyzer, {
        statusCode: 200,
        headers: {},
        body: "<div>请完成安全验证</div>",
        responseTimeMs: 5,
        url: "https://flk.npc.gov.cn/",
      }),
    ).toThrow("Source responded with a hostile verdict: captcha.");
  });
});
