import { describe, expect, it } from "vitest";
import type { AcquisitionResult } from "../acquisition/types";
import { MemoryResultSink, toResultItem } from "../persistence/result-sink";

const found: AcquisitionResult = {
  targetName: "数据安全法",
  found: true,
  record: {
    title: "中华人民共和国数据安全法",
    url: "https://flk.example.test/detail2.html?ff80",
    source: "structured_api",
    documentNumber: null,
    issuingOffice: "全国人民代表大会常务委员会",
    publishedAt: "2021-06-10",
    effectiveAt: "2021-09-01",
    status: "有效",
    content: "第一条",
    keywords: ["数据安全"],
  },
  strategyUsed: "structured_api",
  matchScore: 0.87654,
  elapsedMs: 420,
  error: null,
  escalated: false,
  attempts: [
    {
      strategy: "structured_api",
      outcome: "success",
      elapsedMs: 420,
      matchScore: 0.87654,
      error: null,
    },
  ],
};

describe("toResultItem", () => {
  it("flattens a found record and rounds the score", () => {
    const item = toResultItem(found, new Date("2026-01-02T03:04:05.000Z"));

    expect(item).toEqual({
      target_name: "数据安全法",
      found: true,
      strategy_used: "structured_api",
      match_score: 0.877,
      elapsed_ms: 420,
      escalated: false,
      error_code: null,
      error_message: null,
      title: "中华人民共和国数据安全法",
      url: "https://flk.example.test/detail2.html?ff80",
      source: "structured_api",
      document_number: null,
      issuing_office: "全国人民代表大会常务委员会",
      published_at: "2021-06-10",
      effective_at: "2021-09-01",
      status: "有效",
      keywords: ["数据安全"],
      content: "第一条",
      attempts: [{ strategy: "structured_api", outcome: "success", elapsed_ms: 420, error: null }],
      stored_at: "2026-01-02T03:04:05.000Z",
    });
  });

  it("carries the error of a miss", () => {
    const item = toResultItem({
      ...found,
      found: false,
      record: null,
      strategyUsed: null,
      matchScore: null,
      error: { code: "NOT_FOUND", message: "No strategy resolved the target." },
      attempts: [
        {
          strategy: "direct_url",
          outcome: "failed",
          elapsedMs: 30,
          matchScore: null,
          error: { code: "FETCH_ERROR", message: "Request failed: ECONNRESET" },
        },
      ],
    });

    expect(item).toMatchObject({
      found: false,
      match_score: null,
      error_code: "NOT_FOUND",
      error_message: "No strategy resolved the target.",
      title: null,
      keywords: [],
      attempts: [{ strategy: "direct_url", outcome: "failed", elapsed_ms: 30, error: "FETCH_ERROR: Request failed: ECONNRESET" }],
    });
  });
});

describe("MemoryResultSink", () => {
  it("keeps results in write order", async () => {
    const sink = new MemoryResultSink();
    await sink.write(found);
    await sink.write({ ...found, targetName: "网络安全法" });

    expect(sink.results.map((result) => result.targetName)).toEqual(["数据安全法", "网络安全法"]);
  });
});
