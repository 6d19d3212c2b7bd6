import type { MatchCandidate } from "../../matching/types";
import { NotFoundError } from "../../runtime/errors";
import type { AcquisitionStrategy, RawRecord, StrategyContext } from "../types";
import { readRecord, readRecordArray, readString, readStringList } from "./payload";

export interface StructuredApiConfig {
  baseUrl: string;
  pageSize: number;
}

// Status codes of the national law database.
const STATUS_LABELS: Record<string, string> = {
  "1": "有效",
  "3": "尚未生效",
  "5": "已修改",
  "9": "已废止",
};

const statusLabel = (raw: string | null): string | null => (raw ? (STATUS_LABELS[raw] ?? raw) : null);

const toDate = (raw: string | null): string | null => {
  if (!raw) return null;
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(raw);
  return match ? `${match[1]}-${match[2]}-${match[3]}` : null;
};

export class StructuredApiStrategy implements AcquisitionStrategy {
  public readonly name = "structured_api";
  public readonly transport = "http" as const;
  private readonly config: StructuredApiConfig;

  public constructor(config: StructuredApiConfig) {
    this.config = config;
  }

  public supportsBatchSession(): boolean {
    return false;
  }

  public async search(name: string, ctx: StrategyContext): Promise<MatchCandidate[]> {
    const url = new URL("/api/search", this.config.baseUrl);
    url.searchParams.set("keyword", name);
    url.searchParams.set("page", "1");
    url.searchParams.set("size", String(this.config.pageSize));

    const payload = await ctx.http.getJson(url.toString(), "search");
    if (payload.success !== true) return [];
    const result = readRecord(payload, "result");
    if (!result) return [];

    return readRecordArray(result, "data").flatMap((item, index): MatchCandidate[] => {
      const id = readString(item, "id");
      const title = readString(item, "title");
      if (!id || !title) return [];
      const path = readString(item, "url");
      return [
        {
          title,
          sourceId: id,
          url: path ? new URL(path.replace(/^\./, ""), this.config.baseUrl).toString() : null,
          status: statusLabel(readString(item, "status")),
          publishedAt: toDate(readString(item, "publish")),
          rank: index,
        },
      ];
    });
  }

  public async fetchDetail(candidate: MatchCandidate, ctx: StrategyContext): Promise<RawRecord> {
    const url = new URL("/api/detail", this.config.baseUrl);
    url.searchParams.set("id", candidate.sourceId);

    const payload = await ctx.http.getJson(url.toString(), "detail");
    const detail = payload.success === true ? readRecord(payload, "result") : null;
    if (!detail) {
      throw new NotFoundError("Structured API returned no detail for candidate.", { id: candidate.sourceId });
    }

    return {
      title: readString(detail, "title") ?? candidate.title,
      url: candidate.url ?? new URL(`/detail2.html?${candidate.sourceId}`, this.config.baseUrl).toString(),
      source: this.name,
      documentNumber: readString(detail, "number"),
      issuingOffice: readString(detail, "office"),
      publishedAt: toDate(readString(detail, "publish")) ?? candidate.publishedAt ?? null,
      effectiveAt: toDate(readString(detail, "expiry")),
      status: statusLabel(readString(detail, "status")) ?? candidate.status ?? null,
      content: readString(detail, "content"),
      keywords: readStringList(detail, "keywords"),
      extra: { type: readString(detail, "type"), id: candidate.sourceId },
    };
  }
}
