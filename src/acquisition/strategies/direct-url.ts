import { readFileSync } from "node:fs";
import path from "node:path";
import { normalizeTitle } from "../../matching/normalization";
import type { MatchCandidate } from "../../matching/types";
import { ValidationError } from "../../runtime/errors";
import { extractDocumentPage } from "../document-page";
import type { AcquisitionStrategy, RawRecord, StrategyContext } from "../types";
import { isRecord, readString, readStringList } from "./payload";

export interface KnownUrlEntry {
  title: string;
  url: string;
  status: string | null;
  aliases: string[];
}

export const DEFAULT_KNOWN_URLS_PATH = path.resolve(__dirname, "..", "..", "..", "data", "known-urls.json");

export const parseKnownUrls = (raw: unknown): KnownUrlEntry[] => {
  if (!isRecord(raw) || !Array.isArray(raw.entries)) {
    throw new ValidationError("Known URL table must be an object with an `entries` array.");
  }

  return raw.entries.filter(isRecord).flatMap((entry): KnownUrlEntry[] => {
    const title = readString(entry, "title");
    const url = readString(entry, "url");
    if (!title || !url || !URL.canParse(url)) return [];
    return [{ title, url, status: readString(entry, "status"), aliases: readStringList(entry, "aliases") }];
  });
};

export const loadKnownUrls = (filePath: string = DEFAULT_KNOWN_URLS_PATH): KnownUrlEntry[] => {
  const text = readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ValidationError("Known URL table is not valid JSON.", {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return parseKnownUrls(parsed);
};

/** Looks the target up in a curated table of document pages that search tends to miss. */
export class DirectUrlStrategy implements AcquisitionStrategy {
  public readonly name = "direct_url";
  public readonly transport = "http" as const;
  private readonly entries: Array<KnownUrlEntry & { keys: string[] }>;

  public constructor(entries: KnownUrlEntry[]) {
    this.entries = entries.map((entry) => ({
      ...entry,
      keys: [entry.title, ...entry.aliases].map(normalizeTitle),
    }));
  }

  public supportsBatchSession(): boolean {
    return false;
  }

  public async search(name: string): Promise<MatchCandidate[]> {
    const target = normalizeTitle(name);
    if (!target) return [];

    return this.entries
      .filter((entry) => entry.keys.some((key) => key === target || key.includes(target) || target.includes(key)))
      .map((entry, index) => ({
        title: entry.title,
        sourceId: entry.url,
        url: entry.url,
        status: entry.status,
        rank: index,
      }));
  }

  public async fetchDetail(candidate: MatchCandidate, ctx: StrategyContext): Promise<RawRecord> {
    const url = candidate.url ?? candidate.sourceId;
    const page = await ctx.http.get(url, "detail");
    const record = extractDocumentPage({ html: page.body, url, source: this.name, fallbackTitle: candidate.title });
    return { ...record, status: record.status ?? candidate.status ?? null };
  }
}
