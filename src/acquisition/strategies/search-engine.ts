import { load } from "cheerio";
import type { MatchCandidate } from "../../matching/types";
import { extractDocumentPage } from "../document-page";
import type { AcquisitionStrategy, RawRecord, StrategyContext } from "../types";

export interface SearchEngineConfig {
  searchUrl: string;
  siteFilter: string;
  maxResults: number;
}

export interface SearchHit {
  title: string;
  url: string;
}

const SKIPPED_LINK = /(\.pdf($|\?)|\.docx?($|\?)|\.wps($|\?)|download|attachment|\/files?\/)/i;
const SITE_SUFFIX = /\s*[_|\-–—]\s*[^_|\-–—]*(政府网|人民政府|人大网|gov\.cn|部|委员会|局)[^_|\-–—]*$/i;

/** Drops trailing site labels such as `_国务院部门文件_中国政府网`, one segment at a time. */
export const cleanResultTitle = (title: string): string => {
  let current = title.replace(/\s+/g, " ").trim();
  for (;;) {
    const stripped = current.replace(SITE_SUFFIX, "").trim();
    if (stripped.length === 0 || stripped === current) return current;
    current = stripped;
  }
};

const hostMatches = (url: string, siteFilter: string): boolean => {
  if (!URL.canParse(url)) return false;
  const host = new URL(url).hostname.toLowerCase();
  const suffix = siteFilter.toLowerCase();
  return host === suffix || host.endsWith(`.${suffix}`);
};

/** Organic results of a web search page, limited to the configured site and to HTML documents. */
export const parseSearchResults = (html: string, siteFilter: string): SearchHit[] => {
  const $ = load(html);
  const hits: SearchHit[] = [];
  const seen = new Set<string>();

  $("li.b_algo, div.b_algo").each((_, element) => {
    const link = $(element).find("h2 a").first();
    const href = link.attr("href");
    const title = link.text();
    if (!href || !title.trim()) return;
    if (!hostMatches(href, siteFilter) || SKIPPED_LINK.test(href)) return;
    if (seen.has(href)) return;

    seen.add(href);
    hits.push({ title: cleanResultTitle(title), url: href });
  });

  return hits;
};

export class SearchEngineStrategy implements AcquisitionStrategy {
  public readonly name = "search_engine";
  public readonly transport = "http" as const;
  private readonly config: SearchEngineConfig;

  public constructor(config: SearchEngineConfig) {
    this.config = config;
  }

  public supportsBatchSession(): boolean {
    return false;
  }

  public async search(name: string, ctx: StrategyContext): Promise<MatchCandidate[]> {
    // Quoted first; the unquoted form catches titles the engine tokenizes differently.
    for (const query of [`"${name}" site:${this.config.siteFilter}`, `${name} site:${this.config.siteFilter}`]) {
      const url = new URL(this.config.searchUrl);
      url.searchParams.set("q", query);
      const page = await ctx.http.get(url.toString(), "search");
      const hits = parseSearchResults(page.body, this.config.siteFilter).slice(0, this.config.maxResults);
      if (hits.length > 0) {
        return hits.map((hit, index) => ({ title: hit.title, sourceId: hit.url, url: hit.url, rank: index }));
      }
    }
    return [];
  }

  public async fetchDetail(candidate: MatchCandidate, ctx: StrategyContext): Promise<RawRecord> {
    const url = candidate.url ?? candidate.sourceId;
    const page = await ctx.http.get(url, "detail");
    return extractDocumentPage({ html: page.body, url, source: this.name, fallbackTitle: candidate.title });
  }
}
