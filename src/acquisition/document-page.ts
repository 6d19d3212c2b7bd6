import { load, type CheerioAPI } from "cheerio";
import type { RawRecord } from "./types";

export interface SelectorCandidate {
  selector: string;
  attribute?: string;
}

type SelectorList = Array<string | SelectorCandidate>;

const TITLE_SELECTORS: SelectorList = [
  { selector: "meta[name='ArticleTitle']", attribute: "content" },
  { selector: "meta[property='og:title']", attribute: "content" },
  "h1",
  ".article-title",
  "title",
];

const OFFICE_SELECTORS: SelectorList = [
  { selector: "meta[name='ContentSource']", attribute: "content" },
  { selector: "meta[name='author']", attribute: "content" },
];

const PUBLISHED_SELECTORS: SelectorList = [
  { selector: "meta[name='PubDate']", attribute: "content" },
  { selector: "meta[name='firstpublishedtime']", attribute: "content" },
  { selector: "meta[property='article:published_time']", attribute: "content" },
];

const CONTENT_SELECTORS: SelectorList = ["#UCAP-CONTENT", ".pages_content", ".article-content", ".content", "article", "body"];

const DOCUMENT_NUMBER = /([一-龥]{1,8}[〔\[(（]\d{4}[〕\])）]\d+号|第\s*\d+\s*号)/;
const CN_DATE = /(\d{4})\s*年\s*(\d{1,2})\s*月\s*(\d{1,2})\s*日/;
const ISO_DATE = /(\d{4})-(\d{1,2})-(\d{1,2})/;
const EFFECTIVE_DATE = /自\s*(\d{4}\s*年\s*\d{1,2}\s*月\s*\d{1,2}\s*日)\s*起施行/;

const CONTENT_LIMIT = 20_000;

const normalizeCandidate = (candidate: string | SelectorCandidate): SelectorCandidate =>
  typeof candidate === "string" ? { selector: candidate } : candidate;

export const pickFirstText = ($: CheerioAPI, selectors: SelectorList): string | null => {
  for (const input of selectors) {
    const candidate = normalizeCandidate(input);
    const node = $(candidate.selector).first();
    if (node.length === 0) continue;

    const raw = typeof candidate.attribute === "string" ? node.attr(candidate.attribute) : node.text();
    const value = typeof raw === "string" ? raw.replace(/\s+/g, " ").trim() : "";
    if (value.length > 0) return value;
  }
  return null;
};

const pad = (value: string): string => value.padStart(2, "0");

/** Reduces a Chinese or ISO date found anywhere in `text` to `YYYY-MM-DD`. */
export const toIsoDate = (text: string | null): string | null => {
  if (!text) return null;
  const match = CN_DATE.exec(text) ?? ISO_DATE.exec(text);
  if (!match) return null;
  return `${match[1]}-${pad(match[2])}-${pad(match[3])}`;
};

export interface DocumentPageInput {
  html: string;
  url: string;
  source: string;
  fallbackTitle: string;
}

/** Generic field pickup for government article pages. Per-site layouts are not modelled. */
export const extractDocumentPage = (input: DocumentPageInput): RawRecord => {
  const $ = load(input.html);
  $("script, style, noscript").remove();

  const title = pickFirstText($, TITLE_SELECTORS) ?? input.fallbackTitle;
  const content = pickFirstText($, CONTENT_SELECTORS);
  const text = content ?? "";

  const numberMatch = DOCUMENT_NUMBER.exec(`${title} ${text.slice(0, 2000)}`);
  const effectiveMatch = EFFECTIVE_DATE.exec(text);
  const keywords = pickFirstText($, [{ selector: "meta[name='keywords']", attribute: "content" }]);

  return {
    title,
    url: input.url,
    source: input.source,
    documentNumber: numberMatch ? numberMatch[1].replace(/\s+/g, "") : null,
    issuingOffice: pickFirstText($, OFFICE_SELECTORS),
    publishedAt: toIsoDate(pickFirstText($, PUBLISHED_SELECTORS)) ?? toIsoDate(text.slice(0, 2000)),
    effectiveAt: effectiveMatch ? toIsoDate(effectiveMatch[1]) : null,
    status: null,
    content: content ? content.slice(0, CONTENT_LIMIT) : null,
    keywords: keywords
      ? keywords
          .split(/[,，;；\s]+/)
          .map((entry) => entry.trim())
          .filter(Boolean)
      : [],
  };
};
