import { extractKeywords, normalizeDocumentNumber, normalizeTitle } from "./normalization";
import type { DocumentClass, MatchCandidate, ResolveOptions, ScoredCandidate, Validity } from "./types";

export const DEFAULT_MATCH_THRESHOLD = 0.6;

const KEYWORD_BONUS = 0.05;
const KEYWORD_BONUS_CAP = 0.15;
const CLASS_MISMATCH_PENALTY = 0.5;
const DOCUMENT_NUMBER_BONUS = 0.1;

const SECONDARY_CLASSES: ReadonlySet<DocumentClass> = new Set([
  "interpretation",
  "opinion",
  "notice",
  "reply",
]);

// Checked in order: secondary classes first, since their titles usually embed the statute name.
const CLASS_MARKERS: Array<{ documentClass: DocumentClass; regex: RegExp }> = [
  { documentClass: "interpretation", regex: /(司法解释|的解释|解释\)?$|\binterpretations?\b)/i },
  { documentClass: "reply", regex: /(批复|答复|复函|\breply\b)/i },
  { documentClass: "notice", regex: /(通知|公告|通告|\bnotice\b|\bcircular\b|\bannouncement\b)/i },
  { documentClass: "opinion", regex: /(意见|\bopinions?\b)/i },
  {
    documentClass: "statute",
    regex: /(法$|法典|条例|规定|办法|规则|细则|\blaw\b|\bcode\b|\bregulations?\b|\brules\b|\bmeasures\b|\bprovisions\b)/i,
  },
];

const PENDING_MARKERS = /(尚未生效|not yet (in force|effective))/i;
const IN_FORCE_MARKERS = /(现行有效|有效|in force|valid|effective|current)/i;
const SUPERSEDED_MARKERS =
  /(失效|废止|无效|不再有效|已修改|被修改|invalid|superseded|repealed|revoked|abolished|expired|amended|\b(?:not|no longer)\s+(?:in force|effective|valid)\b)/i;

const clamp01 = (value: number): number => Math.max(0, Math.min(1, value));

export const classifyDocument = (title: string): DocumentClass => {
  const text = normalizeTitle(title);
  for (const marker of CLASS_MARKERS) {
    if (marker.regex.test(text)) return marker.documentClass;
  }
  return "other";
};

/** Superseded markers win over in-force ones; pending or unrecognized text is `unknown`. */
export const parseValidity = (status: string | null | undefined): Validity => {
  if (typeof status !== "string" || status.trim().length === 0) return "unknown";
  if (PENDING_MARKERS.test(status)) return "unknown";
  if (SUPERSEDED_MARKERS.test(status)) return "superseded";
  if (IN_FORCE_MARKERS.test(status)) return "in_force";
  return "unknown";
};

const levenshtein = (a: string[], b: string[]): number => {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, substitution);
    }
    previous = current;
  }
  return previous[b.length];
};

export const editSimilarity = (left: string, right: string): number => {
  const a = Array.from(left);
  const b = Array.from(right);
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshtein(a, b) / longest;
};

const sharedKeywordCount = (left: Set<string>, right: Set<string>): number => {
  let shared = 0;
  for (const keyword of left) {
    if (right.has(keyword)) shared += 1;
  }
  return shared;
};

export const scoreCandidate = (
  targetName: string,
  candidate: MatchCandidate,
  options: ResolveOptions = {},
): number => {
  const target = normalizeTitle(targetName);
  const title = normalizeTitle(candidate.title);
  if (!target || !title) return 0;
  if (target === title) return 1;

  let score = editSimilarity(target, title);

  const shorter = target.length <= title.length ? target : title;
  const longer = shorter === target ? title : target;
  if (longer.includes(shorter)) {
    score = Math.max(score, 0.8 + 0.2 * (Array.from(shorter).length / Array.from(longer).length));
  }

  const shared = sharedKeywordCount(extractKeywords(target), extractKeywords(title));
  score += Math.min(KEYWORD_BONUS_CAP, shared * KEYWORD_BONUS);

  const expectedNumber = normalizeDocumentNumber(options.documentNumber);
  if (expectedNumber && expectedNumber === normalizeDocumentNumber(candidate.documentNumber)) {
    score += DOCUMENT_NUMBER_BONUS;
  }

  const targetClass = classifyDocument(targetName);
  const candidateClass = candidate.documentClass ?? classifyDocument(candidate.title);
  if (SECONDARY_CLASSES.has(candidateClass) && candidateClass !== targetClass) {
    score -= CLASS_MISMATCH_PENALTY;
  }

  return clamp01(score);
};

const publishedTime = (candidate: MatchCandidate): number => {
  if (!candidate.publishedAt) return 0;
  const parsed = Date.parse(candidate.publishedAt);
  return Number.isNaN(parsed) ? 0 : parsed;
};

/** Confirmed-valid first, then score, then newer publication, then source rank. */
const compareScored = (a: ScoredCandidate, b: ScoredCandidate): number => {
  const aValid = a.validity === "in_force" ? 0 : 1;
  const bValid = b.validity === "in_force" ? 0 : 1;
  if (aValid !== bValid) return aValid - bValid;
  if (a.score !== b.score) return b.score - a.score;

  const published = publishedTime(b.candidate) - publishedTime(a.candidate);
  if (published !== 0) return published;

  return (a.candidate.rank ?? Number.MAX_SAFE_INTEGER) - (b.candidate.rank ?? Number.MAX_SAFE_INTEGER);
};

export const rankCandidates = (
  targetName: string,
  candidates: MatchCandidate[],
  options: ResolveOptions = {},
): ScoredCandidate[] => {
  if (candidates.length === 0) return [];
  const threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;

  return candidates
    .map((candidate) => ({
      candidate,
      score: scoreCandidate(targetName, candidate, options),
      validity: parseValidity(candidate.status),
      normalizedTitle: normalizeTitle(candidate.title),
    }))
    .filter((entry) => entry.score >= threshold)
    .sort(compareScored);
};

export const resolve = (
  targetName: string,
  candidates: MatchCandidate[],
  options: ResolveOptions = {},
): ScoredCandidate | null => rankCandidates(targetName, candidates, options)[0] ?? null;
