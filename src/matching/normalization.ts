const COUNTRY_PREFIX = /^(中华人民共和国|(the )?people's republic of china('s)?|prc )\s*/;
const TRAILING_PARENTHETICAL = /\s*\(([^()]*)\)$/;
const REVISION_MARKER = /(\d{4}|修订|修正|修改|amend|revis|version|edition)/;
const CJK_GAP = /(?<=[\u3400-\u9fff])\s+(?=[\u3400-\u9fff])/g;

const OPEN_BRACKETS = /[【〔［\[｛{]/g;
const CLOSE_BRACKETS = /[】〕］\]｝}]/g;
const TITLE_MARKS = /[《》〈〉「」『』"“”]/g;

const cleanOnce = (value: string): string => {
  let text = value
    .normalize("NFKC")
    .replace(OPEN_BRACKETS, "(")
    .replace(CLOSE_BRACKETS, ")")
    .replace(TITLE_MARKS, "")
    .replace(/\s+/g, " ")
    .replace(CJK_GAP, "")
    .replace(/\s*\(\s*/g, " (")
    .replace(/\s*\)/g, ")")
    .trim()
    .toLowerCase();

  text = text.replace(COUNTRY_PREFIX, "");

  const trailing = TRAILING_PARENTHETICAL.exec(text);
  if (trailing && REVISION_MARKER.test(trailing[1])) {
    text = text.slice(0, trailing.index);
  }

  return text.trim();
};

/**
 * Canonical form of a document title, used for comparison only.
 *
 * Applying it to its own output yields the same string.
 */
export const normalizeTitle = (value: string): string => {
  let current = value;
  // Every pass after the first either shortens the text or leaves it unchanged.
  for (let pass = 0; pass <= value.length + 1; pass += 1) {
    const next = cleanOnce(current);
    if (next === current) return next;
    current = next;
  }
  return current;
};

const LATIN_STOPWORDS = new Set([
  "the",
  "and",
  "for",
  "with",
  "from",
  "into",
  "under",
  "about",
  "concerning",
  "regarding",
  "china",
  "people's",
  "republic",
]);

const CJK_STOP_BIGRAMS = new Set(["关于", "办法", "规定", "条例", "管理", "实施", "细则", "暂行", "有关", "通知"]);

/** Distinct meaningful tokens: Latin words and CJK bigrams. */
export const extractKeywords = (value: string): Set<string> => {
  const text = normalizeTitle(value);
  const keywords = new Set<string>();

  for (const word of text.match(/[a-z0-9']+/g) ?? []) {
    if (word.length > 2 && !LATIN_STOPWORDS.has(word)) keywords.add(word);
  }

  for (const run of text.match(/[\u3400-\u9fff]+/g) ?? []) {
    const chars = Array.from(run);
    for (let index = 0; index + 1 < chars.length; index += 1) {
      const bigram = chars[index] + chars[index + 1];
      if (!CJK_STOP_BIGRAMS.has(bigram)) keywords.add(bigram);
    }
  }

  return keywords;
};

export const normalizeDocumentNumber = (value: string | null | undefined): string => {
  if (!value) return "";
  return (value.match(/\d+/g) ?? []).join("");
};
