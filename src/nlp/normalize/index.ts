/**
 * Query normalization.
 *
 * Composes the raw token (NFC), detects the script or language it is most
 * likely written in and peels off a leading German article. The original
 * input is carried through untouched so callers can log exactly what the
 * user typed.
 */

import type { LanguageTables } from "../tables.js";

export type DetectedLanguage =
  | "german"
  | "english"
  | "chinese"
  | "japanese"
  | "korean"
  | "russian"
  | "greek"
  | "hebrew"
  | "arabic"
  | "thai"
  | "unknown";

export interface NormalizedQuery {
  original: string;
  text: string;
  detectedLanguage: DetectedLanguage;
  confidence: number;
  strippedArticle?: string;
  strippedText?: string;
}

// ─── Thresholds ───────────────────────────────────────────────────────────────

export const SCRIPT_CONFIDENCE = 0.95;
export const FUNCTION_WORD_CONFIDENCE = 0.9;
export const LATIN_DEFAULT_CONFIDENCE = 0.6;
export const UNKNOWN_CONFIDENCE = 0.3;

// Order matters: kana before the shared CJK ideograph block.
const SCRIPT_RANGES: ReadonlyArray<{ language: DetectedLanguage; pattern: RegExp }> = [
  { language: "japanese", pattern: /[\u3040-\u30FF\u31F0-\u31FF]/u },
  { language: "korean", pattern: /[\u1100-\u11FF\u3130-\u318F\uAC00-\uD7AF]/u },
  { language: "chinese", pattern: /[\u3400-\u4DBF\u4E00-\u9FFF\uF900-\uFAFF]/u },
  { language: "russian", pattern: /[\u0400-\u04FF]/u },
  { language: "greek", pattern: /[\u0370-\u03FF\u1F00-\u1FFF]/u },
  { language: "hebrew", pattern: /[\u0590-\u05FF]/u },
  { language: "arabic", pattern: /[\u0600-\u06FF\u0750-\u077F]/u },
  { language: "thai", pattern: /[\u0E00-\u0E7F]/u },
];

const LATIN_ONLY = /^[\p{Script=Latin}\p{M}\s'\u2019-]+$/u;

// ─── Text helpers ─────────────────────────────────────────────────────────────

/**
 * NFC composition, trimming and whitespace collapse. Total over any input.
 */
export function normalizeText(raw: string): string {
  return String(raw ?? "")
    .normalize("NFC")
    .replace(/[\u00A0\u200B\u200C\u200D\uFEFF]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Comparison key used for echo validation, caching and in-flight de-duplication. */
export function caseFold(text: string): string {
  return normalizeText(text).toLocaleLowerCase("de-DE");
}

export function codePointLength(text: string): number {
  return Array.from(text).length;
}

// ─── Normalizer ───────────────────────────────────────────────────────────────

export class QueryNormalizer {
  private readonly articles: ReadonlySet<string>;
  private readonly diacritics: ReadonlySet<string>;
  private readonly functionWords: ReadonlyArray<{ language: DetectedLanguage; words: ReadonlySet<string> }>;

  constructor(tables: LanguageTables) {
    this.articles = new Set(tables.articles.map((article) => caseFold(article)));
    this.diacritics = new Set(Array.from(tables.diacritics.normalize("NFC")));
    // English is checked first: its list has no overlap with common German nouns.
    const languages = Object.keys(tables.functionWords).sort((a, b) => (a === "english" ? -1 : b === "english" ? 1 : 0));
    this.functionWords = languages.map((language) => ({
      language: toDetectedLanguage(language),
      words: new Set((tables.functionWords[language] ?? []).map((word) => caseFold(word))),
    }));
  }

  public normalize(raw: string): NormalizedQuery {
    const original = String(raw ?? "");
    const text = normalizeText(original);
    if (!text) {
      return { original, text, detectedLanguage: "unknown", confidence: UNKNOWN_CONFIDENCE };
    }

    const stripped = this.stripArticle(text);
    const detection = this.detect(text, stripped !== null);
    const query: NormalizedQuery = { original, text, ...detection };
    if (stripped) {
      query.strippedArticle = stripped.article;
      query.strippedText = stripped.rest;
    }
    return query;
  }

  public isArticle(token: string): boolean {
    return this.articles.has(caseFold(token));
  }

  private stripArticle(text: string): { article: string; rest: string } | null {
    const spaceIndex = text.indexOf(" ");
    if (spaceIndex <= 0) return null;
    const head = text.slice(0, spaceIndex);
    const rest = text.slice(spaceIndex + 1).trim();
    if (!rest || !this.articles.has(caseFold(head))) return null;
    return { article: head, rest };
  }

  private detect(text: string, hasArticle: boolean): { detectedLanguage: DetectedLanguage; confidence: number } {
    for (const { language, pattern } of SCRIPT_RANGES) {
      if (pattern.test(text)) return { detectedLanguage: language, confidence: SCRIPT_CONFIDENCE };
    }
    if (Array.from(text).some((char) => this.diacritics.has(char))) {
      return { detectedLanguage: "german", confidence: SCRIPT_CONFIDENCE };
    }
    const folded = caseFold(text);
    for (const { language, words } of this.functionWords) {
      if (words.has(folded)) return { detectedLanguage: language, confidence: FUNCTION_WORD_CONFIDENCE };
    }
    if (hasArticle) return { detectedLanguage: "german", confidence: FUNCTION_WORD_CONFIDENCE };
    if (LATIN_ONLY.test(text)) return { detectedLanguage: "german", confidence: LATIN_DEFAULT_CONFIDENCE };
    return { detectedLanguage: "unknown", confidence: UNKNOWN_CONFIDENCE };
  }
}

function toDetectedLanguage(value: string): DetectedLanguage {
  switch (value) {
    case "german":
    case "english":
    case "chinese":
    case "japanese":
    case "korean":
    case "russian":
    case "greek":
    case "hebrew":
    case "arabic":
    case "thai":
      return value;
    default:
      return "unknown";
  }
}
