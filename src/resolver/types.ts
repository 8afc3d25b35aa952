import type { LexiconError } from "../errors/index.js";
import type { FormFeature, LemmaSense } from "../lexicon/types.js";
import type { ConfidenceLabel } from "../nlp/similarity.js";

export type MatchTier =
  | "direct"
  | "inflected"
  | "article_stripped"
  | "translation"
  | "compound"
  | "fuzzy"
  | "enriched";

/** Lower ranks first. */
export const TIER_RANK: Readonly<Record<MatchTier, number>> = {
  direct: 0,
  inflected: 1,
  article_stripped: 2,
  translation: 3,
  compound: 4,
  fuzzy: 5,
  enriched: 6,
};

export interface ResolutionCandidate {
  ref: LemmaSense;
  matchType: MatchTier;
  /** Surface string that produced the hit: a variant, an inflected form, a gloss. */
  matchedText: string;
  similarity: number;
  confidence: ConfidenceLabel;
  features: FormFeature[];
  explanation: string;
}

export type SuggestionSource = "fuzzy" | "external-model";
export type SuggestionKind = "similar_word" | "did_you_mean" | "model_suggestion";

export interface Suggestion {
  word: string;
  pos: string | null;
  meaning: string | null;
  similarity: number | null;
  confidence: ConfidenceLabel | null;
  source: SuggestionSource;
  kind: SuggestionKind;
  lemmaId: number | null;
}

export type TraceStatus = "hit" | "miss" | "skipped";

export interface TraceStep {
  tier: MatchTier;
  status: TraceStatus;
  queried: string[];
  candidates: number;
  /** Below-threshold neighbours offered alongside the candidates. */
  suggestions?: number;
  reason?: string;
}

export interface ResolverThresholds {
  autoAcceptThreshold: number;
  displayThreshold: number;
  fuzzyMinLength: number;
  compoundMinLength: number;
  lengthWindow: number;
  candidateLimit: number;
  maxSuggestions: number;
}

export type TierResolution =
  | { status: "resolved"; candidate: ResolutionCandidate; suggestions: Suggestion[]; trace: TraceStep[] }
  | { status: "ambiguous"; candidates: ResolutionCandidate[]; suggestions: Suggestion[]; trace: TraceStep[] }
  | { status: "unresolved"; suggestions: Suggestion[]; trace: TraceStep[] }
  | { status: "failed"; error: LexiconError; trace: TraceStep[] };

export interface RankedEntry {
  rank: number;
  ref: LemmaSense;
  matchType: MatchTier;
  matchedTiers: MatchTier[];
  matchedText: string;
  similarity: number;
  confidence: ConfidenceLabel;
  features: FormFeature[];
  explanation: string;
}

export interface RankedResultSet {
  query: string;
  entries: RankedEntry[];
  /** True only for a lone direct match; anything else needs caller selection. */
  autoSelectable: boolean;
}
