import type { ExampleDraft, LemmaSense } from "../lexicon/types.js";
import type { Suggestion } from "../resolver/types.js";

export interface AnalyzeRequest {
  word: string;
  languageHint: string | null;
}

/**
 * External generative-model capability. Implementations return the decoded
 * JSON body (or the raw text when it is not JSON); validation happens in the
 * gateway.
 */
export interface WordAnalyzer {
  readonly name: string;
  analyze(request: AnalyzeRequest, signal: AbortSignal): Promise<unknown>;
}

export interface AnalysisForm {
  form: string;
  featureKey: string;
  featureValue: string;
}

export interface AnalysisTranslation {
  langCode: string;
  text: string;
}

export interface ModelSuggestion {
  word: string;
  pos: string | null;
  meaning: string | null;
}

export interface ValidAnalysis {
  kind: "valid";
  echoedInput: string;
  lemma: string;
  pos: string;
  gender: string | null;
  cefr: string | null;
  notes: string | null;
  confidence: number;
  translations: AnalysisTranslation[];
  forms: AnalysisForm[];
  example: ExampleDraft | null;
  suggestions: ModelSuggestion[];
}

export interface InvalidAnalysis {
  kind: "invalid";
  echoedInput: string | null;
  reason: string | null;
  suggestions: ModelSuggestion[];
}

export interface SuggestionList {
  kind: "suggestions";
  echoedInput: string | null;
  suggestions: ModelSuggestion[];
}

export interface MalformedResponse {
  kind: "malformed";
  issue: string;
}

export type ModelAnalysis = ValidAnalysis | InvalidAnalysis | SuggestionList | MalformedResponse;

export type TransientReason =
  | "model_timeout"
  | "model_cancelled"
  | "model_unavailable"
  | "model_malformed_response"
  | "store_unavailable";

export type EnrichmentOutcome =
  | { kind: "resolved"; ref: LemmaSense; created: boolean; needsReview: boolean; matchedForm: string | null }
  | { kind: "not_a_word"; suggestions: Suggestion[] }
  | { kind: "rejected"; echoedInput: string; suggestions: Suggestion[] }
  | { kind: "transient_failure"; reason: TransientReason; message: string; retryable: true };

export interface EnrichOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  languageHint?: string | null;
}
