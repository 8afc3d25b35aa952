/**
 * Resolution engine.
 *
 * One call per user query: normalize, walk the resolver tiers, fall back to
 * model enrichment when the lexicon has nothing, and fold every path into a
 * closed `ResolutionResult`. Failures of the store or the model come back as
 * `transient_failure`; nothing throws across `resolve`.
 */

import type { EnrichmentGateway } from "../enrichment/gateway.js";
import type { EnrichmentOutcome, TransientReason } from "../enrichment/types.js";
import { asLexiconError, describeUnknownError } from "../errors/index.js";
import type { LexiconEntry, LexiconStore, LemmaSense } from "../lexicon/types.js";
import { caseFold, type NormalizedQuery, type QueryNormalizer } from "../nlp/normalize/index.js";
import { confidenceLabel } from "../nlp/similarity.js";
import type { LexiconMetricsSnapshot, LexiconObserver } from "../observability/index.js";
import { aggregate } from "../resolver/aggregate.js";
import { TieredResolver } from "../resolver/tiered.js";
import type {
  MatchTier,
  RankedResultSet,
  ResolutionCandidate,
  ResolverThresholds,
  Suggestion,
  TraceStep,
} from "../resolver/types.js";

export type NotFoundReason = "empty_query" | "no_match" | "not_a_word";

export type ResolutionResult =
  | { kind: "found"; entry: LexiconEntry; candidate: ResolutionCandidate; suggestions: Suggestion[]; trace: TraceStep[] }
  | { kind: "ambiguous"; results: RankedResultSet; suggestions: Suggestion[]; trace: TraceStep[] }
  | { kind: "not_found"; reason: NotFoundReason; suggestions: Suggestion[]; trace: TraceStep[] }
  | { kind: "rejected"; reason: "auto_correction"; echoedInput: string; suggestions: Suggestion[]; trace: TraceStep[] }
  | { kind: "transient_failure"; reason: TransientReason; message: string; retryable: true; trace: TraceStep[] };

export interface ResolveOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface ResolutionEngineDeps {
  normalizer: QueryNormalizer;
  store: LexiconStore;
  thresholds: ResolverThresholds;
  gateway: EnrichmentGateway | null;
  observer: LexiconObserver;
  now?: () => number;
  /** Releases whatever owns the store; called once by `close()`. */
  onClose?: () => void;
}

export class ResolutionEngine {
  private readonly normalizer: QueryNormalizer;
  private readonly store: LexiconStore;
  private readonly resolver: TieredResolver;
  private readonly gateway: EnrichmentGateway | null;
  private readonly observer: LexiconObserver;
  private readonly maxSuggestions: number;
  private readonly now: () => number;
  private readonly onClose?: () => void;
  private closed = false;

  constructor(deps: ResolutionEngineDeps) {
    this.normalizer = deps.normalizer;
    this.store = deps.store;
    this.resolver = new TieredResolver(deps.store, deps.thresholds);
    this.gateway = deps.gateway;
    this.observer = deps.observer;
    this.maxSuggestions = deps.thresholds.maxSuggestions;
    this.now = deps.now ?? Date.now;
    this.onClose = deps.onClose;
  }

  public async resolve(rawQuery: string, options: ResolveOptions = {}): Promise<ResolutionResult> {
    const startedAt = this.now();
    const query = this.normalizer.normalize(rawQuery);
    const result: ResolutionResult = query.text
      ? await this.resolveQuery(query, options)
      : { kind: "not_found", reason: "empty_query", suggestions: [], trace: [] };
    await this.finish(query, result, this.now() - startedAt);
    return result;
  }

  public metrics(): LexiconMetricsSnapshot {
    return this.observer.snapshot();
  }

  public close(): void {
    if (this.closed) return;
    this.closed = true;
    this.onClose?.();
  }

  private async resolveQuery(query: NormalizedQuery, options: ResolveOptions): Promise<ResolutionResult> {
    const resolution = await this.resolver.resolve(query);
    const trace = resolution.trace;
    switch (resolution.status) {
      case "failed":
        return transientFailure("store_unavailable", resolution.error.message, trace);
      case "resolved":
        return this.found(resolution.candidate, resolution.suggestions, trace);
      case "ambiguous":
        return {
          kind: "ambiguous",
          results: aggregate(resolution.candidates, query.text),
          suggestions: resolution.suggestions,
          trace,
        };
      case "unresolved":
        return this.enrich(query, resolution.suggestions, trace, options);
    }
  }

  private async enrich(
    query: NormalizedQuery,
    fuzzySuggestions: Suggestion[],
    trace: TraceStep[],
    options: ResolveOptions,
  ): Promise<ResolutionResult> {
    const lookup = query.strippedText ?? query.text;
    if (!this.gateway) {
      trace.push({ tier: "enriched", status: "skipped", queried: [], candidates: 0, reason: "disabled" });
      return { kind: "not_found", reason: "no_match", suggestions: fuzzySuggestions, trace };
    }

    const outcome = await this.gateway.enrich(lookup, {
      signal: options.signal,
      timeoutMs: options.timeoutMs,
      languageHint: query.detectedLanguage === "german" ? null : query.detectedLanguage,
    });
    trace.push(
      outcome.kind === "resolved"
        ? { tier: "enriched", status: "hit", queried: [lookup], candidates: 1 }
        : { tier: "enriched", status: "miss", queried: [lookup], candidates: 0, reason: reasonOf(outcome) },
    );

    switch (outcome.kind) {
      case "resolved":
        return this.found(
          enrichedCandidate(lookup, outcome.ref, outcome.matchedForm, outcome.needsReview),
          fuzzySuggestions,
          trace,
        );
      case "not_a_word":
        return {
          kind: "not_found",
          reason: "not_a_word",
          suggestions: this.mergeSuggestions(fuzzySuggestions, outcome.suggestions, this.maxSuggestions),
          trace,
        };
      case "rejected":
        return {
          kind: "rejected",
          reason: "auto_correction",
          echoedInput: outcome.echoedInput,
          suggestions: this.mergeSuggestions(outcome.suggestions, fuzzySuggestions, Math.max(1, this.maxSuggestions)),
          trace,
        };
      case "transient_failure":
        return transientFailure(outcome.reason, outcome.message, trace);
    }
  }

  private async found(
    candidate: ResolutionCandidate,
    suggestions: Suggestion[],
    trace: TraceStep[],
  ): Promise<ResolutionResult> {
    const ref = { lemmaId: candidate.ref.lemma.id, senseId: candidate.ref.sense.id };
    let entry: LexiconEntry | null;
    try {
      entry = await this.store.loadEntry(ref);
    } catch (err) {
      return transientFailure("store_unavailable", describeUnknownError(err), trace);
    }
    if (!entry) {
      return transientFailure("store_unavailable", `Lexicon entry ${ref.lemmaId}:${ref.senseId} could not be loaded`, trace);
    }
    // An enriched inflection carries the feature of the stored form it matched.
    const form =
      candidate.matchType === "enriched" && candidate.features.length === 0
        ? entry.forms.find((item) => item.form === candidate.matchedText)
        : undefined;
    if (form) {
      const features = [{ key: form.featureKey, value: form.featureValue }];
      return { kind: "found", entry, candidate: { ...candidate, features }, suggestions, trace };
    }
    return { kind: "found", entry, candidate, suggestions, trace };
  }

  private mergeSuggestions(first: Suggestion[], second: Suggestion[], limit: number): Suggestion[] {
    const seen = new Set<string>();
    const merged: Suggestion[] = [];
    for (const suggestion of [...first, ...second]) {
      const key = caseFold(suggestion.word);
      if (seen.has(key)) continue;
      seen.add(key);
      merged.push(suggestion);
      if (merged.length >= limit) break;
    }
    return merged;
  }

  private async finish(query: NormalizedQuery, result: ResolutionResult, latencyMs: number): Promise<void> {
    const tier = tierOf(result);
    const reason = "reason" in result ? result.reason : null;
    const lemmaId = result.kind === "found" ? result.entry.lemma.id : null;
    this.observer.recordOutcome({ kind: result.kind, tier, reason, latencyMs });
    this.observer.log("resolve.completed", {
      query: query.original,
      text: query.text,
      language: query.detectedLanguage,
      outcome: result.kind,
      tier,
      reason,
      lemmaId,
      latencyMs,
    });
    if (!query.text) return;

    try {
      await this.store.recordSearch({
        rawQuery: query.original,
        normalizedText: query.text,
        outcome: result.kind,
        reason,
        lemmaId,
      });
    } catch (err) {
      const error = asLexiconError(err, { code: "STORE_UNAVAILABLE" });
      this.observer.log("history.write_failed", { query: query.text, code: error.code, error: error.message }, "warn");
    }
  }
}

function enrichedCandidate(
  lookup: string,
  ref: LemmaSense,
  matchedForm: string | null,
  needsReview: boolean,
): ResolutionCandidate {
  const base = matchedForm
    ? `"${matchedForm}" was analyzed as a form of "${ref.lemma.text}" and added to the lexicon`
    : `"${ref.lemma.text}" was analyzed and added to the lexicon`;
  return {
    ref,
    matchType: "enriched",
    matchedText: matchedForm ?? lookup,
    similarity: 1,
    confidence: confidenceLabel(1),
    features: [],
    explanation: needsReview ? `${base} (flagged for review)` : base,
  };
}

function reasonOf(outcome: Exclude<EnrichmentOutcome, { kind: "resolved" }>): string {
  switch (outcome.kind) {
    case "not_a_word":
      return "not_a_word";
    case "rejected":
      return "auto_correction";
    case "transient_failure":
      return outcome.reason;
  }
}

function tierOf(result: ResolutionResult): MatchTier | null {
  if (result.kind === "found") return result.candidate.matchType;
  if (result.kind === "ambiguous") return result.results.entries[0]?.matchType ?? null;
  return null;
}

function transientFailure(reason: TransientReason, message: string, trace: TraceStep[]): ResolutionResult {
  return { kind: "transient_failure", reason, message, retryable: true, trace };
}
