import { asLexiconError, describeUnknownError, type LexiconErrorCode } from "../errors/index.js";
import type { EnrichmentDraft, LexiconWriter, MorphologyReader } from "../lexicon/types.js";
import { caseFold, normalizeText } from "../nlp/normalize/index.js";
import { confidenceLabel, similarity } from "../nlp/similarity.js";
import { variants } from "../nlp/variants.js";
import type { LexiconObserver } from "../observability/index.js";
import type { Suggestion, SuggestionKind } from "../resolver/types.js";
import { MemoryTtlCache } from "./cache.js";
import { decodeAnalysis } from "./decode.js";
import { InFlightRegistry, withDeadline } from "./inflight.js";
import type {
  EnrichmentOutcome,
  EnrichOptions,
  ModelSuggestion,
  TransientReason,
  ValidAnalysis,
  WordAnalyzer,
} from "./types.js";

export interface EnrichmentGatewayOptions {
  timeoutMs: number;
  cacheTtlMs: number;
  cacheMaxEntries: number;
  maxSuggestions: number;
  now?: () => number;
}

export interface EnrichmentGatewayDeps {
  store: MorphologyReader & LexiconWriter;
  analyzer: WordAnalyzer;
  observer: LexiconObserver;
  options: EnrichmentGatewayOptions;
}

type SecondStage = { lemma: string; forms: ValidAnalysis["forms"]; needsReview: boolean; matchedForm: string | null };

export class EnrichmentGateway {
  private readonly store: MorphologyReader & LexiconWriter;
  private readonly analyzer: WordAnalyzer;
  private readonly observer: LexiconObserver;
  private readonly options: EnrichmentGatewayOptions;
  private readonly cache: MemoryTtlCache<EnrichmentOutcome>;
  private readonly inflight = new InFlightRegistry<EnrichmentOutcome>();

  constructor(deps: EnrichmentGatewayDeps) {
    this.store = deps.store;
    this.analyzer = deps.analyzer;
    this.observer = deps.observer;
    this.options = deps.options;
    this.cache = new MemoryTtlCache<EnrichmentOutcome>({
      maxEntries: deps.options.cacheMaxEntries,
      now: deps.options.now,
    });
  }

  /**
   * Asks the analyzer about `query` and persists the result only when the
   * model analyzed exactly that word. At most one enrichment runs per
   * case-folded query; concurrent callers share its outcome.
   */
  public async enrich(query: string, options: EnrichOptions = {}): Promise<EnrichmentOutcome> {
    const text = normalizeText(query);
    const key = caseFold(text);
    if (!key) return { kind: "not_a_word", suggestions: [] };

    const cached = this.cache.get(key);
    if (cached) return cached;

    if (this.inflight.has(key)) {
      this.observer.log("enrichment.attached_inflight", { query: text, analyzer: this.analyzer.name });
    }
    // The shared analysis runs under the gateway's own deadline; each caller
    // waits on it under its own signal and timeout.
    const shared = this.inflight.run(key, async () => {
      const outcome = await this.runEnrichment(text, key, options.languageHint ?? null);
      if (outcome.kind !== "transient_failure") this.cache.set(key, outcome, this.options.cacheTtlMs);
      return outcome;
    });
    try {
      return await withDeadline(() => shared, {
        timeoutMs: options.timeoutMs,
        signal: options.signal,
        label: this.label(text),
      });
    } catch (err) {
      return this.transient(text, err);
    }
  }

  public pendingCount(): number {
    return this.inflight.size();
  }

  public clearCache(): void {
    this.cache.clear();
  }

  private label(text: string): string {
    return `${this.analyzer.name} analysis of "${text}"`;
  }

  private async runEnrichment(text: string, key: string, languageHint: string | null): Promise<EnrichmentOutcome> {
    let raw: unknown;
    try {
      raw = await withDeadline((signal) => this.analyzer.analyze({ word: text, languageHint }, signal), {
        timeoutMs: this.options.timeoutMs,
        label: this.label(text),
      });
    } catch (err) {
      return this.transient(text, err);
    }

    const analysis = decodeAnalysis(raw);
    try {
      switch (analysis.kind) {
        case "malformed":
          return this.transientOutcome(text, "model_malformed_response", analysis.issue);
        case "invalid":
        case "suggestions": {
          const echoed = analysis.echoedInput;
          if (echoed && caseFold(echoed) !== key) {
            const listed = analysis.suggestions.find((item) => caseFold(item.word) === caseFold(echoed));
            return this.reject(text, key, listed ?? { word: echoed, pos: null, meaning: null }, analysis.suggestions);
          }
          return { kind: "not_a_word", suggestions: await this.annotate(key, analysis.suggestions, "model_suggestion") };
        }
        case "valid":
          return await this.acceptValid(text, key, analysis);
      }
    } catch (err) {
      return this.transient(text, err);
    }
  }

  private async acceptValid(
    text: string,
    key: string,
    analysis: ValidAnalysis,
  ): Promise<EnrichmentOutcome> {
    if (caseFold(analysis.echoedInput) !== key) {
      const meaning = analysis.translations.find((item) => item.langCode === "en") ?? analysis.translations[0];
      const didYouMean: ModelSuggestion = { word: analysis.echoedInput, pos: analysis.pos, meaning: meaning?.text ?? null };
      return this.reject(text, key, didYouMean, analysis.suggestions);
    }

    const stage = this.secondStage(text, key, analysis);
    const draft: EnrichmentDraft = {
      text: stage.lemma,
      pos: analysis.pos,
      gender: analysis.gender,
      cefr: analysis.cefr,
      notes: analysis.notes,
      confidence: analysis.confidence,
      needsReview: stage.needsReview,
      gloss: firstPerLanguage(analysis.translations),
      forms: stage.forms,
      translations: analysis.translations,
      example: analysis.example,
    };
    const persisted = await this.store.persistEnrichment(draft);
    this.observer.log("enrichment.persisted", {
      query: text,
      lemma: persisted.ref.lemma.text,
      lemmaId: persisted.ref.lemma.id,
      senseId: persisted.ref.sense.id,
      created: persisted.created,
      needsReview: stage.needsReview,
    });
    return {
      kind: "resolved",
      ref: persisted.ref,
      created: persisted.created,
      needsReview: stage.needsReview,
      matchedForm: stage.matchedForm,
    };
  }

  // The model may normalize to a lemma; accept that only when the query is the
  // lemma itself or one of the forms it returned.
  private secondStage(text: string, key: string, analysis: ValidAnalysis): SecondStage {
    if (caseFold(analysis.lemma) === key) {
      return { lemma: analysis.lemma, forms: analysis.forms, needsReview: false, matchedForm: null };
    }
    const matched = analysis.forms.find((form) => caseFold(form.form) === key);
    if (matched) {
      return { lemma: analysis.lemma, forms: analysis.forms, needsReview: false, matchedForm: matched.form };
    }
    this.observer.log(
      "enrichment.lemma_mismatch",
      { query: text, modelLemma: analysis.lemma, analyzer: this.analyzer.name },
      "warn",
    );
    return { lemma: text, forms: [], needsReview: true, matchedForm: null };
  }

  /** The echoed word leads the suggestions as `did_you_mean`. */
  private async reject(
    text: string,
    key: string,
    didYouMean: ModelSuggestion,
    others: readonly ModelSuggestion[],
  ): Promise<EnrichmentOutcome> {
    this.logEchoMismatch(text, didYouMean.word);
    const [first] = await this.annotate(key, [didYouMean], "did_you_mean");
    const rest = await this.annotate(key, others, "model_suggestion");
    const suggestions = first ? [first, ...rest.filter((item) => caseFold(item.word) !== caseFold(first.word))] : rest;
    return {
      kind: "rejected",
      echoedInput: didYouMean.word,
      suggestions: suggestions.slice(0, Math.max(1, this.options.maxSuggestions)),
    };
  }

  private async annotate(key: string, items: readonly ModelSuggestion[], kind: SuggestionKind): Promise<Suggestion[]> {
    const seen = new Set<string>();
    const unique: ModelSuggestion[] = [];
    for (const item of items) {
      const folded = caseFold(item.word);
      if (!folded || folded === key || seen.has(folded)) continue;
      seen.add(folded);
      unique.push(item);
      if (unique.length >= this.options.maxSuggestions) break;
    }
    return Promise.all(
      unique.map(async (item) => {
        const score = similarity(key, caseFold(item.word));
        return {
          word: item.word,
          pos: item.pos,
          meaning: item.meaning,
          similarity: score,
          confidence: confidenceLabel(score),
          source: "external-model" as const,
          kind,
          lemmaId: await this.lookupLemmaId(item.word),
        };
      }),
    );
  }

  private async lookupLemmaId(word: string): Promise<number | null> {
    for (const variant of variants(normalizeText(word))) {
      const [ref] = await this.store.findLemmaByExactText(variant);
      if (ref) return ref.lemma.id;
    }
    return null;
  }

  private logEchoMismatch(text: string, echoed: string): void {
    this.observer.log(
      "enrichment.echo_mismatch",
      { query: text, echoedInput: echoed, analyzer: this.analyzer.name },
      "warn",
    );
  }

  private transient(text: string, err: unknown): EnrichmentOutcome {
    const error = asLexiconError(err, { code: "UPSTREAM_UNAVAILABLE", retryable: true });
    return this.transientOutcome(text, reasonFor(error.code), describeUnknownError(err));
  }

  private transientOutcome(text: string, reason: TransientReason, message: string): EnrichmentOutcome {
    this.observer.log("enrichment.transient_failure", { query: text, reason, message, analyzer: this.analyzer.name }, "warn");
    return { kind: "transient_failure", reason, message, retryable: true };
  }
}

function reasonFor(code: LexiconErrorCode): TransientReason {
  switch (code) {
    case "TIMEOUT":
      return "model_timeout";
    case "CANCELLED":
      return "model_cancelled";
    case "INVALID_RESPONSE":
      return "model_malformed_response";
    case "STORE_UNAVAILABLE":
      return "store_unavailable";
    default:
      return "model_unavailable";
  }
}

function firstPerLanguage(translations: ValidAnalysis["translations"]): Record<string, string> {
  const gloss: Record<string, string> = {};
  for (const item of translations) {
    if (!(item.langCode in gloss)) gloss[item.langCode] = item.text;
  }
  return gloss;
}
