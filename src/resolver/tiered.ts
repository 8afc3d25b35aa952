import { asLexiconError } from "../errors/index.js";
import type { FormFeature, LemmaSense, MorphologyReader } from "../lexicon/types.js";
import { identityKey } from "../lexicon/types.js";
import { caseFold, codePointLength, type NormalizedQuery } from "../nlp/normalize/index.js";
import { confidenceLabel, similarity } from "../nlp/similarity.js";
import { variants } from "../nlp/variants.js";
import type {
  MatchTier,
  ResolutionCandidate,
  ResolverThresholds,
  Suggestion,
  TierResolution,
  TraceStep,
} from "./types.js";

/** Identity-keyed, insertion-ordered candidate collection. */
class CandidateSet {
  private readonly byIdentity = new Map<string, ResolutionCandidate>();

  public add(candidate: ResolutionCandidate): void {
    const key = identityKey(candidate.ref);
    const existing = this.byIdentity.get(key);
    if (!existing) {
      this.byIdentity.set(key, { ...candidate, features: [...candidate.features] });
      return;
    }
    for (const feature of candidate.features) {
      if (!existing.features.some((known) => known.key === feature.key && known.value === feature.value)) {
        existing.features.push(feature);
      }
    }
  }

  public values(): ResolutionCandidate[] {
    return [...this.byIdentity.values()];
  }

  public get size(): number {
    return this.byIdentity.size;
  }
}

export function meaningOf(ref: LemmaSense): string | null {
  const gloss = ref.sense.gloss;
  return gloss.en ?? Object.values(gloss)[0] ?? null;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export class TieredResolver {
  private readonly store: MorphologyReader;
  private readonly thresholds: ResolverThresholds;

  constructor(store: MorphologyReader, thresholds: ResolverThresholds) {
    this.store = store;
    this.thresholds = thresholds;
  }

  public async resolve(query: NormalizedQuery): Promise<TierResolution> {
    const trace: TraceStep[] = [];
    if (!query.text) return { status: "unresolved", suggestions: [], trace };

    try {
      const queryVariants = variants(query.text);

      const direct = await this.directTier(queryVariants, "direct");
      trace.push(step("direct", queryVariants, direct.size));
      if (direct.size > 0) return classify(direct.values(), [], trace);

      const inflected = await this.inflectedTier(queryVariants, "inflected");
      trace.push(step("inflected", queryVariants, inflected.size));
      if (inflected.size > 0) return classify(inflected.values(), [], trace);

      if (query.strippedText && query.strippedArticle) {
        const strippedVariants = variants(query.strippedText);
        const stripped = await this.directTier(strippedVariants, "article_stripped");
        if (stripped.size === 0) {
          for (const candidate of (await this.inflectedTier(strippedVariants, "article_stripped")).values()) {
            stripped.add(candidate);
          }
        }
        const article = query.strippedArticle;
        const annotated = stripped.values().map((candidate) => ({
          ...candidate,
          explanation: `${candidate.explanation} after removing the article "${article}"`,
        }));
        trace.push(step("article_stripped", strippedVariants, annotated.length));
        if (annotated.length > 0) return classify(annotated, [], trace);
      } else {
        trace.push(skipped("article_stripped", "no_article"));
      }

      if (query.detectedLanguage !== "german") {
        const translated = await this.translationTier(queryVariants);
        trace.push(step("translation", queryVariants, translated.size));
        if (translated.size > 0) return classify(translated.values(), [], trace);
      } else {
        trace.push(skipped("translation", "german_input"));
      }

      const lookup = query.strippedText ?? query.text;
      if (codePointLength(lookup) < this.thresholds.compoundMinLength) {
        trace.push(skipped("compound", "below_min_length"));
      } else {
        const compound = await this.compoundTier(lookup);
        trace.push(step("compound", [lookup], compound.length));
        if (compound.length > 0) return classify(compound, [], trace);
      }

      if (codePointLength(lookup) < this.thresholds.fuzzyMinLength) {
        trace.push(skipped("fuzzy", "below_min_length"));
        return { status: "unresolved", suggestions: [], trace };
      }
      const fuzzy = await this.fuzzyTier(lookup);
      trace.push({ ...step("fuzzy", [lookup], fuzzy.accepted.length), suggestions: fuzzy.suggestions.length });
      if (fuzzy.accepted.length > 0) return classify(fuzzy.accepted, fuzzy.suggestions, trace);
      return { status: "unresolved", suggestions: fuzzy.suggestions, trace };
    } catch (err) {
      return {
        status: "failed",
        error: asLexiconError(err, { code: "STORE_UNAVAILABLE", retryable: true }),
        trace,
      };
    }
  }

  // Variant lookups are read-only and run in parallel; results are merged in variant order.
  private async directTier(queried: string[], tier: MatchTier): Promise<CandidateSet> {
    const results = await Promise.all(queried.map((variant) => this.store.findLemmaByExactText(variant)));
    const found = new CandidateSet();
    results.forEach((refs, index) => {
      const variant = queried[index] ?? "";
      for (const ref of refs) {
        found.add({
          ref,
          matchType: tier,
          matchedText: variant,
          similarity: 1,
          confidence: confidenceLabel(1),
          features: [],
          explanation: `Exact lemma match on "${variant}"`,
        });
      }
    });
    return found;
  }

  private async inflectedTier(queried: string[], tier: MatchTier): Promise<CandidateSet> {
    const results = await Promise.all(queried.map((variant) => this.store.findLemmaByInflectedForm(variant)));
    const found = new CandidateSet();
    for (const matches of results) {
      for (const match of matches) {
        found.add({
          ref: match.ref,
          matchType: tier,
          matchedText: match.form,
          similarity: 1,
          confidence: confidenceLabel(1),
          features: [match.feature],
          explanation: `"${match.form}" is the ${describeFeature(match.feature)} form of "${match.ref.lemma.text}"`,
        });
      }
    }
    return found;
  }

  private async translationTier(queried: string[]): Promise<CandidateSet> {
    const results = await Promise.all(queried.map((variant) => this.store.findLemmaByTranslation(variant)));
    const found = new CandidateSet();
    for (const matches of results) {
      for (const match of matches) {
        found.add({
          ref: match.ref,
          matchType: "translation",
          matchedText: match.text,
          similarity: 1,
          confidence: confidenceLabel(1),
          features: [],
          explanation: `"${match.text}" translates "${match.ref.lemma.text}" (${match.langCode})`,
        });
      }
    }
    return found;
  }

  // Only the best-ranked lemma is kept; its senses may still be ambiguous.
  private async compoundTier(lookup: string): Promise<ResolutionCandidate[]> {
    const matches = await this.store.findLemmasByAffix(lookup, 1);
    const folded = caseFold(lookup);
    return matches.map(({ ref, position }): ResolutionCandidate => {
      const score = similarity(folded, caseFold(ref.lemma.text));
      return {
        ref,
        matchType: "compound",
        matchedText: ref.lemma.text,
        similarity: score,
        confidence: confidenceLabel(score),
        features: [],
        explanation: `"${lookup}" ${position === "prefix" ? "begins" : "ends"} the compound "${ref.lemma.text}"`,
      };
    });
  }

  private async fuzzyTier(lookup: string): Promise<{ accepted: ResolutionCandidate[]; suggestions: Suggestion[] }> {
    const { autoAcceptThreshold, displayThreshold, lengthWindow, candidateLimit, maxSuggestions } = this.thresholds;
    const window = await this.store.candidatesByLengthWindow(lookup, lengthWindow, candidateLimit);
    const folded = caseFold(lookup);

    const scored = new Map<string, { ref: LemmaSense; score: number }>();
    for (const ref of window) {
      const key = identityKey(ref);
      if (!scored.has(key)) scored.set(key, { ref, score: similarity(folded, caseFold(ref.lemma.text)) });
    }
    const ranked = [...scored.values()]
      .filter((item) => item.score >= displayThreshold)
      .sort(
        (a, b) =>
          b.score - a.score ||
          b.ref.lemma.frequency - a.ref.lemma.frequency ||
          compareText(a.ref.lemma.text, b.ref.lemma.text),
      );

    const accepted: ResolutionCandidate[] = [];
    const suggestions: Suggestion[] = [];
    for (const { ref, score } of ranked) {
      if (score >= autoAcceptThreshold) {
        accepted.push({
          ref,
          matchType: "fuzzy",
          matchedText: ref.lemma.text,
          similarity: score,
          confidence: confidenceLabel(score),
          features: [],
          explanation: `Similar spelling to "${ref.lemma.text}" (similarity ${score.toFixed(2)})`,
        });
      } else if (suggestions.length < maxSuggestions) {
        suggestions.push({
          word: ref.lemma.text,
          pos: ref.sense.pos,
          meaning: meaningOf(ref),
          similarity: score,
          confidence: confidenceLabel(score),
          source: "fuzzy",
          kind: "similar_word",
          lemmaId: ref.lemma.id,
        });
      }
    }
    return { accepted, suggestions };
  }
}

function describeFeature(feature: FormFeature): string {
  return `${feature.key}=${feature.value}`;
}

function step(tier: MatchTier, queried: string[], candidates: number): TraceStep {
  return { tier, status: candidates > 0 ? "hit" : "miss", queried: [...queried], candidates };
}

function skipped(tier: MatchTier, reason: string): TraceStep {
  return { tier, status: "skipped", queried: [], candidates: 0, reason };
}

function classify(candidates: ResolutionCandidate[], suggestions: Suggestion[], trace: TraceStep[]): TierResolution {
  const [only] = candidates;
  if (only && candidates.length === 1) return { status: "resolved", candidate: only, suggestions, trace };
  return { status: "ambiguous", candidates, suggestions, trace };
}
