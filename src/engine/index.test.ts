import assert from "node:assert/strict";
import test from "node:test";

import { DEFAULT_CONFIG, type Config, type ResolverConfig } from "../config/index.js";
import type { WordAnalyzer } from "../enrichment/types.js";
import { LexiconError } from "../errors/index.js";
import { createResolutionEngine } from "../index.js";
import { parseSeed } from "../lexicon/seed.js";
import type {
  AffixMatch,
  EnrichmentDraft,
  InflectedMatch,
  LemmaRef,
  LemmaSense,
  LexiconEntry,
  LexiconStore,
  PersistResult,
  RowCounts,
  SearchRecord,
  TranslationMatch,
} from "../lexicon/types.js";
import { LexiconObserver } from "../observability/index.js";
import { ScriptedAnalyzer } from "../testing/analyzers.js";
import { createSeededStore } from "../testing/lexicon.js";

function configWith(resolver: Partial<ResolverConfig> = {}): Config {
  return {
    ...DEFAULT_CONFIG,
    resolver: { ...DEFAULT_CONFIG.resolver, ...resolver },
    enrichment: { ...DEFAULT_CONFIG.enrichment, enabled: true },
    logging: { console: false, structuredLogPath: "" },
  };
}

async function setup(analyzer: WordAnalyzer | null, resolver: Partial<ResolverConfig> = {}) {
  const store = await createSeededStore();
  const observer = new LexiconObserver({ console: false });
  const engine = createResolutionEngine(configWith(resolver), { store, analyzer, observer });
  return { store, engine };
}

function lexiconRows(counts: RowCounts): number[] {
  return [counts.lemmas, counts.senses, counts.inflected_forms, counts.translations, counts.examples];
}

const unused = new ScriptedAnalyzer(() => {
  throw new Error("the analyzer should not be called");
});

test("an exact lemma is found directly and the search is recorded", async () => {
  const { store, engine } = await setup(unused);
  try {
    const result = await engine.resolve("ärger");
    assert.equal(result.kind, "found");
    if (result.kind !== "found") return;
    assert.equal(result.entry.lemma.text, "Ärger");
    assert.equal(result.candidate.matchType, "direct");
    assert.deepEqual(
      result.trace.map((step) => [step.tier, step.status]),
      [["direct", "hit"]],
    );
    assert.equal(unused.calls.length, 0);
    assert.equal((await store.countRows()).search_history, 1);

    const metrics = engine.metrics();
    assert.equal(metrics.total, 1);
    assert.deepEqual(metrics.outcomes, { found: 1 });
    assert.deepEqual(metrics.tiers, { direct: 1 });
  } finally {
    engine.close();
    store.close();
  }
});

test("an inflected form resolves to its lemma with the matched feature", async () => {
  const { store, engine } = await setup(null);
  try {
    const result = await engine.resolve("gehe");
    assert.equal(result.kind, "found");
    if (result.kind !== "found") return;
    assert.equal(result.entry.lemma.text, "gehen");
    assert.equal(result.candidate.matchType, "inflected");
    assert.deepEqual(result.candidate.features, [{ key: "tense_person", value: "present_1st_sg" }]);
    assert.equal(result.entry.forms.length, 5);
  } finally {
    store.close();
  }
});

test("an exact match wins over a fuzzy match above the auto-accept threshold", async () => {
  const { store, engine } = await setup(null, { autoAcceptThreshold: 0.8 });
  try {
    const result = await engine.resolve("Tisch");
    assert.equal(result.kind, "found");
    if (result.kind !== "found") return;
    assert.equal(result.entry.lemma.text, "Tisch");
    assert.equal(result.candidate.matchType, "direct");
  } finally {
    store.close();
  }
});

test("a fuzzy match keeps its below-threshold neighbours as suggestions", async () => {
  const { store, engine } = await setup(null, { autoAcceptThreshold: 0.8 });
  try {
    const result = await engine.resolve("gehn");
    assert.equal(result.kind, "found");
    if (result.kind !== "found") return;
    assert.equal(result.entry.lemma.text, "gehen");
    assert.equal(result.candidate.matchType, "fuzzy");
    assert.deepEqual(
      result.suggestions.map((item) => [item.word, item.similarity]),
      [["nehmen", 0.5]],
    );
    assert.deepEqual(result.trace.at(-1), {
      tier: "fuzzy",
      status: "hit",
      queried: ["gehn"],
      candidates: 1,
      suggestions: 1,
    });
  } finally {
    store.close();
  }
});

test("a German word that equals an English gloss is analyzed rather than translated", async () => {
  const analyzer = new ScriptedAnalyzer(() => ({
    found: true,
    input_word: "Gift",
    lemma: "Gift",
    pos: "noun",
    gender: "das",
    translations_en: ["poison"],
  }));
  const { store, engine } = await setup(analyzer);
  try {
    await store.importSeed(
      parseSeed([
        {
          lemma: "Geschenk",
          pos: "noun",
          frequency: 400,
          senses: [{ gender: "n", gloss: { en: "gift" }, translations: { en: ["gift"] } }],
        },
      ]),
    );
    const result = await engine.resolve("Gift");
    assert.equal(result.kind, "found");
    if (result.kind !== "found") return;
    assert.equal(result.entry.lemma.text, "Gift");
    assert.equal(result.candidate.matchType, "enriched");
    assert.deepEqual(analyzer.calls, [{ word: "Gift", languageHint: null }]);
    assert.deepEqual(
      result.trace.find((step) => step.tier === "translation"),
      { tier: "translation", status: "skipped", queried: [], candidates: 0, reason: "german_input" },
    );
  } finally {
    store.close();
  }
});

test("a leading article is stripped before lookup", async () => {
  const { store, engine } = await setup(null);
  try {
    const result = await engine.resolve("der Tisch");
    assert.equal(result.kind, "found");
    if (result.kind !== "found") return;
    assert.equal(result.candidate.matchType, "article_stripped");
    assert.equal(result.entry.lemma.text, "Tisch");
  } finally {
    store.close();
  }
});

test("homographs come back as an ambiguous ranked set", async () => {
  const { store, engine } = await setup(null);
  try {
    const result = await engine.resolve("BANK");
    assert.equal(result.kind, "ambiguous");
    if (result.kind !== "ambiguous") return;
    assert.equal(result.results.autoSelectable, false);
    assert.deepEqual(
      result.results.entries.map((entry) => [entry.rank, entry.ref.sense.gloss.en]),
      [
        [1, "bench"],
        [2, "bank (financial)"],
      ],
    );
  } finally {
    store.close();
  }
});

test("a near miss without enrichment is not found with fuzzy suggestions", async () => {
  const { store, engine } = await setup(null);
  try {
    const result = await engine.resolve("gehn");
    assert.equal(result.kind, "not_found");
    if (result.kind !== "not_found") return;
    assert.equal(result.reason, "no_match");
    assert.deepEqual(
      result.suggestions.map((item) => [item.word, item.similarity]),
      [
        ["gehen", 0.8],
        ["nehmen", 0.5],
      ],
    );
    assert.deepEqual(result.trace.at(-1), {
      tier: "enriched",
      status: "skipped",
      queried: [],
      candidates: 0,
      reason: "disabled",
    });
  } finally {
    store.close();
  }
});

test("model suggestions follow fuzzy suggestions when the word is unknown", async () => {
  const analyzer = new ScriptedAnalyzer(() => ({ found: false, input_word: "gehn", suggestions: ["gehen", "gen"] }));
  const { store, engine } = await setup(analyzer);
  try {
    const before = lexiconRows(await store.countRows());
    const result = await engine.resolve("gehn");
    assert.equal(result.kind, "not_found");
    if (result.kind !== "not_found") return;
    assert.equal(result.reason, "not_a_word");
    assert.deepEqual(
      result.suggestions.map((item) => [item.word, item.source]),
      [
        ["gehen", "fuzzy"],
        ["nehmen", "fuzzy"],
        ["gen", "external-model"],
      ],
    );
    assert.deepEqual(analyzer.calls, [{ word: "gehn", languageHint: null }]);
    assert.deepEqual(lexiconRows(await store.countRows()), before);
  } finally {
    store.close();
  }
});

test("a model that corrects the input is rejected and nothing is written", async () => {
  const analyzer = new ScriptedAnalyzer(() => ({
    found: true,
    input_word: "nehmen",
    lemma: "nehmen",
    pos: "verb",
    translations_en: ["to take"],
  }));
  const { store, engine } = await setup(analyzer);
  try {
    const before = lexiconRows(await store.countRows());
    const result = await engine.resolve("nim");
    assert.equal(result.kind, "rejected");
    if (result.kind !== "rejected") return;
    assert.equal(result.reason, "auto_correction");
    assert.equal(result.echoedInput, "nehmen");
    const [first] = result.suggestions;
    assert.equal(first?.word, "nehmen");
    assert.equal(first?.kind, "did_you_mean");
    assert.equal(first?.lemmaId, 2);
    assert.deepEqual(lexiconRows(await store.countRows()), before);
  } finally {
    store.close();
  }
});

test("concurrent lookups of a new word enrich it once", async () => {
  const analyzer = new ScriptedAnalyzer(
    () => ({ found: true, input_word: "Zebra", lemma: "Zebra", pos: "noun", gender: "das", translations_en: ["zebra"] }),
    10,
  );
  const { store, engine } = await setup(analyzer);
  try {
    const before = await store.countRows();
    const results = await Promise.all(Array.from({ length: 5 }, () => engine.resolve("Zebra")));
    assert.equal(analyzer.calls.length, 1);
    for (const result of results) assert.deepEqual(result, results[0]);

    const [first] = results;
    assert.equal(first?.kind, "found");
    if (first?.kind !== "found") return;
    assert.equal(first.candidate.matchType, "enriched");
    assert.equal(first.entry.lemma.source, "external-model");
    assert.equal(first.entry.sense.gender, "n");

    const after = await store.countRows();
    assert.equal(after.lemmas, before.lemmas + 1);
    assert.equal(after.search_history, before.search_history + 5);

    const again = await engine.resolve("zebra");
    assert.equal(again.kind, "found");
    if (again.kind !== "found") return;
    assert.equal(again.candidate.matchType, "direct");
    assert.equal(analyzer.calls.length, 1);
  } finally {
    store.close();
  }
});

test("an enriched inflection carries the feature of its stored form", async () => {
  const analyzer = new ScriptedAnalyzer(() => ({
    found: true,
    input_word: "lief",
    lemma: "laufen",
    pos: "verb",
    word_forms: [{ feature_key: "tense", feature_value: "praeteritum_ich", form: "lief" }],
    translations_en: ["to run"],
  }));
  const { store, engine } = await setup(analyzer);
  try {
    const result = await engine.resolve("lief");
    assert.equal(result.kind, "found");
    if (result.kind !== "found") return;
    assert.equal(result.entry.lemma.text, "laufen");
    assert.equal(result.candidate.matchedText, "lief");
    assert.deepEqual(result.candidate.features, [{ key: "tense", value: "praeteritum_ich" }]);
  } finally {
    store.close();
  }
});

test("a model timeout is a retryable transient failure", async () => {
  const analyzer = new ScriptedAnalyzer(() => ({ found: false, input_word: "Zebra", suggestions: [] }), 200);
  const { store, engine } = await setup(analyzer);
  try {
    const result = await engine.resolve("Zebra", { timeoutMs: 20 });
    assert.equal(result.kind, "transient_failure");
    if (result.kind !== "transient_failure") return;
    assert.equal(result.reason, "model_timeout");
    assert.equal(result.retryable, true);
    assert.deepEqual(result.trace.at(-1), {
      tier: "enriched",
      status: "miss",
      queried: ["Zebra"],
      candidates: 0,
      reason: "model_timeout",
    });
  } finally {
    store.close();
  }
});

test("empty input is not found without touching the store", async () => {
  const { store, engine } = await setup(unused);
  try {
    assert.deepEqual(await engine.resolve("   "), { kind: "not_found", reason: "empty_query", suggestions: [], trace: [] });
    assert.equal((await store.countRows()).search_history, 0);
  } finally {
    store.close();
  }
});

class UnavailableStore implements LexiconStore {
  private fail(): never {
    throw new LexiconError({ code: "STORE_UNAVAILABLE", message: "disk I/O error" });
  }

  public async findLemmaByExactText(_text: string): Promise<LemmaSense[]> {
    return this.fail();
  }

  public async findLemmaByInflectedForm(_text: string): Promise<InflectedMatch[]> {
    return this.fail();
  }

  public async findLemmaByTranslation(_text: string): Promise<TranslationMatch[]> {
    return this.fail();
  }

  public async candidatesByLengthWindow(_text: string, _window: number, _limit: number): Promise<LemmaSense[]> {
    return this.fail();
  }

  public async findLemmasByAffix(_text: string, _limit: number): Promise<AffixMatch[]> {
    return this.fail();
  }

  public async loadEntry(_ref: LemmaRef): Promise<LexiconEntry | null> {
    return this.fail();
  }

  public async persistEnrichment(_draft: EnrichmentDraft): Promise<PersistResult> {
    return this.fail();
  }

  public async recordSearch(_entry: SearchRecord): Promise<void> {
    this.fail();
  }
}

test("store failures surface as store_unavailable", async () => {
  const engine = createResolutionEngine(configWith(), {
    store: new UnavailableStore(),
    analyzer: unused,
    observer: new LexiconObserver({ console: false }),
  });
  const result = await engine.resolve("Haus");
  assert.deepEqual(result, {
    kind: "transient_failure",
    reason: "store_unavailable",
    message: "disk I/O error",
    retryable: true,
    trace: [],
  });
  assert.equal(unused.calls.length, 0);
});
