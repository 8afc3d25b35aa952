import assert from "node:assert/strict";
import test from "node:test";

import type { LemmaSense } from "../lexicon/types.js";
import { confidenceLabel } from "../nlp/similarity.js";
import { aggregate, canAutoAccept } from "./aggregate.js";
import type { MatchTier, ResolutionCandidate } from "./types.js";

function ref(lemmaId: number, senseId: number, text: string, frequency: number): LemmaSense {
  return {
    lemma: {
      id: lemmaId,
      text,
      pos: "noun",
      cefr: null,
      frequency,
      notes: null,
      source: "seed",
      confidence: null,
      needsReview: false,
      createdAtMs: 0,
      updatedAtMs: 0,
    },
    sense: {
      id: senseId,
      lemmaId,
      pos: "noun",
      gender: null,
      gloss: {},
      source: "seed",
      confidence: null,
      needsReview: false,
    },
  };
}

function candidate(target: LemmaSense, matchType: MatchTier, score = 1): ResolutionCandidate {
  return {
    ref: target,
    matchType,
    matchedText: target.lemma.text,
    similarity: score,
    confidence: confidenceLabel(score),
    features: [],
    explanation: `${matchType} ${target.lemma.text}`,
  };
}

test("aggregate ranks by tier before similarity and frequency", () => {
  const bench = ref(1, 1, "Bank", 700);
  const fish = ref(2, 2, "Fisch", 610);
  const table = ref(3, 3, "Tisch", 600);
  const result = aggregate(
    [candidate(fish, "fuzzy", 0.9), candidate(table, "inflected"), candidate(bench, "direct")],
    "query",
  );
  assert.deepEqual(
    result.entries.map((entry) => [entry.rank, entry.ref.lemma.text, entry.matchType]),
    [
      [1, "Bank", "direct"],
      [2, "Tisch", "inflected"],
      [3, "Fisch", "fuzzy"],
    ],
  );
  assert.equal(result.autoSelectable, false);
});

test("aggregate keeps distinct senses of one spelling apart", () => {
  const bench = ref(1, 1, "Bank", 700);
  const bank = ref(1, 2, "Bank", 700);
  const result = aggregate([candidate(bench, "direct"), candidate(bank, "direct")], "Bank");
  assert.equal(result.entries.length, 2);
  assert.deepEqual(
    result.entries.map((entry) => entry.ref.sense.id),
    [1, 2],
  );
});

test("aggregate merges one identity found by several tiers under its best tier", () => {
  const walk = ref(4, 4, "gehen", 950);
  const result = aggregate([candidate(walk, "fuzzy", 0.8), candidate(walk, "inflected")], "gehe");
  assert.equal(result.entries.length, 1);
  assert.equal(result.entries[0]?.matchType, "inflected");
  assert.deepEqual(result.entries[0]?.matchedTiers, ["fuzzy", "inflected"]);
  assert.equal(result.entries[0]?.confidence, "very_high");
});

test("aggregate breaks full ties by insertion order", () => {
  const first = ref(5, 5, "Kiefer", 100);
  const second = ref(6, 6, "Kiefer", 100);
  const result = aggregate([candidate(second, "direct"), candidate(first, "direct")], "Kiefer");
  assert.deepEqual(
    result.entries.map((entry) => entry.ref.lemma.id),
    [6, 5],
  );
});

test("aggregate prefers higher similarity and then higher frequency within a tier", () => {
  const low = ref(7, 7, "Hund", 900);
  const high = ref(8, 8, "Mund", 100);
  const frequent = ref(9, 9, "Bund", 500);
  const result = aggregate(
    [candidate(low, "fuzzy", 0.75), candidate(frequent, "fuzzy", 0.75), candidate(high, "fuzzy", 0.9)],
    "Rund",
  );
  assert.deepEqual(
    result.entries.map((entry) => entry.ref.lemma.text),
    ["Mund", "Hund", "Bund"],
  );
});

test("only a lone direct match can be auto-accepted", () => {
  const table = ref(3, 3, "Tisch", 600);
  assert.equal(aggregate([candidate(table, "direct")], "Tisch").autoSelectable, true);
  assert.equal(aggregate([candidate(table, "fuzzy", 0.95)], "Tisch").autoSelectable, false);
  assert.equal(canAutoAccept({ entries: [] }), false);
});
