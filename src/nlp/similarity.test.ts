import assert from "node:assert/strict";
import test from "node:test";

import { confidenceLabel, similarity } from "./similarity.js";

test("similarity normalizes edit distance by the longer string", () => {
  assert.equal(similarity("gehn", "gehen"), 0.8);
  assert.equal(similarity("haus", "haus"), 1);
  assert.equal(similarity("", ""), 1);
  assert.equal(similarity("abc", ""), 0);
  assert.equal(similarity("katze", "kätze"), 0.8);
  assert.equal(similarity("tisch", "fisch"), 0.8);
  assert.equal(similarity("hund", "mund"), 0.75);
  assert.equal(similarity("schön", "schon"), 0.8);
  assert.equal(similarity("abc", "abd"), 0.6667);
});

test("confidenceLabel buckets scores at the documented boundaries", () => {
  assert.equal(confidenceLabel(1), "very_high");
  assert.equal(confidenceLabel(0.9), "very_high");
  assert.equal(confidenceLabel(0.8999), "high");
  assert.equal(confidenceLabel(0.8), "high");
  assert.equal(confidenceLabel(0.6), "medium");
  assert.equal(confidenceLabel(0.4), "low");
  assert.equal(confidenceLabel(0.3999), "very_low");
});
