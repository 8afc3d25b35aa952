import assert from "node:assert/strict";
import test from "node:test";

import { MAX_VARIANTS, variants } from "./variants.js";

test("variants starts with the input and adds locale casing", () => {
  assert.deepEqual(variants("äpfel"), ["äpfel", "ÄPFEL", "Äpfel", "äPFEL"]);
});

test("variants keeps ß as a single letter when uppercasing", () => {
  assert.deepEqual(variants("Straße"), ["Straße", "straße", "STRAẞE", "Straẞe", "straẞe", "STRAßE"]);
});

test("variants is deterministic across calls", () => {
  for (const word of ["Müller", "gehen", "ÜBER", "", "x"]) {
    assert.deepEqual(variants(word), variants(word));
  }
});

test("variants of any case permutation form a closed set", () => {
  for (const word of ["Äpfel", "Müller", "Straße", "Öl"]) {
    const permutations = [word, word.toLocaleLowerCase("de-DE"), word.toLocaleUpperCase("de-DE"), variants(word)[0] ?? word];
    for (const permutation of permutations) {
      const base = new Set(variants(permutation));
      for (const variant of base) {
        for (const next of variants(variant)) {
          assert.ok(base.has(next), `${next} escaped the variant set of ${permutation}`);
        }
      }
    }
  }
});

test("variants output stays bounded for long input", () => {
  const long = "Donaudampfschifffahrtsgesellschaftskapitänsmützenübergröße";
  const out = variants(long);
  assert.ok(out.length <= MAX_VARIANTS);
  assert.equal(out[0], long);
  assert.equal(new Set(out).size, out.length);
});

test("variants of an empty string is just the empty string", () => {
  assert.deepEqual(variants(""), [""]);
});
