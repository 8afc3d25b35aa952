import assert from "node:assert/strict";
import test from "node:test";

import { decodeAnalysis, normalizeGender, stripCodeFences } from "./decode.js";

test("decodeAnalysis reads a valid analysis in the snake_case wire format", () => {
  const analysis = decodeAnalysis({
    found: true,
    input_word: "Hunde",
    lemma: "Hund",
    pos: "Noun",
    word_forms: [
      { feature_key: "gender", feature_value: "masc", form: "der" },
      { feature_key: "number", feature_value: "plural", form: "Hunde" },
      { feature_key: "number", feature_value: "plural", form: "Hunde" },
      { feature_key: "", feature_value: "x", form: "y" },
    ],
    translations_en: ["dog", " ", "hound"],
    translations_zh: ["狗"],
    example: { de: "Der Hund bellt.", en: "The dog barks.", zh: "" },
  });
  assert.deepEqual(analysis, {
    kind: "valid",
    echoedInput: "Hunde",
    lemma: "Hund",
    pos: "noun",
    gender: "m",
    cefr: null,
    notes: null,
    confidence: 0.75,
    translations: [
      { langCode: "en", text: "dog" },
      { langCode: "en", text: "hound" },
      { langCode: "zh", text: "狗" },
    ],
    forms: [{ form: "Hunde", featureKey: "number", featureValue: "plural" }],
    example: { text: "Der Hund bellt.", renderings: { en: "The dog barks." } },
    suggestions: [],
  });
});

test("decodeAnalysis accepts camelCase fields and translation maps", () => {
  const analysis = decodeAnalysis({
    isValid: true,
    echoedInput: "Katze",
    lemma: "Katze",
    pos: "noun",
    gender: "fem",
    confidence: 0.92,
    translations: { en: "cat", zh: ["猫"] },
    forms: [{ form: "Katzen", featureKey: "number", featureValue: "plural" }],
  });
  assert.equal(analysis.kind, "valid");
  if (analysis.kind !== "valid") return;
  assert.equal(analysis.gender, "f");
  assert.equal(analysis.confidence, 0.92);
  assert.deepEqual(analysis.translations, [
    { langCode: "en", text: "cat" },
    { langCode: "zh", text: "猫" },
  ]);
});

test("decodeAnalysis classifies a negative answer as invalid with suggestions", () => {
  assert.deepEqual(
    decodeAnalysis({
      found: false,
      input_word: "hsu",
      message: "not a recognized German word",
      suggestions: ["Haus", { word: "Hut", pos: "noun", meaning: "hat" }, { word: " " }],
    }),
    {
      kind: "invalid",
      echoedInput: "hsu",
      reason: "not a recognized German word",
      suggestions: [
        { word: "Haus", pos: null, meaning: null },
        { word: "Hut", pos: "noun", meaning: "hat" },
      ],
    },
  );
});

test("decodeAnalysis treats a bare suggestion list as its own shape", () => {
  assert.deepEqual(decodeAnalysis({ suggestions: [] }), { kind: "suggestions", echoedInput: null, suggestions: [] });
});

test("decodeAnalysis reports malformed responses instead of throwing", () => {
  assert.deepEqual(decodeAnalysis("Sorry, I cannot help with that."), { kind: "malformed", issue: "response is not JSON" });
  assert.deepEqual(decodeAnalysis(null), { kind: "malformed", issue: "response is not JSON" });
  assert.deepEqual(decodeAnalysis({ found: true, input_word: "Haus", lemma: "Haus", pos: "noun" }), {
    kind: "malformed",
    issue: "valid analysis without translations",
  });
  assert.deepEqual(decodeAnalysis({ found: true, lemma: "Haus", pos: "noun", translations_en: ["house"] }), {
    kind: "malformed",
    issue: "valid analysis without an echoed input",
  });
  assert.deepEqual(decodeAnalysis({ message: "hello" }), {
    kind: "malformed",
    issue: "response carries neither an analysis nor suggestions",
  });
  const wrongType = decodeAnalysis({ found: "yes" });
  assert.equal(wrongType.kind, "malformed");
  if (wrongType.kind !== "malformed") return;
  assert.ok(wrongType.issue.startsWith("found: "));
});

test("decodeAnalysis parses fenced JSON text", () => {
  const analysis = decodeAnalysis('```json\n{"found": false, "input_word": "qq", "suggestions": []}\n```');
  assert.deepEqual(analysis, { kind: "invalid", echoedInput: "qq", reason: null, suggestions: [] });
});

test("stripCodeFences leaves unfenced text alone", () => {
  assert.equal(stripCodeFences('  {"a": 1} '), '{"a": 1}');
  assert.equal(stripCodeFences('```\n{"a": 1}\n```'), '{"a": 1}');
});

test("normalizeGender maps articles and abbreviations", () => {
  assert.equal(normalizeGender("die"), "f");
  assert.equal(normalizeGender("Neutrum"), "n");
  assert.equal(normalizeGender("masc"), "m");
  assert.equal(normalizeGender(""), null);
  assert.equal(normalizeGender("common"), "common");
});
