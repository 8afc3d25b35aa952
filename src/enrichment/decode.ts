import { z } from "zod";

import type { ExampleDraft } from "../lexicon/types.js";
import type { AnalysisForm, AnalysisTranslation, ModelAnalysis, ModelSuggestion } from "./types.js";

export const DEFAULT_MODEL_CONFIDENCE = 0.75;

// Grammatical gender travels as a feature on the wire but is stored on the sense.
const GENDER_FEATURE_KEYS = new Set(["gender", "article", "genus"]);

const GENDER_ALIASES: Record<string, string> = {
  m: "m",
  masc: "m",
  masculine: "m",
  maskulin: "m",
  der: "m",
  f: "f",
  fem: "f",
  feminine: "f",
  feminin: "f",
  die: "f",
  n: "n",
  neut: "n",
  neuter: "n",
  neutrum: "n",
  das: "n",
};

const wireFormSchema = z.object({
  form: z.string(),
  feature_key: z.string().optional(),
  featureKey: z.string().optional(),
  feature_value: z.string().optional(),
  featureValue: z.string().optional(),
});

const wireSuggestionSchema = z.union([
  z.string(),
  z.object({
    word: z.string(),
    pos: z.string().nullish(),
    meaning: z.string().nullish(),
  }),
]);

const wireTranslationsSchema = z.union([
  z.array(z.object({ lang: z.string(), text: z.string() })),
  z.record(z.string(), z.union([z.string(), z.array(z.string())])),
]);

const wireExampleSchema = z.union([z.string(), z.record(z.string(), z.string())]);

const wireAnalysisSchema = z.object({
  isValid: z.boolean().optional(),
  found: z.boolean().optional(),
  echoedInput: z.string().optional(),
  input_word: z.string().optional(),
  lemma: z.string().optional(),
  pos: z.string().optional(),
  gender: z.string().nullish(),
  cefr: z.string().nullish(),
  notes: z.string().nullish(),
  confidence: z.number().min(0).max(1).optional(),
  translations: wireTranslationsSchema.optional(),
  translations_en: z.array(z.string()).optional(),
  translations_zh: z.array(z.string()).optional(),
  forms: z.array(wireFormSchema).optional(),
  word_forms: z.array(wireFormSchema).optional(),
  example: wireExampleSchema.nullish(),
  suggestions: z.array(wireSuggestionSchema).optional(),
  message: z.string().optional(),
});

type WireAnalysis = z.infer<typeof wireAnalysisSchema>;

function clean(value: string | null | undefined): string {
  return String(value ?? "").normalize("NFC").trim();
}

function orNull(value: string | null | undefined): string | null {
  return clean(value) || null;
}

export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/.exec(trimmed);
  return fenced?.[1]?.trim() ?? trimmed;
}

function parseJsonText(text: string): unknown {
  try {
    return JSON.parse(stripCodeFences(text));
  } catch {
    return undefined;
  }
}

export function normalizeGender(value: string | null | undefined): string | null {
  const key = clean(value).toLowerCase();
  if (!key) return null;
  return GENDER_ALIASES[key] ?? key;
}

function collectTranslations(wire: WireAnalysis): AnalysisTranslation[] {
  const out: AnalysisTranslation[] = [];
  const push = (langCode: string, text: string) => {
    const lang = clean(langCode).toLowerCase();
    const value = clean(text);
    if (!lang || !value) return;
    if (out.some((item) => item.langCode === lang && item.text === value)) return;
    out.push({ langCode: lang, text: value });
  };

  if (Array.isArray(wire.translations)) {
    for (const item of wire.translations) push(item.lang, item.text);
  } else if (wire.translations) {
    for (const [lang, value] of Object.entries(wire.translations)) {
      for (const text of Array.isArray(value) ? value : [value]) push(lang, text);
    }
  }
  for (const text of wire.translations_en ?? []) push("en", text);
  for (const text of wire.translations_zh ?? []) push("zh", text);
  return out;
}

function collectForms(wire: WireAnalysis): { forms: AnalysisForm[]; gender: string | null } {
  const forms: AnalysisForm[] = [];
  let gender: string | null = null;
  for (const item of [...(wire.forms ?? []), ...(wire.word_forms ?? [])]) {
    const form = clean(item.form);
    const featureKey = clean(item.feature_key ?? item.featureKey);
    const featureValue = clean(item.feature_value ?? item.featureValue);
    if (!form || !featureKey || !featureValue) continue;
    if (GENDER_FEATURE_KEYS.has(featureKey.toLowerCase())) {
      gender ??= normalizeGender(featureValue) ?? normalizeGender(form);
      continue;
    }
    if (forms.some((known) => known.form === form && known.featureKey === featureKey && known.featureValue === featureValue)) {
      continue;
    }
    forms.push({ form, featureKey, featureValue });
  }
  return { forms, gender };
}

function collectExample(value: WireAnalysis["example"]): ExampleDraft | null {
  if (!value) return null;
  if (typeof value === "string") {
    const text = clean(value);
    return text ? { text, renderings: {} } : null;
  }
  const text = clean(value.de ?? value.text);
  if (!text) return null;
  const renderings: Record<string, string> = {};
  for (const [lang, rendering] of Object.entries(value)) {
    if (lang === "de" || lang === "text") continue;
    const cleaned = clean(rendering);
    if (cleaned) renderings[lang] = cleaned;
  }
  return { text, renderings };
}

function collectSuggestions(wire: WireAnalysis): ModelSuggestion[] {
  const out: ModelSuggestion[] = [];
  for (const item of wire.suggestions ?? []) {
    const suggestion =
      typeof item === "string"
        ? { word: clean(item), pos: null, meaning: null }
        : { word: clean(item.word), pos: orNull(item.pos), meaning: orNull(item.meaning) };
    if (suggestion.word) out.push(suggestion);
  }
  return out;
}

/**
 * Decodes an analyzer response into a closed set of shapes. Nothing untyped
 * leaves this function; anything that does not fit is `malformed`.
 */
export function decodeAnalysis(raw: unknown): ModelAnalysis {
  const payload = typeof raw === "string" ? parseJsonText(raw) : raw;
  if (payload === undefined || payload === null) {
    return { kind: "malformed", issue: "response is not JSON" };
  }
  const parsed = wireAnalysisSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return { kind: "malformed", issue: `${where}${issue?.message ?? "schema mismatch"}` };
  }

  const wire = parsed.data;
  const valid = wire.isValid ?? wire.found;
  const echoedInput = orNull(wire.echoedInput ?? wire.input_word);
  const suggestions = collectSuggestions(wire);

  if (valid === true) {
    const lemma = clean(wire.lemma);
    const pos = clean(wire.pos).toLowerCase();
    if (!echoedInput) return { kind: "malformed", issue: "valid analysis without an echoed input" };
    if (!lemma || !pos) return { kind: "malformed", issue: "valid analysis without lemma or part of speech" };
    const translations = collectTranslations(wire);
    if (translations.length === 0) return { kind: "malformed", issue: "valid analysis without translations" };
    const { forms, gender } = collectForms(wire);
    return {
      kind: "valid",
      echoedInput,
      lemma,
      pos,
      gender: normalizeGender(wire.gender) ?? gender,
      cefr: orNull(wire.cefr),
      notes: orNull(wire.notes),
      confidence: wire.confidence ?? DEFAULT_MODEL_CONFIDENCE,
      translations,
      forms,
      example: collectExample(wire.example),
      suggestions,
    };
  }

  if (valid === false) {
    return { kind: "invalid", echoedInput, reason: orNull(wire.message), suggestions };
  }

  if (wire.suggestions !== undefined) {
    return { kind: "suggestions", echoedInput, suggestions };
  }

  return { kind: "malformed", issue: "response carries neither an analysis nor suggestions" };
}
