export interface AnalysisPrompt {
  system: string;
  user: string;
}

const SYSTEM_PROMPT = [
  "You are a meticulous German lexicon engine.",
  "Always return STRICT JSON that matches the schema.",
  "Never add explanatory text outside JSON.",
  "If something is unknown, OMIT the field.",
].join(" ");

/**
 * Builds the word-analysis request. The model must echo the input verbatim in
 * `input_word`; the gateway rejects any answer that echoes something else.
 */
export function buildAnalysisPrompt(word: string, languageHint: string | null = null): AnalysisPrompt {
  const quoted = JSON.stringify(word);
  const hint = languageHint ? `\nThe user's input was detected as ${languageHint}; analyze it as German regardless.\n` : "";
  const user = `Return a single JSON object for the EXACT German word ${quoted}. Do NOT correct the input.
${hint}
If the word is valid German (a lemma or an inflected form), return:
{
  "found": true,
  "input_word": ${quoted},
  "lemma": "dictionary lemma, preserving German capitalization",
  "pos": "noun|verb|adj|adv|prep|det|pron|conj|interj|num",
  "cefr": "A1|A2|B1|B2|C1|C2",
  "word_forms": [
    {"feature_key": "tense", "feature_value": "praesens_ich", "form": "gehe"},
    {"feature_key": "gender", "feature_value": "masc|fem|neut", "form": "der|die|das"},
    {"feature_key": "number", "feature_value": "plural", "form": "<plural>"},
    {"feature_key": "degree", "feature_value": "comparative", "form": "<comparative>"}
  ],
  "translations_en": ["concise English senses"],
  "translations_zh": ["concise Chinese senses"],
  "example": {"de": "natural German sentence using the word", "en": "", "zh": ""}
}

If ${quoted} is NOT valid German, return:
{
  "found": false,
  "input_word": ${quoted},
  "message": "not a recognized German word",
  "suggestions": [{"word": "...", "pos": "noun|verb|adj|...", "meaning": "brief English gloss"}]
}

Rules:
- JSON only.
- "input_word" is the input exactly as given, never a corrected spelling.
- Verb tenses: praesens, praeteritum, perfekt, plusquamperfekt, futur_i, futur_ii, imperativ, konjunktiv_i, konjunktiv_ii.
- Persons: ich, du, er_sie_es, wir, ihr, sie_Sie; encode verb cells as feature_value "<tense>_<person>".
- Omit unknown fields entirely.`;
  return { system: SYSTEM_PROMPT, user };
}
