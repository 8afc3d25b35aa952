export type Provenance = "seed" | "manual" | "external-model";

export interface Lemma {
  id: number;
  text: string;
  pos: string;
  cefr: string | null;
  /** Higher is more frequent. */
  frequency: number;
  notes: string | null;
  source: Provenance;
  confidence: number | null;
  needsReview: boolean;
  createdAtMs: number;
  updatedAtMs: number;
}

export interface Sense {
  id: number;
  lemmaId: number;
  pos: string;
  gender: string | null;
  gloss: Record<string, string>;
  source: Provenance;
  confidence: number | null;
  needsReview: boolean;
}

export interface InflectedForm {
  id: number;
  lemmaId: number;
  senseId: number | null;
  form: string;
  featureKey: string;
  featureValue: string;
  source: Provenance;
}

export interface Translation {
  id: number;
  senseId: number;
  langCode: string;
  text: string;
  source: Provenance;
  confidence: number | null;
}

export interface Example {
  id: number;
  senseId: number;
  text: string;
  renderings: Record<string, string>;
  source: Provenance;
}

export interface LemmaSense {
  lemma: Lemma;
  sense: Sense;
}

export interface LemmaRef {
  lemmaId: number;
  senseId: number;
}

export interface FormFeature {
  key: string;
  value: string;
}

export interface InflectedMatch {
  ref: LemmaSense;
  form: string;
  feature: FormFeature;
}

export interface TranslationMatch {
  ref: LemmaSense;
  langCode: string;
  text: string;
}

export type AffixPosition = "prefix" | "suffix";

export interface AffixMatch {
  ref: LemmaSense;
  /** Where the query sits in the lemma: "haus" is the prefix of "Haustür", the suffix of "Krankenhaus". */
  position: AffixPosition;
}

export interface LexiconEntry extends LemmaSense {
  forms: InflectedForm[];
  translations: Translation[];
  examples: Example[];
}

export interface FormDraft {
  form: string;
  featureKey: string;
  featureValue: string;
}

export interface TranslationDraft {
  langCode: string;
  text: string;
}

export interface ExampleDraft {
  text: string;
  renderings: Record<string, string>;
}

/** A validated, model-derived entry ready for persistence. */
export interface EnrichmentDraft {
  text: string;
  pos: string;
  gender: string | null;
  cefr: string | null;
  notes: string | null;
  confidence: number;
  needsReview: boolean;
  gloss: Record<string, string>;
  forms: FormDraft[];
  translations: TranslationDraft[];
  example: ExampleDraft | null;
}

export interface PersistResult {
  ref: LemmaSense;
  created: boolean;
}

export interface SeedSenseInput {
  pos: string | null;
  gender: string | null;
  gloss: Record<string, string>;
  translations: Record<string, string[]>;
  examples: ExampleDraft[];
  forms: FormDraft[];
}

export interface SeedLemmaInput {
  lemma: string;
  pos: string;
  cefr: string | null;
  frequency: number;
  notes: string | null;
  senses: SeedSenseInput[];
}

export interface SeedImportResult {
  lemmas: number;
  senses: number;
  forms: number;
  translations: number;
  examples: number;
}

export interface ManualCorrection {
  pos?: string;
  gender?: string | null;
  cefr?: string | null;
  notes?: string | null;
}

export interface SearchRecord {
  rawQuery: string;
  normalizedText: string;
  outcome: string;
  reason: string | null;
  lemmaId: number | null;
}

export type LexiconTable =
  | "lemmas"
  | "senses"
  | "inflected_forms"
  | "translations"
  | "examples"
  | "search_history";

export type RowCounts = Record<LexiconTable, number>;

/**
 * Read surface consumed by the resolver. Every lookup is case-sensitive;
 * callers fold case by querying each generated variant.
 */
export interface MorphologyReader {
  findLemmaByExactText(text: string): Promise<LemmaSense[]>;
  findLemmaByInflectedForm(text: string): Promise<InflectedMatch[]>;
  findLemmaByTranslation(text: string): Promise<TranslationMatch[]>;
  candidatesByLengthWindow(text: string, window: number, limit: number): Promise<LemmaSense[]>;
  findLemmasByAffix(text: string, limit: number): Promise<AffixMatch[]>;
}

export interface LexiconWriter {
  loadEntry(ref: LemmaRef): Promise<LexiconEntry | null>;
  persistEnrichment(draft: EnrichmentDraft, signal?: AbortSignal): Promise<PersistResult>;
}

export interface SearchHistoryWriter {
  recordSearch(entry: SearchRecord): Promise<void>;
}

export type LexiconStore = MorphologyReader & LexiconWriter & SearchHistoryWriter;

export function identityKey(ref: LemmaSense | LemmaRef): string {
  return "lemma" in ref ? `${ref.lemma.id}:${ref.sense.id}` : `${ref.lemmaId}:${ref.senseId}`;
}
