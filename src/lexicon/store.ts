import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

import { describeUnknownError, isLexiconError, LexiconError } from "../errors/index.js";
import { caseFold, codePointLength } from "../nlp/normalize/index.js";
import { ensureLexiconSchema } from "./schema.js";
import type {
  AffixMatch,
  EnrichmentDraft,
  Example,
  ExampleDraft,
  FormDraft,
  InflectedForm,
  InflectedMatch,
  Lemma,
  LemmaRef,
  LemmaSense,
  LexiconEntry,
  LexiconStore,
  LexiconTable,
  ManualCorrection,
  PersistResult,
  Provenance,
  RowCounts,
  SearchRecord,
  SeedImportResult,
  SeedLemmaInput,
  Sense,
  Translation,
  TranslationMatch,
} from "./types.js";

type LemmaSenseRow = {
  l_id: number;
  l_text: string;
  l_pos: string;
  l_cefr: string | null;
  l_frequency: number;
  l_notes: string | null;
  l_source: string;
  l_confidence: number | null;
  l_needs_review: number;
  l_created_at: number;
  l_updated_at: number;
  s_id: number;
  s_pos: string;
  s_gender: string | null;
  s_gloss: string;
  s_source: string;
  s_confidence: number | null;
  s_needs_review: number;
};

type FormRow = {
  id: number;
  lemma_id: number;
  sense_id: number | null;
  form: string;
  feature_key: string;
  feature_value: string;
  source: string;
};

type TranslationRow = {
  id: number;
  sense_id: number;
  lang_code: string;
  text: string;
  source: string;
  confidence: number | null;
};

type ExampleRow = {
  id: number;
  sense_id: number;
  text: string;
  renderings: string;
  source: string;
};

const LEMMA_SENSE_COLUMNS = `
  l.id AS l_id, l.text AS l_text, l.pos AS l_pos, l.cefr AS l_cefr, l.frequency AS l_frequency,
  l.notes AS l_notes, l.source AS l_source, l.confidence AS l_confidence, l.needs_review AS l_needs_review,
  l.created_at AS l_created_at, l.updated_at AS l_updated_at,
  s.id AS s_id, s.pos AS s_pos, s.gender AS s_gender, s.gloss AS s_gloss, s.source AS s_source,
  s.confidence AS s_confidence, s.needs_review AS s_needs_review
`;

const TABLES: readonly LexiconTable[] = [
  "lemmas",
  "senses",
  "inflected_forms",
  "translations",
  "examples",
  "search_history",
];

function toProvenance(value: string): Provenance {
  if (value === "manual" || value === "external-model") return value;
  return "seed";
}

function parseTextMap(raw: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return {};
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string") out[key] = value;
  }
  return out;
}

function toLemmaSense(row: LemmaSenseRow): LemmaSense {
  return {
    lemma: {
      id: row.l_id,
      text: row.l_text,
      pos: row.l_pos,
      cefr: row.l_cefr,
      frequency: Number(row.l_frequency || 0),
      notes: row.l_notes,
      source: toProvenance(row.l_source),
      confidence: row.l_confidence,
      needsReview: row.l_needs_review === 1,
      createdAtMs: Number(row.l_created_at || 0),
      updatedAtMs: Number(row.l_updated_at || 0),
    },
    sense: {
      id: row.s_id,
      lemmaId: row.l_id,
      pos: row.s_pos,
      gender: row.s_gender,
      gloss: parseTextMap(row.s_gloss),
      source: toProvenance(row.s_source),
      confidence: row.s_confidence,
      needsReview: row.s_needs_review === 1,
    },
  };
}

function toInflectedForm(row: FormRow): InflectedForm {
  return {
    id: row.id,
    lemmaId: row.lemma_id,
    senseId: row.sense_id,
    form: row.form,
    featureKey: row.feature_key,
    featureValue: row.feature_value,
    source: toProvenance(row.source),
  };
}

function toTranslation(row: TranslationRow): Translation {
  return {
    id: row.id,
    senseId: row.sense_id,
    langCode: row.lang_code,
    text: row.text,
    source: toProvenance(row.source),
    confidence: row.confidence,
  };
}

function toExample(row: ExampleRow): Example {
  return {
    id: row.id,
    senseId: row.sense_id,
    text: row.text,
    renderings: parseTextMap(row.renderings),
    source: toProvenance(row.source),
  };
}

export class SqliteLexiconStore implements LexiconStore {
  private readonly dbPath: string;
  private readonly db: Database.Database;
  private readonly now: () => number;

  public constructor(dbPath: string, options: { now?: () => number } = {}) {
    this.dbPath = dbPath === ":memory:" ? dbPath : path.resolve(dbPath);
    if (this.dbPath !== ":memory:") fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    this.db = new Database(this.dbPath);
    this.now = options.now ?? Date.now;
    this.db.function("lexeme_fold", { deterministic: true }, (value: unknown) =>
      typeof value === "string" ? caseFold(value) : null,
    );
    ensureLexiconSchema(this.db);
  }

  public getPath(): string {
    return this.dbPath;
  }

  public close(): void {
    this.db.close();
  }

  // ─── Reads ────────────────────────────────────────────────────────────────

  public async findLemmaByExactText(text: string): Promise<LemmaSense[]> {
    return this.guard("exact lookup", () =>
      this.db
        .prepare<[string], LemmaSenseRow>(`
          SELECT ${LEMMA_SENSE_COLUMNS}
          FROM lemmas l
          JOIN senses s ON s.lemma_id = l.id
          WHERE l.text = ?
          ORDER BY l.id, s.id
        `)
        .all(text)
        .map(toLemmaSense),
    );
  }

  public async findLemmaByInflectedForm(text: string): Promise<InflectedMatch[]> {
    return this.guard("inflected lookup", () =>
      this.db
        .prepare<[string], LemmaSenseRow & { f_form: string; f_key: string; f_value: string }>(`
          SELECT ${LEMMA_SENSE_COLUMNS}, f.form AS f_form, f.feature_key AS f_key, f.feature_value AS f_value
          FROM inflected_forms f
          JOIN lemmas l ON l.id = f.lemma_id
          JOIN senses s ON s.lemma_id = l.id AND (f.sense_id IS NULL OR f.sense_id = s.id)
          WHERE f.form = ?
          ORDER BY f.id, s.id
        `)
        .all(text)
        .map((row) => ({
          ref: toLemmaSense(row),
          form: row.f_form,
          feature: { key: row.f_key, value: row.f_value },
        })),
    );
  }

  public async findLemmaByTranslation(text: string): Promise<TranslationMatch[]> {
    return this.guard("translation lookup", () =>
      this.db
        .prepare<[string], LemmaSenseRow & { t_lang: string; t_text: string }>(`
          SELECT ${LEMMA_SENSE_COLUMNS}, t.lang_code AS t_lang, t.text AS t_text
          FROM translations t
          JOIN senses s ON s.id = t.sense_id
          JOIN lemmas l ON l.id = s.lemma_id
          WHERE t.text = ?
          ORDER BY t.id
        `)
        .all(text)
        .map((row) => ({ ref: toLemmaSense(row), langCode: row.t_lang, text: row.t_text })),
    );
  }

  /**
   * Lemmas that start or end with `text` (case-folded) without being equal to
   * it. Prefix matches first, then most frequent, then shortest; `limit` caps
   * lemmas, not senses.
   */
  public async findLemmasByAffix(text: string, limit: number): Promise<AffixMatch[]> {
    const query = caseFold(text);
    if (!query) return [];
    return this.guard("affix lookup", () =>
      this.db
        .prepare<{ query: string; limit: number }, LemmaSenseRow & { a_position: number }>(`
          WITH folded AS (
            SELECT id, frequency, length(text) AS len, lexeme_fold(text) AS folded
            FROM lemmas
          ),
          matched AS (
            SELECT id, frequency, len,
              CASE WHEN substr(folded, 1, length(@query)) = @query THEN 0 ELSE 1 END AS position
            FROM folded
            WHERE folded <> @query
              AND (substr(folded, 1, length(@query)) = @query OR substr(folded, -length(@query)) = @query)
            ORDER BY position ASC, frequency DESC, len ASC, id ASC
            LIMIT @limit
          )
          SELECT ${LEMMA_SENSE_COLUMNS}, m.position AS a_position
          FROM matched m
          JOIN lemmas l ON l.id = m.id
          JOIN senses s ON s.lemma_id = l.id
          ORDER BY m.position ASC, m.frequency DESC, m.len ASC, l.id ASC, s.id ASC
        `)
        .all({ query, limit: Math.max(1, Math.floor(limit)) })
        .map((row): AffixMatch => ({ ref: toLemmaSense(row), position: row.a_position === 0 ? "prefix" : "suffix" })),
    );
  }

  /**
   * Lemmas whose length is within `window` code points of `text`, closest
   * length first, then most frequent. `limit` caps lemmas, not senses.
   */
  public async candidatesByLengthWindow(text: string, window: number, limit: number): Promise<LemmaSense[]> {
    const length = codePointLength(text);
    const span = Math.max(0, Math.floor(window));
    return this.guard("length window", () =>
      this.db
        .prepare<[number, number, number, number], LemmaSenseRow>(`
          WITH nearby AS (
            SELECT id, abs(length(text) - ?) AS distance, frequency
            FROM lemmas
            WHERE length(text) BETWEEN ? AND ?
            ORDER BY distance ASC, frequency DESC, id ASC
            LIMIT ?
          )
          SELECT ${LEMMA_SENSE_COLUMNS}
          FROM nearby w
          JOIN lemmas l ON l.id = w.id
          JOIN senses s ON s.lemma_id = l.id
          ORDER BY w.distance ASC, w.frequency DESC, l.id ASC, s.id ASC
        `)
        .all(length, length - span, length + span, Math.max(1, Math.floor(limit)))
        .map(toLemmaSense),
    );
  }

  public async loadEntry(ref: LemmaRef): Promise<LexiconEntry | null> {
    return this.guard("load entry", () => {
      const head = this.readLemmaSense(ref.lemmaId, ref.senseId);
      if (!head) return null;
      const forms = this.db
        .prepare<[number, number], FormRow>(`
          SELECT id, lemma_id, sense_id, form, feature_key, feature_value, source
          FROM inflected_forms
          WHERE lemma_id = ? AND (sense_id IS NULL OR sense_id = ?)
          ORDER BY id
        `)
        .all(ref.lemmaId, ref.senseId)
        .map(toInflectedForm);
      const translations = this.db
        .prepare<[number], TranslationRow>(`
          SELECT id, sense_id, lang_code, text, source, confidence
          FROM translations WHERE sense_id = ? ORDER BY id
        `)
        .all(ref.senseId)
        .map(toTranslation);
      const examples = this.db
        .prepare<[number], ExampleRow>(`
          SELECT id, sense_id, text, renderings, source
          FROM examples WHERE sense_id = ? ORDER BY id
        `)
        .all(ref.senseId)
        .map(toExample);
      return { ...head, forms, translations, examples };
    });
  }

  public async countRows(): Promise<RowCounts> {
    return this.guard("count", () => {
      const counts: RowCounts = {
        lemmas: 0,
        senses: 0,
        inflected_forms: 0,
        translations: 0,
        examples: 0,
        search_history: 0,
      };
      for (const table of TABLES) {
        const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get();
        counts[table] = Number(row?.count ?? 0);
      }
      return counts;
    });
  }

  // ─── Writes ───────────────────────────────────────────────────────────────

  /**
   * Writes a validated enrichment in one IMMEDIATE transaction. An existing
   * lemma with the same text and a same-POS sense is attached to instead of
   * duplicated; forms, translations and examples are append-only.
   */
  public async persistEnrichment(draft: EnrichmentDraft, signal?: AbortSignal): Promise<PersistResult> {
    if (signal?.aborted) {
      throw new LexiconError({ code: "CANCELLED", message: "Enrichment cancelled before persistence", retryable: true });
    }
    return this.guard("persist enrichment", () =>
      this.db.transaction((input: EnrichmentDraft) => this.writeEnrichment(input)).immediate(draft),
    );
  }

  public async importSeed(entries: readonly SeedLemmaInput[]): Promise<SeedImportResult> {
    return this.guard("seed import", () =>
      this.db.transaction((input: readonly SeedLemmaInput[]) => this.writeSeed(input)).immediate(entries),
    );
  }

  /**
   * Corrects grammatical attributes once. The lemma and its senses become
   * `manual`; a second correction is refused.
   */
  public async applyManualCorrection(lemmaId: number, patch: ManualCorrection): Promise<LemmaSense[]> {
    return this.guard("manual correction", () =>
      this.db.transaction((id: number, input: ManualCorrection) => this.writeCorrection(id, input)).immediate(lemmaId, patch),
    );
  }

  public async recordSearch(entry: SearchRecord): Promise<void> {
    this.guard("search history", () => {
      this.db
        .prepare<[string, string, string, string | null, number | null, number]>(`
          INSERT INTO search_history (raw_query, normalized_text, outcome, reason, lemma_id, created_at)
          VALUES (?, ?, ?, ?, ?, ?)
        `)
        .run(entry.rawQuery, entry.normalizedText, entry.outcome, entry.reason, entry.lemmaId, this.now());
    });
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isLexiconError(err)) throw err;
      throw new LexiconError({
        code: "STORE_UNAVAILABLE",
        message: `Lexicon store ${operation} failed: ${describeUnknownError(err)}`,
        cause: err,
      });
    }
  }

  private readLemmaSense(lemmaId: number, senseId: number): LemmaSense | null {
    const row = this.db
      .prepare<[number, number], LemmaSenseRow>(`
        SELECT ${LEMMA_SENSE_COLUMNS}
        FROM lemmas l
        JOIN senses s ON s.lemma_id = l.id
        WHERE l.id = ? AND s.id = ?
      `)
      .get(lemmaId, senseId);
    return row ? toLemmaSense(row) : null;
  }

  private readLemma(lemmaId: number): Lemma | null {
    const row = this.db
      .prepare<[number], LemmaSenseRow>(`
        SELECT ${LEMMA_SENSE_COLUMNS}
        FROM lemmas l
        JOIN senses s ON s.lemma_id = l.id
        WHERE l.id = ?
        ORDER BY s.id
        LIMIT 1
      `)
      .get(lemmaId);
    return row ? toLemmaSense(row).lemma : null;
  }

  private writeEnrichment(draft: EnrichmentDraft): PersistResult {
    const existing = this.db
      .prepare<[string, string], { lemma_id: number; sense_id: number }>(`
        SELECT l.id AS lemma_id, s.id AS sense_id
        FROM lemmas l
        JOIN senses s ON s.lemma_id = l.id
        WHERE l.text = ? AND lower(s.pos) = lower(?)
        ORDER BY l.id, s.id
        LIMIT 1
      `)
      .get(draft.text, draft.pos);

    let lemmaId: number;
    let senseId: number;
    let created = false;
    if (existing) {
      lemmaId = existing.lemma_id;
      senseId = existing.sense_id;
    } else {
      const sameText = this.db
        .prepare<[string], { id: number }>("SELECT id FROM lemmas WHERE text = ? ORDER BY id LIMIT 1")
        .get(draft.text);
      lemmaId =
        sameText?.id ??
        this.insertLemma({
          text: draft.text,
          pos: draft.pos,
          cefr: draft.cefr,
          frequency: 0,
          notes: draft.notes,
          source: "external-model",
          confidence: draft.confidence,
          needsReview: draft.needsReview,
        });
      senseId = this.insertSense(lemmaId, {
        pos: draft.pos,
        gender: draft.gender,
        gloss: draft.gloss,
        source: "external-model",
        confidence: draft.confidence,
        needsReview: draft.needsReview,
      });
      created = true;
    }

    for (const form of draft.forms) this.insertFormIfMissing(lemmaId, senseId, form, "external-model");
    for (const translation of draft.translations) {
      this.insertTranslationIfMissing(senseId, translation.langCode, translation.text, "external-model", draft.confidence);
    }
    if (draft.example) this.insertExampleIfMissing(senseId, draft.example, "external-model");

    const ref = this.readLemmaSense(lemmaId, senseId);
    if (!ref) {
      throw new LexiconError({ code: "STORE_UNAVAILABLE", message: `Persisted sense ${senseId} could not be read back` });
    }
    return { ref, created };
  }

  private writeSeed(entries: readonly SeedLemmaInput[]): SeedImportResult {
    const result: SeedImportResult = { lemmas: 0, senses: 0, forms: 0, translations: 0, examples: 0 };
    for (const entry of entries) {
      const existingLemma = this.db
        .prepare<[string, string], { id: number }>("SELECT id FROM lemmas WHERE text = ? AND pos = ? ORDER BY id LIMIT 1")
        .get(entry.lemma, entry.pos);
      let lemmaId = existingLemma?.id;
      if (lemmaId === undefined) {
        lemmaId = this.insertLemma({
          text: entry.lemma,
          pos: entry.pos,
          cefr: entry.cefr,
          frequency: entry.frequency,
          notes: entry.notes,
          source: "seed",
          confidence: null,
          needsReview: false,
        });
        result.lemmas += 1;
      }

      for (const sense of entry.senses) {
        const pos = sense.pos ?? entry.pos;
        const gloss = JSON.stringify(sense.gloss);
        const existingSense = this.db
          .prepare<[number, string, string], { id: number }>(
            "SELECT id FROM senses WHERE lemma_id = ? AND pos = ? AND gloss = ? ORDER BY id LIMIT 1",
          )
          .get(lemmaId, pos, gloss);
        let senseId = existingSense?.id;
        if (senseId === undefined) {
          senseId = this.insertSense(lemmaId, {
            pos,
            gender: sense.gender,
            gloss: sense.gloss,
            source: "seed",
            confidence: null,
            needsReview: false,
          });
          result.senses += 1;
        }
        for (const form of sense.forms) {
          if (this.insertFormIfMissing(lemmaId, senseId, form, "seed")) result.forms += 1;
        }
        for (const [langCode, texts] of Object.entries(sense.translations)) {
          for (const text of texts) {
            if (this.insertTranslationIfMissing(senseId, langCode, text, "seed", null)) result.translations += 1;
          }
        }
        for (const example of sense.examples) {
          if (this.insertExampleIfMissing(senseId, example, "seed")) result.examples += 1;
        }
      }
    }
    return result;
  }

  private writeCorrection(lemmaId: number, patch: ManualCorrection): LemmaSense[] {
    const lemma = this.readLemma(lemmaId);
    if (!lemma) {
      throw new LexiconError({ code: "BAD_INPUT", message: `Lemma ${lemmaId} does not exist` });
    }
    if (lemma.source === "manual") {
      throw new LexiconError({
        code: "BAD_INPUT",
        message: `Lemma ${lemmaId} was already corrected manually`,
      });
    }
    const now = this.now();
    this.db
      .prepare<[string, string | null, string | null, number, number]>(`
        UPDATE lemmas
        SET pos = ?, cefr = ?, notes = ?, source = 'manual', needs_review = 0, updated_at = ?
        WHERE id = ?
      `)
      .run(
        patch.pos ?? lemma.pos,
        patch.cefr === undefined ? lemma.cefr : patch.cefr,
        patch.notes === undefined ? lemma.notes : patch.notes,
        now,
        lemmaId,
      );
    if (patch.pos !== undefined) {
      this.db.prepare<[string, number]>("UPDATE senses SET pos = ? WHERE lemma_id = ?").run(patch.pos, lemmaId);
    }
    if (patch.gender !== undefined) {
      this.db.prepare<[string | null, number]>("UPDATE senses SET gender = ? WHERE lemma_id = ?").run(patch.gender, lemmaId);
    }
    this.db
      .prepare<[number]>("UPDATE senses SET source = 'manual', needs_review = 0 WHERE lemma_id = ?")
      .run(lemmaId);
    return this.db
      .prepare<[number], LemmaSenseRow>(`
        SELECT ${LEMMA_SENSE_COLUMNS}
        FROM lemmas l
        JOIN senses s ON s.lemma_id = l.id
        WHERE l.id = ?
        ORDER BY s.id
      `)
      .all(lemmaId)
      .map(toLemmaSense);
  }

  private insertLemma(input: {
    text: string;
    pos: string;
    cefr: string | null;
    frequency: number;
    notes: string | null;
    source: Provenance;
    confidence: number | null;
    needsReview: boolean;
  }): number {
    const now = this.now();
    const info = this.db
      .prepare<[string, string, string | null, number, string | null, string, number | null, number, number, number]>(`
        INSERT INTO lemmas (text, pos, cefr, frequency, notes, source, confidence, needs_review, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        input.text,
        input.pos,
        input.cefr,
        Math.floor(input.frequency),
        input.notes,
        input.source,
        input.confidence,
        input.needsReview ? 1 : 0,
        now,
        now,
      );
    return Number(info.lastInsertRowid);
  }

  private insertSense(
    lemmaId: number,
    input: Pick<Sense, "pos" | "gender" | "gloss" | "source" | "confidence" | "needsReview">,
  ): number {
    const info = this.db
      .prepare<[number, string, string | null, string, string, number | null, number, number]>(`
        INSERT INTO senses (lemma_id, pos, gender, gloss, source, confidence, needs_review, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        lemmaId,
        input.pos,
        input.gender,
        JSON.stringify(input.gloss),
        input.source,
        input.confidence,
        input.needsReview ? 1 : 0,
        this.now(),
      );
    return Number(info.lastInsertRowid);
  }

  private insertFormIfMissing(lemmaId: number, senseId: number, form: FormDraft, source: Provenance): boolean {
    const info = this.db
      .prepare<[number, number, string, string, string, string, number, number, string, string, string]>(`
        INSERT INTO inflected_forms (lemma_id, sense_id, form, feature_key, feature_value, source, created_at)
        SELECT ?, ?, ?, ?, ?, ?, ?
        WHERE NOT EXISTS (
          SELECT 1 FROM inflected_forms
          WHERE lemma_id = ? AND form = ? AND feature_key = ? AND feature_value = ?
        )
      `)
      .run(
        lemmaId,
        senseId,
        form.form,
        form.featureKey,
        form.featureValue,
        source,
        this.now(),
        lemmaId,
        form.form,
        form.featureKey,
        form.featureValue,
      );
    return info.changes > 0;
  }

  private insertTranslationIfMissing(
    senseId: number,
    langCode: string,
    text: string,
    source: Provenance,
    confidence: number | null,
  ): boolean {
    const info = this.db
      .prepare<[number, string, string, string, number | null, number, number, string, string]>(`
        INSERT INTO translations (sense_id, lang_code, text, source, confidence, created_at)
        SELECT ?, ?, ?, ?, ?, ?
        WHERE NOT EXISTS (
          SELECT 1 FROM translations WHERE sense_id = ? AND lang_code = ? AND text = ?
        )
      `)
      .run(senseId, langCode, text, source, confidence, this.now(), senseId, langCode, text);
    return info.changes > 0;
  }

  private insertExampleIfMissing(senseId: number, example: ExampleDraft, source: Provenance): boolean {
    const info = this.db
      .prepare<[number, string, string, string, number, number, string]>(`
        INSERT INTO examples (sense_id, text, renderings, source, created_at)
        SELECT ?, ?, ?, ?, ?
        WHERE NOT EXISTS (
          SELECT 1 FROM examples WHERE sense_id = ? AND text = ?
        )
      `)
      .run(senseId, example.text, JSON.stringify(example.renderings), source, this.now(), senseId, example.text);
    return info.changes > 0;
  }
}
