import type Database from "better-sqlite3";

export function ensureLexiconSchema(db: Database.Database): void {
  db.pragma("foreign_keys = ON");

  db.exec(`
    CREATE TABLE IF NOT EXISTS lemmas (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      text TEXT NOT NULL COLLATE BINARY,
      pos TEXT NOT NULL,
      cefr TEXT,
      frequency INTEGER NOT NULL DEFAULT 0,
      notes TEXT,
      source TEXT NOT NULL CHECK (source IN ('seed', 'manual', 'external-model')),
      confidence REAL,
      needs_review INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_lemmas_text ON lemmas(text);
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_lemmas_length ON lemmas(length(text));
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS senses (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      lemma_id INTEGER NOT NULL REFERENCES lemmas(id) ON DELETE CASCADE,
      pos TEXT NOT NULL,
      gender TEXT,
      gloss TEXT NOT NULL DEFAULT '{}',
      source TEXT NOT NULL CHECK (source IN ('seed', 'manual', 'external-model')),
      confidence REAL,
      needs_review INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL
    );
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_senses_lemma ON senses(lemma_id);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS inflected_forms (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      lemma_id INTEGER NOT NULL REFERENCES lemmas(id) ON DELETE CASCADE,
      sense_id INTEGER REFERENCES senses(id) ON DELETE CASCADE,
      form TEXT NOT NULL COLLATE BINARY,
      feature_key TEXT NOT NULL,
      feature_value TEXT NOT NULL,
      source TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_forms_form ON inflected_forms(form);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS translations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      sense_id INTEGER NOT NULL REFERENCES senses(id) ON DELETE CASCADE,
      lang_code TEXT NOT NULL,
      text TEXT NOT NULL COLLATE BINARY,
      source TEXT NOT NULL,
      confidence REAL,
      created_at INTEGER NOT NULL
    );
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_translations_text ON translations(text);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS examples (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      sense_id INTEGER NOT NULL REFERENCES senses(id) ON DELETE CASCADE,
      text TEXT NOT NULL,
      renderings TEXT NOT NULL DEFAULT '{}',
      source TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS search_history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      raw_query TEXT NOT NULL,
      normalized_text TEXT NOT NULL,
      outcome TEXT NOT NULL,
      reason TEXT,
      lemma_id INTEGER,
      created_at INTEGER NOT NULL
    );
  `);
}
