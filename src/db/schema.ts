import type { Database } from 'better-sqlite3';

import type { SourceRecord } from './types.js';

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sources (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  authority TEXT NOT NULL,
  official_portal TEXT NOT NULL,
  collection TEXT NOT NULL,
  update_frequency TEXT NOT NULL,
  requires_date_range INTEGER NOT NULL CHECK (requires_date_range IN (0, 1)),
  coverage_note TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS documents (
  rowid INTEGER PRIMARY KEY AUTOINCREMENT,
  collection TEXT NOT NULL,
  doc_key TEXT NOT NULL,
  title TEXT NOT NULL,
  body TEXT NOT NULL,
  document_date TEXT,
  url TEXT,
  payload TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  indexed_at TEXT NOT NULL,
  UNIQUE (collection, doc_key)
);

CREATE VIRTUAL TABLE IF NOT EXISTS documents_fts USING fts5(
  collection UNINDEXED,
  doc_key UNINDEXED,
  title,
  body,
  content='documents',
  content_rowid='rowid'
);

CREATE TRIGGER IF NOT EXISTS documents_ai AFTER INSERT ON documents BEGIN
  INSERT INTO documents_fts(rowid, collection, doc_key, title, body)
  VALUES (new.rowid, new.collection, new.doc_key, new.title, new.body);
END;

CREATE TRIGGER IF NOT EXISTS documents_ad AFTER DELETE ON documents BEGIN
  INSERT INTO documents_fts(documents_fts, rowid, collection, doc_key, title, body)
  VALUES ('delete', old.rowid, old.collection, old.doc_key, old.title, old.body);
END;

CREATE TRIGGER IF NOT EXISTS documents_au AFTER UPDATE ON documents BEGIN
  INSERT INTO documents_fts(documents_fts, rowid, collection, doc_key, title, body)
  VALUES ('delete', old.rowid, old.collection, old.doc_key, old.title, old.body);
  INSERT INTO documents_fts(rowid, collection, doc_key, title, body)
  VALUES (new.rowid, new.collection, new.doc_key, new.title, new.body);
END;

CREATE TABLE IF NOT EXISTS ingestion_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  source TEXT NOT NULL,
  from_date TEXT,
  to_date TEXT,
  started_at TEXT NOT NULL,
  finished_at TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('completed', 'failed')),
  attempted INTEGER NOT NULL,
  indexed INTEGER NOT NULL,
  unchanged INTEGER NOT NULL,
  failed INTEGER NOT NULL,
  pages_total INTEGER NOT NULL,
  pages_failed INTEGER NOT NULL,
  error TEXT
);

CREATE INDEX IF NOT EXISTS idx_documents_collection ON documents(collection);
CREATE INDEX IF NOT EXISTS idx_documents_date ON documents(collection, document_date);
CREATE INDEX IF NOT EXISTS idx_ingestion_runs_source ON ingestion_runs(source, finished_at);
`;

const DROP_SQL = `
DROP TRIGGER IF EXISTS documents_ai;
DROP TRIGGER IF EXISTS documents_ad;
DROP TRIGGER IF EXISTS documents_au;

DROP TABLE IF EXISTS documents_fts;
DROP TABLE IF EXISTS documents;
DROP TABLE IF EXISTS ingestion_runs;
DROP TABLE IF EXISTS sources;
`;

/** Creates any missing tables; existing documents are kept. */
export function createSearchSchema(db: Database): void {
  db.exec(SCHEMA_SQL);
}

/** Drops every table, then recreates them empty. */
export function resetSearchSchema(db: Database): void {
  db.exec(DROP_SQL);
  db.exec(SCHEMA_SQL);
}

export function seedSources(db: Database, sources: readonly SourceRecord[]): void {
  const upsertSource = db.prepare(`
    INSERT INTO sources (
      id,
      name,
      authority,
      official_portal,
      collection,
      update_frequency,
      requires_date_range,
      coverage_note
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      name = excluded.name,
      authority = excluded.authority,
      official_portal = excluded.official_portal,
      collection = excluded.collection,
      update_frequency = excluded.update_frequency,
      requires_date_range = excluded.requires_date_range,
      coverage_note = excluded.coverage_note
  `);

  const transaction = db.transaction(() => {
    for (const source of sources) {
      upsertSource.run(
        source.id,
        source.name,
        source.authority,
        source.official_portal,
        source.collection,
        source.update_frequency,
        source.requires_date_range ? 1 : 0,
        source.coverage_note,
      );
    }
  });

  transaction();
}
