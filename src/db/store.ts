import fs from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';

import { contentHash } from '../ingest/document-key.js';
import { errorMessage } from '../ingest/errors.js';
import { createSearchSchema } from './schema.js';
import type { DocumentRow, IndexDocument } from './types.js';

export interface BulkUpsertFailure {
  key: string;
  reason: string;
  transient: boolean;
}

export interface BulkUpsertResult {
  written: string[];
  unchanged: string[];
  failed: BulkUpsertFailure[];
}

export interface SearchQuery {
  text?: string;
  dateFrom?: string;
  dateTo?: string;
  limit: number;
}

export interface SearchHit {
  collection: string;
  key: string;
  title: string;
  snippet: string;
  date: string | null;
  url: string | null;
  score: number | null;
}

export interface StoredDocument extends IndexDocument {
  collection: string;
  contentHash: string;
  indexedAt: string;
}

/** The document-search store the ingestion engine writes into. */
export interface SearchStore {
  bulkUpsert(collection: string, documents: readonly IndexDocument[]): Promise<BulkUpsertResult>;
  search(collection: string | null, query: SearchQuery): Promise<SearchHit[]>;
  count(collection: string): Promise<number>;
  get(collection: string, key: string): Promise<StoredDocument | null>;
  listKeys(collection: string): Promise<string[]>;
}

const TRANSIENT_SQLITE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);

export function isTransientStoreError(error: unknown): boolean {
  return error instanceof Database.SqliteError && TRANSIENT_SQLITE_CODES.has(error.code.split('_').slice(0, 2).join('_'));
}

export function openDatabase(filePath: string, options: { readonly?: boolean } = {}): Database.Database {
  if (!options.readonly && filePath !== ':memory:') {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }
  const db = new Database(filePath, { readonly: options.readonly ?? false });
  if (!options.readonly) {
    db.pragma('journal_mode = WAL');
  }
  return db;
}

/** Quotes every term so user text never reaches FTS5 as query syntax. */
export function toFtsQuery(text: string): string {
  return text
    .split(/\s+/)
    .map((term) => term.trim())
    .filter((term) => term.length > 0)
    .map((term) => `"${term.replace(/"/g, '""')}"`)
    .join(' ');
}

interface HitRow {
  collection: string;
  doc_key: string;
  title: string;
  snippet: string;
  document_date: string | null;
  url: string | null;
  score: number | null;
}

export function searchDocuments(db: Database.Database, collection: string | null, query: SearchQuery): SearchHit[] {
  const filters: string[] = [];
  const params: Array<string | number> = [];
  const ftsQuery = query.text ? toFtsQuery(query.text) : '';

  if (ftsQuery) {
    filters.push('documents_fts MATCH ?');
    params.push(ftsQuery);
  }
  if (collection) {
    filters.push('d.collection = ?');
    params.push(collection);
  }
  if (query.dateFrom) {
    filters.push('substr(d.document_date, 1, 10) >= ?');
    params.push(query.dateFrom);
  }
  if (query.dateTo) {
    filters.push('substr(d.document_date, 1, 10) <= ?');
    params.push(query.dateTo);
  }

  const where = filters.length > 0 ? `WHERE ${filters.join(' AND ')}` : '';
  const sql = ftsQuery
    ? `
      SELECT
        d.collection,
        d.doc_key,
        d.title,
        snippet(documents_fts, 3, '[', ']', '...', 16) AS snippet,
        d.document_date,
        d.url,
        bm25(documents_fts) AS score
      FROM documents_fts
      JOIN documents d ON d.rowid = documents_fts.rowid
      ${where}
      ORDER BY score ASC, d.doc_key ASC
      LIMIT ?
    `
    : `
      SELECT
        d.collection,
        d.doc_key,
        d.title,
        substr(d.body, 1, 200) AS snippet,
        d.document_date,
        d.url,
        NULL AS score
      FROM documents d
      ${where}
      ORDER BY d.document_date DESC, d.doc_key ASC
      LIMIT ?
    `;

  const rows = db.prepare(sql).all(...params, query.limit) as HitRow[];
  return rows.map((row) => ({
    collection: row.collection,
    key: row.doc_key,
    title: row.title,
    snippet: row.snippet,
    date: row.document_date,
    url: row.url,
    score: row.score,
  }));
}

export function toStoredDocument(row: DocumentRow): StoredDocument {
  return {
    collection: row.collection,
    key: row.doc_key,
    title: row.title,
    body: row.body,
    date: row.document_date,
    url: row.url,
    payload: parsePayload(row.payload),
    contentHash: row.content_hash,
    indexedAt: row.indexed_at,
  };
}

function parsePayload(value: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(value);
  if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return {};
}

export interface SqliteSearchStoreOptions {
  now?: () => Date;
}

/**
 * SQLite FTS5 store. Upserts keyed by (collection, key); a document whose
 * content hash is unchanged leaves its row and FTS entry untouched.
 */
export class SqliteSearchStore implements SearchStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(db: Database.Database, options: SqliteSearchStoreOptions = {}) {
    this.db = db;
    this.now = options.now ?? (() => new Date());
    createSearchSchema(db);
  }

  get database(): Database.Database {
    return this.db;
  }

  async bulkUpsert(collection: string, documents: readonly IndexDocument[]): Promise<BulkUpsertResult> {
    const upsert = this.db.prepare(`
      INSERT INTO documents (
        collection,
        doc_key,
        title,
        body,
        document_date,
        url,
        payload,
        content_hash,
        indexed_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(collection, doc_key) DO UPDATE SET
        title = excluded.title,
        body = excluded.body,
        document_date = excluded.document_date,
        url = excluded.url,
        payload = excluded.payload,
        content_hash = excluded.content_hash,
        indexed_at = excluded.indexed_at
      WHERE documents.content_hash <> excluded.content_hash
    `);

    const result: BulkUpsertResult = { written: [], unchanged: [], failed: [] };
    const indexedAt = this.now().toISOString();

    const transaction = this.db.transaction(() => {
      for (const document of documents) {
        if (!document.key) {
          result.failed.push({ key: document.key, reason: 'empty document key', transient: false });
          continue;
        }

        try {
          const payload = JSON.stringify(document.payload);
          const hash = contentHash({
            title: document.title,
            body: document.body,
            date: document.date,
            url: document.url,
            payload: document.payload,
          });
          const info = upsert.run(
            collection,
            document.key,
            document.title,
            document.body,
            document.date,
            document.url,
            payload,
            hash,
            indexedAt,
          );
          if (info.changes === 0) {
            result.unchanged.push(document.key);
          } else {
            result.written.push(document.key);
          }
        } catch (error) {
          if (isTransientStoreError(error)) {
            throw error;
          }
          result.failed.push({ key: document.key, reason: errorMessage(error), transient: false });
        }
      }
    });

    transaction();
    return result;
  }

  async search(collection: string | null, query: SearchQuery): Promise<SearchHit[]> {
    return searchDocuments(this.db, collection, query);
  }

  async count(collection: string): Promise<number> {
    const row = this.db
      .prepare('SELECT COUNT(*) AS count FROM documents WHERE collection = ?')
      .get(collection) as { count: number };
    return row.count;
  }

  async get(collection: string, key: string): Promise<StoredDocument | null> {
    const row = this.db
      .prepare('SELECT * FROM documents WHERE collection = ? AND doc_key = ?')
      .get(collection, key) as DocumentRow | undefined;
    return row ? toStoredDocument(row) : null;
  }

  async listKeys(collection: string): Promise<string[]> {
    const rows = this.db
      .prepare('SELECT doc_key FROM documents WHERE collection = ? ORDER BY doc_key')
      .all(collection) as Array<{ doc_key: string }>;
    return rows.map((row) => row.doc_key);
  }
}
