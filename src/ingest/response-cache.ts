import fs from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';

import { systemClock, type Clock } from './clock.js';

export interface CachedResponse {
  status: number;
  url: string;
  contentType: string;
  body: string;
  storedAt: number;
}

export interface ResponseCache {
  get(id: string): CachedResponse | null;
  set(id: string, response: CachedResponse): void;
}

interface CacheRow {
  status: number;
  url: string;
  content_type: string;
  body: string;
  stored_at: number;
}

const CACHE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS http_cache (
  id TEXT PRIMARY KEY,
  status INTEGER NOT NULL,
  url TEXT NOT NULL,
  content_type TEXT NOT NULL,
  body TEXT NOT NULL,
  stored_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_http_cache_stored_at ON http_cache(stored_at);
`;

/**
 * Disk-backed response cache. Entries expire a fixed TTL after they were
 * stored; reads never extend an entry's life.
 */
export class SqliteResponseCache implements ResponseCache {
  private readonly db: Database.Database;
  private readonly ttlMs: number;
  private readonly clock: Clock;

  constructor(db: Database.Database, options: { ttlMs: number; clock?: Clock }) {
    this.db = db;
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? systemClock;
    this.db.exec(CACHE_SCHEMA_SQL);
  }

  static open(filePath: string, options: { ttlMs: number; clock?: Clock }): SqliteResponseCache {
    if (filePath !== ':memory:') {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
    }
    const db = new Database(filePath);
    db.pragma('journal_mode = WAL');
    return new SqliteResponseCache(db, options);
  }

  get(id: string): CachedResponse | null {
    const row = this.db
      .prepare('SELECT status, url, content_type, body, stored_at FROM http_cache WHERE id = ?')
      .get(id) as CacheRow | undefined;

    if (!row) {
      return null;
    }

    if (this.isExpired(row.stored_at)) {
      this.db.prepare('DELETE FROM http_cache WHERE id = ?').run(id);
      return null;
    }

    return {
      status: row.status,
      url: row.url,
      contentType: row.content_type,
      body: row.body,
      storedAt: row.stored_at,
    };
  }

  set(id: string, response: CachedResponse): void {
    this.db
      .prepare(
        `
        INSERT OR REPLACE INTO http_cache (id, status, url, content_type, body, stored_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `,
      )
      .run(id, response.status, response.url, response.contentType, response.body, response.storedAt);
  }

  purgeExpired(): number {
    const result = this.db
      .prepare('DELETE FROM http_cache WHERE stored_at <= ?')
      .run(this.clock.now() - this.ttlMs);
    return result.changes;
  }

  size(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM http_cache').get() as { count: number };
    return row.count;
  }

  close(): void {
    this.db.close();
  }

  private isExpired(storedAt: number): boolean {
    return this.clock.now() - storedAt >= this.ttlMs;
  }
}
