import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { listLatestRuns, recordIngestionRun } from '../../src/db/runs.js';
import { createSearchSchema, resetSearchSchema } from '../../src/db/schema.js';
import { SqliteSearchStore, toFtsQuery } from '../../src/db/store.js';
import type { IndexDocument, IngestionRunRecord } from '../../src/db/types.js';

function document(key: string, title: string, body: string, date: string | null): IndexDocument {
  return { key, title, body, date, url: `https://example.test/${key}`, payload: { key } };
}

function run(overrides: Partial<IngestionRunRecord>): IngestionRunRecord {
  return {
    source: 'hansard',
    from_date: '2025-01-06',
    to_date: '2025-01-10',
    started_at: '2025-01-10T09:00:00.000Z',
    finished_at: '2025-01-10T09:05:00.000Z',
    status: 'completed',
    attempted: 10,
    indexed: 10,
    unchanged: 0,
    failed: 0,
    pages_total: 1,
    pages_failed: 0,
    error: null,
    ...overrides,
  };
}

describe('SqliteSearchStore', () => {
  let db: Database.Database;
  let store: SqliteSearchStore;

  beforeEach(() => {
    db = new Database(':memory:');
    store = new SqliteSearchStore(db, { now: () => new Date('2025-01-10T12:00:00Z') });
  });

  afterEach(() => {
    db.close();
  });

  it('writes new documents, skips unchanged ones and rewrites changed ones', async () => {
    const original = document('pq_1', 'Inflation targets', 'Question about inflation targets.', '2025-01-06');

    expect(await store.bulkUpsert('parliamentary_questions', [original])).toEqual({
      written: ['pq_1'],
      unchanged: [],
      failed: [],
    });
    expect(await store.bulkUpsert('parliamentary_questions', [original])).toEqual({
      written: [],
      unchanged: ['pq_1'],
      failed: [],
    });

    const revised = { ...original, body: 'Question about housing supply.' };
    expect((await store.bulkUpsert('parliamentary_questions', [revised])).written).toEqual(['pq_1']);

    expect(await store.search(null, { text: 'housing', limit: 10 })).toHaveLength(1);
    expect(await store.search(null, { text: 'targets.', limit: 10 })).toHaveLength(1);
    expect(await store.search(null, { text: 'inflation question', limit: 10 })).toHaveLength(1);
    expect(await store.count('parliamentary_questions')).toBe(1);
  });

  it('drops the old text from the full-text index after an update', async () => {
    await store.bulkUpsert('hansard_contributions', [document('d1', 'Debate', 'banking reform', '2025-01-06')]);
    await store.bulkUpsert('hansard_contributions', [document('d1', 'Debate', 'pension reform', '2025-01-06')]);

    expect(await store.search(null, { text: 'banking', limit: 10 })).toEqual([]);
    expect((await store.search(null, { text: 'pension', limit: 10 }))[0].key).toBe('d1');
  });

  it('rejects an empty key as a permanent failure and keeps the rest', async () => {
    const result = await store.bulkUpsert('products', [
      document('', 'Nameless', 'no key', null),
      document('product_1', 'Growth Fund', 'a fund', null),
    ]);

    expect(result.written).toEqual(['product_1']);
    expect(result.failed).toEqual([{ key: '', reason: 'empty document key', transient: false }]);
  });

  it('round-trips the stored document with its payload', async () => {
    await store.bulkUpsert('authorised_firms', [document('firm_1', 'Acme Ltd', 'Acme body', '2015-02-01')]);

    const stored = await store.get('authorised_firms', 'firm_1');

    expect(stored).toMatchObject({
      collection: 'authorised_firms',
      key: 'firm_1',
      title: 'Acme Ltd',
      body: 'Acme body',
      date: '2015-02-01',
      url: 'https://example.test/firm_1',
      payload: { key: 'firm_1' },
      indexedAt: '2025-01-10T12:00:00.000Z',
    });
    expect(await store.get('authorised_firms', 'firm_2')).toBeNull();
  });

  it('filters by collection and date and lists newest first without a query', async () => {
    await store.bulkUpsert('parliamentary_questions', [
      document('pq_1', 'Older', 'old question', '2025-01-02'),
      document('pq_2', 'Newer', 'new question', '2025-01-08'),
      document('pq_3', 'Middle', 'middle question', '2025-01-05'),
    ]);
    await store.bulkUpsert('products', [document('product_1', 'Fund', 'question fund', '2025-01-09')]);

    const listed = await store.search('parliamentary_questions', { limit: 10 });
    expect(listed.map((hit) => hit.key)).toEqual(['pq_2', 'pq_3', 'pq_1']);
    expect(listed[0].score).toBeNull();

    const windowed = await store.search('parliamentary_questions', {
      text: 'question',
      dateFrom: '2025-01-03',
      dateTo: '2025-01-06',
      limit: 10,
    });
    expect(windowed.map((hit) => hit.key)).toEqual(['pq_3']);
  });

  it('marks matched terms in the snippet', async () => {
    await store.bulkUpsert('hansard_contributions', [
      document('d1', 'Rates', 'The Bank of England raised interest rates', '2025-01-06'),
    ]);

    const [hit] = await store.search('hansard_contributions', { text: 'interest', limit: 5 });

    expect(hit.snippet).toContain('[interest]');
    expect(typeof hit.score).toBe('number');
  });

  it('lists keys in order', async () => {
    await store.bulkUpsert('individuals', [
      document('individual_B', 'B', 'b', null),
      document('individual_A', 'A', 'a', null),
    ]);

    expect(await store.listKeys('individuals')).toEqual(['individual_A', 'individual_B']);
  });
});

describe('toFtsQuery', () => {
  it('quotes each term and escapes embedded quotes', () => {
    expect(toFtsQuery('  interest "rates" OR ')).toBe('"interest" """rates""" "OR"');
  });
});

describe('schema management', () => {
  it('keeps documents on create and drops them on reset', async () => {
    const db = new Database(':memory:');
    const store = new SqliteSearchStore(db);
    await store.bulkUpsert('products', [document('product_1', 'Fund', 'fund', null)]);

    createSearchSchema(db);
    expect(await store.count('products')).toBe(1);

    resetSearchSchema(db);
    expect(await store.count('products')).toBe(0);
    db.close();
  });
});

describe('ingestion run log', () => {
  it('summarises the latest run and the last success per source', () => {
    const db = new Database(':memory:');
    createSearchSchema(db);

    recordIngestionRun(db, run({ finished_at: '2025-01-08T09:05:00.000Z' }));
    recordIngestionRun(db, run({ finished_at: '2025-01-10T09:05:00.000Z', status: 'failed', error: 'count failed' }));
    recordIngestionRun(db, run({ source: 'products', finished_at: '2025-01-09T10:00:00.000Z', status: 'failed' }));

    const runs = listLatestRuns(db);

    expect(runs.get('hansard')?.latest.status).toBe('failed');
    expect(runs.get('hansard')?.latest.error).toBe('count failed');
    expect(runs.get('hansard')?.last_success_at).toBe('2025-01-08T09:05:00.000Z');
    expect(runs.get('products')?.last_success_at).toBeNull();
    db.close();
  });
});
