import type { Database } from 'better-sqlite3';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { about } from '../../src/tools/about.js';
import { checkDataFreshness } from '../../src/tools/check-data-freshness.js';
import { getDocument } from '../../src/tools/get-document.js';
import { listCollections } from '../../src/tools/list-collections.js';
import { searchDocumentsTool } from '../../src/tools/search-documents.js';
import { TOOLS, callTool } from '../../src/tools/shared-tools.js';
import { closeStoreTestDatabase, createStoreTestDatabase } from '../fixtures/store-db.js';

describe('search tool suite', () => {
  let db: Database;

  beforeAll(async () => {
    db = await createStoreTestDatabase();
  });

  afterAll(() => {
    closeStoreTestDatabase(db);
  });

  it('search_documents matches text across collections', async () => {
    const result = await searchDocumentsTool(db, { query: 'inflation' });

    expect(result.map((hit) => hit.key).sort()).toEqual(['debate_sec-a_contrib_c1', 'pq_2']);
    expect(result.every((hit) => typeof hit.relevance === 'number')).toBe(true);
  });

  it('search_documents highlights the match within one collection', async () => {
    const result = await searchDocumentsTool(db, { query: 'inflation', collection: 'parliamentary_questions' });

    expect(result).toHaveLength(1);
    expect(result[0]).toMatchObject({ collection: 'parliamentary_questions', key: 'pq_2', date: '2025-01-09' });
    expect(result[0].snippet).toContain('[inflation]');
  });

  it('search_documents lists a collection newest first without a query', async () => {
    const result = await searchDocumentsTool(db, { collection: 'parliamentary_questions' });

    expect(result.map((hit) => hit.key)).toEqual(['pq_2', 'pq_1']);
    expect(result[1].snippet).toBe('Asked by Jane Doe\nWhat assessment has been made of mortgage interest rates?');
    expect(result[1].relevance).toBeNull();
  });

  it('search_documents filters by date', async () => {
    const result = await searchDocumentsTool(db, {
      collection: 'parliamentary_questions',
      date_from: '2025-01-08',
    });

    expect(result.map((hit) => hit.key)).toEqual(['pq_2']);
  });

  it('search_documents needs a query or a collection', async () => {
    await expect(searchDocumentsTool(db, { query: '  ' })).rejects.toThrow('query or collection is required');
    await expect(searchDocumentsTool(db, { collection: 'gazette' })).rejects.toThrow('collection must be one of');
  });

  it('get_document returns the stored payload', async () => {
    const result = await getDocument(db, { collection: 'authorised_firms', key: 'firm_100001' });

    expect(result).toMatchObject({
      collection: 'authorised_firms',
      key: 'firm_100001',
      title: 'Acme Ltd',
      date: '2015-02-01',
      payload: { frn: '100001', status: 'Authorised' },
      indexedAt: '2025-01-09T12:00:00.000Z',
    });
  });

  it('get_document returns null for an unknown key', async () => {
    expect(await getDocument(db, { collection: 'authorised_firms', key: 'firm_999999' })).toBeNull();
  });

  it('list_collections reports counts and the latest run per source', async () => {
    const result = await listCollections(db);

    expect(result.map((entry) => entry.source_id)).toEqual([
      'firms-register',
      'hansard',
      'individuals',
      'parliamentary-questions',
      'products',
    ]);
    expect(result[0]).toMatchObject({
      collection: 'authorised_firms',
      document_count: 1,
      last_run: { status: 'failed', finished_at: '2025-01-09T10:00:00.000Z', indexed: 0, failed: 1 },
    });
    expect(result[3].document_count).toBe(2);
    expect(result[4]).toMatchObject({ document_count: 0, last_run: null });
  });

  it('check_data_freshness grades each source against its update frequency', async () => {
    const result = await checkDataFreshness(db, { as_of: '2025-01-10' });

    expect(result.totals).toEqual({ fresh: 1, warning: 1, stale: 1, never_loaded: 2 });
    expect(result.entries.map((entry) => [entry.source_id, entry.evaluated_status])).toEqual([
      ['firms-register', 'stale'],
      ['hansard', 'fresh'],
      ['individuals', 'never_loaded'],
      ['parliamentary-questions', 'warning'],
      ['products', 'never_loaded'],
    ]);
    expect(result.entries[0]).toMatchObject({
      last_success_at: '2024-12-20T10:00:00.000Z',
      last_run_status: 'failed',
      last_run_error: 'every firm search failed',
      age_days: 20,
    });
  });

  it('check_data_freshness filters by status', async () => {
    const result = await checkDataFreshness(db, { as_of: '2025-01-10', status: 'never_loaded' });

    expect(result.entries.map((entry) => entry.source_id)).toEqual(['individuals', 'products']);
  });

  it('about reports live totals', async () => {
    const result = await about(db);

    expect(result.stats).toEqual({
      total_documents: 5,
      total_sources: 5,
      collections: {
        hansard_contributions: 1,
        parliamentary_questions: 2,
        authorised_firms: 1,
        individuals: 1,
        products: 0,
      },
    });
    expect(result.freshness.last_ingestion).toBe('2025-01-09T10:00:00.000Z');
    expect(result.supported_tools).toEqual(TOOLS.map((tool) => tool.name));
  });
});

describe('callTool', () => {
  let db: Database;

  beforeAll(async () => {
    db = await createStoreTestDatabase();
  });

  afterAll(() => {
    closeStoreTestDatabase(db);
  });

  it('dispatches validated arguments', async () => {
    const result = await callTool(db, 'get_document', { collection: 'parliamentary_questions', key: 'pq_1' });

    expect(result).toMatchObject({ key: 'pq_1', title: 'Mortgage Interest Rates' });
  });

  it('rejects malformed arguments with the failing field', async () => {
    await expect(callTool(db, 'search_documents', { query: 'rates', date_from: 'yesterday' })).rejects.toThrow(
      'Invalid arguments for search_documents: date_from: expected YYYY-MM-DD',
    );
    await expect(callTool(db, 'get_document', { collection: 'individuals' })).rejects.toThrow(
      'Invalid arguments for get_document: key: Required',
    );
    await expect(callTool(db, 'about', { verbose: true })).rejects.toThrow('Invalid arguments for about');
  });

  it('rejects unknown tools', async () => {
    await expect(callTool(db, 'search_sources', {})).rejects.toThrow('Unknown tool "search_sources".');
  });
});
