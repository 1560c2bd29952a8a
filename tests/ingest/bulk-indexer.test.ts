import Database from 'better-sqlite3';
import { describe, expect, it, vi } from 'vitest';

import { SqliteSearchStore, type BulkUpsertResult, type SearchStore } from '../../src/db/store.js';
import type { IndexDocument } from '../../src/db/types.js';
import { BulkIndexer } from '../../src/ingest/bulk-indexer.js';
import { PartialBulkFailure } from '../../src/ingest/errors.js';
import { ManualClock } from '../fixtures/clock.js';
import { silentLogger } from '../fixtures/mock-transport.js';

interface Note {
  id: number;
  text: string;
}

function noteToDocument(note: Note): IndexDocument {
  return { key: `k${note.id}`, title: note.text, body: note.text, date: null, url: null, payload: { id: note.id } };
}

function scriptedStore(...results: Array<BulkUpsertResult | Error>) {
  const bulkUpsert = vi.fn(async (_collection: string, _documents: readonly IndexDocument[]) => {
    const next = results.shift();
    if (!next) {
      throw new Error('unexpected bulk call');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
  const store: SearchStore = {
    bulkUpsert,
    search: async () => [],
    count: async () => 0,
    get: async () => null,
    listKeys: async () => [],
  };
  return { store, bulkUpsert };
}

function indexerFor(store: SearchStore, maxRetries = 2) {
  const clock = new ManualClock();
  const indexer = new BulkIndexer(store, 'notes', noteToDocument, {
    maxRetries,
    retryDelayMs: 50,
    logger: silentLogger,
    clock,
  });
  return { indexer, clock };
}

describe('BulkIndexer', () => {
  it('keeps the last record per key and reports unchanged documents on a repeat load', async () => {
    const store = new SqliteSearchStore(new Database(':memory:'));
    const { indexer } = indexerFor(store);
    const notes = [
      { id: 1, text: 'first draft' },
      { id: 1, text: 'final text' },
      { id: 2, text: 'another note' },
    ];

    await expect(indexer.store(notes)).resolves.toEqual({ submitted: 2, written: 2, unchanged: 0 });
    await expect(indexer.store(notes)).resolves.toEqual({ submitted: 2, written: 0, unchanged: 2 });
    expect((await store.get('notes', 'k1'))?.title).toBe('final text');
  });

  it('retries only the transiently rejected documents', async () => {
    const { store, bulkUpsert } = scriptedStore(
      { written: ['k1'], unchanged: [], failed: [{ key: 'k2', reason: 'busy', transient: true }] },
      { written: ['k2'], unchanged: [], failed: [] },
    );
    const { indexer, clock } = indexerFor(store);

    const result = await indexer.store([
      { id: 1, text: 'one' },
      { id: 2, text: 'two' },
    ]);

    expect(result).toEqual({ submitted: 2, written: 2, unchanged: 0 });
    expect(bulkUpsert).toHaveBeenCalledTimes(2);
    expect(bulkUpsert.mock.calls[1][1].map((document) => document.key)).toEqual(['k2']);
    expect(clock.sleeps).toEqual([50]);
  });

  it('reports permanent rejections without retrying them', async () => {
    const { store, bulkUpsert } = scriptedStore({
      written: ['k1'],
      unchanged: [],
      failed: [{ key: 'k2', reason: 'bad document', transient: false }],
    });
    const { indexer } = indexerFor(store);

    const error = await indexer
      .store([
        { id: 1, text: 'one' },
        { id: 2, text: 'two' },
      ])
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PartialBulkFailure);
    expect(error).toMatchObject({ failedKeys: ['k2'], accepted: 1, causes: { k2: 'bad document' } });
    expect(bulkUpsert).toHaveBeenCalledTimes(1);
  });

  it('retries a failed call, then fails every pending document', async () => {
    const { store, bulkUpsert } = scriptedStore(new Error('store down'), new Error('store down'));
    const { indexer, clock } = indexerFor(store, 1);

    const error = await indexer
      .store([
        { id: 1, text: 'one' },
        { id: 2, text: 'two' },
      ])
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PartialBulkFailure);
    expect(error).toMatchObject({ failedKeys: ['k1', 'k2'], accepted: 0 });
    expect(bulkUpsert).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([50]);
  });

  it('treats a transient rejection on the last attempt as final', async () => {
    const { store } = scriptedStore({
      written: [],
      unchanged: [],
      failed: [{ key: 'k1', reason: 'locked', transient: true }],
    });
    const { indexer, clock } = indexerFor(store, 0);

    await expect(indexer.store([{ id: 1, text: 'one' }])).rejects.toMatchObject({ causes: { k1: 'locked' } });
    expect(clock.sleeps).toEqual([]);
  });

  it('does nothing for an empty batch', async () => {
    const { store, bulkUpsert } = scriptedStore();
    const { indexer } = indexerFor(store);

    await expect(indexer.store([])).resolves.toEqual({ submitted: 0, written: 0, unchanged: 0 });
    expect(bulkUpsert).not.toHaveBeenCalled();
  });
});
