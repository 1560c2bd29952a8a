import type { Database } from 'better-sqlite3';

import { searchDocuments } from '../db/store.js';
import { normalizeLimit, requireCollection } from './tool-utils.js';

export interface SearchDocumentsInput {
  query?: string;
  collection?: string;
  date_from?: string;
  date_to?: string;
  limit?: number;
}

export interface SearchDocumentsResult {
  collection: string;
  key: string;
  title: string;
  snippet: string;
  date: string | null;
  url: string | null;
  relevance: number | null;
}

export async function searchDocumentsTool(
  db: Database,
  input: SearchDocumentsInput,
): Promise<SearchDocumentsResult[]> {
  const query = input.query?.trim() ?? '';
  const collection = input.collection ? requireCollection(input.collection) : null;

  if (query.length === 0 && !collection) {
    throw new Error('query or collection is required');
  }

  const hits = searchDocuments(db, collection, {
    text: query || undefined,
    dateFrom: input.date_from,
    dateTo: input.date_to,
    limit: normalizeLimit(input.limit),
  });

  return hits.map((hit) => ({
    collection: hit.collection,
    key: hit.key,
    title: hit.title,
    snippet: hit.snippet,
    date: hit.date,
    url: hit.url,
    relevance: hit.score,
  }));
}
