import type { Database } from 'better-sqlite3';

import { COLLECTION_NAMES } from '../config.js';

export const SERVER_VERSION = '0.1.0';

export const SUPPORTED_TOOLS = [
  'search_documents',
  'get_document',
  'list_collections',
  'check_data_freshness',
  'about',
] as const;

export interface AboutResult {
  name: string;
  package: string;
  version: string;
  description: string;
  stats: {
    total_documents: number;
    total_sources: number;
    collections: Record<string, number>;
  };
  data_sources: Array<{
    name: string;
    url: string;
    authority: string;
  }>;
  freshness: {
    last_ingestion: string | null;
  };
  disclaimer: string;
  supported_tools: string[];
}

interface CountRow {
  count: number;
}

interface CollectionCountRow {
  collection: string;
  count: number;
}

interface SourceRow {
  name: string;
  official_portal: string;
  authority: string;
}

export async function about(db: Database): Promise<AboutResult> {
  const sources = queryCount(db, 'SELECT COUNT(*) AS count FROM sources');
  const countRows = db
    .prepare('SELECT collection, COUNT(*) AS count FROM documents GROUP BY collection')
    .all() as CollectionCountRow[];

  const collections: Record<string, number> = Object.fromEntries(COLLECTION_NAMES.map((name) => [name, 0]));
  for (const row of countRows) {
    collections[row.collection] = row.count;
  }
  const totalDocuments = countRows.reduce((sum, row) => sum + row.count, 0);

  const sourceRows = db.prepare('SELECT name, official_portal, authority FROM sources ORDER BY id').all() as SourceRow[];
  const lastIngestion = db.prepare('SELECT MAX(finished_at) AS finished_at FROM ingestion_runs').get() as {
    finished_at: string | null;
  };

  return {
    name: 'Register Search MCP',
    package: 'register-search-mcp',
    version: SERVER_VERSION,
    description:
      'Full-text search over UK parliamentary debates, written questions and the FCA Financial Services Register.',
    stats: {
      total_documents: totalDocuments,
      total_sources: sources,
      collections,
    },
    data_sources: sourceRows.map((s) => ({
      name: s.name,
      url: s.official_portal,
      authority: s.authority,
    })),
    freshness: {
      last_ingestion: lastIngestion.finished_at,
    },
    disclaimer:
      'This is a reference tool, not professional advice. Register entries and parliamentary records change; verify critical data against the official sources.',
    supported_tools: [...SUPPORTED_TOOLS],
  };
}

function queryCount(db: Database, sql: string): number {
  const row = db.prepare(sql).get() as CountRow;
  return row.count;
}
