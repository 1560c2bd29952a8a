import type { Database } from 'better-sqlite3';

import { listLatestRuns } from '../db/runs.js';
import type { RunStatus } from '../db/types.js';

export interface CollectionSummary {
  source_id: string;
  source_name: string;
  authority: string;
  official_portal: string;
  collection: string;
  document_count: number;
  coverage_note: string;
  last_run: {
    status: RunStatus;
    finished_at: string;
    indexed: number;
    failed: number;
  } | null;
}

interface SourceCountRow {
  source_id: string;
  source_name: string;
  authority: string;
  official_portal: string;
  collection: string;
  coverage_note: string;
  document_count: number;
}

export async function listCollections(db: Database): Promise<CollectionSummary[]> {
  const rows = db
    .prepare(
      `
      SELECT
        s.id AS source_id,
        s.name AS source_name,
        s.authority,
        s.official_portal,
        s.collection,
        s.coverage_note,
        (SELECT COUNT(*) FROM documents d WHERE d.collection = s.collection) AS document_count
      FROM sources s
      ORDER BY s.id
    `,
    )
    .all() as SourceCountRow[];

  const runs = listLatestRuns(db);

  return rows.map((row) => {
    const latest = runs.get(row.source_id)?.latest;
    return {
      ...row,
      last_run: latest
        ? {
            status: latest.status,
            finished_at: latest.finished_at,
            indexed: latest.indexed,
            failed: latest.failed,
          }
        : null,
    };
  });
}
