import type { Database } from 'better-sqlite3';

import type { IngestionRunRecord, IngestionRunRow } from './types.js';

export function recordIngestionRun(db: Database, run: IngestionRunRecord): number {
  const info = db
    .prepare(
      `
      INSERT INTO ingestion_runs (
        source,
        from_date,
        to_date,
        started_at,
        finished_at,
        status,
        attempted,
        indexed,
        unchanged,
        failed,
        pages_total,
        pages_failed,
        error
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `,
    )
    .run(
      run.source,
      run.from_date,
      run.to_date,
      run.started_at,
      run.finished_at,
      run.status,
      run.attempted,
      run.indexed,
      run.unchanged,
      run.failed,
      run.pages_total,
      run.pages_failed,
      run.error,
    );
  return Number(info.lastInsertRowid);
}

/** Most recent run per source, plus the most recent successful finish. */
export interface SourceRunSummary {
  latest: IngestionRunRow;
  last_success_at: string | null;
}

export function listLatestRuns(db: Database): Map<string, SourceRunSummary> {
  const rows = db
    .prepare(
      `
      SELECT r.*
      FROM ingestion_runs r
      WHERE r.id = (
        SELECT MAX(inner_runs.id) FROM ingestion_runs inner_runs WHERE inner_runs.source = r.source
      )
      ORDER BY r.source
    `,
    )
    .all() as IngestionRunRow[];

  const successes = db
    .prepare(
      `
      SELECT source, MAX(finished_at) AS last_success_at
      FROM ingestion_runs
      WHERE status = 'completed'
      GROUP BY source
    `,
    )
    .all() as Array<{ source: string; last_success_at: string }>;
  const successBySource = new Map(successes.map((row) => [row.source, row.last_success_at]));

  const summaries = new Map<string, SourceRunSummary>();
  for (const row of rows) {
    summaries.set(row.source, { latest: row, last_success_at: successBySource.get(row.source) ?? null });
  }
  return summaries;
}
