import type { Database } from 'better-sqlite3';

import { listLatestRuns } from '../db/runs.js';
import { ageInDays, frequencyThresholdDays } from './tool-utils.js';

export type FreshnessStatus = 'fresh' | 'warning' | 'stale' | 'never_loaded';

export interface CheckDataFreshnessInput {
  as_of?: string;
  status?: FreshnessStatus;
}

export interface FreshnessEntry {
  source_id: string;
  source_name: string;
  update_frequency: string;
  last_success_at: string | null;
  last_run_status: string | null;
  last_run_error: string | null;
  expected_max_age_days: number;
  age_days: number | null;
  evaluated_status: FreshnessStatus;
}

export interface CheckDataFreshnessResult {
  as_of: string;
  totals: Record<FreshnessStatus, number>;
  entries: FreshnessEntry[];
}

interface SourceRow {
  id: string;
  name: string;
  update_frequency: string;
}

export async function checkDataFreshness(
  db: Database,
  input: CheckDataFreshnessInput,
): Promise<CheckDataFreshnessResult> {
  const asOf = input.as_of ?? new Date().toISOString().slice(0, 10);
  const sources = db.prepare('SELECT id, name, update_frequency FROM sources ORDER BY id').all() as SourceRow[];
  const runs = listLatestRuns(db);

  const entries = sources
    .map((source) => {
      const summary = runs.get(source.id);
      const expectedMaxAgeDays = frequencyThresholdDays(source.update_frequency);
      const lastSuccess = summary?.last_success_at ?? null;
      const ageDays = lastSuccess ? ageInDays(lastSuccess, asOf) : null;

      return {
        source_id: source.id,
        source_name: source.name,
        update_frequency: source.update_frequency,
        last_success_at: lastSuccess,
        last_run_status: summary?.latest.status ?? null,
        last_run_error: summary?.latest.error ?? null,
        expected_max_age_days: expectedMaxAgeDays,
        age_days: ageDays,
        evaluated_status: evaluateStatus(ageDays, expectedMaxAgeDays),
      } satisfies FreshnessEntry;
    })
    .filter((entry) => (input.status ? entry.evaluated_status === input.status : true));

  const totals = entries.reduce<Record<FreshnessStatus, number>>(
    (accumulator, entry) => {
      accumulator[entry.evaluated_status] += 1;
      return accumulator;
    },
    {
      fresh: 0,
      warning: 0,
      stale: 0,
      never_loaded: 0,
    },
  );

  return {
    as_of: asOf,
    totals,
    entries,
  };
}

function evaluateStatus(ageDays: number | null, expectedMaxAgeDays: number): FreshnessStatus {
  if (ageDays === null || !Number.isFinite(ageDays)) {
    return 'never_loaded';
  }

  if (ageDays <= expectedMaxAgeDays) {
    return 'fresh';
  }

  if (ageDays <= expectedMaxAgeDays * 2) {
    return 'warning';
  }

  return 'stale';
}
