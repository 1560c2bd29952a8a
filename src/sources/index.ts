import { COLLECTIONS } from '../config.js';
import type { IngestionRunRecord, RunStatus, SourceRecord } from '../db/types.js';
import { IngestionError, errorMessage } from '../ingest/errors.js';
import { RunTally, type DateRange, type IngestionContext } from '../ingest/loaders.js';
import { loadFirmsRegister } from './firms-register.js';
import { loadHansard } from './hansard.js';
import { loadIndividuals } from './individuals.js';
import { loadParliamentaryQuestions } from './parliamentary-questions.js';
import { loadProducts } from './products.js';

export const SOURCE_IDS = ['hansard', 'parliamentary-questions', 'firms-register', 'individuals', 'products'] as const;
export type SourceId = (typeof SOURCE_IDS)[number];

interface SourceDefinition extends SourceRecord {
  id: SourceId;
  run: (context: IngestionContext, range: DateRange | null, tally: RunTally) => Promise<void>;
}

function requireRange(id: SourceId, range: DateRange | null): DateRange {
  if (!range) {
    throw new IngestionError(`${id} needs a date range`);
  }
  return range;
}

export const SOURCES: Record<SourceId, SourceDefinition> = {
  hansard: {
    id: 'hansard',
    name: 'Hansard contributions',
    authority: 'UK Parliament',
    official_portal: 'https://hansard.parliament.uk',
    collection: COLLECTIONS.hansardContributions,
    update_frequency: 'daily',
    requires_date_range: true,
    coverage_note: 'Spoken, written, correction and petition contributions with their debate section ancestry.',
    run: (context, range, tally) => loadHansard(context, requireRange('hansard', range), tally),
  },
  'parliamentary-questions': {
    id: 'parliamentary-questions',
    name: 'Written questions',
    authority: 'UK Parliament',
    official_portal: 'https://questions-statements.parliament.uk',
    collection: COLLECTIONS.parliamentaryQuestions,
    update_frequency: 'daily',
    requires_date_range: true,
    coverage_note: 'Written questions tabled or answered in the window, with full question and answer text.',
    run: (context, range, tally) =>
      loadParliamentaryQuestions(context, requireRange('parliamentary-questions', range), tally),
  },
  'firms-register': {
    id: 'firms-register',
    name: 'Authorised firms',
    authority: 'Financial Conduct Authority',
    official_portal: 'https://register.fca.org.uk',
    collection: COLLECTIONS.authorisedFirms,
    update_frequency: 'daily',
    requires_date_range: false,
    coverage_note: 'Firms found by register search, with names, address, permissions, individuals, requirements and disciplinary history.',
    run: (context, _range, tally) => loadFirmsRegister(context, tally),
  },
  individuals: {
    id: 'individuals',
    name: 'Approved individuals',
    authority: 'Financial Conduct Authority',
    official_portal: 'https://register.fca.org.uk',
    collection: COLLECTIONS.individuals,
    update_frequency: 'weekly',
    requires_date_range: false,
    coverage_note: 'Individuals linked to indexed firms, with controlled functions and disciplinary history.',
    run: (context, _range, tally) => loadIndividuals(context, tally),
  },
  products: {
    id: 'products',
    name: 'Collective investment schemes',
    authority: 'Financial Conduct Authority',
    official_portal: 'https://register.fca.org.uk',
    collection: COLLECTIONS.products,
    update_frequency: 'weekly',
    requires_date_range: false,
    coverage_note: 'Funds found by register search, with sub-funds and other names.',
    run: (context, _range, tally) => loadProducts(context, tally),
  },
};

export function isSourceId(value: string): value is SourceId {
  return (SOURCE_IDS as readonly string[]).includes(value);
}

export function sourceRecords(): SourceRecord[] {
  return SOURCE_IDS.map((id) => {
    const { run: _run, ...record } = SOURCES[id];
    return record;
  });
}

export interface SourceRunReport {
  source: SourceId;
  status: RunStatus;
  from: string | null;
  to: string | null;
  attempted: number;
  indexed: number;
  unchanged: number;
  failed: number;
  pagesTotal: number;
  pagesFailed: number;
  error: string | null;
  durationMs: number;
}

/**
 * Runs one source and appends the outcome to the run log. The run fails when
 * counting or discovery fails, or when every page failed.
 */
export async function loadSource(
  context: IngestionContext,
  sourceId: string,
  range: DateRange | null,
): Promise<SourceRunReport> {
  if (!isSourceId(sourceId)) {
    throw new IngestionError(`unknown source "${sourceId}" (supported: ${SOURCE_IDS.join(', ')})`);
  }
  const source = SOURCES[sourceId];
  if (source.requires_date_range && !range) {
    throw new IngestionError(`${sourceId} needs --from-date`);
  }

  const logger = context.logger.child({ source: sourceId });
  const tally = new RunTally();
  const startedAt = context.clock.now();
  let error: string | null = null;

  logger.info({ from: range?.from ?? null, to: range?.to ?? null }, 'source run started');
  try {
    await source.run({ ...context, logger }, range, tally);
  } catch (caught) {
    error = errorMessage(caught);
    logger.error({ err: error }, 'source run failed');
  }

  if (!error && tally.pagesTotal > 0 && tally.pagesFailed === tally.pagesTotal) {
    error = `all ${tally.pagesTotal} pages failed`;
  }

  const finishedAt = context.clock.now();
  const report: SourceRunReport = {
    source: sourceId,
    status: error ? 'failed' : 'completed',
    from: range?.from ?? null,
    to: range?.to ?? null,
    attempted: tally.attempted,
    indexed: tally.indexed,
    unchanged: tally.unchanged,
    failed: tally.failed,
    pagesTotal: tally.pagesTotal,
    pagesFailed: tally.pagesFailed,
    error,
    durationMs: finishedAt - startedAt,
  };

  context.runLog?.(toRunRecord(report, startedAt, finishedAt));
  logger.info({ ...report }, 'source run finished');

  context.signal?.throwIfAborted();
  return report;
}

function toRunRecord(report: SourceRunReport, startedAt: number, finishedAt: number): IngestionRunRecord {
  return {
    source: report.source,
    from_date: report.from,
    to_date: report.to,
    started_at: new Date(startedAt).toISOString(),
    finished_at: new Date(finishedAt).toISOString(),
    status: report.status,
    attempted: report.attempted,
    indexed: report.indexed,
    unchanged: report.unchanged,
    failed: report.failed,
    pages_total: report.pagesTotal,
    pages_failed: report.pagesFailed,
    error: report.error,
  };
}
