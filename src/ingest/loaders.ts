import type { IngestionSettings } from '../config.js';
import type { SearchStore } from '../db/store.js';
import type { IndexDocument, IngestionRunRecord } from '../db/types.js';
import type { Logger } from '../logger.js';
import { BulkIndexer, type BulkIndexResult } from './bulk-indexer.js';
import type { Clock } from './clock.js';
import { chunk, settleBounded } from './concurrency.js';
import { PartialBulkFailure, errorMessage } from './errors.js';
import type { HierarchyResolver } from './hierarchy.js';
import { paginate, type Page, type PageProgress, type PaginationReport } from './paginate.js';
import type { RateLimitedCache } from './rate-limited-cache.js';

export interface IngestionContext {
  http: RateLimitedCache;
  store: SearchStore;
  hierarchy: HierarchyResolver;
  settings: IngestionSettings;
  logger: Logger;
  clock: Clock;
  signal?: AbortSignal;
  runLog?: (run: IngestionRunRecord) => void;
  /** Called once per completed page of every paginated source. */
  onProgress?: (progress: PageProgress) => void;
}

export interface DateRange {
  from: string;
  to: string;
}

/** Running counts for one source run. */
export class RunTally {
  attempted = 0;
  indexed = 0;
  unchanged = 0;
  failed = 0;
  pagesTotal = 0;
  pagesFailed = 0;

  addPagination(report: PaginationReport): void {
    this.pagesTotal += report.pagesTotal;
    this.pagesFailed += report.pagesFailed;
  }

  addIndexResult(result: BulkIndexResult): void {
    this.indexed += result.written;
    this.unchanged += result.unchanged;
  }

  addBulkFailure(failure: PartialBulkFailure): void {
    this.indexed += failure.accepted;
    this.failed += failure.failedKeys.length;
  }
}

function createIndexer<T>(
  context: IngestionContext,
  collection: string,
  toDocument: (record: T) => IndexDocument,
  logger: Logger,
): BulkIndexer<T> {
  return new BulkIndexer(context.store, collection, toDocument, {
    maxRetries: context.settings.storeRetries,
    retryDelayMs: context.settings.retryBackoffMs,
    clock: context.clock,
    logger,
  });
}

async function indexBatch<T>(
  indexer: BulkIndexer<T>,
  records: readonly T[],
  tally: RunTally,
  logger: Logger,
  signal?: AbortSignal,
): Promise<void> {
  if (records.length === 0) {
    return;
  }

  tally.attempted += records.length;
  try {
    tally.addIndexResult(await indexer.store(records, signal));
  } catch (error) {
    if (!(error instanceof PartialBulkFailure)) {
      throw error;
    }
    logger.warn(
      { collection: error.collection, failedKeys: error.failedKeys.slice(0, 10), accepted: error.accepted },
      error.message,
    );
    tally.addBulkFailure(error);
  }
}

export interface PaginatedSourceDefinition<TRecord> {
  label: string;
  collection: string;
  pageSize: number;
  concurrency: number;
  countQuery: (signal?: AbortSignal) => Promise<number>;
  fetchPage: (page: Page, signal?: AbortSignal) => Promise<unknown>;
  parsePage: (body: unknown) => TRecord[];
  isValid?: (record: TRecord) => boolean;
  /** Runs before a page is indexed. A failure keeps the record as fetched. */
  enrich?: (record: TRecord, signal?: AbortSignal) => Promise<TRecord>;
  enrichConcurrency?: number;
  /** Drops records already taken by an earlier page or pass. */
  select?: (records: TRecord[]) => TRecord[];
  toDocument: (record: TRecord) => IndexDocument;
}

/** Pagination driver feeding pages through optional enrichment into the indexer. */
export async function runPaginatedSource<TRecord>(
  context: IngestionContext,
  source: PaginatedSourceDefinition<TRecord>,
  tally: RunTally,
): Promise<PaginationReport> {
  const logger = context.logger.child({ label: source.label });
  const indexer = createIndexer(context, source.collection, source.toDocument, logger);
  const { enrich } = source;

  const report = await paginate(
    {
      label: source.label,
      pageSize: source.pageSize,
      concurrency: source.concurrency,
      countQuery: source.countQuery,
      fetchPage: source.fetchPage,
      parsePage: source.parsePage,
      isValid: source.isValid,
      logger,
      signal: context.signal,
      onProgress: context.onProgress,
    },
    async (records, page) => {
      const selected = source.select ? source.select(records) : records;
      let ready = selected;

      if (enrich) {
        const settled = await settleBounded(selected, source.enrichConcurrency ?? 5, (record) =>
          enrich(record, context.signal),
        );
        ready = settled.map((result, index) => {
          if (result.ok) {
            return result.value;
          }
          logger.warn({ page: page.index, err: errorMessage(result.error) }, 'enrichment failed, indexing record as fetched');
          return selected[index];
        });
      }

      await indexBatch(indexer, ready, tally, logger, context.signal);
    },
  );

  tally.addPagination(report);
  return report;
}

export interface AggregateSourceDefinition<TId, TRecord> {
  label: string;
  collection: string;
  /** Item identifiers to load. A failure here fails the run. */
  discover: (signal?: AbortSignal) => Promise<TId[]>;
  /** Detail call plus sub-resources merged into one record; null skips the item. */
  loadItem: (id: TId, signal?: AbortSignal) => Promise<TRecord | null>;
  batchSize?: number;
  toDocument: (record: TRecord) => IndexDocument;
}

export interface AggregateReport {
  label: string;
  discovered: number;
  loaded: number;
  batchesTotal: number;
  batchesFailed: number;
}

/**
 * Discovery, then items in fixed batches. Each batch is indexed as soon as it
 * has loaded; a batch counts as failed when none of its items loaded.
 */
export async function runAggregateSource<TId, TRecord>(
  context: IngestionContext,
  source: AggregateSourceDefinition<TId, TRecord>,
  tally: RunTally,
): Promise<AggregateReport> {
  const logger = context.logger.child({ label: source.label });
  const indexer = createIndexer(context, source.collection, source.toDocument, logger);
  const batchSize = source.batchSize ?? 3;

  const ids = await source.discover(context.signal);
  const batches = chunk(ids, batchSize);
  logger.info({ discovered: ids.length, batches: batches.length }, 'discovery finished');

  const report: AggregateReport = {
    label: source.label,
    discovered: ids.length,
    loaded: 0,
    batchesTotal: batches.length,
    batchesFailed: 0,
  };

  for (const [index, batch] of batches.entries()) {
    context.signal?.throwIfAborted();
    const settled = await settleBounded(batch, batchSize, (id) => source.loadItem(id, context.signal));

    const records: TRecord[] = [];
    let errors = 0;
    for (const [position, result] of settled.entries()) {
      if (!result.ok) {
        errors++;
        logger.warn({ id: batch[position], err: errorMessage(result.error) }, 'item failed');
      } else if (result.value !== null) {
        records.push(result.value);
      }
    }
    tally.failed += errors;

    try {
      await indexBatch(indexer, records, tally, logger, context.signal);
    } catch (error) {
      logger.warn({ batch: index, err: errorMessage(error) }, 'batch failed to index');
      tally.failed += records.length;
      report.batchesFailed++;
      continue;
    }

    report.loaded += records.length;
    if (errors === batch.length) {
      report.batchesFailed++;
    }
    logger.debug({ batch: index + 1, of: batches.length, loaded: records.length }, 'batch indexed');
  }

  tally.pagesTotal += report.batchesTotal;
  tally.pagesFailed += report.batchesFailed;
  logger.info({ loaded: report.loaded, batchesFailed: report.batchesFailed }, 'aggregate load finished');
  return report;
}
