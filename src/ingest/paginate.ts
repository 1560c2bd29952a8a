import { z } from 'zod';

import type { Logger } from '../logger.js';
import { settleBounded } from './concurrency.js';
import { ValidationError, errorMessage } from './errors.js';
import type { FetchKey, RateLimitedCache } from './rate-limited-cache.js';

export interface Page {
  readonly index: number;
  readonly offset: number;
  readonly size: number;
}

export interface PageOutcome {
  page: Page;
  status: 'ok' | 'failed';
  records: number;
  error?: string;
}

export interface PageProgress {
  label: string;
  page: Page;
  records: number;
  pagesCompleted: number;
  pagesTotal: number;
}

export interface PaginationOptions<T> {
  label: string;
  pageSize: number;
  concurrency: number;
  countQuery: (signal?: AbortSignal) => Promise<number>;
  fetchPage: (page: Page, signal?: AbortSignal) => Promise<unknown>;
  /** Deserializes one page body; throws ValidationError when the body is malformed. */
  parsePage: (body: unknown) => T[];
  isValid?: (record: T) => boolean;
  logger: Logger;
  signal?: AbortSignal;
  onProgress?: (progress: PageProgress) => void;
}

export type PageSink<T> = (records: T[], page: Page) => Promise<void>;

export interface PaginationReport {
  label: string;
  totalCount: number;
  pagesTotal: number;
  pagesFailed: number;
  recordsFetched: number;
  outcomes: PageOutcome[];
}

export function computePages(totalCount: number, pageSize: number): Page[] {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`page size must be a positive integer, got ${pageSize}`);
  }

  const pages: Page[] = [];
  for (let offset = 0, index = 0; offset < totalCount; offset += pageSize, index++) {
    pages.push(Object.freeze({ index, offset, size: pageSize }));
  }
  return pages;
}

/**
 * Count, partition, then fan the pages out under a concurrency bound. A page
 * that fails to fetch, parse or reach the sink is logged and counted; the
 * count query is the only fatal step.
 */
export async function paginate<T>(options: PaginationOptions<T>, sink: PageSink<T>): Promise<PaginationReport> {
  const { label, logger, signal } = options;
  signal?.throwIfAborted();

  const totalCount = await options.countQuery(signal);
  if (!Number.isInteger(totalCount) || totalCount < 0) {
    throw new ValidationError(`${label}: invalid total count ${totalCount}`);
  }

  const pages = computePages(totalCount, options.pageSize);
  logger.info({ label, totalCount, pages: pages.length }, 'pagination started');

  let pagesCompleted = 0;
  const processPage = async (page: Page): Promise<PageOutcome> => {
    let outcome: PageOutcome;
    try {
      signal?.throwIfAborted();
      const body = await options.fetchPage(page, signal);
      const parsed = options.parsePage(body);
      const records = options.isValid ? parsed.filter(options.isValid) : parsed;
      if (records.length < parsed.length) {
        logger.debug({ label, page: page.index, dropped: parsed.length - records.length }, 'dropped invalid records');
      }
      await sink(records, page);
      outcome = { page, status: 'ok', records: records.length };
    } catch (error) {
      logger.warn({ label, page: page.index, offset: page.offset, err: errorMessage(error) }, 'page failed');
      outcome = { page, status: 'failed', records: 0, error: errorMessage(error) };
    }

    pagesCompleted++;
    options.onProgress?.({ label, page, records: outcome.records, pagesCompleted, pagesTotal: pages.length });
    return outcome;
  };

  const settled = await settleBounded(pages, options.concurrency, processPage);
  const outcomes = settled.map(
    (result, index): PageOutcome =>
      result.ok ? result.value : { page: pages[index], status: 'failed', records: 0, error: errorMessage(result.error) },
  );

  signal?.throwIfAborted();

  const report: PaginationReport = {
    label,
    totalCount,
    pagesTotal: pages.length,
    pagesFailed: outcomes.filter((outcome) => outcome.status === 'failed').length,
    recordsFetched: outcomes.reduce((sum, outcome) => sum + outcome.records, 0),
    outcomes,
  };
  logger.info(
    {
      label,
      pagesTotal: report.pagesTotal,
      pagesFailed: report.pagesFailed,
      recordsFetched: report.recordsFetched,
    },
    'pagination finished',
  );
  return report;
}

/**
 * The same run as a lazy record stream. Records arrive as pages complete, in
 * no particular page order. A page hands its records over only once the
 * consumer has taken the previous ones, so at most `concurrency` pages are
 * fetched ahead of the reader. Leaving the loop early aborts pages still in
 * flight and waits for them to settle.
 */
export async function* paginateRecords<T>(options: PaginationOptions<T>): AsyncGenerator<T, void, undefined> {
  const controller = new AbortController();
  const outer = options.signal;
  const forwardAbort = (): void => controller.abort(outer?.reason);
  if (outer?.aborted) {
    controller.abort(outer.reason);
  } else {
    outer?.addEventListener('abort', forwardAbort, { once: true });
  }

  const queue: T[] = [];
  const drained: Array<() => void> = [];
  const state: { done: boolean; failure: { error: unknown } | null; wake: (() => void) | null } = {
    done: false,
    failure: null,
    wake: null,
  };
  const notify = (): void => {
    const resolve = state.wake;
    state.wake = null;
    resolve?.();
  };
  const releaseProducers = (): void => {
    for (const resolve of drained.splice(0)) {
      resolve();
    }
  };
  controller.signal.addEventListener('abort', releaseProducers, { once: true });

  const run = paginate({ ...options, signal: controller.signal }, async (records) => {
    while (queue.length > 0) {
      controller.signal.throwIfAborted();
      await new Promise<void>((resolve) => {
        drained.push(resolve);
      });
    }
    controller.signal.throwIfAborted();
    queue.push(...records);
    notify();
  })
    .then(
      () => undefined,
      (error: unknown) => {
        state.failure = { error };
      },
    )
    .finally(() => {
      state.done = true;
      notify();
    });

  try {
    for (;;) {
      if (queue.length > 0) {
        const [next] = queue.splice(0, 1);
        if (queue.length === 0) {
          releaseProducers();
        }
        yield next;
        continue;
      }
      if (state.done) {
        break;
      }
      releaseProducers();
      await new Promise<void>((resolve) => {
        state.wake = resolve;
      });
    }
    if (state.failure) {
      throw state.failure.error;
    }
  } finally {
    if (!state.done) {
      controller.abort();
    }
    await run;
    outer?.removeEventListener('abort', forwardAbort);
  }
}

const countEnvelope = z.record(z.unknown());

/** Issues the single-record query an upstream answers with its total count. */
export async function fetchTotalCount(
  http: RateLimitedCache,
  key: FetchKey,
  countField: string,
  signal?: AbortSignal,
): Promise<number> {
  const body = await http.fetchJson(key, signal);
  const parsed = countEnvelope.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(`count response from ${key.url} is not an object`, parsed.error.issues);
  }

  const value = parsed.data[countField];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ValidationError(`count response from ${key.url} has no integer ${countField}`);
  }
  return value;
}
