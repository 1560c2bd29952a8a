import type { SearchStore } from '../db/store.js';
import type { IndexDocument } from '../db/types.js';
import type { Logger } from '../logger.js';
import { systemClock, type Clock } from './clock.js';
import { PartialBulkFailure, errorMessage, isAbortError } from './errors.js';

export interface BulkIndexResult {
  submitted: number;
  written: number;
  unchanged: number;
}

export interface BulkIndexerOptions {
  maxRetries: number;
  retryDelayMs: number;
  logger: Logger;
  clock?: Clock;
}

/**
 * Turns records into index actions and writes them in one bulk call per
 * attempt. Accepted documents stay accepted; only transient rejections and
 * failed calls are retried, and whatever still fails is reported together.
 */
export class BulkIndexer<T> {
  private readonly searchStore: SearchStore;
  private readonly collection: string;
  private readonly toDocument: (record: T) => IndexDocument;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    store: SearchStore,
    collection: string,
    toDocument: (record: T) => IndexDocument,
    options: BulkIndexerOptions,
  ) {
    this.searchStore = store;
    this.collection = collection;
    this.toDocument = toDocument;
    this.maxRetries = Math.max(0, options.maxRetries);
    this.retryDelayMs = options.retryDelayMs;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
  }

  async store(records: readonly T[], signal?: AbortSignal): Promise<BulkIndexResult> {
    const byKey = new Map<string, IndexDocument>();
    for (const record of records) {
      const document = this.toDocument(record);
      byKey.set(document.key, document);
    }

    const result: BulkIndexResult = { submitted: byKey.size, written: 0, unchanged: 0 };
    const causes: Record<string, string> = {};
    let pending = [...byKey.values()];

    for (let attempt = 0; pending.length > 0; attempt++) {
      signal?.throwIfAborted();
      const lastAttempt = attempt >= this.maxRetries;

      let retry: IndexDocument[] = [];
      try {
        const upserted = await this.searchStore.bulkUpsert(this.collection, pending);
        result.written += upserted.written.length;
        result.unchanged += upserted.unchanged.length;

        const transientKeys = new Set<string>();
        for (const failure of upserted.failed) {
          if (failure.transient && !lastAttempt) {
            transientKeys.add(failure.key);
          } else {
            causes[failure.key] = failure.reason;
          }
        }
        retry = pending.filter((document) => transientKeys.has(document.key));
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        if (lastAttempt) {
          for (const document of pending) {
            causes[document.key] = errorMessage(error);
          }
        } else {
          this.logger.warn(
            { collection: this.collection, attempt: attempt + 1, documents: pending.length, err: errorMessage(error) },
            'bulk upsert rejected, retrying',
          );
          retry = pending;
        }
      }

      pending = retry;
      if (pending.length > 0) {
        await this.clock.sleep(this.retryDelayMs * 2 ** attempt, signal);
      }
    }

    this.logger.debug({ collection: this.collection, ...result }, 'bulk upsert finished');

    if (Object.keys(causes).length > 0) {
      throw new PartialBulkFailure(this.collection, causes, result.written + result.unchanged);
    }
    return result;
  }
}
