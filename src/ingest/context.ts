import type Database from 'better-sqlite3';

import type { IngestionSettings } from '../config.js';
import { recordIngestionRun } from '../db/runs.js';
import { seedSources } from '../db/schema.js';
import { SqliteSearchStore, openDatabase } from '../db/store.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { sourceRecords } from '../sources/index.js';
import { systemClock, type Clock } from './clock.js';
import { HierarchyResolver } from './hierarchy.js';
import type { IngestionContext } from './loaders.js';
import type { PageProgress } from './paginate.js';
import { RateLimitedCache, type Transport } from './rate-limited-cache.js';
import { TokenBucket } from './rate-limiter.js';
import { SqliteResponseCache } from './response-cache.js';

export interface IngestionRuntime {
  context: IngestionContext;
  db: Database.Database;
  cache: SqliteResponseCache;
  close(): void;
}

export interface IngestionRuntimeOptions {
  transport?: Transport;
  logger?: Logger;
  clock?: Clock;
  signal?: AbortSignal;
  onProgress?: IngestionContext['onProgress'];
}

/** Per-page progress as info log lines. */
export function logPageProgress(logger: Logger): (progress: PageProgress) => void {
  return ({ label, page, records, pagesCompleted, pagesTotal }) => {
    logger.info({ label, page: page.index, offset: page.offset, records, pagesCompleted, pagesTotal }, 'page loaded');
  };
}

/** Opens the store and the response cache and wires one context for a process. */
export function createIngestionRuntime(
  settings: IngestionSettings,
  options: IngestionRuntimeOptions = {},
): IngestionRuntime {
  const logger = options.logger ?? rootLogger;
  const clock = options.clock ?? systemClock;

  const db = openDatabase(settings.databasePath);
  const store = new SqliteSearchStore(db);
  seedSources(db, sourceRecords());

  const cache = SqliteResponseCache.open(settings.cachePath, { ttlMs: settings.cacheTtlMs, clock });
  const purged = cache.purgeExpired();
  if (purged > 0) {
    logger.debug({ purged }, 'purged expired cache entries');
  }

  const limiter = new TokenBucket({
    intervalMs: settings.rateLimitIntervalMs,
    burst: settings.rateLimitBurst,
    maxWaitMs: settings.rateLimitMaxWaitMs,
    clock,
  });

  const http = new RateLimitedCache({
    cache,
    limiter,
    transport: options.transport,
    clock,
    logger: logger.child({ component: 'http' }),
    userAgent: settings.userAgent,
    timeoutMs: settings.requestTimeoutMs,
    retries: settings.transportRetries,
    backoffMs: settings.retryBackoffMs,
  });

  const hierarchy = new HierarchyResolver(http, {
    baseUrl: settings.hansardBaseUrl,
    logger: logger.child({ component: 'hierarchy' }),
  });

  const context: IngestionContext = {
    http,
    store,
    hierarchy,
    settings,
    logger,
    clock,
    signal: options.signal,
    onProgress: options.onProgress,
    runLog: (run) => {
      recordIngestionRun(db, run);
    },
  };

  return {
    context,
    db,
    cache,
    close: () => {
      cache.close();
      db.close();
    },
  };
}
