#!/usr/bin/env tsx
import 'dotenv/config';

import { parseArguments, printUsage } from '../src/cli.js';
import { loadSettings } from '../src/config.js';
import { createSearchSchema, resetSearchSchema, seedSources } from '../src/db/schema.js';
import { openDatabase } from '../src/db/store.js';
import { createIngestionRuntime, logPageProgress } from '../src/ingest/context.js';
import { createLogger } from '../src/logger.js';
import { loadSource, sourceRecords } from '../src/sources/index.js';

async function main(): Promise<void> {
  const args = parseArguments(process.argv.slice(2));
  if (args.command === 'help') {
    printUsage();
    return;
  }

  const settings = loadSettings();
  const logger = createLogger(args.logLevel);

  if (args.command === 'init-db' || args.command === 'reset-db') {
    const db = openDatabase(settings.databasePath);
    try {
      if (args.command === 'reset-db') {
        resetSearchSchema(db);
      } else {
        createSearchSchema(db);
      }
      seedSources(db, sourceRecords());
    } finally {
      db.close();
    }
    console.log(`register-search: ${args.command} done at ${settings.databasePath}`);
    return;
  }

  const controller = new AbortController();
  const stop = () => controller.abort(new Error('interrupted'));
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  const runtime = createIngestionRuntime(settings, {
    logger,
    signal: controller.signal,
    onProgress: logPageProgress(logger.child({ component: 'progress' })),
  });
  try {
    const report = await loadSource(runtime.context, args.source, args.range);
    const window = report.from ? ` ${report.from}..${report.to}` : '';
    console.log(`register-search: ${report.source}${window} ${report.status}`);
    console.log(
      `attempted=${report.attempted} indexed=${report.indexed} unchanged=${report.unchanged} failed=${report.failed} pages=${report.pagesTotal} pages_failed=${report.pagesFailed} duration_ms=${report.durationMs}`,
    );
    if (report.status !== 'completed') {
      throw new Error(report.error ?? `${report.source} did not complete`);
    }
  } finally {
    runtime.close();
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`register-search: ingest failed: ${message}`);
  process.exit(1);
});
