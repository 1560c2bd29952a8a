#!/usr/bin/env tsx
import 'dotenv/config';

import { loadSettings } from '../src/config.js';
import { createIngestionRuntime, logPageProgress } from '../src/ingest/context.js';
import { logger } from '../src/logger.js';
import { runScheduledIngestion, type ScheduledEvent } from '../src/scheduled.js';

const FROM_DATE_FLAG = '--from-date';
const TO_DATE_FLAG = '--to-date';
const HELP_FLAGS = new Set(['--help', '-h']);

function parseArguments(argv: string[]): ScheduledEvent | null {
  if (argv.some((token) => HELP_FLAGS.has(token))) {
    return null;
  }

  const event: ScheduledEvent = {};
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token !== FROM_DATE_FLAG && token !== TO_DATE_FLAG) {
      throw new Error(`Unknown argument: ${token}`);
    }
    const value = argv[index + 1];
    if (!value) {
      throw new Error(`Missing value for ${token}`);
    }
    if (token === FROM_DATE_FLAG) event.from_date = value;
    else event.to_date = value;
    index += 1;
  }
  return event;
}

function printUsage(): void {
  console.log('Usage: npm run ingest:scheduled -- [options]');
  console.log('');
  console.log('Loads hansard, parliamentary-questions and firms-register in turn.');
  console.log('');
  console.log('Options:');
  console.log(`  ${FROM_DATE_FLAG} <date>   Window start (default two days ago)`);
  console.log(`  ${TO_DATE_FLAG} <date>     Window end (default today)`);
  console.log('  --help, -h             Show this usage text');
}

async function main(): Promise<void> {
  const event = parseArguments(process.argv.slice(2));
  if (!event) {
    printUsage();
    return;
  }

  const controller = new AbortController();
  const stop = () => controller.abort(new Error('interrupted'));
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  const runtime = createIngestionRuntime(loadSettings(), {
    logger,
    signal: controller.signal,
    onProgress: logPageProgress(logger.child({ component: 'progress' })),
  });
  try {
    const result = await runScheduledIngestion(runtime.context, event);
    console.log(`register-search: scheduled window ${result.window.from}..${result.window.to}`);
    for (const report of result.reports) {
      console.log(
        `  ${report.source}: ${report.status} indexed=${report.indexed} unchanged=${report.unchanged} failed=${report.failed}${report.error ? ` error=${report.error}` : ''}`,
      );
    }
    if (!result.ok) {
      const failed = result.reports.filter((report) => report.status !== 'completed').map((report) => report.source);
      throw new Error(`sources failed: ${failed.join(', ')}`);
    }
  } finally {
    runtime.close();
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`register-search: scheduled ingest failed: ${message}`);
  process.exit(1);
});
