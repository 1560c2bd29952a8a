import { isoDate, parseDateArgument } from './ingest/dates.js';
import type { DateRange } from './ingest/loaders.js';
import { SOURCE_IDS, isSourceId, type SourceId } from './sources/index.js';

const FROM_DATE_FLAG = '--from-date';
const TO_DATE_FLAG = '--to-date';
const LOG_LEVEL_FLAG = '--log-level';
const HELP_FLAGS = new Set(['--help', '-h']);
const LOG_LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type ParsedCommand =
  | { command: 'help' }
  | { command: 'init-db'; logLevel?: string }
  | { command: 'reset-db'; logLevel?: string }
  | { command: 'load-data'; source: SourceId; range: DateRange | null; logLevel?: string };

export function parseArguments(argv: string[], now: Date = new Date()): ParsedCommand {
  if (argv.length === 0 || argv.some((token) => HELP_FLAGS.has(token))) {
    return { command: 'help' };
  }

  let fromDate: string | undefined;
  let toDate: string | undefined;
  let logLevel: string | undefined;
  const positional: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (token === FROM_DATE_FLAG || token === TO_DATE_FLAG || token === LOG_LEVEL_FLAG) {
      const value = argv[index + 1];
      if (!value) {
        throw new Error(`Missing value for ${token}`);
      }
      if (token === FROM_DATE_FLAG) fromDate = parseDateArgument(value, now);
      else if (token === TO_DATE_FLAG) toDate = parseDateArgument(value, now);
      else logLevel = value;
      index += 1;
      continue;
    }

    if (token.startsWith('-')) {
      throw new Error(`Unknown argument: ${token}`);
    }

    positional.push(token);
  }

  if (logLevel !== undefined && !LOG_LEVELS.has(logLevel)) {
    throw new Error(`Unknown log level "${logLevel}"`);
  }

  const [command, source, ...rest] = positional;
  if (rest.length > 0) {
    throw new Error(`Unexpected arguments: ${rest.join(' ')}`);
  }

  switch (command) {
    case 'init-db':
    case 'reset-db':
      if (source) {
        throw new Error(`${command} takes no source`);
      }
      return { command, logLevel };
    case 'load-data': {
      if (!source) {
        throw new Error(`load-data needs a source (${SOURCE_IDS.join(', ')})`);
      }
      if (!isSourceId(source)) {
        throw new Error(`Unknown source "${source}" (supported: ${SOURCE_IDS.join(', ')})`);
      }
      if (toDate && !fromDate) {
        throw new Error(`${TO_DATE_FLAG} needs ${FROM_DATE_FLAG}`);
      }
      const range = fromDate ? { from: fromDate, to: toDate ?? isoDate(now) } : null;
      if (range && range.from > range.to) {
        throw new Error(`${FROM_DATE_FLAG} ${range.from} is after ${TO_DATE_FLAG} ${range.to}`);
      }
      return { command, source, range, logLevel };
    }
    default:
      throw new Error(`Unknown command "${command}" (expected init-db, reset-db or load-data)`);
  }
}

export function printUsage(): void {
  console.log('Usage: npm run ingest -- <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  init-db                       Create missing tables; keeps indexed documents');
  console.log('  reset-db                      Drop and recreate every table');
  console.log(`  load-data <source>            Load one source (${SOURCE_IDS.join(', ')})`);
  console.log('');
  console.log('Options:');
  console.log(`  ${FROM_DATE_FLAG} <date>          Window start: YYYY-MM-DD, today, yesterday, "N days ago", "N weeks ago"`);
  console.log(`  ${TO_DATE_FLAG} <date>            Window end (default today)`);
  console.log(`  ${LOG_LEVEL_FLAG} <level>         fatal, error, warn, info, debug, trace or silent`);
  console.log('  --help, -h                    Show this usage text');
  console.log('');
  console.log('Examples:');
  console.log('  npm run ingest -- init-db');
  console.log(`  npm run ingest -- load-data hansard ${FROM_DATE_FLAG} 2025-01-06 ${TO_DATE_FLAG} 2025-01-10`);
  console.log(`  npm run ingest -- load-data parliamentary-questions ${FROM_DATE_FLAG} "3 days ago"`);
  console.log('  npm run ingest -- load-data firms-register');
}
