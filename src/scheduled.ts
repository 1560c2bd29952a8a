import { isoDate, parseDateArgument, shiftDays } from './ingest/dates.js';
import type { DateRange, IngestionContext } from './ingest/loaders.js';
import { loadSource, SOURCES, type SourceId, type SourceRunReport } from './sources/index.js';

export const SCHEDULED_SOURCES: readonly SourceId[] = ['hansard', 'parliamentary-questions', 'firms-register'];

const DEFAULT_LOOKBACK_DAYS = 2;

export interface ScheduledEvent {
  from_date?: string;
  to_date?: string;
}

/** `[from_date ?? today - 2 days, to_date ?? today]`. */
export function resolveScheduledWindow(event: ScheduledEvent, now: Date = new Date()): DateRange {
  const today = isoDate(now);
  return {
    from: event.from_date ? parseDateArgument(event.from_date, now) : shiftDays(today, -DEFAULT_LOOKBACK_DAYS),
    to: event.to_date ? parseDateArgument(event.to_date, now) : today,
  };
}

export interface ScheduledResult {
  window: DateRange;
  reports: SourceRunReport[];
  ok: boolean;
}

/** Runs the scheduled sources one after another; one failing never stops the next. */
export async function runScheduledIngestion(
  context: IngestionContext,
  event: ScheduledEvent,
  now: Date = new Date(),
): Promise<ScheduledResult> {
  const window = resolveScheduledWindow(event, now);
  const reports: SourceRunReport[] = [];

  for (const sourceId of SCHEDULED_SOURCES) {
    const range = SOURCES[sourceId].requires_date_range ? window : null;
    reports.push(await loadSource(context, sourceId, range));
  }

  return { window, reports, ok: reports.every((report) => report.status === 'completed') };
}
