const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const RELATIVE = /^(\d+)\s+(day|days|week|weeks)\s+ago$/;

export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function shiftDays(day: string, days: number): string {
  return isoDate(new Date(Date.parse(`${day}T00:00:00Z`) + days * DAY_MS));
}

/**
 * Accepts `YYYY-MM-DD`, `today`, `yesterday`, `N days ago` and `N weeks ago`,
 * relative to `now` (UTC). Returns the calendar day as `YYYY-MM-DD`.
 */
export function parseDateArgument(value: string, now: Date = new Date()): string {
  const input = value.trim().toLowerCase();
  const today = isoDate(now);

  if (input === 'today') return today;
  if (input === 'yesterday') return shiftDays(today, -1);

  const relative = RELATIVE.exec(input);
  if (relative) {
    const amount = Number.parseInt(relative[1], 10);
    const days = relative[2].startsWith('week') ? amount * 7 : amount;
    return shiftDays(today, -days);
  }

  const exact = ISO_DATE.exec(input);
  if (exact) {
    const parsed = new Date(`${input}T00:00:00Z`);
    if (!Number.isNaN(parsed.getTime()) && isoDate(parsed) === input) {
      return input;
    }
  }

  throw new RangeError(`unrecognised date "${value}" (use YYYY-MM-DD, today, yesterday, or N days/weeks ago)`);
}
