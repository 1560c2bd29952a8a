import { describe, expect, it } from 'vitest';

import { parseDateArgument, shiftDays } from '../../src/ingest/dates.js';

const NOW = new Date('2025-03-10T15:30:00Z');

describe('parseDateArgument', () => {
  it.each([
    ['2025-01-06', '2025-01-06'],
    ['today', '2025-03-10'],
    ['Yesterday', '2025-03-09'],
    ['3 days ago', '2025-03-07'],
    ['1 day ago', '2025-03-09'],
    ['2 weeks ago', '2025-02-24'],
  ])('reads %s', (input, expected) => {
    expect(parseDateArgument(input, NOW)).toBe(expected);
  });

  it.each(['2025-02-30', '10/03/2025', 'next week', ''])('rejects %j', (input) => {
    expect(() => parseDateArgument(input, NOW)).toThrow(RangeError);
  });
});

describe('shiftDays', () => {
  it('crosses month and year boundaries', () => {
    expect(shiftDays('2025-03-01', -1)).toBe('2025-02-28');
    expect(shiftDays('2024-12-31', 1)).toBe('2025-01-01');
  });
});
