import { COLLECTION_NAMES, type CollectionName } from '../config.js';

export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 50;

export function normalizeLimit(limit: number | undefined, defaultValue = DEFAULT_LIMIT): number {
  if (typeof limit !== 'number' || Number.isNaN(limit)) {
    return defaultValue;
  }

  return Math.min(Math.max(Math.floor(limit), 1), MAX_LIMIT);
}

export function isCollectionName(value: string): value is CollectionName {
  return (COLLECTION_NAMES as readonly string[]).includes(value);
}

export function requireCollection(value: string | undefined): CollectionName {
  const collection = value?.trim() ?? '';
  if (!isCollectionName(collection)) {
    throw new Error(`collection must be one of: ${COLLECTION_NAMES.join(', ')}`);
  }
  return collection;
}

export function ageInDays(fromDate: string, toDate: string): number {
  const millisecondsPerDay = 1000 * 60 * 60 * 24;
  const from = new Date(fromDate);
  const to = new Date(toDate);

  if (Number.isNaN(from.getTime()) || Number.isNaN(to.getTime())) {
    return Number.POSITIVE_INFINITY;
  }

  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / millisecondsPerDay));
}

export function frequencyThresholdDays(frequency: string): number {
  switch (frequency) {
    case 'daily':
      return 3;
    case 'weekly':
      return 10;
    case 'monthly':
      return 35;
    default:
      return 7;
  }
}
