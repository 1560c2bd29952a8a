import { createHash } from 'node:crypto';

/** JSON with object keys sorted at every depth. */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, entry]) => entry !== undefined)
        .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
        .map(([name, entry]) => [name, sortKeys(entry)]),
    );
  }
  return value;
}

export function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/** Key for records the upstream gives no identifier: a digest of their natural keys. */
export function hashKey(parts: ReadonlyArray<string | number | null>): string {
  return sha256(JSON.stringify(parts));
}

export function contentHash(value: unknown): string {
  return sha256(stableStringify(value));
}
