import { z } from 'zod';

import type { IngestionSettings } from '../config.js';
import { ValidationError, errorMessage, isAbortError, isTransientError } from '../ingest/errors.js';
import type { IngestionContext } from '../ingest/loaders.js';
import type { Logger } from '../logger.js';

export const SEARCH_OK = 'FSR-API-04-01-00';
export const SEARCH_NO_RESULTS = 'FSR-API-04-01-11';

const STATUS_PREFIX = 'FSR-API-';
const NOT_FOUND_MARKERS = ['not found', 'Not Found', 'No search result found'];
const SUCCESS_MARKERS = ['Ok', 'Found', 'successful', 'Success'];

const envelopeSchema = z
  .object({
    Status: z.string().nullable().optional(),
    Message: z.string().nullable().optional(),
    Data: z.unknown().optional(),
  })
  .passthrough();

const recordListSchema = z.array(z.record(z.unknown()));
const recordSchema = z.record(z.unknown());

export type RegisterRecord = Record<string, unknown>;

export interface RegisterResponse {
  status: string;
  message: string;
  data: unknown;
}

export function registerHeaders(settings: IngestionSettings): Record<string, string> {
  return {
    'x-auth-email': settings.registerApiEmail,
    'x-auth-key': settings.registerApiKey,
    'content-type': 'application/json',
  };
}

export function parseEnvelope(body: unknown): RegisterResponse {
  const parsed = envelopeSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('malformed register response', parsed.error.issues);
  }
  return {
    status: parsed.data.Status ?? '',
    message: parsed.data.Message ?? '',
    data: parsed.data.Data ?? null,
  };
}

/**
 * Interprets a register envelope. Any `FSR-API-*` status is an answer: a
 * "not found" message means no data, anything else passes its data through.
 * Other statuses yield null.
 */
export function interpretEnvelope(response: RegisterResponse, logger: Logger, path: string): RegisterResponse | null {
  const { status, message } = response;
  if (!status.startsWith(STATUS_PREFIX)) {
    logger.warn({ path, status, message }, 'unexpected register response');
    return null;
  }
  if (NOT_FOUND_MARKERS.some((marker) => message.includes(marker))) {
    return { status, message, data: null };
  }
  if (!SUCCESS_MARKERS.some((marker) => message.includes(marker))) {
    logger.debug({ path, status, message }, 'register response');
  }
  return response;
}

async function fetchEnvelope(
  context: IngestionContext,
  path: string,
  logger: Logger,
  signal?: AbortSignal,
): Promise<RegisterResponse | null> {
  const body = await context.http.fetchJson(
    { url: `${context.settings.registerBaseUrl}${path}`, headers: registerHeaders(context.settings) },
    signal,
  );
  return interpretEnvelope(parseEnvelope(body), logger, path);
}

/**
 * One register sub-resource. HTTP, network and envelope problems are logged
 * and come back as null so the rest of the composite can still load.
 */
export async function registerCall(
  context: IngestionContext,
  path: string,
  logger: Logger,
  signal?: AbortSignal,
): Promise<RegisterResponse | null> {
  try {
    return await fetchEnvelope(context, path, logger, signal);
  } catch (error) {
    if (isAbortError(error) || signal?.aborted) {
      throw error;
    }
    logger.warn({ path, err: errorMessage(error) }, 'register call failed');
    return null;
  }
}

/**
 * The resource an item stands on. Transient failures propagate so the item
 * counts as failed; a client error or malformed envelope comes back as null
 * like a "not found" answer.
 */
export async function registerDetail(
  context: IngestionContext,
  path: string,
  logger: Logger,
  signal?: AbortSignal,
): Promise<RegisterResponse | null> {
  try {
    return await fetchEnvelope(context, path, logger, signal);
  } catch (error) {
    if (isAbortError(error) || signal?.aborted || isTransientError(error)) {
      throw error;
    }
    logger.warn({ path, err: errorMessage(error) }, 'register detail unavailable');
    return null;
  }
}

/** Register search; throws on transport failure so the caller can count it. */
export async function registerSearch(
  context: IngestionContext,
  term: string,
  type: 'firm' | 'fund' | 'individual',
  logger: Logger,
  signal?: AbortSignal,
): Promise<RegisterRecord[]> {
  const body = await context.http.fetchJson(
    {
      url: `${context.settings.registerBaseUrl}/Search`,
      params: { q: term, type },
      headers: registerHeaders(context.settings),
    },
    signal,
  );
  const response = parseEnvelope(body);

  if (response.status === SEARCH_OK) {
    return recordList(response.data);
  }
  if (response.status === SEARCH_NO_RESULTS) {
    logger.debug({ term, type }, 'no register search results');
    return [];
  }
  logger.warn({ term, type, status: response.status, message: response.message }, 'unexpected search response');
  return [];
}

export function recordList(data: unknown): RegisterRecord[] {
  const parsed = recordListSchema.safeParse(data);
  return parsed.success ? parsed.data : [];
}

export function asRecord(value: unknown): RegisterRecord | null {
  const parsed = recordSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function firstRecord(response: RegisterResponse | null): RegisterRecord | null {
  return recordList(response?.data ?? null)[0] ?? null;
}

/** String field of a free-form register record; numbers are stringified. */
export function field(record: RegisterRecord | null, name: string): string {
  const value = record?.[name];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

export interface DisciplinaryAction {
  actionType: string;
  enforcementType: string;
  description: string;
  effectiveDate: string;
}

export function parseDisciplinaryHistory(response: RegisterResponse | null): DisciplinaryAction[] {
  return recordList(response?.data ?? null).map((action) => ({
    actionType: field(action, 'TypeofAction'),
    enforcementType: field(action, 'EnforcementType'),
    description: field(action, 'TypeofDescription'),
    effectiveDate: field(action, 'ActionEffectiveFrom'),
  }));
}

/** Reference numbers from search hits, first `perTerm` of each, in discovery order. */
export async function discoverReferences(
  context: IngestionContext,
  terms: readonly string[],
  type: 'firm' | 'fund',
  perTerm: number,
  logger: Logger,
  signal?: AbortSignal,
): Promise<{ references: string[]; failedTerms: string[] }> {
  const references = new Set<string>();
  const failedTerms: string[] = [];

  for (const term of terms) {
    try {
      const hits = await registerSearch(context, term, type, logger, signal);
      for (const hit of hits.slice(0, perTerm)) {
        const reference = field(hit, 'Reference Number');
        if (reference) {
          references.add(reference);
        }
      }
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) {
        throw error;
      }
      logger.warn({ term, type, err: errorMessage(error) }, 'register search failed');
      failedTerms.push(term);
    }
  }

  return { references: [...references], failedTerms };
}
