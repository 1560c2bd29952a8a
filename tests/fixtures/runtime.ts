import { loadSettings, type IngestionSettings } from '../../src/config.js';
import {
  createIngestionRuntime,
  type IngestionRuntime,
  type IngestionRuntimeOptions,
} from '../../src/ingest/context.js';
import type { TransportRequest } from '../../src/ingest/rate-limited-cache.js';
import { ManualClock } from './clock.js';
import { createMockTransport, silentLogger, type MockHandler } from './mock-transport.js';

export const TEST_HANSARD_URL = 'https://hansard.test';
export const TEST_QUESTIONS_URL = 'https://questions.test/api';
export const TEST_REGISTER_URL = 'https://register.test/V0.1';

export function testSettings(overrides: Partial<IngestionSettings> = {}): IngestionSettings {
  return {
    ...loadSettings({}, '/'),
    databasePath: ':memory:',
    cachePath: ':memory:',
    rateLimitIntervalMs: 0,
    transportRetries: 0,
    retryBackoffMs: 10,
    storeRetries: 1,
    hansardBaseUrl: TEST_HANSARD_URL,
    questionsBaseUrl: TEST_QUESTIONS_URL,
    registerBaseUrl: TEST_REGISTER_URL,
    registerApiEmail: 'tester@example.com',
    registerApiKey: 'test-secret',
    knownFirmReferences: [],
    ...overrides,
  };
}

export interface TestRuntime extends IngestionRuntime {
  clock: ManualClock;
  requests: TransportRequest[];
}

/** A full ingestion runtime over in-memory SQLite and a mock transport. */
export function createTestRuntime(
  handler: MockHandler,
  overrides: Partial<IngestionSettings> = {},
  options: Pick<IngestionRuntimeOptions, 'onProgress' | 'signal'> = {},
): TestRuntime {
  const clock = new ManualClock({ start: Date.parse('2025-01-10T09:00:00Z') });
  const { transport, requests } = createMockTransport(handler);
  const runtime = createIngestionRuntime(testSettings(overrides), {
    ...options,
    transport,
    clock,
    logger: silentLogger,
  });
  return { ...runtime, clock, requests };
}
