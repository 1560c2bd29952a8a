import Database from 'better-sqlite3';

import { createLogger } from '../../src/logger.js';
import {
  RateLimitedCache,
  type Transport,
  type TransportRequest,
  type TransportResponse,
} from '../../src/ingest/rate-limited-cache.js';
import type { RateLimiter } from '../../src/ingest/rate-limiter.js';
import { SqliteResponseCache } from '../../src/ingest/response-cache.js';
import { ManualClock } from './clock.js';

export interface MockReply {
  status?: number;
  body: unknown;
}

export type MockHandler = (url: URL, request: TransportRequest) => MockReply | Promise<MockReply>;

export const silentLogger = createLogger('silent');

export function reply(body: unknown, status = 200): MockReply {
  return { status, body };
}

export const notFound: MockReply = { status: 404, body: { message: 'not found' } };

/** In-process transport: every request is recorded and answered by `handler`. */
export function createMockTransport(handler: MockHandler): { transport: Transport; requests: TransportRequest[] } {
  const requests: TransportRequest[] = [];
  const transport: Transport = async (request): Promise<TransportResponse> => {
    requests.push(request);
    const answer = await handler(new URL(request.url), request);
    return {
      status: answer.status ?? 200,
      url: request.url,
      contentType: 'application/json',
      body: typeof answer.body === 'string' ? answer.body : JSON.stringify(answer.body),
    };
  };
  return { transport, requests };
}

export class CountingLimiter implements RateLimiter {
  acquired = 0;

  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.acquired++;
  }
}

export interface TestHttp {
  http: RateLimitedCache;
  cache: SqliteResponseCache;
  limiter: CountingLimiter;
  clock: ManualClock;
  requests: TransportRequest[];
}

export function createTestHttp(
  handler: MockHandler,
  options: { retries?: number; backoffMs?: number; ttlMs?: number; timeoutMs?: number } = {},
): TestHttp {
  const clock = new ManualClock();
  const cache = new SqliteResponseCache(new Database(':memory:'), { ttlMs: options.ttlMs ?? 60_000, clock });
  const limiter = new CountingLimiter();
  const { transport, requests } = createMockTransport(handler);
  const http = new RateLimitedCache({
    cache,
    limiter,
    transport,
    clock,
    logger: silentLogger,
    userAgent: 'test-agent',
    timeoutMs: options.timeoutMs ?? 5_000,
    retries: options.retries ?? 0,
    backoffMs: options.backoffMs ?? 100,
  });
  return { http, cache, limiter, clock, requests };
}
