import { createHash } from 'node:crypto';

import type { Logger } from '../logger.js';
import { systemClock, type Clock } from './clock.js';
import { PermanentHTTPError, TransientNetworkError, ValidationError, errorMessage } from './errors.js';
import type { RateLimiter } from './rate-limiter.js';
import type { ResponseCache } from './response-cache.js';

export type QueryValue = string | number | boolean | undefined;

export interface FetchKey {
  method?: 'GET';
  url: string;
  params?: Record<string, QueryValue>;
  headers?: Record<string, string>;
}

export interface TransportRequest {
  url: string;
  method: 'GET';
  headers: Record<string, string>;
  signal: AbortSignal;
}

export interface TransportResponse {
  status: number;
  url: string;
  contentType: string;
  body: string;
}

export type Transport = (request: TransportRequest) => Promise<TransportResponse>;

export interface FetchedResponse extends TransportResponse {
  fromCache: boolean;
}

export const fetchTransport: Transport = async (request) => {
  const response = await fetch(request.url, {
    method: request.method,
    headers: request.headers,
    redirect: 'follow',
    signal: request.signal,
  });

  return {
    status: response.status,
    url: response.url || request.url,
    contentType: response.headers.get('content-type') ?? '',
    body: await response.text(),
  };
};

export function buildRequestUrl(key: FetchKey): string {
  const url = new URL(key.url);
  const entries = Object.entries(key.params ?? {})
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
    .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0));

  for (const [name, value] of entries) {
    url.searchParams.append(name, String(value));
  }
  url.searchParams.sort();
  return url.toString();
}

/** Cache identity of a request. The user agent never splits the cache. */
export function fetchKeyId(key: FetchKey): string {
  const headers = Object.entries(key.headers ?? {})
    .map(([name, value]): [string, string] => [name.toLowerCase(), value])
    .filter(([name]) => name !== 'user-agent')
    .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0));

  return createHash('sha256')
    .update(JSON.stringify([key.method ?? 'GET', buildRequestUrl(key), headers]))
    .digest('hex');
}

export interface RateLimitedCacheOptions {
  cache: ResponseCache;
  limiter: RateLimiter;
  transport?: Transport;
  clock?: Clock;
  logger: Logger;
  userAgent: string;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
}

/**
 * The one HTTP primitive every source fetches through. Cache hits cost
 * neither a rate-limit token nor a network call; misses take exactly one
 * token, then retry transport failures without taking another.
 */
export class RateLimitedCache {
  private readonly cache: ResponseCache;
  private readonly limiter: RateLimiter;
  private readonly transport: Transport;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly inFlight = new Map<string, Promise<FetchedResponse>>();

  constructor(options: RateLimitedCacheOptions) {
    this.cache = options.cache;
    this.limiter = options.limiter;
    this.transport = options.transport ?? fetchTransport;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs;
    this.retries = Math.max(0, options.retries);
    this.backoffMs = options.backoffMs;
  }

  async fetch(key: FetchKey, signal?: AbortSignal): Promise<FetchedResponse> {
    signal?.throwIfAborted();
    const id = fetchKeyId(key);

    const cached = this.cache.get(id);
    if (cached) {
      return {
        status: cached.status,
        url: cached.url,
        contentType: cached.contentType,
        body: cached.body,
        fromCache: true,
      };
    }

    const pending = this.inFlight.get(id);
    if (pending) {
      return pending;
    }

    const request = this.fetchFromNetwork(id, key, signal).finally(() => {
      this.inFlight.delete(id);
    });
    this.inFlight.set(id, request);
    return request;
  }

  async fetchJson(key: FetchKey, signal?: AbortSignal): Promise<unknown> {
    const response = await this.fetch(key, signal);
    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw new ValidationError(`response from ${response.url} is not JSON (${errorMessage(error)})`);
    }
  }

  private async fetchFromNetwork(id: string, key: FetchKey, signal?: AbortSignal): Promise<FetchedResponse> {
    await this.limiter.acquire(signal);

    const url = buildRequestUrl(key);
    const headers: Record<string, string> = {
      'user-agent': this.userAgent,
      accept: 'application/json',
      ...key.headers,
    };

    const response = await this.sendWithRetries(url, headers, signal);

    if (response.status >= 200 && response.status < 300) {
      this.cache.set(id, { ...response, storedAt: this.clock.now() });
      return { ...response, fromCache: false };
    }

    if (response.status === 429 || response.status >= 500) {
      throw new TransientNetworkError(url, `HTTP ${response.status}`, { status: response.status });
    }

    throw new PermanentHTTPError(url, response.status);
  }

  private async sendWithRetries(
    url: string,
    headers: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<TransportResponse> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.send(url, headers, signal);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }

        if (attempt >= this.retries) {
          if (error instanceof TransientNetworkError) {
            throw error;
          }
          throw new TransientNetworkError(url, errorMessage(error), { cause: error });
        }

        const backoffMs = this.backoffMs * 2 ** attempt;
        this.logger.warn(
          { url, attempt: attempt + 1, retries: this.retries, backoffMs, err: errorMessage(error) },
          'transport failure, retrying',
        );
        await this.clock.sleep(backoffMs, signal);
      }
    }
  }

  private async send(
    url: string,
    headers: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort(new TransientNetworkError(url, `timed out after ${this.timeoutMs}ms`));
    }, this.timeoutMs);
    const forwardAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      return await this.transport({ url, method: 'GET', headers, signal: controller.signal });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
