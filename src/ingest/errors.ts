import type { ZodIssue } from 'zod';

export class IngestionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Timeouts, connection failures, 429 and 5xx responses. Safe to retry. */
export class TransientNetworkError extends IngestionError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, reason: string, options?: { status?: number; cause?: unknown }) {
    super(`transient failure for ${url}: ${reason}`, { cause: options?.cause });
    this.url = url;
    this.status = options?.status ?? null;
  }
}

/** Client errors (4xx other than 429) and unfollowed redirects. Never retried. */
export class PermanentHTTPError extends IngestionError {
  readonly url: string;
  readonly status: number;

  constructor(url: string, status: number) {
    super(`HTTP ${status} for ${url}`);
    this.url = url;
    this.status = status;
  }
}

export class RateLimitTimeout extends IngestionError {
  readonly waitMs: number;
  readonly maxWaitMs: number;

  constructor(waitMs: number, maxWaitMs: number) {
    super(`rate limiter could not grant a slot within ${maxWaitMs}ms (next slot in ${waitMs}ms)`);
    this.waitMs = waitMs;
    this.maxWaitMs = maxWaitMs;
  }
}

export class ValidationError extends IngestionError {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(issues.length > 0 ? `${message}: ${formatIssues(issues)}` : message);
    this.issues = issues;
  }
}

export class PartialBulkFailure extends IngestionError {
  readonly collection: string;
  readonly failedKeys: string[];
  readonly causes: Record<string, string>;
  readonly accepted: number;

  constructor(collection: string, causes: Record<string, string>, accepted: number) {
    const failedKeys = Object.keys(causes);
    super(`${failedKeys.length} document(s) rejected by ${collection} (${accepted} accepted)`);
    this.collection = collection;
    this.failedKeys = failedKeys;
    this.causes = causes;
    this.accepted = accepted;
  }
}

export function isTransientError(error: unknown): boolean {
  return error instanceof TransientNetworkError || error instanceof RateLimitTimeout;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join('.') || '<root>'} ${issue.message}`)
    .join('; ');
}
