import path from 'node:path';

export const COLLECTIONS = {
  hansardContributions: 'hansard_contributions',
  parliamentaryQuestions: 'parliamentary_questions',
  authorisedFirms: 'authorised_firms',
  individuals: 'individuals',
  products: 'products',
} as const;

export type CollectionName = (typeof COLLECTIONS)[keyof typeof COLLECTIONS];

export const COLLECTION_NAMES: readonly CollectionName[] = Object.values(COLLECTIONS);

export interface IngestionSettings {
  databasePath: string;
  cachePath: string;
  cacheTtlMs: number;
  userAgent: string;
  requestTimeoutMs: number;
  transportRetries: number;
  retryBackoffMs: number;
  rateLimitIntervalMs: number;
  rateLimitBurst: number;
  rateLimitMaxWaitMs: number;
  storeRetries: number;
  hansardBaseUrl: string;
  questionsBaseUrl: string;
  registerBaseUrl: string;
  registerApiEmail: string;
  registerApiKey: string;
  knownFirmReferences: string[];
}

const DB_ENV_VAR = 'REGISTER_SEARCH_DB_PATH';
const CACHE_ENV_VAR = 'REGISTER_SEARCH_CACHE_PATH';

const DAY_MS = 24 * 60 * 60 * 1000;

function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function parseListEnv(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): IngestionSettings {
  return {
    databasePath: path.resolve(cwd, env[DB_ENV_VAR] || 'data/database.db'),
    cachePath: path.resolve(cwd, env[CACHE_ENV_VAR] || '.cache/http-cache.db'),
    cacheTtlMs: parseNumericEnv(env.REGISTER_SEARCH_CACHE_TTL_MS, DAY_MS),
    userAgent: env.REGISTER_SEARCH_USER_AGENT || 'register-search-mcp/0.1',
    requestTimeoutMs: parseNumericEnv(env.REGISTER_SEARCH_REQUEST_TIMEOUT_MS, 30_000),
    transportRetries: parseNumericEnv(env.REGISTER_SEARCH_TRANSPORT_RETRIES, 3),
    retryBackoffMs: parseNumericEnv(env.REGISTER_SEARCH_RETRY_BACKOFF_MS, 500),
    // One request every two seconds: the upstream APIs publish no burst tolerance.
    rateLimitIntervalMs: parseNumericEnv(env.REGISTER_SEARCH_RATE_LIMIT_INTERVAL_MS, 2_000),
    rateLimitBurst: parseNumericEnv(env.REGISTER_SEARCH_RATE_LIMIT_BURST, 1),
    rateLimitMaxWaitMs: parseNumericEnv(env.REGISTER_SEARCH_RATE_LIMIT_MAX_WAIT_MS, 30 * 60 * 1000),
    storeRetries: parseNumericEnv(env.REGISTER_SEARCH_STORE_RETRIES, 3),
    hansardBaseUrl: trimTrailingSlash(env.HANSARD_API_BASE_URL || 'https://hansard-api.parliament.uk'),
    questionsBaseUrl: trimTrailingSlash(
      env.PQS_API_BASE_URL || 'https://questions-statements-api.parliament.uk/api',
    ),
    registerBaseUrl: trimTrailingSlash(env.FCA_API_BASE_URL || 'https://register.fca.org.uk/services/V0.1'),
    registerApiEmail: env.FCA_API_EMAIL ?? '',
    registerApiKey: env.FCA_API_KEY ?? '',
    knownFirmReferences: parseListEnv(env.FCA_KNOWN_FIRM_REFERENCES),
  };
}
