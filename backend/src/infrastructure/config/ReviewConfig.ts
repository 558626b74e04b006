import { join } from 'path';
import { WorkerPoolConfig } from '../../application/services/BoundedWorkerPool';
import { CacheNamespace } from '../../application/services/ResultCache';

export const DEFAULT_CACHE_TTL_SECONDS: Record<CacheNamespace, number> = {
  diff: 60 * 60,
  repo: 24 * 60 * 60,
  job: 7 * 24 * 60 * 60,
};

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface BreakerConfig {
  windowSize: number;
  failureRateThreshold: number;
  cooldownMs: number;
}

export interface ReviewConfig {
  port: number;
  databasePath: string;
  githubToken: string | null;
  githubApiUrl: string;
  publicUrl: string;
  aiServiceUrl: string;
  aiTimeoutMs: number;
  workers: WorkerPoolConfig;
  retry: RetryConfig;
  breaker: BreakerConfig;
  redisUrl: string | null;
  cacheTtlSeconds: Record<CacheNamespace, number>;
}

export const REVIEW_CONFIG = Symbol('ReviewConfig');

export type EnvReader = (key: string) => string | undefined;

/**
 * Builds the typed configuration from environment values.
 * Throws on malformed numbers so a bad deployment fails at startup.
 */
export function loadReviewConfig(read: EnvReader): ReviewConfig {
  const workers: WorkerPoolConfig = {
    core: readInt(read, 'WORKER_CORE', 5, 1),
    max: readInt(read, 'WORKER_MAX', 10, 1),
    queueCapacity: readInt(read, 'WORKER_QUEUE', 25, 0),
  };
  if (workers.max < workers.core) {
    throw new Error(`WORKER_MAX (${workers.max}) must be at least WORKER_CORE (${workers.core})`);
  }

  const threshold = readNumber(read, 'BREAKER_THRESHOLD', 0.5);
  if (threshold <= 0 || threshold > 1) {
    throw new Error(`BREAKER_THRESHOLD must be in (0, 1], got ${threshold}`);
  }

  const port = readInt(read, 'PORT', 3000, 0);

  return {
    port,
    databasePath: readString(read, 'DATABASE_PATH') ?? join(process.cwd(), 'data', 'reviews.db'),
    githubToken: readString(read, 'GITHUB_TOKEN'),
    githubApiUrl: readString(read, 'GITHUB_API_URL') ?? 'https://api.github.com',
    publicUrl: (readString(read, 'PUBLIC_URL') ?? `http://localhost:${port}`).replace(/\/+$/, ''),
    aiServiceUrl: (readString(read, 'AI_SERVICE_URL') ?? 'http://localhost:8000').replace(/\/+$/, ''),
    aiTimeoutMs: readInt(read, 'AI_TIMEOUT_MS', 120_000, 1),
    workers,
    retry: {
      maxRetries: readInt(read, 'RETRY_MAX', 3, 0),
      baseDelayMs: readInt(read, 'RETRY_BASE_MS', 200, 0),
      maxDelayMs: readInt(read, 'RETRY_MAX_DELAY_MS', 5000, 0),
    },
    breaker: {
      windowSize: readInt(read, 'BREAKER_WINDOW', 10, 1),
      failureRateThreshold: threshold,
      cooldownMs: readInt(read, 'BREAKER_COOLDOWN_MS', 5000, 0),
    },
    redisUrl: readString(read, 'REDIS_URL'),
    cacheTtlSeconds: {
      diff: readInt(read, 'CACHE_TTL_DIFF', DEFAULT_CACHE_TTL_SECONDS.diff, 0),
      repo: readInt(read, 'CACHE_TTL_REPO', DEFAULT_CACHE_TTL_SECONDS.repo, 0),
      job: readInt(read, 'CACHE_TTL_JOB', DEFAULT_CACHE_TTL_SECONDS.job, 0),
    },
  };
}

function readString(read: EnvReader, key: string): string | null {
  const value = read(key)?.trim();
  return value ? value : null;
}

function readNumber(read: EnvReader, key: string, fallback: number): number {
  const raw = readString(read, key);
  if (raw === null) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readInt(read: EnvReader, key: string, fallback: number, min: number): number {
  const value = readNumber(read, key, fallback);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min}, got ${value}`);
  }
  return value;
}
