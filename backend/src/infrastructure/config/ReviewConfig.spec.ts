import { loadReviewConfig } from './ReviewConfig';

describe('loadReviewConfig', () => {
  const fromEnv = (env: Record<string, string>) => loadReviewConfig((key) => env[key]);

  it('should apply defaults', () => {
    const config = fromEnv({ DATABASE_PATH: '/tmp/reviews.db' });

    expect(config.port).toBe(3000);
    expect(config.databasePath).toBe('/tmp/reviews.db');
    expect(config.githubToken).toBeNull();
    expect(config.githubApiUrl).toBe('https://api.github.com');
    expect(config.publicUrl).toBe('http://localhost:3000');
    expect(config.aiTimeoutMs).toBe(120000);
    expect(config.workers).toEqual({ core: 5, max: 10, queueCapacity: 25 });
    expect(config.retry).toEqual({ maxRetries: 3, baseDelayMs: 200, maxDelayMs: 5000 });
    expect(config.breaker).toEqual({ windowSize: 10, failureRateThreshold: 0.5, cooldownMs: 5000 });
    expect(config.redisUrl).toBeNull();
    expect(config.cacheTtlSeconds).toEqual({ diff: 3600, repo: 86400, job: 604800 });
  });

  it('should read overrides', () => {
    const config = fromEnv({
      PORT: '8080',
      GITHUB_TOKEN: 'test-token',
      PUBLIC_URL: 'https://reviews.example.test/',
      WORKER_CORE: '2',
      WORKER_MAX: '4',
      WORKER_QUEUE: '0',
      BREAKER_THRESHOLD: '0.75',
      CACHE_TTL_DIFF: '0',
      REDIS_URL: 'redis://localhost:6379',
    });

    expect(config.port).toBe(8080);
    expect(config.githubToken).toBe('test-token');
    expect(config.publicUrl).toBe('https://reviews.example.test');
    expect(config.workers).toEqual({ core: 2, max: 4, queueCapacity: 0 });
    expect(config.breaker.failureRateThreshold).toBe(0.75);
    expect(config.cacheTtlSeconds.diff).toBe(0);
    expect(config.redisUrl).toBe('redis://localhost:6379');
  });

  it('should treat blank values as unset', () => {
    expect(fromEnv({ GITHUB_TOKEN: '  ' }).githubToken).toBeNull();
  });

  it('should reject malformed numbers', () => {
    expect(() => fromEnv({ AI_TIMEOUT_MS: 'soon' })).toThrow('AI_TIMEOUT_MS must be a number, got "soon"');
    expect(() => fromEnv({ WORKER_CORE: '0' })).toThrow('WORKER_CORE must be an integer >= 1, got 0');
    expect(() => fromEnv({ RETRY_MAX: '1.5' })).toThrow('RETRY_MAX must be an integer >= 0, got 1.5');
  });

  it('should reject a pool whose max is below its core size', () => {
    expect(() => fromEnv({ WORKER_CORE: '6', WORKER_MAX: '3' })).toThrow(
      'WORKER_MAX (3) must be at least WORKER_CORE (6)',
    );
  });

  it('should reject a breaker threshold outside (0, 1]', () => {
    expect(() => fromEnv({ BREAKER_THRESHOLD: '1.5' })).toThrow('BREAKER_THRESHOLD must be in (0, 1], got 1.5');
  });
});
