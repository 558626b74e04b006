import { Logger } from '@nestjs/common';
import { ICacheStore } from '../../domain/ports/ICacheStore';

/** diff: pull request diffs; repo: remote repository listings; job: terminal job snapshots */
export type CacheNamespace = 'diff' | 'repo' | 'job';

export type CacheLookup<T> = { hit: true; value: T } | { hit: false };

const MISS: CacheLookup<never> = { hit: false };

/**
 * Typed cache-aside layer over a string store. Cache trouble is never fatal:
 * store failures and unreadable entries degrade to a miss.
 */
export class ResultCache {
  private readonly logger = new Logger(ResultCache.name);

  constructor(
    private readonly store: ICacheStore,
    private readonly ttlSeconds: Record<CacheNamespace, number>,
  ) {}

  static key(namespace: CacheNamespace, id: string): string {
    return `${namespace}:${id}`;
  }

  async get<T>(namespace: CacheNamespace, id: string): Promise<CacheLookup<T>> {
    const key = ResultCache.key(namespace, id);
    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      this.logger.warn(`Cache read failed for ${key}: ${errorText(error)}`);
      return MISS;
    }
    if (raw === null) {
      return MISS;
    }
    try {
      return { hit: true, value: JSON.parse(raw) };
    } catch (error) {
      this.logger.warn(`Discarding unreadable cache entry ${key}: ${errorText(error)}`);
      return MISS;
    }
  }

  /** Stores nothing when the ttl, given or the namespace default, is not positive. */
  async set<T>(namespace: CacheNamespace, id: string, value: T, ttlSeconds?: number): Promise<void> {
    const ttl = ttlSeconds ?? this.ttlSeconds[namespace];
    if (ttl <= 0) {
      return;
    }
    const key = ResultCache.key(namespace, id);
    let raw: string | undefined;
    try {
      raw = JSON.stringify(value);
    } catch (error) {
      this.logger.warn(`Cannot serialize value for ${key}: ${errorText(error)}`);
      return;
    }
    if (raw === undefined) {
      this.logger.warn(`Cannot serialize value for ${key}: not representable as JSON`);
      return;
    }
    try {
      await this.store.set(key, raw, ttl);
    } catch (error) {
      this.logger.warn(`Cache write failed for ${key}: ${errorText(error)}`);
    }
  }

  async invalidate(namespace: CacheNamespace, id: string): Promise<void> {
    const key = ResultCache.key(namespace, id);
    try {
      await this.store.delete(key);
    } catch (error) {
      this.logger.warn(`Cache delete failed for ${key}: ${errorText(error)}`);
    }
  }

  async invalidateByPrefix(namespace: CacheNamespace, idPrefix = ''): Promise<number> {
    const prefix = ResultCache.key(namespace, idPrefix);
    try {
      return await this.store.deleteByPrefix(prefix);
    } catch (error) {
      this.logger.warn(`Cache prefix delete failed for ${prefix}: ${errorText(error)}`);
      return 0;
    }
  }

  /**
   * Returns the cached value or runs the loader and caches its result.
   * Loader errors propagate and nothing is cached.
   */
  async getOrLoad<T>(
    namespace: CacheNamespace,
    id: string,
    loader: () => Promise<T>,
  ): Promise<{ value: T; fromCache: boolean }> {
    const cached = await this.get<T>(namespace, id);
    if (cached.hit) {
      return { value: cached.value, fromCache: true };
    }
    const value = await loader();
    await this.set(namespace, id, value);
    return { value, fromCache: false };
  }
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
