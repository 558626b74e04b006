import Redis from 'ioredis';
import { ICacheStore } from '../../domain/ports/ICacheStore';

const SCAN_BATCH = 100;

/**
 * Cache store backed by Redis. Keys are namespaced so several deployments
 * can share one instance.
 */
export class RedisCacheStore implements ICacheStore {
  constructor(
    private readonly client: Redis,
    private readonly keyPrefix = 'review:',
  ) {}

  static connect(url: string): RedisCacheStore {
    return new RedisCacheStore(new Redis(url, { maxRetriesPerRequest: 2 }));
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(this.keyPrefix + key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) {
      await this.client.del(this.keyPrefix + key);
      return;
    }
    await this.client.set(this.keyPrefix + key, value, 'EX', ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(this.keyPrefix + key);
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    let cursor = '0';
    let removed = 0;
    do {
      const [next, keys] = await this.client.scan(cursor, 'MATCH', `${this.keyPrefix}${escapeGlob(prefix)}*`, 'COUNT', SCAN_BATCH);
      cursor = next;
      if (keys.length > 0) {
        removed += await this.client.del(...keys);
      }
    } while (cursor !== '0');
    return removed;
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, '\\$&');
}
