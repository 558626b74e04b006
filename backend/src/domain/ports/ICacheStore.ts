/**
 * Port for a string key/value store with per-entry expiry
 */
export interface ICacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  deleteByPrefix(prefix: string): Promise<number>;
}

export const CACHE_STORE = Symbol('ICacheStore');
