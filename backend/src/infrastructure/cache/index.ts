export * from './MemoryCacheStore';
export * from './RedisCacheStore';
