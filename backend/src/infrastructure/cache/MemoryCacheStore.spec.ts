import { MemoryCacheStore } from './MemoryCacheStore';

describe('MemoryCacheStore', () => {
  let clock: number;
  let store: MemoryCacheStore;

  beforeEach(() => {
    clock = 1_000_000;
    store = new MemoryCacheStore(() => clock);
  });

  it('should return stored values until they expire', async () => {
    await store.set('diff:pr-1', 'patch', 60);
    clock += 59_999;
    expect(await store.get('diff:pr-1')).toBe('patch');

    clock += 1;
    expect(await store.get('diff:pr-1')).toBeNull();
    expect(store.size).toBe(0);
  });

  it('should not store entries with a non-positive ttl', async () => {
    await store.set('diff:pr-1', 'patch', 0);

    expect(await store.get('diff:pr-1')).toBeNull();
  });

  it('should delete by prefix', async () => {
    await store.set('job:1', 'a', 60);
    await store.set('job:2', 'b', 60);
    await store.set('diff:1', 'c', 60);

    expect(await store.deleteByPrefix('job:')).toBe(2);
    expect(await store.get('diff:1')).toBe('c');
  });
});
