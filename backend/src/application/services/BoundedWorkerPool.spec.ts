import { CapacityError, ShuttingDownError } from '../../domain/errors';
import { BoundedWorkerPool } from './BoundedWorkerPool';

function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('BoundedWorkerPool', () => {
  it('should fill core workers, then the queue, then extra workers', async () => {
    const pool = new BoundedWorkerPool({ core: 1, max: 2, queueCapacity: 1 });
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];
    const task = (index: number) => async () => {
      started.push(index);
      await gates[index].promise;
      return index;
    };

    const first = pool.submit(task(0));
    const second = pool.submit(task(1));
    const third = pool.submit(task(2));
    await flush();

    expect(started).toEqual([0, 2]);
    expect(pool.stats()).toMatchObject({ running: 2, queued: 1 });
    expect(pool.hasCapacity()).toBe(false);
    expect(() => pool.submit(task(0))).toThrow(CapacityError);

    gates[0].resolve();
    await expect(first).resolves.toBe(0);
    await flush();
    expect(started).toEqual([0, 2, 1]);

    gates[1].resolve();
    gates[2].resolve();
    await expect(second).resolves.toBe(1);
    await expect(third).resolves.toBe(2);
    expect(pool.stats()).toEqual({ core: 1, max: 2, running: 0, queued: 0, queueCapacity: 1, completed: 3 });
  });

  it('should report the queue capacity in the rejection', async () => {
    const pool = new BoundedWorkerPool({ core: 1, max: 1, queueCapacity: 0 });
    const gate = deferred();
    const running = pool.submit(() => gate.promise);

    expect(() => pool.submit(async () => undefined)).toThrow('Analysis queue is full (0 waiting); try again later');

    gate.resolve();
    await running;
  });

  it('should free the slot when a task fails', async () => {
    const pool = new BoundedWorkerPool({ core: 1, max: 1, queueCapacity: 0 });

    await expect(pool.submit(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(pool.submit(async () => 'next')).resolves.toBe('next');
  });

  it('should drain queued work on shutdown and refuse new work', async () => {
    const pool = new BoundedWorkerPool({ core: 1, max: 1, queueCapacity: 2 });
    const gate = deferred();
    const finished: string[] = [];
    const first = pool.submit(async () => {
      await gate.promise;
      finished.push('a');
    });
    const second = pool.submit(async () => {
      finished.push('b');
    });

    const stopped = pool.shutdown();
    expect(pool.isShuttingDown).toBe(true);
    expect(() => pool.submit(async () => undefined)).toThrow(ShuttingDownError);

    gate.resolve();
    await Promise.all([first, second, stopped]);
    expect(finished).toEqual(['a', 'b']);
  });

  it('should reject invalid sizing', () => {
    expect(() => new BoundedWorkerPool({ core: 2, max: 1, queueCapacity: 0 })).toThrow(
      'Invalid worker pool sizing: core=2 max=1 queue=0',
    );
  });
});
