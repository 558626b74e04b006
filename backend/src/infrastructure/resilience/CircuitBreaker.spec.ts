import { CircuitBreaker, CircuitBreakerError } from './CircuitBreaker';

class ClientError extends Error {}

describe('CircuitBreaker', () => {
  let clock: number;

  const makeBreaker = (windowSize = 4) =>
    new CircuitBreaker({
      name: 'test-breaker',
      windowSize,
      failureRateThreshold: 0.5,
      cooldownMs: 1000,
      isFailure: (error) => !(error instanceof ClientError),
      now: () => clock,
    });

  const succeed = () => Promise.resolve('ok');
  const fail = () => Promise.reject(new Error('boom'));

  const runAll = async (breaker: CircuitBreaker, calls: Array<() => Promise<string>>) => {
    for (const call of calls) {
      await breaker.execute(call).catch(() => undefined);
    }
  };

  beforeEach(() => {
    clock = 0;
  });

  it('should start CLOSED', () => {
    const breaker = makeBreaker();

    expect(breaker.getState()).toBe('CLOSED');
    expect(breaker.getStats()).toEqual({ state: 'CLOSED', calls: 0, failures: 0, openedAt: null });
  });

  it('should not open before the window is full', async () => {
    const breaker = makeBreaker(4);
    await runAll(breaker, [fail, fail, fail]);

    expect(breaker.getState()).toBe('CLOSED');
    expect(breaker.getStats().failures).toBe(3);
  });

  it('should open when the failure rate of a full window reaches the threshold', async () => {
    const breaker = makeBreaker(4);
    await runAll(breaker, [succeed, fail, succeed, fail]);

    expect(breaker.getState()).toBe('OPEN');
  });

  it('should stay closed below the threshold', async () => {
    const breaker = makeBreaker(4);
    await runAll(breaker, [succeed, succeed, succeed, fail]);

    expect(breaker.getState()).toBe('CLOSED');
  });

  it('should only count the most recent calls', async () => {
    const breaker = makeBreaker(4);
    await runAll(breaker, [fail, succeed, succeed, succeed, succeed, fail]);

    expect(breaker.getState()).toBe('CLOSED');
    expect(breaker.getStats()).toMatchObject({ calls: 4, failures: 1 });
  });

  it('should fail fast while open without invoking the call', async () => {
    const breaker = makeBreaker(2);
    await runAll(breaker, [fail, fail]);
    const call = jest.fn(succeed);

    await expect(breaker.execute(call)).rejects.toBeInstanceOf(CircuitBreakerError);
    expect(call).not.toHaveBeenCalled();
  });

  it('should not record errors rejected by isFailure', async () => {
    const breaker = makeBreaker(2);
    const clientError = () => Promise.reject(new ClientError('404'));
    await runAll(breaker, [clientError, clientError, clientError]);

    expect(breaker.getState()).toBe('CLOSED');
    expect(breaker.getStats().calls).toBe(0);
  });

  describe('half-open', () => {
    const openBreaker = async () => {
      const breaker = makeBreaker(2);
      await runAll(breaker, [fail, fail]);
      return breaker;
    };

    it('should admit a trial call after the cooldown and close on success', async () => {
      const breaker = await openBreaker();
      clock = 1000;

      await expect(breaker.execute(succeed)).resolves.toBe('ok');
      expect(breaker.getState()).toBe('CLOSED');
    });

    it('should keep rejecting before the cooldown has elapsed', async () => {
      const breaker = await openBreaker();
      clock = 999;

      await expect(breaker.execute(succeed)).rejects.toThrow('Circuit breaker "test-breaker" is OPEN');
    });

    it('should re-open when the trial fails', async () => {
      const breaker = await openBreaker();
      clock = 1500;

      await expect(breaker.execute(fail)).rejects.toThrow('boom');
      expect(breaker.getState()).toBe('OPEN');
      expect(breaker.getStats().openedAt?.getTime()).toBe(1500);
    });

    it('should admit exactly one trial at a time', async () => {
      const breaker = await openBreaker();
      clock = 1000;
      let release: (value: string) => void = () => undefined;
      const trial = breaker.execute(() => new Promise<string>((resolve) => (release = resolve)));

      await expect(breaker.execute(succeed)).rejects.toBeInstanceOf(CircuitBreakerError);

      release('done');
      await expect(trial).resolves.toBe('done');
      expect(breaker.getState()).toBe('CLOSED');
    });
  });

  it('should report state changes', async () => {
    const changes: string[] = [];
    const breaker = new CircuitBreaker({
      name: 'observed',
      windowSize: 1,
      cooldownMs: 0,
      now: () => clock,
      onStateChange: (from, to) => changes.push(`${from}->${to}`),
    });

    await runAll(breaker, [fail, succeed]);

    expect(changes).toEqual(['CLOSED->OPEN', 'OPEN->HALF_OPEN', 'HALF_OPEN->CLOSED']);
  });
});
