import type { CircuitState } from '@pr-sentinel/shared';

export type { CircuitState };

export class CircuitBreakerError extends Error {
  constructor(
    public readonly breakerName: string,
    message?: string,
  ) {
    super(message ?? `Circuit breaker "${breakerName}" is OPEN`);
    this.name = 'CircuitBreakerError';
  }
}

export interface CircuitBreakerOptions {
  name: string;
  /** Number of most recent calls the failure rate is computed over */
  windowSize?: number;
  /** Failure rate (0-1) at or above which a full window opens the circuit */
  failureRateThreshold?: number;
  /** Time spent open before a single trial call is let through */
  cooldownMs?: number;
  /** Errors for which this returns false pass through without being recorded */
  isFailure?: (error: unknown) => boolean;
  now?: () => number;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  calls: number;
  failures: number;
  openedAt: Date | null;
}

/**
 * Count-based sliding window breaker. Only the last `windowSize` outcomes
 * count, and the circuit never opens before the window has filled.
 */
export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private outcomes: boolean[] = [];
  private openedAt: number | null = null;
  private trialInFlight = false;

  private readonly name: string;
  private readonly windowSize: number;
  private readonly failureRateThreshold: number;
  private readonly cooldownMs: number;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly now: () => number;
  private readonly onStateChange?: (from: CircuitState, to: CircuitState) => void;

  constructor(options: CircuitBreakerOptions) {
    this.name = options.name;
    this.windowSize = options.windowSize ?? 10;
    this.failureRateThreshold = options.failureRateThreshold ?? 0.5;
    this.cooldownMs = options.cooldownMs ?? 5000;
    this.isFailure = options.isFailure ?? (() => true);
    this.now = options.now ?? Date.now;
    this.onStateChange = options.onStateChange;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      if (this.openedAt !== null && this.now() - this.openedAt >= this.cooldownMs) {
        this.transitionTo('HALF_OPEN');
      } else {
        throw new CircuitBreakerError(this.name);
      }
    }

    if (this.state === 'HALF_OPEN') {
      return this.runTrial(fn);
    }
    return this.runClosed(fn);
  }

  getName(): string {
    return this.name;
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      calls: this.outcomes.length,
      failures: this.outcomes.filter(Boolean).length,
      openedAt: this.openedAt === null ? null : new Date(this.openedAt),
    };
  }

  private async runClosed<T>(fn: () => Promise<T>): Promise<T> {
    try {
      const result = await fn();
      this.record(false);
      return result;
    } catch (error) {
      if (this.isFailure(error)) {
        this.record(true);
      }
      throw error;
    }
  }

  private async runTrial<T>(fn: () => Promise<T>): Promise<T> {
    if (this.trialInFlight) {
      throw new CircuitBreakerError(this.name, `Circuit breaker "${this.name}" is HALF_OPEN with a trial in flight`);
    }
    this.trialInFlight = true;
    try {
      const result = await fn();
      this.transitionTo('CLOSED');
      return result;
    } catch (error) {
      if (this.isFailure(error)) {
        this.transitionTo('OPEN');
      }
      throw error;
    } finally {
      this.trialInFlight = false;
    }
  }

  private record(failed: boolean): void {
    // A call that started while closed may finish after the circuit opened
    if (this.state !== 'CLOSED') {
      return;
    }
    this.outcomes.push(failed);
    if (this.outcomes.length > this.windowSize) {
      this.outcomes.shift();
    }
    if (this.outcomes.length < this.windowSize) {
      return;
    }
    const failures = this.outcomes.filter(Boolean).length;
    if (failures / this.outcomes.length >= this.failureRateThreshold) {
      this.transitionTo('OPEN');
    }
  }

  private transitionTo(newState: CircuitState): void {
    const previous = this.state;
    this.state = newState;
    if (newState === 'OPEN') {
      this.openedAt = this.now();
    } else if (newState === 'CLOSED') {
      this.openedAt = null;
    }
    this.outcomes = [];
    if (previous !== newState) {
      this.onStateChange?.(previous, newState);
    }
  }
}
