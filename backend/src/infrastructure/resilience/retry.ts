export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  retryOn?: (error: unknown) => boolean;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS = {
  maxRetries: 3,
  baseDelay: 200,
  maxDelay: 5000,
  jitter: false,
};

export function computeDelay(attempt: number, baseDelay: number, maxDelay: number, jitter: boolean): number {
  let delay = Math.min(baseDelay * Math.pow(2, attempt), maxDelay);

  if (jitter) {
    delay *= 0.5 + Math.random() * 0.5;
  }

  return delay;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs fn up to maxRetries + 1 times with exponential backoff.
 * Errors rejected by retryOn are rethrown immediately.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxRetries = options?.maxRetries ?? DEFAULT_OPTIONS.maxRetries;
  const baseDelay = options?.baseDelay ?? DEFAULT_OPTIONS.baseDelay;
  const maxDelay = options?.maxDelay ?? DEFAULT_OPTIONS.maxDelay;
  const jitter = options?.jitter ?? DEFAULT_OPTIONS.jitter;
  const retryOn = options?.retryOn;
  const wait = options?.sleep ?? sleep;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= maxRetries) {
        break;
      }
      if (retryOn && !retryOn(error)) {
        break;
      }

      const delay = computeDelay(attempt, baseDelay, maxDelay, jitter);
      options?.onRetry?.(attempt + 1, delay, error);
      await wait(delay);
    }
  }

  throw lastError;
}
