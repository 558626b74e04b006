/**
 * Error taxonomy for the review pipeline.
 * Every error raised across a port boundary is one of these, so callers can
 * branch on `code` instead of matching message text.
 */
export type ReviewErrorCode =
  | 'TRANSIENT_UPSTREAM'
  | 'UPSTREAM_UNAVAILABLE'
  | 'UPSTREAM_REQUEST'
  | 'VALIDATION'
  | 'INFERENCE_TIMEOUT'
  | 'INFERENCE'
  | 'PERSISTENCE'
  | 'CAPACITY'
  | 'SHUTTING_DOWN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'UNAUTHORIZED';

export abstract class ReviewError extends Error {
  abstract readonly code: ReviewErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Timeouts, connection resets, 429 and 5xx answers from the code host. */
export class TransientUpstreamError extends ReviewError {
  readonly code = 'TRANSIENT_UPSTREAM' as const;

  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Raised without a network attempt while a circuit breaker is open. */
export class UpstreamUnavailableError extends ReviewError {
  readonly code = 'UPSTREAM_UNAVAILABLE' as const;

  constructor(readonly operation: string) {
    super(`GitHub is temporarily unavailable (${operation})`);
  }
}

/** 4xx answers: bad credentials, missing resources, rejected input. */
export class UpstreamRequestError extends ReviewError {
  readonly code = 'UPSTREAM_REQUEST' as const;

  constructor(
    message: string,
    readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ValidationError extends ReviewError {
  readonly code = 'VALIDATION' as const;
}

export class InferenceTimeoutError extends ReviewError {
  readonly code = 'INFERENCE_TIMEOUT' as const;

  constructor(
    readonly timeoutMs: number,
    options?: { cause?: unknown },
  ) {
    super(`AI analysis timed out after ${timeoutMs}ms`, options);
  }
}

export class InferenceError extends ReviewError {
  readonly code = 'INFERENCE' as const;
}

export class PersistenceError extends ReviewError {
  readonly code = 'PERSISTENCE' as const;
}

export class CapacityError extends ReviewError {
  readonly code = 'CAPACITY' as const;

  constructor(readonly queueCapacity: number) {
    super(`Analysis queue is full (${queueCapacity} waiting); try again later`);
  }
}

export class ShuttingDownError extends ReviewError {
  readonly code = 'SHUTTING_DOWN' as const;

  constructor() {
    super('Review service is shutting down; no new analyses are accepted');
  }
}

export class NotFoundError extends ReviewError {
  readonly code = 'NOT_FOUND' as const;

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`);
  }
}

export class ConflictError extends ReviewError {
  readonly code = 'CONFLICT' as const;
}

/** Webhook delivery whose signature does not match the repository secret. */
export class WebhookSignatureError extends ReviewError {
  readonly code = 'UNAUTHORIZED' as const;

  constructor() {
    super('Invalid webhook signature');
  }
}

const MAX_ERROR_LENGTH = 300;

/**
 * Short, single-line message safe to store on a job and show to users.
 * Unknown errors keep only the first line of their message.
 */
export function sanitizeErrorMessage(error: unknown): string {
  if (!(error instanceof Error)) {
    return 'Unknown error';
  }
  if (!(error instanceof ReviewError)) {
    const firstLine = error.message.split('\n')[0].trim();
    if (!firstLine) {
      return 'Internal error during analysis';
    }
    return truncate(firstLine);
  }
  return truncate(error.message.split('\n')[0].trim());
}

function truncate(message: string): string {
  return message.length > MAX_ERROR_LENGTH ? `${message.slice(0, MAX_ERROR_LENGTH - 3)}...` : message;
}
