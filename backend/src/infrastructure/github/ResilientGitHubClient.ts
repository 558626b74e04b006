import { Logger } from '@nestjs/common';
import {
  ChangedFile,
  CreateWebhookParams,
  GitHubCredentials,
  IGitHubApiClient,
  PullRequestRef,
  RemoteRepository,
} from '../../domain/ports/IGitHubApiClient';
import { TransientUpstreamError, UpstreamRequestError, UpstreamUnavailableError } from '../../domain/errors';
import { BreakerConfig, RetryConfig } from '../config/ReviewConfig';
import { CircuitBreaker, CircuitBreakerError, CircuitState } from '../resilience/CircuitBreaker';
import { withRetry } from '../resilience/retry';

export type GitHubOperation = keyof IGitHubApiClient;

export interface ResilienceOptions {
  retry: RetryConfig;
  breaker: BreakerConfig;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Decorates an IGitHubApiClient with one circuit breaker per operation and
 * retries with exponential backoff inside each breaker.
 */
export class ResilientGitHubClient implements IGitHubApiClient {
  private readonly logger = new Logger(ResilientGitHubClient.name);
  private readonly breakers: Record<GitHubOperation, CircuitBreaker>;

  constructor(
    private readonly inner: IGitHubApiClient,
    private readonly options: ResilienceOptions,
  ) {
    this.breakers = {
      listRepositories: this.createBreaker('listRepositories'),
      getPullRequestDiff: this.createBreaker('getPullRequestDiff'),
      getPullRequestFiles: this.createBreaker('getPullRequestFiles'),
      createWebhook: this.createBreaker('createWebhook'),
      deleteWebhook: this.createBreaker('deleteWebhook'),
    };
  }

  listRepositories(credentials: GitHubCredentials): Promise<RemoteRepository[]> {
    return this.protect('listRepositories', () => this.inner.listRepositories(credentials));
  }

  getPullRequestDiff(credentials: GitHubCredentials, ref: PullRequestRef): Promise<string> {
    return this.protect('getPullRequestDiff', () => this.inner.getPullRequestDiff(credentials, ref));
  }

  getPullRequestFiles(credentials: GitHubCredentials, ref: PullRequestRef): Promise<ChangedFile[]> {
    return this.protect('getPullRequestFiles', () => this.inner.getPullRequestFiles(credentials, ref));
  }

  createWebhook(credentials: GitHubCredentials, params: CreateWebhookParams): Promise<number> {
    return this.protect('createWebhook', () => this.inner.createWebhook(credentials, params));
  }

  deleteWebhook(credentials: GitHubCredentials, owner: string, repo: string, webhookId: number): Promise<void> {
    return this.protect('deleteWebhook', () => this.inner.deleteWebhook(credentials, owner, repo, webhookId));
  }

  breakerStates(): Record<GitHubOperation, CircuitState> {
    return {
      listRepositories: this.breakers.listRepositories.getState(),
      getPullRequestDiff: this.breakers.getPullRequestDiff.getState(),
      getPullRequestFiles: this.breakers.getPullRequestFiles.getState(),
      createWebhook: this.breakers.createWebhook.getState(),
      deleteWebhook: this.breakers.deleteWebhook.getState(),
    };
  }

  private async protect<T>(operation: GitHubOperation, fn: () => Promise<T>): Promise<T> {
    const { retry } = this.options;
    try {
      return await this.breakers[operation].execute(() =>
        withRetry(fn, {
          maxRetries: retry.maxRetries,
          baseDelay: retry.baseDelayMs,
          maxDelay: retry.maxDelayMs,
          retryOn: (error) => error instanceof TransientUpstreamError,
          onRetry: (attempt, delayMs, error) =>
            this.logger.debug(
              `${operation} attempt ${attempt} failed (${error instanceof Error ? error.message : String(error)}); retrying in ${Math.round(delayMs)}ms`,
            ),
          sleep: this.options.sleep,
        }),
      );
    } catch (error) {
      if (error instanceof CircuitBreakerError) {
        throw new UpstreamUnavailableError(operation);
      }
      throw error;
    }
  }

  private createBreaker(operation: GitHubOperation): CircuitBreaker {
    const { breaker } = this.options;
    return new CircuitBreaker({
      name: operation,
      windowSize: breaker.windowSize,
      failureRateThreshold: breaker.failureRateThreshold,
      cooldownMs: breaker.cooldownMs,
      isFailure: (error) => !(error instanceof UpstreamRequestError),
      now: this.options.now,
      onStateChange: (from, to) => this.logger.warn(`Circuit ${operation}: ${from} -> ${to}`),
    });
  }
}
