import { Global, Inject, Logger, Module, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import {
  // Persistence
  createDatabase,
  SqliteGitHubRepoRepository,
  SqliteJobRepository,
  SqlitePullRequestRepository,
  SqliteSuggestionRepository,
  // GitHub
  GitHubApiClient,
  ResilientGitHubClient,
  // Inference
  HttpInferenceGateway,
  // Cache
  MemoryCacheStore,
  RedisCacheStore,
  // Realtime
  ProgressBroadcaster,
  // Config
  loadReviewConfig,
  REVIEW_CONFIG,
  ReviewConfig,
} from '../..';
import { BoundedWorkerPool, ResultCache, ReviewOrchestrator } from '../../../application';
import {
  CACHE_STORE,
  GITHUB_API_CLIENT,
  GITHUB_REPO_REPOSITORY,
  ICacheStore,
  IGitHubApiClient,
  IGitHubRepoRepository,
  IInferenceGateway,
  IJobRepository,
  INFERENCE_GATEWAY,
  IProgressBroadcaster,
  IPullRequestRepository,
  ISuggestionRepository,
  JOB_REPOSITORY,
  PROGRESS_BROADCASTER,
  PULL_REQUEST_REPOSITORY,
  SUGGESTION_REPOSITORY,
} from '../../../domain';
import {
  HealthController,
  JobsController,
  PullRequestsController,
  RepositoriesController,
  StatsController,
  SuggestionsController,
  WebhooksController,
} from '../controllers';

const DATABASE_TOKEN = Symbol('DATABASE');

@Global()
@Module({
  controllers: [
    WebhooksController,
    JobsController,
    PullRequestsController,
    SuggestionsController,
    StatsController,
    RepositoriesController,
    HealthController,
  ],
  providers: [
    // Configuration
    {
      provide: REVIEW_CONFIG,
      useFactory: (configService: ConfigService) => loadReviewConfig((key) => configService.get<string>(key)),
      inject: [ConfigService],
    },

    // Database
    {
      provide: DATABASE_TOKEN,
      useFactory: (config: ReviewConfig) => {
        mkdirSync(dirname(config.databasePath), { recursive: true });
        return createDatabase(config.databasePath);
      },
      inject: [REVIEW_CONFIG],
    },

    // Repositories
    {
      provide: GITHUB_REPO_REPOSITORY,
      useFactory: (db: Database.Database) => new SqliteGitHubRepoRepository(db),
      inject: [DATABASE_TOKEN],
    },
    {
      provide: PULL_REQUEST_REPOSITORY,
      useFactory: (db: Database.Database) => new SqlitePullRequestRepository(db),
      inject: [DATABASE_TOKEN],
    },
    {
      provide: JOB_REPOSITORY,
      useFactory: (db: Database.Database) => new SqliteJobRepository(db),
      inject: [DATABASE_TOKEN],
    },
    {
      provide: SUGGESTION_REPOSITORY,
      useFactory: (db: Database.Database) => new SqliteSuggestionRepository(db),
      inject: [DATABASE_TOKEN],
    },

    // Upstream and inference clients
    {
      provide: ResilientGitHubClient,
      useFactory: (config: ReviewConfig) =>
        new ResilientGitHubClient(new GitHubApiClient(config.githubApiUrl), {
          retry: config.retry,
          breaker: config.breaker,
        }),
      inject: [REVIEW_CONFIG],
    },
    {
      provide: GITHUB_API_CLIENT,
      useExisting: ResilientGitHubClient,
    },
    {
      provide: INFERENCE_GATEWAY,
      useFactory: (config: ReviewConfig) => new HttpInferenceGateway(config.aiServiceUrl),
      inject: [REVIEW_CONFIG],
    },

    // Cache and live progress
    {
      provide: CACHE_STORE,
      useFactory: (config: ReviewConfig): ICacheStore =>
        config.redisUrl ? RedisCacheStore.connect(config.redisUrl) : new MemoryCacheStore(),
      inject: [REVIEW_CONFIG],
    },
    {
      provide: ResultCache,
      useFactory: (store: ICacheStore, config: ReviewConfig) => new ResultCache(store, config.cacheTtlSeconds),
      inject: [CACHE_STORE, REVIEW_CONFIG],
    },
    {
      provide: PROGRESS_BROADCASTER,
      useFactory: () => new ProgressBroadcaster(),
    },

    // Job execution
    {
      provide: BoundedWorkerPool,
      useFactory: (config: ReviewConfig) => new BoundedWorkerPool(config.workers),
      inject: [REVIEW_CONFIG],
    },
    {
      provide: ReviewOrchestrator,
      useFactory: (
        jobRepo: IJobRepository,
        suggestionRepo: ISuggestionRepository,
        pullRequestRepo: IPullRequestRepository,
        repoRepository: IGitHubRepoRepository,
        githubClient: IGitHubApiClient,
        inferenceGateway: IInferenceGateway,
        cache: ResultCache,
        broadcaster: IProgressBroadcaster,
        pool: BoundedWorkerPool,
        config: ReviewConfig,
      ) =>
        new ReviewOrchestrator(
          jobRepo,
          suggestionRepo,
          pullRequestRepo,
          repoRepository,
          githubClient,
          inferenceGateway,
          cache,
          broadcaster,
          pool,
          { inferenceTimeoutMs: config.aiTimeoutMs },
        ),
      inject: [
        JOB_REPOSITORY,
        SUGGESTION_REPOSITORY,
        PULL_REQUEST_REPOSITORY,
        GITHUB_REPO_REPOSITORY,
        GITHUB_API_CLIENT,
        INFERENCE_GATEWAY,
        ResultCache,
        PROGRESS_BROADCASTER,
        BoundedWorkerPool,
        REVIEW_CONFIG,
      ],
    },
  ],
  exports: [
    REVIEW_CONFIG,
    DATABASE_TOKEN,
    GITHUB_REPO_REPOSITORY,
    PULL_REQUEST_REPOSITORY,
    JOB_REPOSITORY,
    SUGGESTION_REPOSITORY,
    GITHUB_API_CLIENT,
    ResilientGitHubClient,
    INFERENCE_GATEWAY,
    CACHE_STORE,
    ResultCache,
    PROGRESS_BROADCASTER,
    BoundedWorkerPool,
    ReviewOrchestrator,
  ],
})
export class CoreModule implements OnApplicationShutdown {
  private readonly logger = new Logger(CoreModule.name);

  constructor(
    private readonly orchestrator: ReviewOrchestrator,
    @Inject(CACHE_STORE) private readonly cacheStore: ICacheStore,
    @Inject(DATABASE_TOKEN) private readonly db: Database.Database,
  ) {}

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.logger.log(`Shutting down${signal ? ` (${signal})` : ''}`);
    await this.orchestrator.shutdown();
    if (this.cacheStore instanceof RedisCacheStore) {
      await this.cacheStore.disconnect();
    }
    this.db.close();
  }
}
