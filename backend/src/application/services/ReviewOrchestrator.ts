import { Logger } from '@nestjs/common';
import {
  CapacityError,
  ConfidenceScore,
  GitHubCredentials,
  GitHubRepo,
  IGitHubApiClient,
  IGitHubRepoRepository,
  IInferenceGateway,
  IJobRepository,
  InferenceRequest,
  InferenceTimeoutError,
  InferredSuggestion,
  IProgressBroadcaster,
  IPullRequestRepository,
  ISuggestionRepository,
  JobMetadata,
  NotFoundError,
  PullRequest,
  PullRequestRef,
  ReviewJob,
  ReviewJobSnapshot,
  sanitizeErrorMessage,
  ShuttingDownError,
  Suggestion,
  ValidationError,
} from '../../domain';
import { toSuggestionDto } from '../mappers';
import { BoundedWorkerPool } from './BoundedWorkerPool';
import { ResultCache } from './ResultCache';

export interface JobHandle {
  jobId: string;
  /** Settles with the job in its terminal state; never rejects for pipeline failures */
  completion: Promise<ReviewJob>;
}

/** Value cached under `job:<id>` once a run is terminal */
export interface TerminalJobEntry {
  job: ReviewJobSnapshot;
  suggestionCount: number;
}

export interface ReviewOrchestratorOptions {
  inferenceTimeoutMs: number;
  now?: () => Date;
}

interface ReviewTarget {
  pullRequest: PullRequest;
  repository: GitHubRepo;
  ref: PullRequestRef;
}

/**
 * Runs the review pipeline for a pull request on a bounded worker pool.
 * The request path only creates the pending job; everything else happens
 * on the worker that owns the job.
 */
export class ReviewOrchestrator {
  private readonly logger = new Logger(ReviewOrchestrator.name);
  private readonly now: () => Date;

  constructor(
    private readonly jobRepo: IJobRepository,
    private readonly suggestionRepo: ISuggestionRepository,
    private readonly pullRequestRepo: IPullRequestRepository,
    private readonly repoRepository: IGitHubRepoRepository,
    private readonly githubClient: IGitHubApiClient,
    private readonly inferenceGateway: IInferenceGateway,
    private readonly cache: ResultCache,
    private readonly broadcaster: IProgressBroadcaster,
    private readonly pool: BoundedWorkerPool,
    private readonly options: ReviewOrchestratorOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Creates a pending job and hands its run to the worker pool.
   * Throws CapacityError, without writing the job, when the pool is full,
   * and ShuttingDownError once shutdown has begun.
   */
  async triggerJob(
    pullRequestId: string,
    credentials: GitHubCredentials,
    metadata: JobMetadata = {},
  ): Promise<JobHandle> {
    const target = await this.resolveTarget(pullRequestId);
    if (this.pool.isShuttingDown) {
      throw new ShuttingDownError();
    }
    if (!this.pool.hasCapacity()) {
      throw new CapacityError(this.pool.stats().queueCapacity);
    }

    const job = ReviewJob.create({ pullRequestId, metadata });

    let release: (persisted: boolean) => void = () => undefined;
    const persisted = new Promise<boolean>((resolve) => {
      release = resolve;
    });
    const completion = this.pool.submit(async () => ((await persisted) ? this.run(job, target, credentials) : job));

    try {
      await this.jobRepo.save(job);
    } catch (error) {
      release(false);
      throw error;
    }
    release(true);

    this.logger.log(`Queued job ${job.id} for ${target.repository.fullName}#${target.pullRequest.number}`);
    return { jobId: job.id, completion };
  }

  /** Stops accepting jobs and waits for queued and running ones to finish. */
  async shutdown(): Promise<void> {
    const { running, queued } = this.pool.stats();
    this.logger.log(`Shutting down with ${running} running and ${queued} queued jobs`);
    await this.pool.shutdown();
  }

  private async resolveTarget(pullRequestId: string): Promise<ReviewTarget> {
    const pullRequest = await this.pullRequestRepo.findById(pullRequestId);
    if (!pullRequest) {
      throw new NotFoundError('Pull request', pullRequestId);
    }
    const repository = await this.repoRepository.findById(pullRequest.repositoryId);
    if (!repository) {
      throw new NotFoundError('Repository', pullRequest.repositoryId);
    }
    return {
      pullRequest,
      repository,
      ref: { owner: repository.owner, repo: repository.name, number: pullRequest.number },
    };
  }

  private async run(job: ReviewJob, target: ReviewTarget, credentials: GitHubCredentials): Promise<ReviewJob> {
    try {
      job.start(this.now());
      await this.advance(job, 5, 'Analysis started');

      await this.advance(job, 10, 'Fetching pull request diff');
      const diff = await this.fetchDiff(job, target, credentials);
      if (diff.trim() === '') {
        throw new ValidationError('Empty diff - nothing to analyze');
      }

      await this.advance(job, 30, 'Fetching changed files');
      const files = await this.githubClient.getPullRequestFiles(credentials, target.ref);
      job.recordFilesAnalyzed(files.length);

      await this.advance(job, 50, 'Analyzing code');
      const inferenceStarted = Date.now();
      const inferred = await this.inferWithDeadline({
        subjectId: job.pullRequestId,
        diff,
        files: files.map(({ filename, status, additions, deletions }) => ({ filename, status, additions, deletions })),
        language: target.repository.language,
      });
      job.annotate({ inferenceMs: Date.now() - inferenceStarted });

      await this.advance(job, 80, 'Saving suggestions');
      for (const item of inferred) {
        const suggestion = this.toSuggestion(job, item, target.repository.language);
        await this.suggestionRepo.save(suggestion);
        this.broadcaster.publish(job.id, { type: 'suggestion', payload: { suggestion: toSuggestionDto(suggestion) } });
      }

      job.annotate({ suggestionCount: inferred.length });
      job.complete(this.now());
      await this.jobRepo.save(job);
      await this.cache.set<TerminalJobEntry>('job', job.id, {
        job: job.toSnapshot(),
        suggestionCount: inferred.length,
      });
      this.logger.log(`Job ${job.id} completed with ${inferred.length} suggestions in ${job.durationMs}ms`);
      this.broadcaster.publish(job.id, { type: 'complete', payload: { count: inferred.length } });
      return job;
    } catch (error) {
      return this.failJob(job, error);
    }
  }

  private async fetchDiff(job: ReviewJob, target: ReviewTarget, credentials: GitHubCredentials): Promise<string> {
    const cached = await this.cache.get<string>('diff', job.pullRequestId);
    if (cached.hit) {
      this.logger.debug(`Diff cache hit for ${job.pullRequestId}`);
      job.annotate({ diffFromCache: true, diffBytes: Buffer.byteLength(cached.value) });
      return cached.value;
    }
    this.logger.debug(`Diff cache miss for ${job.pullRequestId}`);
    const diff = await this.githubClient.getPullRequestDiff(credentials, target.ref);
    job.annotate({ diffFromCache: false, diffBytes: Buffer.byteLength(diff) });
    if (diff.trim() !== '') {
      await this.cache.set('diff', job.pullRequestId, diff);
    }
    return diff;
  }

  private async inferWithDeadline(request: InferenceRequest): Promise<InferredSuggestion[]> {
    const timeoutMs = this.options.inferenceTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new InferenceTimeoutError(timeoutMs));
        controller.abort();
      }, timeoutMs);
    });
    try {
      return await Promise.race([this.inferenceGateway.analyze(request, controller.signal), deadline]);
    } catch (error) {
      // the gateway may surface the abort itself before the deadline settles the race
      if (controller.signal.aborted && !(error instanceof InferenceTimeoutError)) {
        throw new InferenceTimeoutError(timeoutMs, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private toSuggestion(job: ReviewJob, item: InferredSuggestion, language: string | null): Suggestion {
    return Suggestion.create({
      jobId: job.id,
      filePath: item.filePath,
      lineNumber: item.lineNumber,
      lineEnd: item.lineEnd,
      category: item.category,
      severity: item.severity,
      message: item.message,
      explanation: item.explanation,
      suggestedFix: item.suggestedFix,
      confidenceScore: ConfidenceScore.create(item.confidenceScore),
      metadata: language ? { language } : {},
    });
  }

  private async advance(job: ReviewJob, percent: number, message: string): Promise<void> {
    job.updateProgress(percent, message);
    await this.jobRepo.save(job);
    this.broadcaster.publish(job.id, { type: 'progress', payload: { percent, message } });
  }

  private async failJob(job: ReviewJob, error: unknown): Promise<ReviewJob> {
    const message = sanitizeErrorMessage(error);
    this.logger.error(`Job ${job.id} failed: ${message}`, error instanceof Error ? error.stack : undefined);
    try {
      if (job.status.isPending) {
        job.start(this.now());
      }
      if (!job.status.isTerminal) {
        job.fail(message, this.now());
      }
      await this.jobRepo.save(job);
      await this.cache.set<TerminalJobEntry>('job', job.id, {
        job: job.toSnapshot(),
        suggestionCount: await this.suggestionRepo.countByJobId(job.id),
      });
    } catch (persistError) {
      this.logger.error(`Could not record failure of job ${job.id}: ${sanitizeErrorMessage(persistError)}`);
    }
    this.broadcaster.publish(job.id, { type: 'error', payload: { message } });
    return job;
  }
}
