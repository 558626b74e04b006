import { Logger } from '@nestjs/common';
import { JobDto, JobListDto } from '@pr-sentinel/shared';
import { IJobRepository, ISuggestionRepository, NotFoundError, ReviewJob } from '../../domain';
import { toJobDto } from '../mappers';
import { ResultCache } from '../services/ResultCache';
import { TerminalJobEntry } from '../services/ReviewOrchestrator';

/**
 * Query to read job status. Terminal jobs are served from the cached
 * snapshot when present; live jobs always come from the store.
 */
export class GetJobStatusQuery {
  private readonly logger = new Logger(GetJobStatusQuery.name);

  constructor(
    private readonly jobRepo: IJobRepository,
    private readonly suggestionRepo: ISuggestionRepository,
    private readonly cache: ResultCache,
  ) {}

  async getById(jobId: string): Promise<JobDto> {
    const cached = await this.cache.get<TerminalJobEntry>('job', jobId);
    if (cached.hit) {
      this.logger.debug(`Job cache hit for ${jobId}`);
      return toJobDto(cached.value.job, cached.value.suggestionCount);
    }

    const job = await this.jobRepo.findById(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    const suggestionCount = await this.suggestionRepo.countByJobId(job.id);
    if (job.status.isTerminal) {
      await this.cache.set<TerminalJobEntry>('job', job.id, { job: job.toSnapshot(), suggestionCount });
    }
    return toJobDto(job, suggestionCount);
  }

  async getLatestForPullRequest(pullRequestId: string): Promise<JobDto> {
    const job = await this.jobRepo.findLatestByPullRequestId(pullRequestId);
    if (!job) {
      throw new NotFoundError('Job for pull request', pullRequestId);
    }
    return toJobDto(job, await this.suggestionRepo.countByJobId(job.id));
  }

  /**
   * Jobs left pending or processing for longer than the threshold,
   * typically after a crash.
   */
  async listStuck(olderThanMinutes: number, now: Date = new Date()): Promise<JobListDto> {
    const cutoff = new Date(now.getTime() - olderThanMinutes * 60_000);
    const jobs = await this.jobRepo.findStuck(cutoff);
    return {
      jobs: await Promise.all(jobs.map(async (job) => this.withCount(job))),
      total: jobs.length,
    };
  }

  private async withCount(job: ReviewJob): Promise<JobDto> {
    return toJobDto(job, await this.suggestionRepo.countByJobId(job.id));
  }
}
