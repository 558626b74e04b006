import { Controller, Get, Headers, HttpCode, HttpStatus, Inject, Param, Post } from '@nestjs/common';
import { JobResponseDto, TriggerJobResponseDto } from '../dto';
import {
  IJobRepository,
  ISuggestionRepository,
  JOB_REPOSITORY,
  SUGGESTION_REPOSITORY,
} from '../../../domain';
import { GetJobStatusQuery } from '../../../application/queries/GetJobStatus';
import { ResultCache } from '../../../application/services/ResultCache';
import { ReviewOrchestrator } from '../../../application/services/ReviewOrchestrator';
import { REVIEW_CONFIG, ReviewConfig } from '../../config/ReviewConfig';
import { GITHUB_TOKEN_HEADER, requireCredentials } from './credentials';
import { toHttpException } from './http-errors';

@Controller('pull-requests')
export class PullRequestsController {
  constructor(
    @Inject(JOB_REPOSITORY)
    private readonly jobRepo: IJobRepository,
    @Inject(SUGGESTION_REPOSITORY)
    private readonly suggestionRepo: ISuggestionRepository,
    private readonly orchestrator: ReviewOrchestrator,
    private readonly cache: ResultCache,
    @Inject(REVIEW_CONFIG)
    private readonly config: ReviewConfig,
  ) {}

  @Post(':id/analyze')
  @HttpCode(HttpStatus.ACCEPTED)
  async analyze(
    @Param('id') id: string,
    @Headers(GITHUB_TOKEN_HEADER) token: string | undefined,
  ): Promise<TriggerJobResponseDto> {
    const credentials = requireCredentials(token, this.config.githubToken);
    try {
      const handle = await this.orchestrator.triggerJob(id, credentials, { trigger: 'manual' });
      return { jobId: handle.jobId, status: 'pending' };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get(':id/latest-job')
  async latestJob(@Param('id') id: string): Promise<JobResponseDto> {
    const query = new GetJobStatusQuery(this.jobRepo, this.suggestionRepo, this.cache);
    try {
      return await query.getLatestForPullRequest(id);
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
