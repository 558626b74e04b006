import { Controller, Get, Inject } from '@nestjs/common';
import { StatsResponseDto } from '../dto';
import { IJobRepository, ISuggestionRepository, JOB_REPOSITORY, SUGGESTION_REPOSITORY } from '../../../domain';
import { GetReviewStatsQuery } from '../../../application/queries/GetReviewStats';

@Controller('stats')
export class StatsController {
  constructor(
    @Inject(JOB_REPOSITORY)
    private readonly jobRepo: IJobRepository,
    @Inject(SUGGESTION_REPOSITORY)
    private readonly suggestionRepo: ISuggestionRepository,
  ) {}

  @Get()
  async getStats(): Promise<StatsResponseDto> {
    return new GetReviewStatsQuery(this.jobRepo, this.suggestionRepo).execute();
  }
}
