import { StatsDto } from '@pr-sentinel/shared';
import { IJobRepository, ISuggestionRepository } from '../../domain';

export class GetReviewStatsQuery {
  constructor(
    private readonly jobRepo: IJobRepository,
    private readonly suggestionRepo: ISuggestionRepository,
  ) {}

  async execute(): Promise<StatsDto> {
    const [acceptanceRate, averageDurationMs] = await Promise.all([
      this.suggestionRepo.acceptanceRate(),
      this.jobRepo.averageCompletedDurationMs(),
    ]);
    return {
      acceptanceRate: Math.round(acceptanceRate * 10_000) / 10_000,
      averageDurationMs: averageDurationMs === null ? null : Math.round(averageDurationMs),
    };
  }
}
