import { SuggestionDto, SuggestionListDto } from '@pr-sentinel/shared';
import { IJobRepository, ISuggestionRepository, NotFoundError, SuggestionFilter } from '../../domain';
import { toSuggestionDto } from '../mappers';

/**
 * Query to list a job's suggestions, optionally filtered
 */
export class ListSuggestionsQuery {
  constructor(
    private readonly jobRepo: IJobRepository,
    private readonly suggestionRepo: ISuggestionRepository,
  ) {}

  async execute(jobId: string, filter: SuggestionFilter = {}): Promise<SuggestionListDto> {
    const job = await this.jobRepo.findById(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    const suggestions = await this.suggestionRepo.findByJobId(jobId, filter);
    return {
      suggestions: suggestions.map(toSuggestionDto),
      total: suggestions.length,
    };
  }

  async getById(suggestionId: string): Promise<SuggestionDto> {
    const suggestion = await this.suggestionRepo.findById(suggestionId);
    if (!suggestion) {
      throw new NotFoundError('Suggestion', suggestionId);
    }
    return toSuggestionDto(suggestion);
  }
}
