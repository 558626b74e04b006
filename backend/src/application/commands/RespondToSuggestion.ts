import { ISuggestionRepository, NotFoundError, Suggestion } from '../../domain';

export type SuggestionResponseKind = 'accept' | 'reject' | 'ignore';

export interface RespondToSuggestionInput {
  suggestionId: string;
  response: SuggestionResponseKind;
  feedback?: string;
}

/**
 * Command to record a reviewer's response to a suggestion.
 * Repeating a response is allowed; the latest one wins.
 */
export class RespondToSuggestionCommand {
  constructor(
    private readonly suggestionRepo: ISuggestionRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async execute(input: RespondToSuggestionInput): Promise<Suggestion> {
    const suggestion = await this.suggestionRepo.findById(input.suggestionId);
    if (!suggestion) {
      throw new NotFoundError('Suggestion', input.suggestionId);
    }

    const feedback = input.feedback?.trim() || undefined;
    const at = this.now();
    switch (input.response) {
      case 'accept':
        suggestion.accept(feedback, at);
        break;
      case 'reject':
        suggestion.reject(feedback, at);
        break;
      case 'ignore':
        suggestion.ignore(feedback, at);
        break;
    }

    await this.suggestionRepo.save(suggestion);
    return suggestion;
  }
}
