export type SuggestionStatusValue = 'pending' | 'accepted' | 'rejected' | 'ignored';

export const SUGGESTION_STATUSES: readonly SuggestionStatusValue[] = ['pending', 'accepted', 'rejected', 'ignored'];

export function isSuggestionStatus(value: string): value is SuggestionStatusValue {
  return SUGGESTION_STATUSES.some(status => status === value);
}

export function parseSuggestionStatus(value: string): SuggestionStatusValue {
  if (!isSuggestionStatus(value)) {
    throw new Error(`Invalid suggestion status: ${value}`);
  }
  return value;
}

/** Statuses a user has responded with. */
export const RESPONDED_STATUSES: readonly SuggestionStatusValue[] = ['accepted', 'rejected', 'ignored'];
