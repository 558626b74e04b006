import { Suggestion } from '../entities/Suggestion';
import { Severity } from '../value-objects/Severity';
import { SuggestionStatusValue } from '../value-objects/SuggestionStatus';

export interface SuggestionFilter {
  status?: SuggestionStatusValue;
  severity?: Severity;
  minConfidence?: number;
}

/**
 * Repository interface (port) for Suggestion entity persistence
 */
export interface ISuggestionRepository {
  save(suggestion: Suggestion): Promise<void>;
  findById(id: string): Promise<Suggestion | null>;
  findByJobId(jobId: string, filter?: SuggestionFilter): Promise<Suggestion[]>;
  countByJobId(jobId: string): Promise<number>;

  /**
   * accepted / (accepted + rejected + ignored); 0 when nothing has been responded to
   */
  acceptanceRate(): Promise<number>;
}

export const SUGGESTION_REPOSITORY = Symbol('ISuggestionRepository');
