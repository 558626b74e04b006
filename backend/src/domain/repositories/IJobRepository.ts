import { ReviewJob } from '../entities/ReviewJob';

/**
 * Repository interface (port) for ReviewJob entity persistence
 */
export interface IJobRepository {
  save(job: ReviewJob): Promise<void>;
  findById(id: string): Promise<ReviewJob | null>;
  findByPullRequestId(pullRequestId: string): Promise<ReviewJob[]>;
  findLatestByPullRequestId(pullRequestId: string): Promise<ReviewJob | null>;

  /**
   * Jobs still pending or processing that were created before the cutoff
   */
  findStuck(createdBefore: Date): Promise<ReviewJob[]>;

  /**
   * Mean durationMs over completed jobs, null when there are none
   */
  averageCompletedDurationMs(): Promise<number | null>;
}

export const JOB_REPOSITORY = Symbol('IJobRepository');
