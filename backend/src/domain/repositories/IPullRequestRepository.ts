import { PullRequest } from '../entities/PullRequest';

export interface IPullRequestRepository {
  save(pullRequest: PullRequest): Promise<void>;
  findById(id: string): Promise<PullRequest | null>;
  findByRepositoryAndNumber(repositoryId: string, number: number): Promise<PullRequest | null>;
}

export const PULL_REQUEST_REPOSITORY = Symbol('IPullRequestRepository');
