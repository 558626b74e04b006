import { GitHubRepo } from '../entities/GitHubRepo';

/**
 * Registered repositories. githubRepoId is unique across the store, so
 * findByGithubRepoId doubles as the duplicate check on registration.
 */
export interface IGitHubRepoRepository {
  save(repo: GitHubRepo): Promise<void>;
  findById(id: string): Promise<GitHubRepo | null>;
  findByGithubRepoId(githubRepoId: number): Promise<GitHubRepo | null>;
  findAll(): Promise<GitHubRepo[]>;
  delete(id: string): Promise<void>;
}

export const GITHUB_REPO_REPOSITORY = Symbol('IGitHubRepoRepository');
