/**
 * Port for the upstream code host (GitHub) operations the review pipeline needs
 * Infrastructure provides the Octokit adapter and its resilient wrapper
 */

export interface GitHubCredentials {
  token: string;
}

export interface PullRequestRef {
  owner: string;
  repo: string;
  number: number;
}

export interface RemoteRepository {
  githubRepoId: number;
  owner: string;
  name: string;
  fullName: string;
  language: string | null;
  description: string | null;
  private: boolean;
}

export interface ChangedFile {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
  patch: string | null;
}

export interface CreateWebhookParams {
  owner: string;
  repo: string;
  callbackUrl: string;
  secret: string;
}

export interface IGitHubApiClient {
  /**
   * Repositories the credentials can see
   */
  listRepositories(credentials: GitHubCredentials): Promise<RemoteRepository[]>;

  /**
   * Unified diff of a pull request
   */
  getPullRequestDiff(credentials: GitHubCredentials, ref: PullRequestRef): Promise<string>;

  getPullRequestFiles(credentials: GitHubCredentials, ref: PullRequestRef): Promise<ChangedFile[]>;

  /**
   * Registers a pull_request webhook and returns its id
   */
  createWebhook(credentials: GitHubCredentials, params: CreateWebhookParams): Promise<number>;

  /**
   * Removes a webhook; an already-deleted hook is not an error
   */
  deleteWebhook(credentials: GitHubCredentials, owner: string, repo: string, webhookId: number): Promise<void>;
}

export const GITHUB_API_CLIENT = Symbol('IGitHubApiClient');
