import { Octokit } from '@octokit/rest';
import {
  ChangedFile,
  CreateWebhookParams,
  GitHubCredentials,
  IGitHubApiClient,
  PullRequestRef,
  RemoteRepository,
} from '../../domain/ports/IGitHubApiClient';
import { TransientUpstreamError, UpstreamRequestError } from '../../domain/errors';

const WEBHOOK_EVENTS = ['pull_request', 'pull_request_review'];

const TRANSIENT_MESSAGE_PATTERNS = [
  'timeout',
  'timed out',
  'econnrefused',
  'econnreset',
  'etimedout',
  'socket hang up',
  'fetch failed',
  'getaddrinfo',
];

/**
 * Client for GitHub API operations needed by the review pipeline
 * Implements IGitHubApiClient port from domain; every failure leaves as
 * TransientUpstreamError or UpstreamRequestError
 */
export class GitHubApiClient implements IGitHubApiClient {
  private readonly clients = new Map<string, Octokit>();

  constructor(private readonly baseUrl = 'https://api.github.com') {}

  async listRepositories(credentials: GitHubCredentials): Promise<RemoteRepository[]> {
    return this.call('listRepositories', async (octokit) => {
      const repos = await octokit.paginate(octokit.repos.listForAuthenticatedUser, {
        per_page: 100,
        sort: 'updated',
      });

      return repos.map((repo) => ({
        githubRepoId: repo.id,
        owner: repo.owner.login,
        name: repo.name,
        fullName: repo.full_name,
        language: repo.language ?? null,
        description: repo.description,
        private: repo.private,
      }));
    }, credentials);
  }

  async getPullRequestDiff(credentials: GitHubCredentials, ref: PullRequestRef): Promise<string> {
    return this.call('getPullRequestDiff', async (octokit) => {
      const response = await octokit.pulls.get({
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.number,
        mediaType: { format: 'diff' },
      });

      // The diff media type returns the raw text body
      const diff: unknown = response.data;
      if (typeof diff !== 'string') {
        throw new UpstreamRequestError('GitHub did not return a diff body', response.status);
      }
      return diff;
    }, credentials);
  }

  async getPullRequestFiles(credentials: GitHubCredentials, ref: PullRequestRef): Promise<ChangedFile[]> {
    return this.call('getPullRequestFiles', async (octokit) => {
      const files = await octokit.paginate(octokit.pulls.listFiles, {
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.number,
        per_page: 100,
      });

      return files.map((file) => ({
        filename: file.filename,
        status: file.status,
        additions: file.additions,
        deletions: file.deletions,
        patch: file.patch ?? null,
      }));
    }, credentials);
  }

  async createWebhook(credentials: GitHubCredentials, params: CreateWebhookParams): Promise<number> {
    return this.call('createWebhook', async (octokit) => {
      const { data } = await octokit.repos.createWebhook({
        owner: params.owner,
        repo: params.repo,
        name: 'web',
        active: true,
        events: WEBHOOK_EVENTS,
        config: {
          url: params.callbackUrl,
          content_type: 'json',
          secret: params.secret,
          insecure_ssl: '0',
        },
      });
      return data.id;
    }, credentials);
  }

  async deleteWebhook(credentials: GitHubCredentials, owner: string, repo: string, webhookId: number): Promise<void> {
    return this.call('deleteWebhook', async (octokit) => {
      try {
        await octokit.repos.deleteWebhook({ owner, repo, hook_id: webhookId });
      } catch (error: unknown) {
        if (statusOf(error) === 404) {
          return;
        }
        throw error;
      }
    }, credentials);
  }

  private async call<T>(
    operation: string,
    fn: (octokit: Octokit) => Promise<T>,
    credentials: GitHubCredentials,
  ): Promise<T> {
    try {
      return await fn(this.clientFor(credentials));
    } catch (error: unknown) {
      throw classifyGitHubError(operation, error);
    }
  }

  private clientFor(credentials: GitHubCredentials): Octokit {
    let octokit = this.clients.get(credentials.token);
    if (!octokit) {
      octokit = new Octokit({ auth: credentials.token, baseUrl: this.baseUrl });
      this.clients.set(credentials.token, octokit);
    }
    return octokit;
  }
}

function statusOf(error: unknown): number | null {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
}

/**
 * 429, 5xx and network failures are transient; any other HTTP status is a
 * request error that retrying cannot fix.
 */
export function classifyGitHubError(operation: string, error: unknown): Error {
  if (error instanceof TransientUpstreamError || error instanceof UpstreamRequestError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);

  if (status !== null && (status === 429 || status >= 500)) {
    return new TransientUpstreamError(`${operation}: GitHub responded ${status}`, status, { cause: error });
  }
  if (status !== null && status >= 400) {
    return new UpstreamRequestError(`${operation}: GitHub responded ${status} (${message})`, status, { cause: error });
  }

  const lower = message.toLowerCase();
  if (TRANSIENT_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new TransientUpstreamError(`${operation}: ${message}`, null, { cause: error });
  }
  return error instanceof Error ? error : new Error(message);
}
