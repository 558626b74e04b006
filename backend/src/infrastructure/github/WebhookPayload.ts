import { ValidationError } from '../../domain/errors';
import { PullRequestDetails } from '../../domain/entities/PullRequest';

export interface PullRequestEvent {
  action: string;
  githubRepoId: number;
  repositoryFullName: string;
  number: number;
  details: PullRequestDetails;
}

type JsonRecord = Record<string, unknown>;

const asRecord = (value: unknown): JsonRecord | null =>
  typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : null;

const requireRecord = (value: unknown, field: string): JsonRecord => {
  const record = asRecord(value);
  if (!record) {
    throw new ValidationError(`Webhook payload is missing ${field}`);
  }
  return record;
};

const requireString = (record: JsonRecord, key: string, field: string): string => {
  const value = record[key];
  if (typeof value !== 'string' || value === '') {
    throw new ValidationError(`Webhook payload is missing ${field}`);
  }
  return value;
};

const requireInteger = (record: JsonRecord, key: string, field: string): number => {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`Webhook payload is missing ${field}`);
  }
  return value;
};

export function parseWebhookBody(rawBody: Buffer | string): JsonRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody.toString());
  } catch (error) {
    throw new ValidationError('Webhook body is not valid JSON', { cause: error });
  }
  return requireRecord(parsed, 'a JSON object body');
}

/**
 * GitHub's numeric repository id, or null when the payload names no repository
 */
export function extractRepositoryId(payload: JsonRecord): number | null {
  const repository = asRecord(payload.repository);
  const id = repository?.id;
  return typeof id === 'number' && Number.isInteger(id) ? id : null;
}

/**
 * Reads the fields of a pull_request delivery the pipeline uses; everything
 * else in the payload is ignored.
 */
export function parsePullRequestEvent(payload: JsonRecord): PullRequestEvent {
  const action = requireString(payload, 'action', 'action');
  const repository = requireRecord(payload.repository, 'repository');
  const pullRequest = requireRecord(payload.pull_request, 'pull_request');
  const user = requireRecord(pullRequest.user, 'pull_request.user');
  const base = requireRecord(pullRequest.base, 'pull_request.base');
  const head = requireRecord(pullRequest.head, 'pull_request.head');

  return {
    action,
    githubRepoId: requireInteger(repository, 'id', 'repository.id'),
    repositoryFullName: requireString(repository, 'full_name', 'repository.full_name'),
    number: requireInteger(pullRequest, 'number', 'pull_request.number'),
    details: {
      title: requireString(pullRequest, 'title', 'pull_request.title'),
      author: requireString(user, 'login', 'pull_request.user.login'),
      baseBranch: requireString(base, 'ref', 'pull_request.base.ref'),
      headBranch: requireString(head, 'ref', 'pull_request.head.ref'),
      state: pullRequest.state === 'closed' ? 'closed' : 'open',
      htmlUrl: requireString(pullRequest, 'html_url', 'pull_request.html_url'),
    },
  };
}
