import { Logger } from '@nestjs/common';
import { WebhookAckDto } from '@pr-sentinel/shared';
import {
  GitHubCredentials,
  IGitHubRepoRepository,
  IPullRequestRepository,
  PullRequest,
  WebhookSignatureError,
} from '../../domain';
import {
  extractRepositoryId,
  parsePullRequestEvent,
  parseWebhookBody,
  PullRequestEvent,
} from '../../infrastructure/github/WebhookPayload';
import { validateWebhookSignature } from '../../infrastructure/github/WebhookSignature';
import { ResultCache } from '../services/ResultCache';
import { ReviewOrchestrator } from '../services/ReviewOrchestrator';

const ANALYZED_ACTIONS = ['opened', 'synchronize', 'reopened'];

export interface WebhookDelivery {
  event: string;
  deliveryId: string | null;
  signature: string | null;
  rawBody: Buffer;
}

/**
 * Command to process one GitHub webhook delivery.
 * Rejects deliveries whose signature does not match the repository's secret.
 */
export class HandleWebhookEventCommand {
  private readonly logger = new Logger(HandleWebhookEventCommand.name);

  constructor(
    private readonly repoRepository: IGitHubRepoRepository,
    private readonly pullRequestRepo: IPullRequestRepository,
    private readonly orchestrator: ReviewOrchestrator,
    private readonly cache: ResultCache,
    private readonly credentials: GitHubCredentials | null,
  ) {}

  async execute(delivery: WebhookDelivery): Promise<WebhookAckDto> {
    const payload = parseWebhookBody(delivery.rawBody);
    const githubRepoId = extractRepositoryId(payload);
    const repository = githubRepoId === null ? null : await this.repoRepository.findByGithubRepoId(githubRepoId);
    if (!repository) {
      this.logger.warn(`Ignoring ${delivery.event} delivery ${delivery.deliveryId ?? '-'} for unknown repository`);
      return { status: 'ignored', message: 'Repository not registered' };
    }

    if (
      !repository.webhookSecret ||
      !validateWebhookSignature(delivery.rawBody, delivery.signature, repository.webhookSecret)
    ) {
      this.logger.warn(`Rejected ${delivery.event} delivery ${delivery.deliveryId ?? '-'} for ${repository.fullName}`);
      throw new WebhookSignatureError();
    }

    if (delivery.event === 'ping') {
      return { status: 'ok', message: 'pong' };
    }
    if (delivery.event !== 'pull_request') {
      return { status: 'ignored', message: `Event ${delivery.event} is not handled` };
    }

    const event = parsePullRequestEvent(payload);
    const pullRequest = await this.upsertPullRequest(repository.id, event);

    if (!ANALYZED_ACTIONS.includes(event.action)) {
      return { status: 'ok', message: `Pull request ${event.action}` };
    }
    if (event.action === 'synchronize') {
      await this.cache.invalidate('diff', pullRequest.id);
    }
    if (!repository.autoAnalyze) {
      return { status: 'ok', message: 'Automatic analysis is disabled for this repository' };
    }
    if (!this.credentials) {
      this.logger.warn(`No GitHub token configured; skipping analysis of ${repository.fullName}#${event.number}`);
      return { status: 'ignored', message: 'No GitHub credentials configured' };
    }

    const handle = await this.orchestrator.triggerJob(pullRequest.id, this.credentials, {
      trigger: 'webhook',
      ...(delivery.deliveryId ? { deliveryId: delivery.deliveryId } : {}),
    });
    return { status: 'accepted', message: 'Analysis queued', jobId: handle.jobId };
  }

  private async upsertPullRequest(repositoryId: string, event: PullRequestEvent): Promise<PullRequest> {
    const existing = await this.pullRequestRepo.findByRepositoryAndNumber(repositoryId, event.number);
    if (existing) {
      existing.refresh(event.details);
      await this.pullRequestRepo.save(existing);
      return existing;
    }
    const created = PullRequest.create({ repositoryId, number: event.number, ...event.details });
    await this.pullRequestRepo.save(created);
    return created;
  }
}
