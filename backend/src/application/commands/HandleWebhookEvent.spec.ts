import Database from 'better-sqlite3';
import {
  GitHubRepo,
  IGitHubApiClient,
  IInferenceGateway,
  WebhookSignatureError,
} from '../../domain';
import {
  createTestDatabase,
  SqliteGitHubRepoRepository,
  SqliteJobRepository,
  SqlitePullRequestRepository,
  SqliteSuggestionRepository,
} from '../../infrastructure/persistence/sqlite';
import { MemoryCacheStore } from '../../infrastructure/cache/MemoryCacheStore';
import { DEFAULT_CACHE_TTL_SECONDS } from '../../infrastructure/config/ReviewConfig';
import { signWebhookPayload } from '../../infrastructure/github/WebhookSignature';
import { ProgressBroadcaster } from '../../infrastructure/realtime/ProgressBroadcaster';
import { BoundedWorkerPool } from '../services/BoundedWorkerPool';
import { ResultCache } from '../services/ResultCache';
import { ReviewOrchestrator } from '../services/ReviewOrchestrator';
import { HandleWebhookEventCommand, WebhookDelivery } from './HandleWebhookEvent';

const SECRET = 'test-secret';

const pullRequestPayload = (action: string, githubRepoId = 101) => ({
  action,
  number: 8,
  repository: { id: githubRepoId, full_name: 'acme/api' },
  pull_request: {
    number: 8,
    title: 'Add rate limiting',
    state: 'open',
    html_url: 'https://github.com/acme/api/pull/8',
    user: { login: 'dev' },
    base: { ref: 'main' },
    head: { ref: 'feature/rate-limit' },
  },
});

const delivery = (event: string, payload: object, secret = SECRET): WebhookDelivery => {
  const rawBody = Buffer.from(JSON.stringify(payload));
  return { event, deliveryId: 'delivery-1', signature: signWebhookPayload(rawBody, secret), rawBody };
};

describe('HandleWebhookEventCommand', () => {
  let db: Database.Database;
  let repoRepository: SqliteGitHubRepoRepository;
  let pullRequestRepo: SqlitePullRequestRepository;
  let jobRepo: SqliteJobRepository;
  let store: MemoryCacheStore;
  let cache: ResultCache;
  let orchestrator: ReviewOrchestrator;
  let repository: GitHubRepo;

  const github: IGitHubApiClient = {
    listRepositories: jest.fn().mockResolvedValue([]),
    getPullRequestDiff: jest.fn().mockResolvedValue('diff --git a/a.ts b/a.ts\n+x\n'),
    getPullRequestFiles: jest.fn().mockResolvedValue([]),
    createWebhook: jest.fn().mockResolvedValue(1),
    deleteWebhook: jest.fn().mockResolvedValue(undefined),
  };
  const gateway: IInferenceGateway = { analyze: jest.fn().mockResolvedValue([]) };

  const command = (credentials: { token: string } | null = { token: 'test-token' }) =>
    new HandleWebhookEventCommand(repoRepository, pullRequestRepo, orchestrator, cache, credentials);

  beforeEach(async () => {
    db = createTestDatabase();
    repoRepository = new SqliteGitHubRepoRepository(db);
    pullRequestRepo = new SqlitePullRequestRepository(db);
    jobRepo = new SqliteJobRepository(db);
    store = new MemoryCacheStore();
    cache = new ResultCache(store, DEFAULT_CACHE_TTL_SECONDS);
    orchestrator = new ReviewOrchestrator(
      jobRepo,
      new SqliteSuggestionRepository(db),
      pullRequestRepo,
      repoRepository,
      github,
      gateway,
      cache,
      new ProgressBroadcaster(),
      new BoundedWorkerPool({ core: 1, max: 1, queueCapacity: 5 }),
      { inferenceTimeoutMs: 1000 },
    );

    repository = GitHubRepo.create({ githubRepoId: 101, owner: 'acme', name: 'api' });
    repository.attachWebhook(77, SECRET);
    await repoRepository.save(repository);
  });

  afterEach(async () => {
    await orchestrator.shutdown();
    db.close();
  });

  it('should ignore deliveries for unregistered repositories', async () => {
    const ack = await command().execute(delivery('pull_request', pullRequestPayload('opened', 999)));

    expect(ack).toEqual({ status: 'ignored', message: 'Repository not registered' });
  });

  it('should reject a bad signature', async () => {
    await expect(
      command().execute(delivery('pull_request', pullRequestPayload('opened'), 'wrong-secret')),
    ).rejects.toBeInstanceOf(WebhookSignatureError);
  });

  it('should reject a missing signature', async () => {
    const unsigned = { ...delivery('ping', { zen: 'hi', repository: { id: 101 } }), signature: null };

    await expect(command().execute(unsigned)).rejects.toThrow('Invalid webhook signature');
  });

  it('should answer a signed ping', async () => {
    const ack = await command().execute(delivery('ping', { zen: 'hi', repository: { id: 101 } }));

    expect(ack).toEqual({ status: 'ok', message: 'pong' });
  });

  it('should ignore events it does not handle', async () => {
    const ack = await command().execute(delivery('issues', { action: 'opened', repository: { id: 101 } }));

    expect(ack).toEqual({ status: 'ignored', message: 'Event issues is not handled' });
  });

  it('should record the pull request and queue a job when it is opened', async () => {
    const ack = await command().execute(delivery('pull_request', pullRequestPayload('opened')));

    const pullRequest = await pullRequestRepo.findByRepositoryAndNumber(repository.id, 8);
    expect(pullRequest?.title).toBe('Add rate limiting');
    expect(ack.status).toBe('accepted');
    expect(ack.jobId).toBeDefined();

    const job = await jobRepo.findById(ack.jobId ?? '');
    expect(job?.pullRequestId).toBe(pullRequest?.id);
    expect(job?.metadata).toMatchObject({ trigger: 'webhook', deliveryId: 'delivery-1' });
  });

  it('should upsert without analysis for other actions', async () => {
    await command().execute(delivery('pull_request', pullRequestPayload('opened')));
    const closed = pullRequestPayload('closed');
    closed.pull_request.state = 'closed';

    const ack = await command().execute(delivery('pull_request', closed));

    const pullRequest = await pullRequestRepo.findByRepositoryAndNumber(repository.id, 8);
    expect(ack).toEqual({ status: 'ok', message: 'Pull request closed' });
    expect(pullRequest?.state).toBe('closed');
    expect(await jobRepo.findByPullRequestId(pullRequest?.id ?? '')).toHaveLength(1);
  });

  it('should drop the cached diff when new commits are pushed', async () => {
    repository.setAutoAnalyze(false);
    await repoRepository.save(repository);
    await command().execute(delivery('pull_request', pullRequestPayload('opened')));
    const pullRequest = await pullRequestRepo.findByRepositoryAndNumber(repository.id, 8);
    await store.set(`diff:${pullRequest?.id}`, 'stale diff', 60);

    await command().execute(delivery('pull_request', pullRequestPayload('synchronize')));

    expect(await store.get(`diff:${pullRequest?.id}`)).toBeNull();
  });

  it('should not trigger analysis when automatic analysis is disabled', async () => {
    repository.setAutoAnalyze(false);
    await repoRepository.save(repository);

    const ack = await command().execute(delivery('pull_request', pullRequestPayload('reopened')));

    expect(ack).toEqual({ status: 'ok', message: 'Automatic analysis is disabled for this repository' });
  });

  it('should skip analysis without credentials', async () => {
    const ack = await command(null).execute(delivery('pull_request', pullRequestPayload('opened')));

    expect(ack).toEqual({ status: 'ignored', message: 'No GitHub credentials configured' });
  });
});
