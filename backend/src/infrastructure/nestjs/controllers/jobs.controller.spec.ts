import Database from 'better-sqlite3';
import { NotFoundException } from '@nestjs/common';
import { firstValueFrom, timeout, toArray } from 'rxjs';
import { GitHubRepo, PullRequest, ReviewJob } from '../../../domain';
import { ResultCache } from '../../../application/services/ResultCache';
import {
  createTestDatabase,
  SqliteGitHubRepoRepository,
  SqliteJobRepository,
  SqlitePullRequestRepository,
  SqliteSuggestionRepository,
} from '../../persistence/sqlite';
import { MemoryCacheStore } from '../../cache/MemoryCacheStore';
import { DEFAULT_CACHE_TTL_SECONDS } from '../../config/ReviewConfig';
import { ProgressBroadcaster } from '../../realtime/ProgressBroadcaster';
import { JobsController } from './jobs.controller';

describe('JobsController events', () => {
  const NOW = '2026-03-01T10:00:00.000Z';

  let db: Database.Database;
  let jobRepo: SqliteJobRepository;
  let suggestionRepo: SqliteSuggestionRepository;
  let broadcaster: ProgressBroadcaster;
  let controller: JobsController;
  let pullRequest: PullRequest;

  beforeEach(async () => {
    db = createTestDatabase();
    jobRepo = new SqliteJobRepository(db);
    suggestionRepo = new SqliteSuggestionRepository(db);
    broadcaster = new ProgressBroadcaster(() => new Date(NOW));
    controller = new JobsController(
      jobRepo,
      suggestionRepo,
      broadcaster,
      new ResultCache(new MemoryCacheStore(), DEFAULT_CACHE_TTL_SECONDS),
    );

    const repository = GitHubRepo.create({ githubRepoId: 31, owner: 'acme', name: 'billing' });
    await new SqliteGitHubRepoRepository(db).save(repository);
    pullRequest = PullRequest.create({
      repositoryId: repository.id,
      number: 4,
      title: 'Round invoice totals',
      author: 'dev',
      baseBranch: 'main',
      headBranch: 'rounding',
      htmlUrl: 'https://github.com/acme/billing/pull/4',
    });
    await new SqlitePullRequestRepository(db).save(pullRequest);
  });

  afterEach(() => db.close());

  const processingJob = async () => {
    const job = ReviewJob.create({ pullRequestId: pullRequest.id });
    job.start(new Date('2026-03-01T09:59:00.000Z'));
    await jobRepo.save(job);
    return job;
  };

  const collect = (jobId: string) => firstValueFrom(controller.events(jobId).pipe(timeout(1000), toArray()));

  it('should deliver a terminal event published while the job is being read', async () => {
    const job = await processingJob();
    const countByJobId = suggestionRepo.countByJobId.bind(suggestionRepo);
    jest.spyOn(suggestionRepo, 'countByJobId').mockImplementation(async (jobId) => {
      broadcaster.publish(jobId, { type: 'complete', payload: { count: 2 } });
      return countByJobId(jobId);
    });

    const events = await collect(job.id);

    expect(events).toEqual([
      {
        type: 'complete',
        data: { type: 'complete', jobId: job.id, payload: { count: 2 }, timestamp: NOW },
      },
    ]);
    expect(broadcaster.subscriberCount(job.id)).toBe(0);
  });

  it('should stream live events until the job completes', async () => {
    const job = await processingJob();

    const pending = collect(job.id);
    await new Promise((resolve) => setTimeout(resolve, 10));
    broadcaster.publish(job.id, { type: 'progress', payload: { percent: 50, message: 'Analyzing code' } });
    broadcaster.publish(job.id, { type: 'complete', payload: { count: 0 } });

    expect((await pending).map((event) => event.data)).toEqual([
      { type: 'progress', jobId: job.id, payload: { percent: 50, message: 'Analyzing code' }, timestamp: NOW },
      { type: 'complete', jobId: job.id, payload: { count: 0 }, timestamp: NOW },
    ]);
  });

  it('should answer a finished job with one event and release the topic', async () => {
    const job = ReviewJob.create({ pullRequestId: pullRequest.id });
    job.start(new Date('2026-03-01T09:59:00.000Z'));
    job.fail('Empty diff - nothing to analyze', new Date('2026-03-01T09:59:01.000Z'));
    await jobRepo.save(job);

    const events = await collect(job.id);

    expect(events).toHaveLength(1);
    expect(events[0].type).toBe('error');
    expect(events[0].data).toMatchObject({
      type: 'error',
      jobId: job.id,
      payload: { message: 'Empty diff - nothing to analyze' },
    });
    expect(broadcaster.subscriberCount(job.id)).toBe(0);
  });

  it('should fail the stream for an unknown job', async () => {
    await expect(collect('missing')).rejects.toBeInstanceOf(NotFoundException);
    expect(broadcaster.subscriberCount('missing')).toBe(0);
  });
});
