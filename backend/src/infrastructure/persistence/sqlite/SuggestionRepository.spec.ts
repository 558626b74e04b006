import { GitHubRepo } from '../../../domain/entities/GitHubRepo';
import { PullRequest } from '../../../domain/entities/PullRequest';
import { ReviewJob } from '../../../domain/entities/ReviewJob';
import { Suggestion } from '../../../domain/entities/Suggestion';
import { ConfidenceScore } from '../../../domain/value-objects/ConfidenceScore';
import { Severity } from '../../../domain/value-objects/Severity';
import { createTestDatabase } from './database';
import { SqliteGitHubRepoRepository } from './GitHubRepoRepository';
import { SqliteJobRepository } from './JobRepository';
import { SqlitePullRequestRepository } from './PullRequestRepository';
import { SqliteSuggestionRepository } from './SuggestionRepository';

describe('SqliteSuggestionRepository', () => {
  let suggestions: SqliteSuggestionRepository;
  let job: ReviewJob;

  beforeEach(async () => {
    const db = createTestDatabase();
    suggestions = new SqliteSuggestionRepository(db);

    const repository = GitHubRepo.create({ githubRepoId: 1, owner: 'acme', name: 'api' });
    await new SqliteGitHubRepoRepository(db).save(repository);
    const pullRequest = PullRequest.create({
      repositoryId: repository.id,
      number: 8,
      title: 'Add rate limiting',
      author: 'dev',
      baseBranch: 'main',
      headBranch: 'feat/rate-limit',
      htmlUrl: 'https://github.com/acme/api/pull/8',
    });
    await new SqlitePullRequestRepository(db).save(pullRequest);
    job = ReviewJob.create({ pullRequestId: pullRequest.id });
    await new SqliteJobRepository(db).save(job);
  });

  const createSuggestion = (severity: Severity, confidence: number, lineNumber = 1) =>
    Suggestion.create({
      jobId: job.id,
      filePath: 'src/limiter.ts',
      lineNumber,
      category: 'bug',
      severity,
      message: `Issue on line ${lineNumber}`,
      explanation: 'Explanation',
      confidenceScore: ConfidenceScore.create(confidence),
      metadata: { ruleId: 'no-unbounded-map' },
    });

  describe('save and findById', () => {
    it('should round-trip a suggestion', async () => {
      const suggestion = createSuggestion('moderate', 72.5);
      await suggestions.save(suggestion);

      const found = await suggestions.findById(suggestion.id);
      expect(found?.severity).toBe('moderate');
      expect(found?.confidenceScore.value).toBe(72.5);
      expect(found?.status).toBe('pending');
      expect(found?.respondedAt).toBeNull();
      expect(found?.metadata).toEqual({ ruleId: 'no-unbounded-map' });
    });

    it('should persist the latest response', async () => {
      const suggestion = createSuggestion('minor', 40);
      await suggestions.save(suggestion);

      suggestion.accept('ok', new Date('2026-04-01T10:00:00.000Z'));
      await suggestions.save(suggestion);
      suggestion.reject('changed mind', new Date('2026-04-01T10:01:00.000Z'));
      await suggestions.save(suggestion);

      const found = await suggestions.findById(suggestion.id);
      expect(found?.status).toBe('rejected');
      expect(found?.userFeedback).toBe('changed mind');
      expect(found?.respondedAt?.toISOString()).toBe('2026-04-01T10:01:00.000Z');
    });
  });

  describe('findByJobId', () => {
    beforeEach(async () => {
      const critical = createSuggestion('critical', 95, 1);
      const moderate = createSuggestion('moderate', 60, 2);
      const minor = createSuggestion('minor', 30, 3);
      moderate.ignore();
      for (const suggestion of [critical, moderate, minor]) {
        await suggestions.save(suggestion);
      }
    });

    it('should return all suggestions in insertion order', async () => {
      const found = await suggestions.findByJobId(job.id);
      expect(found.map((s) => s.lineNumber)).toEqual([1, 2, 3]);
    });

    it('should filter by status', async () => {
      const found = await suggestions.findByJobId(job.id, { status: 'pending' });
      expect(found.map((s) => s.lineNumber)).toEqual([1, 3]);
    });

    it('should filter by severity and minimum confidence', async () => {
      expect((await suggestions.findByJobId(job.id, { severity: 'minor' })).map((s) => s.lineNumber)).toEqual([3]);
      expect((await suggestions.findByJobId(job.id, { minConfidence: 60 })).map((s) => s.lineNumber)).toEqual([1, 2]);
    });

    it('should count suggestions for a job', async () => {
      expect(await suggestions.countByJobId(job.id)).toBe(3);
      expect(await suggestions.countByJobId('other')).toBe(0);
    });
  });

  describe('acceptanceRate', () => {
    it('should be 0 when nothing has been responded to', async () => {
      await suggestions.save(createSuggestion('minor', 50));

      expect(await suggestions.acceptanceRate()).toBe(0);
    });

    it('should divide accepted by responded suggestions', async () => {
      const statuses: Array<'accept' | 'reject' | 'ignore' | 'pending'> = ['accept', 'accept', 'reject', 'ignore', 'pending'];
      for (const [index, response] of statuses.entries()) {
        const suggestion = createSuggestion('minor', 50, index + 1);
        if (response === 'accept') suggestion.accept();
        if (response === 'reject') suggestion.reject();
        if (response === 'ignore') suggestion.ignore();
        await suggestions.save(suggestion);
      }

      expect(await suggestions.acceptanceRate()).toBe(0.5);
    });
  });
});
