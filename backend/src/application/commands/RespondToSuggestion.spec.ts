import Database from 'better-sqlite3';
import { ConfidenceScore, GitHubRepo, PullRequest, ReviewJob, Suggestion } from '../../domain';
import {
  createTestDatabase,
  SqliteGitHubRepoRepository,
  SqliteJobRepository,
  SqlitePullRequestRepository,
  SqliteSuggestionRepository,
} from '../../infrastructure/persistence/sqlite';
import { RespondToSuggestionCommand } from './RespondToSuggestion';

describe('RespondToSuggestionCommand', () => {
  let db: Database.Database;
  let suggestionRepo: SqliteSuggestionRepository;
  let suggestion: Suggestion;
  let clock: Date[];

  beforeEach(async () => {
    db = createTestDatabase();
    suggestionRepo = new SqliteSuggestionRepository(db);
    clock = [new Date('2026-04-01T10:00:00.000Z'), new Date('2026-04-01T10:05:00.000Z')];

    const repository = GitHubRepo.create({ githubRepoId: 3, owner: 'acme', name: 'web' });
    await new SqliteGitHubRepoRepository(db).save(repository);
    const pullRequest = PullRequest.create({
      repositoryId: repository.id,
      number: 1,
      title: 'Init',
      author: 'dev',
      baseBranch: 'main',
      headBranch: 'init',
      htmlUrl: 'https://github.com/acme/web/pull/1',
    });
    await new SqlitePullRequestRepository(db).save(pullRequest);
    const job = ReviewJob.create({ pullRequestId: pullRequest.id });
    await new SqliteJobRepository(db).save(job);

    suggestion = Suggestion.create({
      jobId: job.id,
      filePath: 'src/app.ts',
      lineNumber: 3,
      category: 'bug',
      severity: 'moderate',
      message: 'Possible null dereference',
      explanation: 'user may be undefined',
      confidenceScore: ConfidenceScore.create(77),
    });
    await suggestionRepo.save(suggestion);
  });

  afterEach(() => db.close());

  const command = () => {
    let call = 0;
    return new RespondToSuggestionCommand(suggestionRepo, () => clock[call++]);
  };

  it('should let the last response win across accept and reject', async () => {
    const respond = command();

    await respond.execute({ suggestionId: suggestion.id, response: 'accept', feedback: 'ok' });
    await respond.execute({ suggestionId: suggestion.id, response: 'reject', feedback: 'changed mind' });

    const stored = await suggestionRepo.findById(suggestion.id);
    expect(stored?.status).toBe('rejected');
    expect(stored?.userFeedback).toBe('changed mind');
    expect(stored?.respondedAt?.toISOString()).toBe('2026-04-01T10:05:00.000Z');
  });

  it('should be idempotent for repeated responses', async () => {
    const respond = command();

    await respond.execute({ suggestionId: suggestion.id, response: 'ignore' });
    await respond.execute({ suggestionId: suggestion.id, response: 'ignore' });

    const stored = await suggestionRepo.findById(suggestion.id);
    expect(stored?.status).toBe('ignored');
    expect(stored?.userFeedback).toBeNull();
  });

  it('should treat blank feedback as none', async () => {
    const result = await command().execute({ suggestionId: suggestion.id, response: 'accept', feedback: '   ' });

    expect(result.userFeedback).toBeNull();
  });

  it('should throw for an unknown suggestion', async () => {
    await expect(command().execute({ suggestionId: 'missing', response: 'accept' })).rejects.toThrow(
      'Suggestion not found: missing',
    );
  });
});
