import Database from 'better-sqlite3';
import { ConflictError, IGitHubApiClient, TransientUpstreamError, ValidationError } from '../../domain';
import { createTestDatabase, SqliteGitHubRepoRepository } from '../../infrastructure/persistence/sqlite';
import { DeleteRepositoryCommand } from './DeleteRepository';
import { RegisterRepositoryCommand } from './RegisterRepository';
import { UpdateRepositoryCommand } from './UpdateRepository';

describe('repository commands', () => {
  const credentials = { token: 'test-token' };
  let db: Database.Database;
  let repoRepository: SqliteGitHubRepoRepository;
  let github: jest.Mocked<IGitHubApiClient>;

  beforeEach(() => {
    db = createTestDatabase();
    repoRepository = new SqliteGitHubRepoRepository(db);
    github = {
      listRepositories: jest.fn(),
      getPullRequestDiff: jest.fn(),
      getPullRequestFiles: jest.fn(),
      createWebhook: jest.fn().mockResolvedValue(321),
      deleteWebhook: jest.fn().mockResolvedValue(undefined),
    };
  });

  afterEach(() => db.close());

  const register = () => new RegisterRepositoryCommand(repoRepository, github, 'https://review.example.test');

  describe('RegisterRepositoryCommand', () => {
    it('should create the webhook and store the repository with its secret', async () => {
      const repository = await register().execute(
        { githubRepoId: 55, fullName: 'acme/payments', language: 'Go' },
        credentials,
      );

      expect(github.createWebhook).toHaveBeenCalledTimes(1);
      const [usedCredentials, params] = github.createWebhook.mock.calls[0];
      expect(usedCredentials).toEqual(credentials);
      expect(params.owner).toBe('acme');
      expect(params.repo).toBe('payments');
      expect(params.callbackUrl).toBe('https://review.example.test/api/webhooks/github');
      expect(params.secret).toMatch(/^[0-9a-f]{64}$/);

      const stored = await repoRepository.findById(repository.id);
      expect(stored?.webhookId).toBe(321);
      expect(stored?.webhookSecret).toBe(params.secret);
      expect(stored?.language).toBe('Go');
      expect(stored?.autoAnalyze).toBe(true);
    });

    it('should refuse a repository that is already registered', async () => {
      await register().execute({ githubRepoId: 55, fullName: 'acme/payments' }, credentials);

      await expect(register().execute({ githubRepoId: 55, fullName: 'acme/payments' }, credentials)).rejects.toThrow(
        ConflictError,
      );
    });

    it('should reject a malformed name', async () => {
      await expect(register().execute({ githubRepoId: 56, fullName: 'payments' }, credentials)).rejects.toThrow(
        ValidationError,
      );
      expect(github.createWebhook).not.toHaveBeenCalled();
    });

    it('should store nothing when the webhook cannot be created', async () => {
      github.createWebhook.mockRejectedValue(new TransientUpstreamError('GitHub responded 502', 502));

      await expect(register().execute({ githubRepoId: 57, fullName: 'acme/billing' }, credentials)).rejects.toThrow(
        'GitHub responded 502',
      );
      expect(await repoRepository.findByGithubRepoId(57)).toBeNull();
    });
  });

  describe('UpdateRepositoryCommand', () => {
    it('should toggle automatic analysis', async () => {
      const repository = await register().execute({ githubRepoId: 60, fullName: 'acme/docs' }, credentials);

      await new UpdateRepositoryCommand(repoRepository).execute({ repositoryId: repository.id, autoAnalyze: false });

      expect((await repoRepository.findById(repository.id))?.autoAnalyze).toBe(false);
    });
  });

  describe('DeleteRepositoryCommand', () => {
    it('should remove the webhook and the repository', async () => {
      const repository = await register().execute({ githubRepoId: 61, fullName: 'acme/site' }, credentials);

      await new DeleteRepositoryCommand(repoRepository, github).execute(repository.id, credentials);

      expect(github.deleteWebhook).toHaveBeenCalledWith(credentials, 'acme', 'site', 321);
      expect(await repoRepository.findById(repository.id)).toBeNull();
    });

    it('should still delete locally when the webhook removal fails', async () => {
      const repository = await register().execute({ githubRepoId: 62, fullName: 'acme/blog' }, credentials);
      github.deleteWebhook.mockRejectedValue(new Error('network down'));

      await new DeleteRepositoryCommand(repoRepository, github).execute(repository.id, credentials);

      expect(await repoRepository.findById(repository.id)).toBeNull();
    });

    it('should throw for an unknown repository', async () => {
      await expect(new DeleteRepositoryCommand(repoRepository, github).execute('missing', credentials)).rejects.toThrow(
        'Repository not found: missing',
      );
    });
  });
});
