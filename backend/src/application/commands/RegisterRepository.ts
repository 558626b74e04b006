import { randomBytes } from 'crypto';
import { Logger } from '@nestjs/common';
import {
  ConflictError,
  GitHubCredentials,
  GitHubRepo,
  IGitHubApiClient,
  IGitHubRepoRepository,
  ValidationError,
} from '../../domain';

export interface RegisterRepositoryInput {
  githubRepoId: number;
  fullName: string;
  language?: string;
  autoAnalyze?: boolean;
}

/**
 * Command to register a repository for review and install its webhook.
 * Nothing is stored when the webhook cannot be created.
 */
export class RegisterRepositoryCommand {
  private readonly logger = new Logger(RegisterRepositoryCommand.name);

  constructor(
    private readonly repoRepository: IGitHubRepoRepository,
    private readonly githubClient: IGitHubApiClient,
    private readonly publicUrl: string,
  ) {}

  async execute(input: RegisterRepositoryInput, credentials: GitHubCredentials): Promise<GitHubRepo> {
    const existing = await this.repoRepository.findByGithubRepoId(input.githubRepoId);
    if (existing) {
      throw new ConflictError(`Repository already registered: ${existing.fullName}`);
    }

    let repository: GitHubRepo;
    try {
      const { owner, name } = GitHubRepo.parseFullName(input.fullName);
      repository = GitHubRepo.create({
        githubRepoId: input.githubRepoId,
        owner,
        name,
        language: input.language ?? null,
        autoAnalyze: input.autoAnalyze ?? true,
      });
    } catch (error) {
      throw new ValidationError(error instanceof Error ? error.message : String(error), { cause: error });
    }

    const secret = randomBytes(32).toString('hex');
    const webhookId = await this.githubClient.createWebhook(credentials, {
      owner: repository.owner,
      repo: repository.name,
      callbackUrl: `${this.publicUrl}/api/webhooks/github`,
      secret,
    });
    repository.attachWebhook(webhookId, secret);

    await this.repoRepository.save(repository);
    this.logger.log(`Registered ${repository.fullName} with webhook ${webhookId}`);
    return repository;
  }
}
