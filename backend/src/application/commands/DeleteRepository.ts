import { Logger } from '@nestjs/common';
import {
  GitHubCredentials,
  IGitHubApiClient,
  IGitHubRepoRepository,
  NotFoundError,
  sanitizeErrorMessage,
} from '../../domain';

/**
 * Command to unregister a repository. Its pull requests, jobs and
 * suggestions go with it. A webhook that cannot be removed upstream is
 * logged and left behind.
 */
export class DeleteRepositoryCommand {
  private readonly logger = new Logger(DeleteRepositoryCommand.name);

  constructor(
    private readonly repoRepository: IGitHubRepoRepository,
    private readonly githubClient: IGitHubApiClient,
  ) {}

  async execute(repositoryId: string, credentials: GitHubCredentials | null): Promise<void> {
    const repository = await this.repoRepository.findById(repositoryId);
    if (!repository) {
      throw new NotFoundError('Repository', repositoryId);
    }

    if (repository.webhookId !== null) {
      if (!credentials) {
        this.logger.warn(`No GitHub credentials; webhook ${repository.webhookId} on ${repository.fullName} is left in place`);
      } else {
        try {
          await this.githubClient.deleteWebhook(credentials, repository.owner, repository.name, repository.webhookId);
        } catch (error) {
          this.logger.warn(
            `Could not delete webhook ${repository.webhookId} on ${repository.fullName}: ${sanitizeErrorMessage(error)}`,
          );
        }
      }
    }

    await this.repoRepository.delete(repository.id);
    this.logger.log(`Unregistered ${repository.fullName}`);
  }
}
