import { createHash } from 'crypto';
import { RemoteRepositoryDto, RepositoryDto } from '@pr-sentinel/shared';
import { GitHubCredentials, IGitHubApiClient, IGitHubRepoRepository, RemoteRepository } from '../../domain';
import { toRepositoryDto } from '../mappers';
import { ResultCache } from '../services/ResultCache';

/**
 * Query for registered repositories and for the ones the token can see upstream
 */
export class ListRepositoriesQuery {
  constructor(
    private readonly repoRepository: IGitHubRepoRepository,
    private readonly githubClient: IGitHubApiClient,
    private readonly cache: ResultCache,
  ) {}

  async listRegistered(): Promise<RepositoryDto[]> {
    const repositories = await this.repoRepository.findAll();
    return repositories.map(toRepositoryDto);
  }

  /**
   * Remote listings are cached per token fingerprint under the `repo` namespace.
   */
  async listRemote(credentials: GitHubCredentials): Promise<RemoteRepositoryDto[]> {
    const fingerprint = createHash('sha256').update(credentials.token).digest('hex').slice(0, 16);
    const { value } = await this.cache.getOrLoad<RemoteRepository[]>('repo', `remote:${fingerprint}`, () =>
      this.githubClient.listRepositories(credentials),
    );
    return value.map((repository) => ({
      githubRepoId: repository.githubRepoId,
      fullName: repository.fullName,
      language: repository.language,
      description: repository.description,
      private: repository.private,
    }));
  }
}
