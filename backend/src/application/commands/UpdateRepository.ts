import { GitHubRepo, IGitHubRepoRepository, NotFoundError } from '../../domain';

export interface UpdateRepositoryInput {
  repositoryId: string;
  autoAnalyze: boolean;
}

export class UpdateRepositoryCommand {
  constructor(private readonly repoRepository: IGitHubRepoRepository) {}

  async execute(input: UpdateRepositoryInput): Promise<GitHubRepo> {
    const repository = await this.repoRepository.findById(input.repositoryId);
    if (!repository) {
      throw new NotFoundError('Repository', input.repositoryId);
    }
    repository.setAutoAnalyze(input.autoAnalyze);
    await this.repoRepository.save(repository);
    return repository;
  }
}
