import {
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  Patch,
  Post,
} from '@nestjs/common';
import {
  CreateRepositoryDto,
  RemoteRepositoryResponseDto,
  RepositoryResponseDto,
  UpdateRepositoryDto,
} from '../dto';
import { GITHUB_API_CLIENT, GITHUB_REPO_REPOSITORY, IGitHubApiClient, IGitHubRepoRepository } from '../../../domain';
import { DeleteRepositoryCommand } from '../../../application/commands/DeleteRepository';
import { RegisterRepositoryCommand } from '../../../application/commands/RegisterRepository';
import { UpdateRepositoryCommand } from '../../../application/commands/UpdateRepository';
import { ListRepositoriesQuery } from '../../../application/queries/ListRepositories';
import { toRepositoryDto } from '../../../application/mappers';
import { ResultCache } from '../../../application/services/ResultCache';
import { REVIEW_CONFIG, ReviewConfig } from '../../config/ReviewConfig';
import { GITHUB_TOKEN_HEADER, optionalCredentials, requireCredentials } from './credentials';
import { toHttpException } from './http-errors';

@Controller('repositories')
export class RepositoriesController {
  constructor(
    @Inject(GITHUB_REPO_REPOSITORY)
    private readonly repoRepository: IGitHubRepoRepository,
    @Inject(GITHUB_API_CLIENT)
    private readonly githubClient: IGitHubApiClient,
    private readonly cache: ResultCache,
    @Inject(REVIEW_CONFIG)
    private readonly config: ReviewConfig,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @Body() dto: CreateRepositoryDto,
    @Headers(GITHUB_TOKEN_HEADER) token: string | undefined,
  ): Promise<RepositoryResponseDto> {
    const credentials = requireCredentials(token, this.config.githubToken);
    const command = new RegisterRepositoryCommand(this.repoRepository, this.githubClient, this.config.publicUrl);
    try {
      return toRepositoryDto(await command.execute(dto, credentials));
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get()
  async findAll(): Promise<RepositoryResponseDto[]> {
    return this.query().listRegistered();
  }

  @Get('remote')
  async findRemote(@Headers(GITHUB_TOKEN_HEADER) token: string | undefined): Promise<RemoteRepositoryResponseDto[]> {
    const credentials = requireCredentials(token, this.config.githubToken);
    try {
      return await this.query().listRemote(credentials);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Patch(':id')
  async update(@Param('id') id: string, @Body() dto: UpdateRepositoryDto): Promise<RepositoryResponseDto> {
    try {
      const repository = await new UpdateRepositoryCommand(this.repoRepository).execute({
        repositoryId: id,
        autoAnalyze: dto.autoAnalyze,
      });
      return toRepositoryDto(repository);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id') id: string, @Headers(GITHUB_TOKEN_HEADER) token: string | undefined): Promise<void> {
    const command = new DeleteRepositoryCommand(this.repoRepository, this.githubClient);
    try {
      await command.execute(id, optionalCredentials(token, this.config.githubToken));
    } catch (error) {
      throw toHttpException(error);
    }
  }

  private query(): ListRepositoriesQuery {
    return new ListRepositoriesQuery(this.repoRepository, this.githubClient, this.cache);
  }
}
