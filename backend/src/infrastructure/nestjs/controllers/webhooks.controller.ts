import {
  BadRequestException,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Param,
  Post,
  RawBodyRequest,
  Req,
  Res,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { WebhookAckResponseDto } from '../dto';
import {
  GITHUB_REPO_REPOSITORY,
  IGitHubRepoRepository,
  IPullRequestRepository,
  PULL_REQUEST_REPOSITORY,
} from '../../../domain';
import { HandleWebhookEventCommand } from '../../../application/commands/HandleWebhookEvent';
import { ResultCache } from '../../../application/services/ResultCache';
import { ReviewOrchestrator } from '../../../application/services/ReviewOrchestrator';
import { REVIEW_CONFIG, ReviewConfig } from '../../config/ReviewConfig';
import { optionalCredentials } from './credentials';
import { toHttpException } from './http-errors';

@Controller('webhooks')
export class WebhooksController {
  constructor(
    @Inject(GITHUB_REPO_REPOSITORY)
    private readonly repoRepository: IGitHubRepoRepository,
    @Inject(PULL_REQUEST_REPOSITORY)
    private readonly pullRequestRepo: IPullRequestRepository,
    private readonly orchestrator: ReviewOrchestrator,
    private readonly cache: ResultCache,
    @Inject(REVIEW_CONFIG)
    private readonly config: ReviewConfig,
  ) {}

  @Post(':provider')
  @HttpCode(HttpStatus.OK)
  async receive(
    @Param('provider') provider: string,
    @Headers('x-github-event') event: string | undefined,
    @Headers('x-github-delivery') deliveryId: string | undefined,
    @Headers('x-hub-signature-256') signature: string | undefined,
    @Req() req: RawBodyRequest<Request>,
    @Res({ passthrough: true }) res: Response,
  ): Promise<WebhookAckResponseDto> {
    if (provider !== 'github') {
      throw new NotFoundException(`Unsupported webhook provider: ${provider}`);
    }
    if (!event) {
      throw new BadRequestException('Missing X-GitHub-Event header');
    }
    if (!req.rawBody) {
      throw new BadRequestException('Webhook body is empty');
    }

    const command = new HandleWebhookEventCommand(
      this.repoRepository,
      this.pullRequestRepo,
      this.orchestrator,
      this.cache,
      optionalCredentials(undefined, this.config.githubToken),
    );

    try {
      const ack = await command.execute({
        event,
        deliveryId: deliveryId ?? null,
        signature: signature ?? null,
        rawBody: req.rawBody,
      });
      if (ack.status !== 'ok') {
        res.status(HttpStatus.ACCEPTED);
      }
      return ack;
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
