import { Controller, Get } from '@nestjs/common';
import { HealthResponseDto } from '../dto';
import { BoundedWorkerPool } from '../../../application/services/BoundedWorkerPool';
import { ResilientGitHubClient } from '../../github/ResilientGitHubClient';

@Controller('health')
export class HealthController {
  constructor(
    private readonly githubClient: ResilientGitHubClient,
    private readonly pool: BoundedWorkerPool,
  ) {}

  @Get()
  check(): HealthResponseDto {
    const breakers = this.githubClient.breakerStates();
    const degraded = Object.values(breakers).some((state) => state !== 'CLOSED');
    return {
      status: degraded ? 'degraded' : 'ok',
      breakers,
      workers: this.pool.stats(),
    };
  }
}
