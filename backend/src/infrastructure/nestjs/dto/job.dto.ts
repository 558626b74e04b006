import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class StuckJobsQueryDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(7 * 24 * 60)
  @IsOptional()
  olderThanMinutes?: number;
}

export type {
  JobDto as JobResponseDto,
  JobListDto as JobListResponseDto,
  TriggerJobResponse as TriggerJobResponseDto,
  StatsDto as StatsResponseDto,
  HealthDto as HealthResponseDto,
  WebhookAckDto as WebhookAckResponseDto,
} from '@pr-sentinel/shared';
