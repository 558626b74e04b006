import { Type } from 'class-transformer';
import { IsIn, IsNumber, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { SEVERITIES, Severity } from '../../../domain/value-objects/Severity';
import { SUGGESTION_STATUSES, SuggestionStatusValue } from '../../../domain/value-objects/SuggestionStatus';

export class SuggestionQueryDto {
  @IsIn(SUGGESTION_STATUSES)
  @IsOptional()
  status?: SuggestionStatusValue;

  @IsIn(SEVERITIES)
  @IsOptional()
  severity?: Severity;

  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(100)
  @IsOptional()
  minConfidence?: number;
}

export class RespondToSuggestionDto {
  @IsString()
  @MaxLength(2000)
  @IsOptional()
  feedback?: string;
}

export type {
  SuggestionDto as SuggestionResponseDto,
  SuggestionListDto as SuggestionListResponseDto,
} from '@pr-sentinel/shared';
