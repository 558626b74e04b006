import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

/** Severities the analysis service may emit, including its legacy names */
export const WIRE_SEVERITIES = ['critical', 'major', 'moderate', 'minor', 'info'] as const;
export type WireSeverity = (typeof WIRE_SEVERITIES)[number];

/**
 * snake_case spellings some analysis services still emit, keyed to the
 * camelCase field they stand for
 */
export const SNAKE_CASE_ALIASES: Readonly<Record<string, keyof InferredSuggestionDto>> = {
  file_path: 'filePath',
  line_number: 'lineNumber',
  line_end: 'lineEnd',
  suggested_fix: 'suggestedFix',
  confidence_score: 'confidenceScore',
};

export class InferredSuggestionDto {
  @IsString()
  @IsNotEmpty()
  filePath!: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  lineNumber?: number | null;

  @IsOptional()
  @IsInt()
  @Min(0)
  lineEnd?: number | null;

  @IsString()
  @IsNotEmpty()
  category!: string;

  @IsIn(WIRE_SEVERITIES)
  severity!: WireSeverity;

  @IsString()
  @IsNotEmpty()
  message!: string;

  @IsOptional()
  @IsString()
  explanation?: string | null;

  @IsOptional()
  @IsString()
  suggestedFix?: string | null;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(100)
  confidenceScore!: number;
}

export class InferenceResponseDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => InferredSuggestionDto)
  suggestions!: InferredSuggestionDto[];
}
