import { IsBoolean, IsInt, IsOptional, IsString, Matches, MaxLength, Min } from 'class-validator';

// Request DTOs with validation (stay in backend)
export class CreateRepositoryDto {
  @IsInt()
  @Min(1)
  githubRepoId!: number;

  @IsString()
  @Matches(/^[\w.-]+\/[\w.-]+$/, { message: 'fullName must look like owner/name' })
  fullName!: string;

  @IsString()
  @MaxLength(64)
  @IsOptional()
  language?: string;

  @IsBoolean()
  @IsOptional()
  autoAnalyze?: boolean;
}

export class UpdateRepositoryDto {
  @IsBoolean()
  autoAnalyze!: boolean;
}

// Re-export response types from shared
export type {
  RepositoryDto as RepositoryResponseDto,
  RemoteRepositoryDto as RemoteRepositoryResponseDto,
} from '@pr-sentinel/shared';
