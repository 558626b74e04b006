import { JobDto, RepositoryDto, SuggestionDto } from '@pr-sentinel/shared';
import { GitHubRepo, ReviewJob, ReviewJobSnapshot, Suggestion } from '../domain';

export function toSuggestionDto(suggestion: Suggestion): SuggestionDto {
  return {
    id: suggestion.id,
    jobId: suggestion.jobId,
    filePath: suggestion.filePath,
    lineNumber: suggestion.lineNumber,
    lineEnd: suggestion.lineEnd,
    category: suggestion.category,
    severity: suggestion.severity,
    message: suggestion.message,
    explanation: suggestion.explanation,
    suggestedFix: suggestion.suggestedFix,
    confidenceScore: suggestion.confidenceScore.value,
    status: suggestion.status,
    userFeedback: suggestion.userFeedback,
    respondedAt: suggestion.respondedAt?.toISOString() ?? null,
    createdAt: suggestion.createdAt.toISOString(),
  };
}

export function toJobDto(job: ReviewJob | ReviewJobSnapshot, suggestionCount: number): JobDto {
  const snapshot = job instanceof ReviewJob ? job.toSnapshot() : job;
  return {
    id: snapshot.id,
    pullRequestId: snapshot.pullRequestId,
    status: snapshot.status,
    progressPercent: snapshot.progressPercent,
    progressMessage: snapshot.progressMessage,
    startedAt: snapshot.startedAt,
    completedAt: snapshot.completedAt,
    filesAnalyzed: snapshot.filesAnalyzed,
    durationMs: snapshot.durationMs,
    errorMessage: snapshot.errorMessage,
    suggestionCount,
  };
}

export function toRepositoryDto(repository: GitHubRepo): RepositoryDto {
  return {
    id: repository.id,
    githubRepoId: repository.githubRepoId,
    fullName: repository.fullName,
    language: repository.language,
    autoAnalyze: repository.autoAnalyze,
    webhookId: repository.webhookId,
    createdAt: repository.createdAt.toISOString(),
  };
}
