// Repository DTOs
export interface RepositoryDto {
  id: string;
  githubRepoId: number;
  fullName: string;
  language: string | null;
  autoAnalyze: boolean;
  webhookId: number | null;
  createdAt: string;
}

export interface RemoteRepositoryDto {
  githubRepoId: number;
  fullName: string;
  language: string | null;
  description: string | null;
  private: boolean;
}

export interface CreateRepositoryRequest {
  githubRepoId: number;
  fullName: string;
  language?: string;
  autoAnalyze?: boolean;
}

export interface UpdateRepositoryRequest {
  autoAnalyze: boolean;
}

// Job DTOs
export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export interface JobDto {
  id: string;
  pullRequestId: string;
  status: JobStatus;
  progressPercent: number;
  progressMessage: string | null;
  startedAt: string | null;
  completedAt: string | null;
  filesAnalyzed: number | null;
  durationMs: number | null;
  errorMessage: string | null;
  suggestionCount: number;
}

export interface JobListDto {
  jobs: JobDto[];
  total: number;
}

export interface TriggerJobResponse {
  jobId: string;
  status: JobStatus;
}

// Suggestion DTOs
export type Severity = 'critical' | 'moderate' | 'minor';
export type SuggestionStatus = 'pending' | 'accepted' | 'rejected' | 'ignored';
export type SuggestionResponse = 'accept' | 'reject' | 'ignore';

export interface SuggestionDto {
  id: string;
  jobId: string;
  filePath: string;
  lineNumber: number;
  lineEnd: number | null;
  category: string;
  severity: Severity;
  message: string;
  explanation: string;
  suggestedFix: string | null;
  confidenceScore: number;
  status: SuggestionStatus;
  userFeedback: string | null;
  respondedAt: string | null;
  createdAt: string;
}

export interface SuggestionListDto {
  suggestions: SuggestionDto[];
  total: number;
}

export interface RespondToSuggestionRequest {
  feedback?: string;
}

export interface StatsDto {
  acceptanceRate: number;
  averageDurationMs: number | null;
}

// Webhook acknowledgement
export type WebhookOutcome = 'accepted' | 'ignored' | 'ok';

export interface WebhookAckDto {
  status: WebhookOutcome;
  message: string;
  jobId?: string;
}

// Health
export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface WorkerPoolStatsDto {
  core: number;
  max: number;
  running: number;
  queued: number;
  queueCapacity: number;
  completed: number;
}

export interface HealthDto {
  status: 'ok' | 'degraded';
  breakers: Record<string, CircuitState>;
  workers: WorkerPoolStatsDto;
}

// Live job events (server-sent events on /jobs/:id/events)
export interface JobEventPayloads {
  progress: { percent: number; message: string };
  suggestion: { suggestion: SuggestionDto };
  complete: { count: number };
  error: { message: string };
}

export type JobEventType = keyof JobEventPayloads;

/** Event as published by the pipeline, before it is stamped with job and time */
export type JobEventBody = {
  [K in JobEventType]: { type: K; payload: JobEventPayloads[K] };
}[JobEventType];

export type JobEvent = JobEventBody & { jobId: string; timestamp: string };

// API error body as produced by Nest's exception filter
export interface ApiErrorBody {
  statusCode: number;
  message: string | string[];
  error?: string;
}
