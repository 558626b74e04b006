import type {
  ApiErrorBody,
  JobDto,
  JobListDto,
  StatsDto,
  SuggestionDto,
  SuggestionListDto,
  SuggestionResponse,
  TriggerJobResponse,
} from '@pr-sentinel/shared';

let apiUrl = 'http://localhost:3000/api';

export function setApiUrl(url: string): void {
  apiUrl = url.replace(/\/+$/, '');
}

export function getApiUrl(): string {
  return apiUrl;
}

function authHeaders(): Record<string, string> {
  const token = process.env.GITHUB_TOKEN;
  return token ? { 'X-GitHub-Token': token } : {};
}

function errorMessage(body: Partial<ApiErrorBody>, status: number): string {
  if (Array.isArray(body.message)) {
    return body.message.join('; ');
  }
  return body.message || `HTTP ${status}`;
}

async function request<T>(path: string, options?: RequestInit): Promise<T> {
  const response = await fetch(`${apiUrl}${path}`, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...authHeaders(),
      ...options?.headers,
    },
  });

  if (!response.ok) {
    const errorData = (await response.json().catch(() => ({ message: response.statusText }))) as Partial<ApiErrorBody>;
    throw new Error(errorMessage(errorData, response.status));
  }

  return response.json() as Promise<T>;
}

// Jobs API
export async function getJob(id: string): Promise<JobDto> {
  return request<JobDto>(`/jobs/${encodeURIComponent(id)}`);
}

export async function getLatestJob(pullRequestId: string): Promise<JobDto> {
  return request<JobDto>(`/pull-requests/${encodeURIComponent(pullRequestId)}/latest-job`);
}

export async function listStuckJobs(olderThanMinutes: number): Promise<JobListDto> {
  return request<JobListDto>(`/jobs/stuck?olderThanMinutes=${olderThanMinutes}`);
}

export async function analyzePullRequest(pullRequestId: string): Promise<TriggerJobResponse> {
  return request<TriggerJobResponse>(`/pull-requests/${encodeURIComponent(pullRequestId)}/analyze`, {
    method: 'POST',
  });
}

// Suggestions API
export interface SuggestionFilter {
  status?: string;
  severity?: string;
  minConfidence?: number;
}

export async function listSuggestions(jobId: string, filter: SuggestionFilter = {}): Promise<SuggestionListDto> {
  const params = new URLSearchParams();
  if (filter.status) params.set('status', filter.status);
  if (filter.severity) params.set('severity', filter.severity);
  if (filter.minConfidence !== undefined) params.set('minConfidence', filter.minConfidence.toString());
  const query = params.toString() ? `?${params.toString()}` : '';
  return request<SuggestionListDto>(`/jobs/${encodeURIComponent(jobId)}/suggestions${query}`);
}

export async function respondToSuggestion(
  id: string,
  response: SuggestionResponse,
  feedback?: string,
): Promise<SuggestionDto> {
  return request<SuggestionDto>(`/suggestions/${encodeURIComponent(id)}/${response}`, {
    method: 'POST',
    body: JSON.stringify(feedback === undefined ? {} : { feedback }),
  });
}

// Stats API
export async function getStats(): Promise<StatsDto> {
  return request<StatsDto>('/stats');
}
