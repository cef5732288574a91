/**
 * Jobs API
 */

import type { RequestFn } from './client';
import type {
  CancelResult,
  Job,
  JobListResponse,
  JobLogsResponse,
  KillAllResult,
  RunRequest,
  SubmitJobResponse,
} from '../types';

export interface JobsApi {
  /** List active and retained jobs */
  list: () => Promise<JobListResponse>;

  /** Submit a run; returns immediately with the job id */
  submit: (request: RunRequest) => Promise<SubmitJobResponse>;

  /** Get a job by ID */
  get: (id: string) => Promise<Job>;

  /** Retained log lines of a job */
  getLogs: (id: string) => Promise<JobLogsResponse>;

  /** URL of the server-sent log stream for a job */
  logStreamUrl: (id: string, options?: { replay?: boolean }) => string;

  /** Cancel a job */
  cancel: (id: string) => Promise<CancelResult>;

  /** Cancel every non-terminal job */
  killAll: () => Promise<KillAllResult>;

  /** Forget a terminal job */
  clear: (id: string) => Promise<{ message: string; job: Job }>;

  /** Forget all terminal jobs */
  clearAll: () => Promise<{ message: string; cleared: number }>;
}

export function createJobsApi(request: RequestFn, baseUrl: string): JobsApi {
  return {
    list: () => request<JobListResponse>('/jobs'),

    submit: (runRequest: RunRequest) =>
      request<SubmitJobResponse>('/jobs', {
        method: 'POST',
        body: JSON.stringify(runRequest),
      }),

    get: (id: string) => request<Job>(`/jobs/${encodeURIComponent(id)}`),

    getLogs: (id: string) => request<JobLogsResponse>(`/jobs/${encodeURIComponent(id)}/logs`),

    logStreamUrl: (id: string, options?: { replay?: boolean }) =>
      `${baseUrl}/api/jobs/${encodeURIComponent(id)}/logs/stream${options?.replay ? '?replay=true' : ''}`,

    cancel: (id: string) =>
      request<CancelResult>(`/jobs/${encodeURIComponent(id)}/cancel`, { method: 'POST' }),

    killAll: () => request<KillAllResult>('/jobs/kill-all', { method: 'POST' }),

    clear: (id: string) =>
      request<{ message: string; job: Job }>(`/jobs/${encodeURIComponent(id)}`, { method: 'DELETE' }),

    clearAll: () => request<{ message: string; cleared: number }>('/jobs', { method: 'DELETE' }),
  };
}
