import type { EngineName } from './engine';

export type JobState =
  | 'Queued'
  | 'Pulling'
  | 'Starting'
  | 'Running'
  | 'Completed'
  | 'Failed'
  | 'Killed';

export type JobFailureReason =
  | 'PullError'
  | 'ImageNotFound'
  | 'InvalidMount'
  | 'EngineUnavailable'
  | 'NonZeroExit'
  | 'Timeout'
  | 'Internal';

export interface RunRequest {
  image: string;                 // Image reference, e.g. "mhubai/lungmask:latest"
  inputPath: string;             // Host directory mounted read-only
  outputPath: string;            // Host directory mounted read-write
  gpus: string[];                // Device ids; empty runs on CPU only
  args: string[];                // Extra CLI arguments passed to the image entrypoint
  engineExecutable?: string;     // Per-run override of the engine executable
}

export interface JobTransition {
  state: JobState;
  at: string;
}

export interface Job {
  id: string;
  request: RunRequest;
  engine: EngineName;
  state: JobState;
  failureReason?: JobFailureReason;
  message?: string;
  exitCode: number | null;
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
  transitions: JobTransition[];
  logLineCount: number;
}

export type CancelOutcome = 'Cancelled' | 'AlreadyTerminal';

export interface CancelResult {
  jobId: string;
  outcome: CancelOutcome;
  state: JobState;
}

export interface KillAllEntry {
  jobId: string;
  outcome: 'Killed' | 'AlreadyTerminal' | 'Error';
  error?: string;
}

export interface KillAllResult {
  killed: number;
  alreadyTerminal: number;
  failed: number;
  results: KillAllEntry[];
}

export interface SubmitJobResponse {
  id: string;
}

export interface JobListResponse {
  jobs: Job[];
}

export interface JobLogsResponse {
  jobId: string;
  state: JobState;
  lines: string[];
}

export type JobEvent =
  | { type: 'job_created'; job: Job }
  | { type: 'job_state'; job: Job; previous: JobState };
