import { randomUUID } from 'node:crypto';
import type {
  CancelResult,
  EngineName,
  Job,
  JobEvent,
  JobFailureReason,
  JobState,
  KillAllEntry,
  KillAllResult,
  RunRequest,
} from '@medrun/shared';
import { Broadcast } from '../lib/broadcast';
import { BackendError, errorMessage } from '../lib/errors';
import { TypedEventEmitter } from '../lib/events';
import logger from '../lib/logger';

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set<JobState>(['Completed', 'Failed', 'Killed']);

const ALLOWED_TRANSITIONS: Record<JobState, readonly JobState[]> = {
  Queued: ['Pulling', 'Starting', 'Killed'],
  Pulling: ['Starting', 'Failed', 'Killed'],
  Starting: ['Running', 'Failed', 'Killed'],
  Running: ['Completed', 'Failed', 'Killed'],
  Completed: [],
  Failed: [],
  Killed: [],
};

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.has(state);
}

export function canTransition(from: JobState, to: JobState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export interface TransitionDetails {
  failureReason?: JobFailureReason;
  message?: string;
  exitCode?: number | null;
}

export type JobRegistryEvents = {
  job_created: [event: Extract<JobEvent, { type: 'job_created' }>];
  job_state: [event: Extract<JobEvent, { type: 'job_state' }>];
};

interface JobRecord {
  job: Job;
  logs: Broadcast<string>;
}

function snapshot(job: Job): Job {
  return {
    ...job,
    request: { ...job.request, gpus: [...job.request.gpus], args: [...job.request.args] },
    transitions: job.transitions.map((t) => ({ ...t })),
  };
}

/**
 * Job Registry
 * Process-wide table of jobs and their log buffers. All mutations are
 * synchronous, so readers never observe a half-applied transition.
 */
export class JobRegistry {
  private records = new Map<string, JobRecord>();
  readonly events = new TypedEventEmitter<JobRegistryEvents>((error, event) => {
    logger.error({ error: errorMessage(error), event }, 'Job event listener failed');
  });

  constructor(private readonly options: { maxRetainedLogLines: number }) {}

  /**
   * Register a new job in Queued
   */
  insert(request: RunRequest, engine: EngineName): Job {
    const now = new Date().toISOString();
    const job: Job = {
      id: randomUUID(),
      request: { ...request, gpus: [...request.gpus], args: [...request.args] },
      engine,
      state: 'Queued',
      exitCode: null,
      createdAt: now,
      transitions: [{ state: 'Queued', at: now }],
      logLineCount: 0,
    };
    this.records.set(job.id, {
      job,
      logs: new Broadcast<string>({ maxRetained: this.options.maxRetainedLogLines }),
    });

    logger.info({ jobId: job.id, image: request.image, engine }, 'Job queued');
    this.events.emit('job_created', { type: 'job_created', job: snapshot(job) });
    return snapshot(job);
  }

  get(jobId: string): Job | undefined {
    const record = this.records.get(jobId);
    return record ? snapshot(record.job) : undefined;
  }

  /**
   * @throws BackendError NotFound
   */
  require(jobId: string): Job {
    return snapshot(this.requireRecord(jobId).job);
  }

  /** Jobs in creation order */
  list(): Job[] {
    return Array.from(this.records.values(), (record) => snapshot(record.job));
  }

  active(): Job[] {
    return this.list().filter((job) => !isTerminal(job.state));
  }

  /**
   * Move a job to a new state. Returns false when the job is already
   * terminal, so a late confirmation cannot overwrite the outcome.
   * @throws BackendError Internal on a transition the state machine forbids
   */
  transition(jobId: string, state: JobState, details: TransitionDetails = {}): boolean {
    const record = this.requireRecord(jobId);
    const job = record.job;
    const previous = job.state;

    if (isTerminal(previous)) {
      logger.debug({ jobId, state: previous, requested: state }, 'Ignoring transition of terminal job');
      return false;
    }
    if (!canTransition(previous, state)) {
      throw new BackendError('Internal', `Illegal job transition ${previous} -> ${state}`);
    }

    const at = new Date().toISOString();
    job.state = state;
    job.transitions.push({ state, at });
    if (state === 'Running') {
      job.startedAt = at;
    }
    if (details.failureReason) job.failureReason = details.failureReason;
    if (details.message) job.message = details.message;
    if (details.exitCode !== undefined) job.exitCode = details.exitCode;

    if (isTerminal(state)) {
      job.finishedAt = at;
      record.logs.close();
    }

    logger.info(
      { jobId, from: previous, to: state, failureReason: details.failureReason, exitCode: job.exitCode },
      `Job ${previous} -> ${state}`
    );
    this.events.emit('job_state', { type: 'job_state', job: snapshot(job), previous });
    return true;
  }

  /**
   * Append an output line; dropped once the job is terminal
   */
  appendLog(jobId: string, line: string): void {
    const record = this.records.get(jobId);
    if (!record) return;
    if (record.logs.push(line)) {
      record.job.logLineCount = record.logs.total;
    }
  }

  getLogs(jobId: string): string[] {
    return this.requireRecord(jobId).logs.snapshot();
  }

  /**
   * Follow a job's output from now (or from the oldest retained line with replay).
   * The iterable ends when the job reaches a terminal state.
   */
  subscribeLogs(jobId: string, options: { replay?: boolean; signal?: AbortSignal } = {}): AsyncIterable<string> {
    return this.requireRecord(jobId).logs.subscribe(options);
  }

  /**
   * Remove a finished job
   * @throws BackendError NotFound, or InvalidRequest while the job is active
   */
  clear(jobId: string): Job {
    const record = this.requireRecord(jobId);
    if (!isTerminal(record.job.state)) {
      throw new BackendError('InvalidRequest', `Job ${jobId} is still ${record.job.state}; cancel it first`);
    }
    this.records.delete(jobId);
    return snapshot(record.job);
  }

  /**
   * Remove every finished job; active jobs stay
   */
  clearAll(): number {
    let cleared = 0;
    for (const [jobId, record] of this.records) {
      if (isTerminal(record.job.state)) {
        this.records.delete(jobId);
        cleared++;
      }
    }
    return cleared;
  }

  /**
   * Cancel every active job. Jobs already terminal are reported without
   * calling the canceller; one failing cancel does not stop the rest.
   */
  async killAll(cancel: (jobId: string) => Promise<CancelResult>): Promise<KillAllResult> {
    const jobs = this.list();
    const results: KillAllEntry[] = await Promise.all(
      jobs.map(async (job): Promise<KillAllEntry> => {
        if (isTerminal(job.state)) {
          return { jobId: job.id, outcome: 'AlreadyTerminal' };
        }
        try {
          const result = await cancel(job.id);
          return { jobId: job.id, outcome: result.outcome === 'AlreadyTerminal' ? 'AlreadyTerminal' : 'Killed' };
        } catch (error) {
          logger.error({ jobId: job.id, error: errorMessage(error) }, 'Failed to cancel job');
          return { jobId: job.id, outcome: 'Error', error: errorMessage(error) };
        }
      })
    );

    return {
      killed: results.filter((r) => r.outcome === 'Killed').length,
      alreadyTerminal: results.filter((r) => r.outcome === 'AlreadyTerminal').length,
      failed: results.filter((r) => r.outcome === 'Error').length,
      results,
    };
  }

  private requireRecord(jobId: string): JobRecord {
    const record = this.records.get(jobId);
    if (!record) {
      throw new BackendError('NotFound', `Job not found: ${jobId}`);
    }
    return record;
  }
}
