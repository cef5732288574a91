import path from 'node:path';
import type { AppConfig, CancelResult, ErrorKind, Job, JobFailureReason, RunRequest } from '@medrun/shared';
import type { ContainerHandle, EngineClient } from '../engines';
import { errorMessage, toBackendError } from '../lib/errors';
import logger from '../lib/logger';
import { KeyedMutex } from '../lib/mutex';
import type { ImageService } from './images';
import { isTerminal, type JobRegistry } from './jobRegistry';

export interface OrchestratorDeps {
  registry: JobRegistry;
  /** Image service bound to the current engine */
  images: ImageService;
  getEngine: () => EngineClient;
  getConfig: () => AppConfig;
  /** Engine client for a run that overrides the executable */
  createEngine?: (engine: EngineClient, executable: string) => { engine: EngineClient; images: ImageService };
}

interface ActiveRun {
  controller: AbortController;
  engine: EngineClient;
  handle?: ContainerHandle;
  cancelling?: Promise<CancelResult>;
}

const FAILURE_REASONS: Partial<Record<ErrorKind, JobFailureReason>> = {
  PullError: 'PullError',
  ImageNotFound: 'ImageNotFound',
  InvalidMount: 'InvalidMount',
  EngineUnavailable: 'EngineUnavailable',
};

export function failureReasonFor(error: unknown): JobFailureReason {
  return FAILURE_REASONS[toBackendError(error).kind] ?? 'Internal';
}

/**
 * Timer that can be cancelled; resolves with "timeout" when it fires
 */
function delay(ms: number): { promise: Promise<'timeout'>; cancel: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

/**
 * Run Orchestrator
 * Drives each job through Queued -> Pulling? -> Starting -> Running -> terminal
 * on its own async context, with cancellation, run timeout and log draining.
 */
export class RunOrchestrator {
  private active = new Map<string, ActiveRun>();
  private runs = new Map<string, Promise<void>>();
  private inputLocks = new KeyedMutex();

  constructor(private deps: OrchestratorDeps) {}

  /**
   * Queue a run and return immediately
   */
  submit(request: RunRequest): Job {
    const config = this.deps.getConfig();
    const baseEngine = this.deps.getEngine();
    const override = request.engineExecutable
      ? this.deps.createEngine?.(baseEngine, request.engineExecutable)
      : undefined;
    const engine = override?.engine ?? baseEngine;
    const images = override?.images ?? this.deps.images;

    const frozen: RunRequest = {
      image: request.image,
      inputPath: path.resolve(request.inputPath),
      outputPath: path.resolve(request.outputPath),
      gpus: [...request.gpus],
      args: request.args.length > 0 ? [...request.args] : [...config.defaultRunArgs],
      ...(request.engineExecutable ? { engineExecutable: request.engineExecutable } : {}),
    };

    const job = this.deps.registry.insert(frozen, engine.name);
    const run: ActiveRun = { controller: new AbortController(), engine };
    this.active.set(job.id, run);

    const execution = this.execute(job.id, frozen, run, images, config)
      .catch((error: unknown) => {
        logger.error({ jobId: job.id, error: errorMessage(error) }, 'Run failed unexpectedly');
        const { state } = this.deps.registry.require(job.id);
        // Queued has no Failed edge
        const target = state === 'Queued' ? 'Killed' : 'Failed';
        this.deps.registry.transition(job.id, target, { failureReason: 'Internal', message: errorMessage(error) });
      })
      .catch((error: unknown) => {
        logger.error({ jobId: job.id, error: errorMessage(error) }, 'Failed to record run failure');
      })
      .finally(() => {
        this.active.delete(job.id);
        this.runs.delete(job.id);
      });
    this.runs.set(job.id, execution);

    return job;
  }

  /**
   * Cancel a job: abandon whatever it is doing, ask the engine to kill the
   * container, and force Killed once the kill confirms or the grace period ends.
   */
  async cancel(jobId: string): Promise<CancelResult> {
    const job = this.deps.registry.require(jobId);
    if (isTerminal(job.state)) {
      return { jobId, outcome: 'AlreadyTerminal', state: job.state };
    }

    const run = this.active.get(jobId);
    if (!run) {
      return this.markKilled(jobId);
    }
    if (!run.cancelling) {
      run.cancelling = this.performCancel(jobId, run);
    }
    return run.cancelling;
  }

  /** Number of jobs with a live run context */
  get activeCount(): number {
    return this.active.size;
  }

  /**
   * Resolves once the job's run context has finished (including release)
   */
  async settled(jobId: string): Promise<void> {
    await this.runs.get(jobId);
  }

  private async performCancel(jobId: string, run: ActiveRun): Promise<CancelResult> {
    const { gracePeriodMs } = this.deps.getConfig();
    logger.info({ jobId }, 'Cancelling job');
    run.controller.abort();

    if (run.handle) {
      await this.killWithGrace(run.engine, run.handle, gracePeriodMs, jobId);
    }

    return this.markKilled(jobId);
  }

  /**
   * Force Killed; a job that reached another terminal state first
   * (timeout, exit) is reported as AlreadyTerminal
   */
  private markKilled(jobId: string): CancelResult {
    const { registry } = this.deps;
    const killed = registry.transition(jobId, 'Killed', { message: 'Cancelled by request' });
    const { state } = registry.require(jobId);
    return { jobId, outcome: killed ? 'Cancelled' : 'AlreadyTerminal', state };
  }

  private async killWithGrace(engine: EngineClient, handle: ContainerHandle, gracePeriodMs: number, jobId: string): Promise<void> {
    const grace = delay(gracePeriodMs);
    const killed = engine.kill(handle).then(
      () => 'killed' as const,
      (error: unknown) => {
        logger.warn({ jobId, containerId: handle.id, error: errorMessage(error) }, 'Engine kill failed');
        return 'error' as const;
      }
    );

    const outcome = await Promise.race([killed, grace.promise]);
    grace.cancel();
    if (outcome === 'timeout') {
      logger.warn({ jobId, containerId: handle.id, gracePeriodMs }, 'Engine did not confirm kill within grace period');
    }
  }

  private async execute(
    jobId: string,
    request: RunRequest,
    run: ActiveRun,
    images: ImageService,
    config: AppConfig
  ): Promise<void> {
    if (config.allowConcurrentInputRuns) {
      await this.runPipeline(jobId, request, run, images, config);
      return;
    }
    // Jobs sharing an input volume wait their turn in Queued
    await this.inputLocks.runExclusive(request.inputPath, () => this.runPipeline(jobId, request, run, images, config));
  }

  private async runPipeline(
    jobId: string,
    request: RunRequest,
    run: ActiveRun,
    images: ImageService,
    config: AppConfig
  ): Promise<void> {
    const { registry } = this.deps;
    const { engine } = run;
    const signal = run.controller.signal;
    if (signal.aborted) return;

    // Presence check
    let present = true;
    try {
      present = await images.isPresent(request.image, { refresh: true });
    } catch (error) {
      logger.warn({ jobId, error: errorMessage(error) }, 'Image presence check failed; trying to start anyway');
    }
    if (signal.aborted) return;

    if (!present && config.autoPull) {
      if (!registry.transition(jobId, 'Pulling')) return;
      try {
        await images.pull(request.image, {
          signal,
          skipIfPresent: true,
          onProgress: (event) => registry.appendLog(jobId, event.line),
        });
      } catch (error) {
        if (signal.aborted) return;
        registry.transition(jobId, 'Failed', { failureReason: 'PullError', message: errorMessage(error) });
        return;
      }
      if (signal.aborted) return;
    }

    // Start
    if (!registry.transition(jobId, 'Starting')) return;
    let handle: ContainerHandle;
    try {
      handle = await engine.createAndStart(request, { jobId });
    } catch (error) {
      if (signal.aborted) return;
      registry.transition(jobId, 'Failed', { failureReason: failureReasonFor(error), message: errorMessage(error) });
      return;
    }

    try {
      run.handle = handle;
      if (signal.aborted) {
        // Cancelled while the container was being created
        await this.killWithGrace(engine, handle, config.gracePeriodMs, jobId);
        return;
      }
      if (!registry.transition(jobId, 'Running')) return;

      await this.supervise(jobId, handle, run, config);
    } finally {
      await engine.release(handle).catch((error: unknown) => {
        logger.warn({ jobId, containerId: handle.id, error: errorMessage(error) }, 'Failed to release container');
      });
    }
  }

  /**
   * Follow a running container until it exits, times out or is cancelled
   */
  private async supervise(jobId: string, handle: ContainerHandle, run: ActiveRun, config: AppConfig): Promise<void> {
    const { registry } = this.deps;
    const { engine } = run;
    const signal = run.controller.signal;

    const logController = new AbortController();
    const pump = this.pumpLogs(engine, handle, jobId, logController.signal);

    // wait() is abandoned on cancel or timeout
    const waitController = new AbortController();
    const forwardAbort = () => waitController.abort();
    signal.addEventListener('abort', forwardAbort, { once: true });
    let timedOut = false;
    const timeout =
      config.runTimeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            waitController.abort();
          }, config.runTimeoutMs)
        : undefined;

    let exitCode: number | null = null;
    let waitError: unknown;
    try {
      exitCode = await engine.wait(handle, { signal: waitController.signal });
    } catch (error) {
      waitError = error;
    } finally {
      clearTimeout(timeout);
      signal.removeEventListener('abort', forwardAbort);
    }

    if (signal.aborted) {
      // The cancel path owns the terminal transition
      logController.abort();
      return;
    }

    if (timedOut) {
      logger.warn({ jobId, runTimeoutMs: config.runTimeoutMs }, 'Run timed out; killing container');
      await this.killWithGrace(engine, handle, config.gracePeriodMs, jobId);
      await this.drain(pump, logController, config.logDrainMs);
      registry.transition(jobId, 'Failed', {
        failureReason: 'Timeout',
        message: `Run exceeded the ${config.runTimeoutMs} ms limit`,
      });
      return;
    }

    if (exitCode === null) {
      logController.abort();
      registry.transition(jobId, 'Failed', {
        failureReason: failureReasonFor(waitError),
        message: errorMessage(waitError),
      });
      return;
    }

    // Every flushed line is delivered before the terminal state
    await this.drain(pump, logController, config.logDrainMs);
    if (signal.aborted) return;

    if (exitCode === 0) {
      registry.transition(jobId, 'Completed', { exitCode });
    } else {
      registry.transition(jobId, 'Failed', {
        failureReason: 'NonZeroExit',
        exitCode,
        message: `Container exited with code ${exitCode}`,
      });
    }
  }

  private async pumpLogs(engine: EngineClient, handle: ContainerHandle, jobId: string, signal: AbortSignal): Promise<void> {
    try {
      for await (const line of engine.streamLogs(handle, { signal })) {
        this.deps.registry.appendLog(jobId, line);
      }
    } catch (error) {
      if (!signal.aborted) {
        logger.warn({ jobId, error: errorMessage(error) }, 'Log stream ended with an error');
      }
    }
  }

  private async drain(pump: Promise<void>, controller: AbortController, logDrainMs: number): Promise<void> {
    const limit = delay(logDrainMs);
    const outcome = await Promise.race([pump.then(() => 'drained' as const), limit.promise]);
    limit.cancel();
    if (outcome === 'timeout') {
      logger.debug({ logDrainMs }, 'Log stream still open after drain period; detaching');
    }
    controller.abort();
  }
}
