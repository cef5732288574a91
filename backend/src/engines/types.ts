import type {
  EngineInfo,
  EngineName,
  GpuDevice,
  LocalImage,
  PullProgressEvent,
  RunRequest,
} from '@medrun/shared';

/**
 * Opaque reference to a container started for a job
 */
export interface ContainerHandle {
  id: string;
  name: string;
  jobId: string;
  engine: EngineName;
}

export interface PullOptions {
  signal?: AbortSignal;
}

export interface CreateOptions {
  jobId: string;
}

export interface StreamLogsOptions {
  signal?: AbortSignal;
  /**
   * Number of lines already seen; output resumes after them. Without it the
   * first subscription to a handle starts at the beginning and later ones at
   * the current position.
   */
  since?: number;
}

export interface WaitOptions {
  signal?: AbortSignal;
}

/**
 * Capability interface over a container engine.
 *
 * Failures are thrown as BackendError with one of the engine error kinds:
 * EngineUnavailable, ImageNotFound, InvalidMount, ImageInUse, PullError, NotFound.
 * Nothing here retries; callers decide.
 */
export interface EngineClient {
  readonly name: EngineName;
  readonly executable: string;

  /** Version probe; never throws */
  info(): Promise<EngineInfo>;

  listImages(): Promise<LocalImage[]>;

  /** Lazy, finite progress stream. Aborting the signal abandons the pull. */
  pullImage(reference: string, options?: PullOptions): AsyncIterable<PullProgressEvent>;

  removeImage(reference: string): Promise<void>;

  /**
   * Validate mounts and start a container for the request. Never pulls:
   * an absent image fails with ImageNotFound.
   */
  createAndStart(request: RunRequest, options: CreateOptions): Promise<ContainerHandle>;

  streamLogs(handle: ContainerHandle, options?: StreamLogsOptions): AsyncIterable<string>;

  /** Resolves with the container's exit code */
  wait(handle: ContainerHandle, options?: WaitOptions): Promise<number>;

  /** Stopping an already-stopped container succeeds */
  kill(handle: ContainerHandle): Promise<void>;

  /** Best-effort removal of the stopped container */
  release(handle: ContainerHandle): Promise<void>;

  listGPUs(): Promise<GpuDevice[]>;

  /** Stop helper processes owned by this client */
  teardown(): Promise<void>;
}

/** Container-side mount points every model image reads and writes */
export const CONTAINER_INPUT_DIR = '/app/data/input_data';
export const CONTAINER_OUTPUT_DIR = '/app/data/output_data';

/** Label carrying the job id on engines that support labels */
export const JOB_LABEL = 'medrun.job';

export function containerNameFor(jobId: string): string {
  return `medrun-${jobId}`;
}
