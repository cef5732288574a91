import { z } from 'zod';
import type {
  EngineInfo,
  ErrorKind,
  GpuDevice,
  LocalImage,
  PullProgressEvent,
  RunRequest,
} from '@medrun/shared';
import { Broadcast } from '../../lib/broadcast';
import { BackendError } from '../../lib/errors';
import { normalizeRepository } from '../../lib/imageReference';
import logger from '../../lib/logger';
import { CliRunner, isSpawnFailure, type CommandResult, type CommandRunner, type RunningCommand } from '../cli';
import { listNvidiaGpus } from '../gpu';
import { assertMounts } from '../mounts';
import {
  CONTAINER_INPUT_DIR,
  CONTAINER_OUTPUT_DIR,
  JOB_LABEL,
  containerNameFor,
  type ContainerHandle,
  type CreateOptions,
  type EngineClient,
  type PullOptions,
  type StreamLogsOptions,
  type WaitOptions,
} from '../types';

export interface DockerEngineOptions {
  executable: string;
  runner?: CommandRunner;
  gpuRunner?: CommandRunner;
}

const UNAVAILABLE_PATTERN =
  /Cannot connect to the Docker daemon|Is the docker daemon running|error during connect|docker daemon is not running|permission denied while trying to connect/i;
const MISSING_IMAGE_PATTERN =
  /No such image|Unable to find image|pull access denied|manifest unknown|manifest for .* not found|repository does not exist/i;
const IN_USE_PATTERN = /image is being used|conflict: unable to (delete|remove)/i;
const MISSING_CONTAINER_PATTERN = /No such container/i;
const MOUNT_PATTERN = /invalid mount config|bind source path does not exist|invalid volume specification/i;
const NOT_RUNNING_PATTERN = /is not running/i;

/**
 * Map docker CLI stderr onto an error kind
 */
export function classifyDockerError(
  result: CommandResult,
  fallback: ErrorKind,
  imageMissing: ErrorKind = 'ImageNotFound'
): ErrorKind {
  if (isSpawnFailure(result)) return 'EngineUnavailable';

  const stderr = result.stderr;
  if (UNAVAILABLE_PATTERN.test(stderr)) return 'EngineUnavailable';
  if (IN_USE_PATTERN.test(stderr)) return 'ImageInUse';
  if (MISSING_CONTAINER_PATTERN.test(stderr)) return 'NotFound';
  if (MISSING_IMAGE_PATTERN.test(stderr)) return imageMissing;
  if (MOUNT_PATTERN.test(stderr)) return 'InvalidMount';
  return fallback;
}

function failure(result: CommandResult, kind: ErrorKind, action: string): BackendError {
  const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
  return new BackendError(kind, `${action}: ${detail}`);
}

/**
 * `--gpus` value; docker parses it as CSV so a device list needs inner quotes
 */
export function dockerGpuArgs(gpus: string[]): string[] {
  if (gpus.length === 0) {
    return [];
  }
  return ['--gpus', `"device=${gpus.join(',')}"`];
}

export function buildDockerRunArgs(request: RunRequest, jobId: string, mounts: { input: string; output: string }): string[] {
  return [
    'run',
    '-d',
    '--pull=never',
    '--network=none',
    '--name',
    containerNameFor(jobId),
    '--label',
    `${JOB_LABEL}=${jobId}`,
    ...dockerGpuArgs(request.gpus),
    '-v',
    `${mounts.input}:${CONTAINER_INPUT_DIR}:ro`,
    '-v',
    `${mounts.output}:${CONTAINER_OUTPUT_DIR}:rw`,
    request.image,
    ...request.args,
  ];
}

const dockerImageLineSchema = z.object({
  Repository: z.string(),
  Tag: z.string(),
  Digest: z.string().optional(),
  ID: z.string().optional(),
  Size: z.string().optional(),
  CreatedAt: z.string().optional(),
});

function present(value: string | undefined): string | undefined {
  return value && value !== '<none>' ? value : undefined;
}

/**
 * Parse `docker images --format '{{json .}}'` output, one JSON object per line
 */
export function parseDockerImages(stdout: string): LocalImage[] {
  const images: LocalImage[] = [];

  for (const raw of stdout.split('\n')) {
    const line = raw.trim();
    if (!line) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      logger.warn({ line, error: error instanceof Error ? error.message : String(error) }, 'Skipping unparseable docker images line');
      continue;
    }

    const result = dockerImageLineSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn({ line }, 'Skipping docker images line with unexpected shape');
      continue;
    }

    const entry = result.data;
    const repository = present(entry.Repository);
    const tag = present(entry.Tag);
    if (!repository || !tag) continue;

    const normalized = normalizeRepository(repository);
    const digest = present(entry.Digest);
    const imageId = present(entry.ID);
    images.push({
      reference: `${normalized}:${tag}`,
      repository: normalized,
      tag,
      ...(digest ? { digest } : {}),
      ...(imageId ? { imageId } : {}),
      ...(entry.Size ? { size: entry.Size } : {}),
      ...(entry.CreatedAt ? { pulledAt: entry.CreatedAt } : {}),
    });
  }

  return images;
}

const LAYER_LINE = /^([0-9a-f]{12}): (.+)$/;

export function parseDockerPullLine(reference: string, line: string): PullProgressEvent {
  const match = LAYER_LINE.exec(line);
  if (match) {
    return { reference, line, layer: match[1], status: match[2] };
  }
  return { reference, line };
}

/**
 * Docker engine client: detached containers driven through the docker CLI
 */
export class DockerEngine implements EngineClient {
  readonly name = 'docker' as const;
  readonly executable: string;

  private readonly runner: CommandRunner;
  private readonly gpuRunner: CommandRunner | undefined;
  private readonly followers = new Set<RunningCommand>();
  /** Containers whose log has been followed at least once */
  private readonly followed = new Set<string>();

  constructor(options: DockerEngineOptions) {
    this.executable = options.executable;
    this.runner = options.runner ?? new CliRunner(options.executable);
    this.gpuRunner = options.gpuRunner;
  }

  async info(): Promise<EngineInfo> {
    const result = await this.runner.execute(['--version'], { timeoutMs: 5000 });
    if (!result.success) {
      return {
        name: this.name,
        executable: this.executable,
        version: '',
        available: false,
        error: result.stderr.trim() || 'Docker not found. Please install Docker.',
      };
    }

    const stdout = result.stdout.trim();
    const match = /version\s+([^\s,]+)/i.exec(stdout);
    return {
      name: this.name,
      executable: this.executable,
      version: match ? match[1] : stdout,
      available: true,
    };
  }

  async listImages(): Promise<LocalImage[]> {
    const result = await this.runner.execute(['images', '--no-trunc', '--digests', '--format', '{{json .}}'], {
      timeoutMs: 30000,
    });
    if (!result.success) {
      throw failure(result, classifyDockerError(result, 'EngineUnavailable'), 'Failed to list docker images');
    }
    return parseDockerImages(result.stdout);
  }

  async *pullImage(reference: string, options: PullOptions = {}): AsyncGenerator<PullProgressEvent> {
    const progress = new Broadcast<PullProgressEvent>();
    const pending = this.runner
      .execute(['pull', reference], {
        signal: options.signal,
        timeoutMs: 3600000,
        onLine: (line) => progress.push(parseDockerPullLine(reference, line)),
      })
      .finally(() => progress.close());

    yield* progress.subscribe({ from: 0, signal: options.signal });

    const result = await pending;
    if (options.signal?.aborted) {
      throw new BackendError('PullError', `Pull of ${reference} was abandoned`);
    }
    if (!result.success) {
      throw failure(result, classifyDockerError(result, 'PullError', 'PullError'), `Failed to pull ${reference}`);
    }
  }

  async removeImage(reference: string): Promise<void> {
    const result = await this.runner.execute(['rmi', reference], { timeoutMs: 60000 });
    if (!result.success) {
      throw failure(result, classifyDockerError(result, 'Internal', 'NotFound'), `Failed to remove ${reference}`);
    }
  }

  async createAndStart(request: RunRequest, options: CreateOptions): Promise<ContainerHandle> {
    const mounts = await assertMounts(request.inputPath, request.outputPath);
    const args = buildDockerRunArgs(request, options.jobId, mounts);

    const result = await this.runner.execute(args, { timeoutMs: 120000 });
    if (!result.success) {
      throw failure(result, classifyDockerError(result, 'Internal'), `Failed to start ${request.image}`);
    }

    const lines = result.stdout.trim().split('\n');
    const id = lines[lines.length - 1].trim();
    logger.info({ jobId: options.jobId, containerId: id, image: request.image }, 'Started docker container');

    return { id, name: containerNameFor(options.jobId), jobId: options.jobId, engine: this.name };
  }

  async *streamLogs(handle: ContainerHandle, options: StreamLogsOptions = {}): AsyncGenerator<string> {
    // A resumed follow starts at the live end unless the caller says how far it got
    const resume = options.since === undefined && this.followed.has(handle.id);
    this.followed.add(handle.id);
    const follower = this.runner.start(
      resume ? ['logs', '-f', '--tail', '0', handle.id] : ['logs', '-f', handle.id]
    );
    this.followers.add(follower);
    const stopOnAbort = () => follower.kill();
    options.signal?.addEventListener('abort', stopOnAbort, { once: true });

    try {
      yield* follower.lines({ from: options.since ?? 0, signal: options.signal });

      const exit = await follower.exited;
      if (exit.error) {
        throw new BackendError('EngineUnavailable', exit.error);
      }
    } finally {
      options.signal?.removeEventListener('abort', stopOnAbort);
      follower.kill();
      this.followers.delete(follower);
    }
  }

  async wait(handle: ContainerHandle, options: WaitOptions = {}): Promise<number> {
    const result = await this.runner.execute(['wait', handle.id], {
      signal: options.signal,
      timeoutMs: 0,
    });
    options.signal?.throwIfAborted();

    if (!result.success) {
      throw failure(result, classifyDockerError(result, 'Internal'), `Failed to wait for container ${handle.id}`);
    }

    const code = Number.parseInt(result.stdout.trim(), 10);
    if (Number.isNaN(code)) {
      throw new BackendError('Internal', `Unexpected docker wait output: ${result.stdout.trim()}`);
    }
    return code;
  }

  async kill(handle: ContainerHandle): Promise<void> {
    const result = await this.runner.execute(['kill', handle.id], { timeoutMs: 30000 });
    if (result.success || NOT_RUNNING_PATTERN.test(result.stderr)) {
      return;
    }
    throw failure(result, classifyDockerError(result, 'Internal'), `Failed to kill container ${handle.id}`);
  }

  async release(handle: ContainerHandle): Promise<void> {
    this.followed.delete(handle.id);
    const result = await this.runner.execute(['rm', '-f', handle.id], { timeoutMs: 30000 });
    if (!result.success) {
      logger.warn({ containerId: handle.id, stderr: result.stderr.trim() }, 'Failed to remove container');
    }
  }

  async listGPUs(): Promise<GpuDevice[]> {
    return listNvidiaGpus(this.gpuRunner);
  }

  async teardown(): Promise<void> {
    for (const follower of this.followers) {
      follower.kill();
    }
    this.followers.clear();
    this.followed.clear();
  }
}
