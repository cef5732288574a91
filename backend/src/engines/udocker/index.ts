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
import { formatImageReference, parseImageReference } from '../../lib/imageReference';
import logger from '../../lib/logger';
import {
  CliRunner,
  exitCodeFor,
  isSpawnFailure,
  type CommandResult,
  type CommandRunner,
  type RunningCommand,
} from '../cli';
import { listNvidiaGpus } from '../gpu';
import { assertMounts } from '../mounts';
import {
  CONTAINER_INPUT_DIR,
  CONTAINER_OUTPUT_DIR,
  containerNameFor,
  type ContainerHandle,
  type CreateOptions,
  type EngineClient,
  type PullOptions,
  type StreamLogsOptions,
  type WaitOptions,
} from '../types';

export interface UdockerEngineOptions {
  executable: string;
  runner?: CommandRunner;
  gpuRunner?: CommandRunner;
  /** Output lines kept per running container */
  maxRetainedLines?: number;
}

/**
 * Map udocker CLI output onto an error kind; udocker reports most errors on stdout
 */
export function classifyUdockerError(result: CommandResult, fallback: ErrorKind, imageMissing: ErrorKind): ErrorKind {
  if (isSpawnFailure(result)) return 'EngineUnavailable';

  const output = `${result.stderr}\n${result.stdout}`;
  if (/in use by container|being used/i.test(output)) return 'ImageInUse';
  if (/image or container not available|image not found|no such image|not found/i.test(output)) return imageMissing;
  if (/invalid volume|volume.*not found|invalid host volume/i.test(output)) return 'InvalidMount';
  return fallback;
}

function failure(result: CommandResult, kind: ErrorKind, action: string): BackendError {
  const detail = (result.stderr.trim() || result.stdout.trim()) || `exit code ${result.exitCode}`;
  return new BackendError(kind, `${action}: ${detail}`);
}

/**
 * Parse `udocker images`: a "REPOSITORIES" header followed by "repo:tag  <flags>" lines
 */
export function parseUdockerImages(stdout: string): LocalImage[] {
  const images: LocalImage[] = [];

  for (const raw of stdout.split('\n')) {
    const line = raw.trim();
    if (!line || /^REPOSITORIES$/i.test(line)) continue;

    const token = line.split(/\s+/)[0];
    if (!token.includes(':')) continue;

    const image = parseImageReference(token);
    images.push({
      reference: formatImageReference(image),
      repository: image.repository,
      tag: image.tag,
    });
  }

  return images;
}

export function parseUdockerVersion(stdout: string): string {
  const match = /version:\s*([0-9][\w.-]*)/i.exec(stdout);
  return match ? match[1] : stdout.trim().split('\n')[0] ?? '';
}

/**
 * udocker engine client. udocker has no daemon: a container "runs" as a
 * foreground child process, so its output is the log stream and its exit
 * is the container exit. GPU visibility is all-or-nothing (nvidia setup).
 */
export class UdockerEngine implements EngineClient {
  readonly name = 'udocker' as const;
  readonly executable: string;

  private readonly runner: CommandRunner;
  private readonly gpuRunner: CommandRunner | undefined;
  private readonly maxRetainedLines: number;
  private readonly running = new Map<string, RunningCommand>();
  /** Containers whose output has been followed at least once */
  private readonly followed = new Set<string>();

  constructor(options: UdockerEngineOptions) {
    this.executable = options.executable;
    this.runner = options.runner ?? new CliRunner(options.executable);
    this.gpuRunner = options.gpuRunner;
    this.maxRetainedLines = options.maxRetainedLines ?? 10000;
  }

  async info(): Promise<EngineInfo> {
    const result = await this.runner.execute(['--version'], { timeoutMs: 5000 });
    if (!result.success) {
      return {
        name: this.name,
        executable: this.executable,
        version: '',
        available: false,
        error: (result.stderr.trim() || result.stdout.trim()) || 'udocker not found. Please install udocker.',
      };
    }
    return {
      name: this.name,
      executable: this.executable,
      version: parseUdockerVersion(result.stdout),
      available: true,
    };
  }

  async listImages(): Promise<LocalImage[]> {
    const result = await this.runner.execute(['images'], { timeoutMs: 30000 });
    if (!result.success) {
      throw failure(result, classifyUdockerError(result, 'EngineUnavailable', 'EngineUnavailable'), 'Failed to list udocker images');
    }
    return parseUdockerImages(result.stdout);
  }

  async *pullImage(reference: string, options: PullOptions = {}): AsyncGenerator<PullProgressEvent> {
    const progress = new Broadcast<PullProgressEvent>();
    const pending = this.runner
      .execute(['pull', reference], {
        signal: options.signal,
        timeoutMs: 3600000,
        onLine: (line) => progress.push({ reference, line }),
      })
      .finally(() => progress.close());

    yield* progress.subscribe({ from: 0, signal: options.signal });

    const result = await pending;
    if (options.signal?.aborted) {
      throw new BackendError('PullError', `Pull of ${reference} was abandoned`);
    }
    if (!result.success) {
      throw failure(result, classifyUdockerError(result, 'PullError', 'PullError'), `Failed to pull ${reference}`);
    }
  }

  async removeImage(reference: string): Promise<void> {
    const result = await this.runner.execute(['rmi', reference], { timeoutMs: 60000 });
    if (!result.success) {
      throw failure(result, classifyUdockerError(result, 'Internal', 'NotFound'), `Failed to remove ${reference}`);
    }
  }

  async createAndStart(request: RunRequest, options: CreateOptions): Promise<ContainerHandle> {
    const mounts = await assertMounts(request.inputPath, request.outputPath);
    const name = containerNameFor(options.jobId);

    const created = await this.runner.execute(['create', `--name=${name}`, request.image], { timeoutMs: 600000 });
    if (!created.success) {
      throw failure(created, classifyUdockerError(created, 'Internal', 'ImageNotFound'), `Failed to create container from ${request.image}`);
    }
    const id = created.stdout.trim().split('\n').pop()?.trim() || name;

    if (request.gpus.length > 0) {
      const setup = await this.runner.execute(['setup', '--nvidia', '--force', name], { timeoutMs: 120000 });
      if (!setup.success) {
        await this.removeContainer(name);
        throw failure(setup, classifyUdockerError(setup, 'EngineUnavailable', 'EngineUnavailable'), 'Failed to enable GPU access');
      }
    }

    const command = this.runner.start(
      [
        'run',
        '--rm',
        '-v',
        `${mounts.input}:${CONTAINER_INPUT_DIR}:ro`,
        '-v',
        `${mounts.output}:${CONTAINER_OUTPUT_DIR}:rw`,
        name,
        ...request.args,
      ],
      { maxRetainedLines: this.maxRetainedLines }
    );
    this.running.set(id, command);
    logger.info({ jobId: options.jobId, containerId: id, image: request.image }, 'Started udocker container');

    return { id, name, jobId: options.jobId, engine: this.name };
  }

  async *streamLogs(handle: ContainerHandle, options: StreamLogsOptions = {}): AsyncGenerator<string> {
    const command = this.getRunning(handle);
    let from = options.since;
    if (from === undefined) {
      from = this.followed.has(handle.id) ? command.lineCount : 0;
    }
    this.followed.add(handle.id);
    yield* command.lines({ from, signal: options.signal });
  }

  async wait(handle: ContainerHandle, options: WaitOptions = {}): Promise<number> {
    const command = this.getRunning(handle);
    const signal = options.signal;
    signal?.throwIfAborted();

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => reject(signal?.reason ?? new Error('Wait aborted'));
      signal?.addEventListener('abort', onAbort, { once: true });
    });

    try {
      const exit = await Promise.race([command.exited, aborted]);
      if (exit.error) {
        throw new BackendError('EngineUnavailable', exit.error);
      }
      return exitCodeFor(exit);
    } finally {
      if (onAbort) signal?.removeEventListener('abort', onAbort);
    }
  }

  async kill(handle: ContainerHandle): Promise<void> {
    const command = this.getRunning(handle);
    command.kill('SIGKILL');
  }

  async release(handle: ContainerHandle): Promise<void> {
    const command = this.running.get(handle.id);
    if (command) {
      command.kill('SIGKILL');
      this.running.delete(handle.id);
    }
    this.followed.delete(handle.id);
    // `run --rm` normally removes it already
    await this.removeContainer(handle.name);
  }

  async listGPUs(): Promise<GpuDevice[]> {
    return listNvidiaGpus(this.gpuRunner);
  }

  async teardown(): Promise<void> {
    for (const command of this.running.values()) {
      command.kill('SIGKILL');
    }
    this.running.clear();
    this.followed.clear();
  }

  private getRunning(handle: ContainerHandle): RunningCommand {
    const command = this.running.get(handle.id);
    if (!command) {
      throw new BackendError('NotFound', `No such container: ${handle.id}`);
    }
    return command;
  }

  private async removeContainer(name: string): Promise<void> {
    const result = await this.runner.execute(['rm', name], { timeoutMs: 60000 });
    if (!result.success) {
      logger.debug({ container: name, output: (result.stderr || result.stdout).trim() }, 'udocker rm did not remove container');
    }
  }
}
