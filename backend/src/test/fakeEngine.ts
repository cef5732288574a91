import type {
  EngineInfo,
  EngineName,
  GpuDevice,
  LocalImage,
  PullProgressEvent,
  RunRequest,
} from '@medrun/shared';
import type {
  ContainerHandle,
  CreateOptions,
  EngineClient,
  PullOptions,
  StreamLogsOptions,
  WaitOptions,
} from '../engines';
import { Broadcast } from '../lib/broadcast';
import { BackendError } from '../lib/errors';
import { normalizeImageReference, parseImageReference } from '../lib/imageReference';

export interface ContainerScript {
  /** Output written as soon as the container starts */
  lines?: string[];
  /** Exit right after the lines; leave undefined to keep running */
  exitCode?: number;
  /** kill() never confirms */
  ignoreKill?: boolean;
}

export class FakeContainer {
  readonly output = new Broadcast<string>();
  readonly exit: Promise<number>;
  exited = false;
  private resolveExit: (code: number) => void = () => undefined;

  constructor(
    readonly handle: ContainerHandle,
    readonly request: RunRequest,
    readonly script: ContainerScript
  ) {
    this.exit = new Promise<number>((resolve) => {
      this.resolveExit = resolve;
    });
  }

  write(line: string): void {
    this.output.push(line);
  }

  finish(code: number): void {
    if (this.exited) return;
    this.exited = true;
    this.output.close();
    this.resolveExit(code);
  }
}

/**
 * In-process engine with scriptable containers, images and failures
 */
export class FakeEngine implements EngineClient {
  readonly executable: string;
  readonly images = new Map<string, LocalImage>();
  readonly directories = new Set<string>(['/data/in', '/data/out']);
  readonly containers = new Map<string, FakeContainer>();
  readonly calls: string[] = [];
  readonly released = new Set<string>();

  gpus: GpuDevice[] = [];
  pullLines = ['a1b2c3d4e5f6: Pulling fs layer', 'a1b2c3d4e5f6: Pull complete'];
  pullError: BackendError | null = null;
  listImagesError: BackendError | null = null;
  removeError: BackendError | null = null;
  /** Pulls wait for this before finishing */
  pullGate: Promise<void> | null = null;
  /** createAndStart waits for this before creating */
  createGate: Promise<void> | null = null;
  script: (request: RunRequest) => ContainerScript = () => ({ lines: ['done'], exitCode: 0 });
  teardowns = 0;

  private nextId = 1;

  constructor(
    readonly name: EngineName = 'docker',
    executable = `/usr/local/bin/${name}`
  ) {
    this.executable = executable;
  }

  addImage(reference: string, digest?: string): void {
    const image = parseImageReference(reference);
    const key = normalizeImageReference(reference);
    this.images.set(key, {
      reference: key,
      repository: image.repository,
      tag: image.tag,
      ...(digest ? { digest } : {}),
    });
  }

  hasImage(reference: string): boolean {
    return this.images.has(normalizeImageReference(reference));
  }

  containerFor(jobId: string): FakeContainer | undefined {
    return Array.from(this.containers.values()).find((c) => c.handle.jobId === jobId);
  }

  async info(): Promise<EngineInfo> {
    return { name: this.name, executable: this.executable, version: '1.0.0-test', available: true };
  }

  async listImages(): Promise<LocalImage[]> {
    this.calls.push('listImages');
    if (this.listImagesError) throw this.listImagesError;
    return Array.from(this.images.values());
  }

  async *pullImage(reference: string, options: PullOptions = {}): AsyncGenerator<PullProgressEvent> {
    this.calls.push(`pull ${reference}`);
    for (const line of this.pullLines) {
      yield { reference, line };
    }
    if (this.pullGate) await this.pullGate;
    if (options.signal?.aborted) {
      throw new BackendError('PullError', `Pull of ${reference} was abandoned`);
    }
    if (this.pullError) throw this.pullError;
    this.addImage(reference);
  }

  async removeImage(reference: string): Promise<void> {
    this.calls.push(`rmi ${reference}`);
    if (this.removeError) throw this.removeError;
    if (!this.images.delete(normalizeImageReference(reference))) {
      throw new BackendError('NotFound', `No such image: ${reference}`);
    }
  }

  async createAndStart(request: RunRequest, options: CreateOptions): Promise<ContainerHandle> {
    this.calls.push('createAndStart');
    if (this.createGate) await this.createGate;
    for (const [role, dir] of [['input', request.inputPath], ['output', request.outputPath]] as const) {
      if (!this.directories.has(dir)) {
        throw new BackendError('InvalidMount', `The ${role} path does not exist: ${dir}`);
      }
    }
    if (!this.hasImage(request.image)) {
      throw new BackendError('ImageNotFound', `No such image: ${request.image}`);
    }

    const id = `c${this.nextId++}`;
    const handle: ContainerHandle = { id, name: `medrun-${options.jobId}`, jobId: options.jobId, engine: this.name };
    const script = this.script(request);
    const container = new FakeContainer(handle, request, script);
    this.containers.set(id, container);

    for (const line of script.lines ?? []) {
      container.write(line);
    }
    if (script.exitCode !== undefined) {
      container.finish(script.exitCode);
    }
    return handle;
  }

  async *streamLogs(handle: ContainerHandle, options: StreamLogsOptions = {}): AsyncGenerator<string> {
    const container = this.require(handle);
    yield* container.output.subscribe({ from: options.since ?? 0, signal: options.signal });
  }

  async wait(handle: ContainerHandle, options: WaitOptions = {}): Promise<number> {
    const container = this.require(handle);
    const signal = options.signal;
    signal?.throwIfAborted();
    return new Promise<number>((resolve, reject) => {
      const onAbort = () => reject(new Error('wait aborted'));
      signal?.addEventListener('abort', onAbort, { once: true });
      container.exit.then((code) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(code);
      }, reject);
    });
  }

  async kill(handle: ContainerHandle): Promise<void> {
    this.calls.push(`kill ${handle.id}`);
    const container = this.require(handle);
    if (container.script.ignoreKill) {
      return new Promise<void>(() => undefined);
    }
    container.finish(137);
  }

  async release(handle: ContainerHandle): Promise<void> {
    this.calls.push(`release ${handle.id}`);
    this.released.add(handle.id);
  }

  async listGPUs(): Promise<GpuDevice[]> {
    this.calls.push('listGPUs');
    return this.gpus;
  }

  async teardown(): Promise<void> {
    this.teardowns++;
  }

  private require(handle: ContainerHandle): FakeContainer {
    const container = this.containers.get(handle.id);
    if (!container) {
      throw new BackendError('NotFound', `No such container: ${handle.id}`);
    }
    return container;
  }
}
