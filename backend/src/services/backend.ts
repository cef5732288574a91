import type {
  AppConfig,
  CancelResult,
  EngineInfo,
  EngineName,
  GpuDevice,
  Job,
  JobEvent,
  JobLogsResponse,
  KillAllResult,
  ModelActivity,
  ModelCatalogSnapshot,
  ModelDescriptor,
  ModelListResponse,
  ModelStatus,
  OperationResult,
  PullResult,
  Settings,
  SubmitJobResponse,
  UpdateSettingsRequest,
} from '@medrun/shared';
import { engineRegistry, type EngineClient, type EngineRegistry } from '../engines';
import { BackendError, errorMessage, toResult } from '../lib/errors';
import { formatImageReference, normalizeImageReference } from '../lib/imageReference';
import logger from '../lib/logger';
import { formatZodIssues, runRequestSchema } from '../lib/validation';
import { CatalogService } from './catalog';
import { ConfigService } from './config';
import { GpuInventory } from './gpuInventory';
import { resolveImageStatus } from './imageRegistry';
import { ImageService } from './images';
import { JobRegistry } from './jobRegistry';
import { RunOrchestrator } from './orchestrator';

export interface BackendOptions {
  config?: ConfigService;
  /** Builds engine clients; defaults to the built-in registry */
  createEngine?: (name: EngineName, executable?: string) => EngineClient;
  fetchImpl?: typeof fetch;
  /** Catalog retry backoff; lowered in tests */
  catalogRetryDelayMs?: number;
}

function defaultEngineFactory(registry: EngineRegistry) {
  return (name: EngineName, executable?: string) => registry.create(name, { executable });
}

/**
 * Backend
 * Public operations over the catalog, local images, GPUs and runs. Every
 * operation returns a discriminated result; nothing here throws to callers.
 */
export class Backend {
  readonly config: ConfigService;
  readonly catalog: CatalogService;
  readonly images: ImageService;
  readonly gpus: GpuInventory;
  readonly registry: JobRegistry;
  readonly orchestrator: RunOrchestrator;

  private engine: EngineClient;
  private readonly createEngine: (name: EngineName, executable?: string) => EngineClient;

  constructor(options: BackendOptions = {}) {
    this.config = options.config ?? new ConfigService();
    this.createEngine = options.createEngine ?? defaultEngineFactory(engineRegistry);

    const config = this.config.getConfig();
    this.engine = this.createEngine(config.backend, config.executables[config.backend]);
    this.images = new ImageService(this.engine);
    this.gpus = new GpuInventory(this.engine);
    this.registry = new JobRegistry({ maxRetainedLogLines: config.maxRetainedLogLines });
    this.catalog = new CatalogService({
      url: config.catalogUrl,
      imageNamespace: config.imageNamespace,
      documentationBaseUrl: config.documentationBaseUrl,
      timeoutMs: config.catalogTimeoutMs,
      maxRetries: config.catalogMaxRetries,
      refreshIntervalMs: config.catalogRefreshIntervalMs,
      fetchImpl: options.fetchImpl,
      retryDelayMs: options.catalogRetryDelayMs,
    });
    this.orchestrator = new RunOrchestrator({
      registry: this.registry,
      images: this.images,
      getEngine: () => this.engine,
      getConfig: () => this.config.getConfig(),
      createEngine: (engine, executable) => {
        const override = this.createEngine(engine.name, executable);
        return { engine: override, images: new ImageService(override) };
      },
    });
  }

  /**
   * Start background work (periodic catalog refresh when configured)
   */
  start(): void {
    this.catalog.start();
  }

  // Catalog

  async listModels(query?: string): Promise<OperationResult<ModelListResponse>> {
    return toResult(async () => {
      const models = await this.catalog.search(query);
      return { models, fetchedAt: this.catalog.getSnapshot()?.fetchedAt ?? null };
    });
  }

  async getModel(id: string): Promise<OperationResult<ModelDescriptor>> {
    return toResult(() => this.catalog.get(id));
  }

  async refreshCatalog(): Promise<OperationResult<ModelCatalogSnapshot>> {
    return toResult(() => this.catalog.refresh());
  }

  // Images

  async getModelStatus(id: string): Promise<OperationResult<ModelStatus>> {
    return toResult(async () => this.statusFor(await this.catalog.get(id)));
  }

  /**
   * Pull the model's image, or re-pull it to pick up a newer version
   */
  async pullOrUpdate(id: string): Promise<OperationResult<PullResult>> {
    return toResult(async () => {
      const model = await this.catalog.get(id);
      const reference = formatImageReference(model.image);
      await this.images.pull(reference);
      return { modelId: model.id, image: reference, status: await this.statusFor(model) };
    });
  }

  async removeLocalImage(id: string): Promise<OperationResult<ModelStatus>> {
    return toResult(async () => {
      const model = await this.catalog.get(id);
      const reference = formatImageReference(model.image);
      if (this.activeJobsFor(reference).length > 0) {
        throw new BackendError('ImageInUse', `Image ${reference} is used by an active job`);
      }
      await this.images.remove(reference);
      return this.statusFor(model);
    });
  }

  // GPUs

  async listGPUs(options: { refresh?: boolean } = {}): Promise<OperationResult<GpuDevice[]>> {
    return toResult(() => this.gpus.list(options));
  }

  // Jobs

  /**
   * Validate and queue a run; returns as soon as the job exists
   */
  async submit(request: unknown): Promise<OperationResult<SubmitJobResponse>> {
    return toResult(() => {
      const parsed = runRequestSchema.safeParse(request);
      if (!parsed.success) {
        throw new BackendError('InvalidRequest', `Invalid run request: ${formatZodIssues(parsed.error).join('; ')}`);
      }
      const job = this.orchestrator.submit(parsed.data);
      return { id: job.id };
    });
  }

  async getJob(id: string): Promise<OperationResult<Job>> {
    return toResult(() => this.registry.require(id));
  }

  async listJobs(): Promise<OperationResult<Job[]>> {
    return toResult(() => this.registry.list());
  }

  async getLogs(id: string): Promise<OperationResult<JobLogsResponse>> {
    return toResult(() => {
      const job = this.registry.require(id);
      return { jobId: id, state: job.state, lines: this.registry.getLogs(id) };
    });
  }

  /**
   * Follow a job's output; ends when the job is terminal
   */
  async subscribeLogs(
    id: string,
    options: { replay?: boolean; signal?: AbortSignal } = {}
  ): Promise<OperationResult<AsyncIterable<string>>> {
    return toResult(() => this.registry.subscribeLogs(id, options));
  }

  async cancel(id: string): Promise<OperationResult<CancelResult>> {
    return toResult(() => this.orchestrator.cancel(id));
  }

  async killAll(): Promise<OperationResult<KillAllResult>> {
    return toResult(() => this.registry.killAll((jobId) => this.orchestrator.cancel(jobId)));
  }

  async clearJob(id: string): Promise<OperationResult<Job>> {
    return toResult(() => this.registry.clear(id));
  }

  async clearJobs(): Promise<OperationResult<{ cleared: number }>> {
    return toResult(() => ({ cleared: this.registry.clearAll() }));
  }

  /**
   * Receive job_created and job_state events; returns the unsubscribe function
   */
  subscribeJobEvents(listener: (event: JobEvent) => void): OperationResult<() => void> {
    const offCreated = this.registry.events.subscribe('job_created', listener);
    const offState = this.registry.events.subscribe('job_state', listener);
    return {
      success: true,
      data: () => {
        offCreated();
        offState();
      },
    };
  }

  // Engine

  async getEngineInfo(): Promise<OperationResult<EngineInfo>> {
    return toResult(() => this.engine.info());
  }

  /**
   * Replace the engine client. Active jobs are killed first since their
   * containers belong to the old engine.
   */
  async switchEngine(name: EngineName, options: { executable?: string } = {}): Promise<OperationResult<EngineInfo>> {
    return toResult(async () => {
      if (!engineRegistry.has(name)) {
        throw new BackendError('InvalidRequest', `Unknown engine: ${name}`);
      }
      const killed = await this.registry.killAll((jobId) => this.orchestrator.cancel(jobId));
      if (killed.killed > 0 || killed.failed > 0) {
        logger.info({ killed: killed.killed, failed: killed.failed }, 'Stopped active jobs before engine switch');
      }

      await this.engine.teardown();
      const executable = options.executable ?? this.config.getConfig().executables[name];
      this.engine = this.createEngine(name, executable);
      this.images.setEngine(this.engine);
      this.gpus.setSource(this.engine);

      const current = this.config.getConfig();
      if (current.backend !== name || (options.executable && current.executables[name] !== options.executable)) {
        const executables: Partial<Record<EngineName, string>> = {};
        if (options.executable) {
          executables[name] = options.executable;
        }
        this.config.update({ backend: name, executables });
      }

      const info = await this.engine.info();
      logger.info({ engine: name, executable: this.engine.executable, available: info.available }, 'Switched engine');
      return info;
    });
  }

  // Settings

  getConfig(): OperationResult<Settings> {
    return { success: true, data: { config: this.config.getConfig(), engines: engineRegistry.list() } };
  }

  /**
   * Apply a settings patch; a change of engine or of its executable switches the engine
   */
  async updateConfig(patch: UpdateSettingsRequest): Promise<OperationResult<Settings>> {
    return toResult(async () => {
      const before = this.config.getConfig();
      const after = this.config.update(patch);

      if (
        after.backend !== before.backend ||
        after.executables[after.backend] !== before.executables[after.backend]
      ) {
        const switched = await this.switchEngine(after.backend, { executable: after.executables[after.backend] });
        if (!switched.success) {
          throw new BackendError(switched.error.kind, switched.error.message);
        }
      }

      this.applyCatalogSettings(before, after);
      return { config: this.config.getConfig(), engines: engineRegistry.list() };
    });
  }

  /**
   * Kill every job, stop background refresh and release the engine
   */
  async shutdown(): Promise<OperationResult<KillAllResult>> {
    return toResult(async () => {
      this.catalog.stop();
      const result = await this.registry.killAll((jobId) => this.orchestrator.cancel(jobId));
      try {
        await this.engine.teardown();
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Engine teardown failed');
      }
      return result;
    });
  }

  private applyCatalogSettings(before: AppConfig, after: AppConfig): void {
    if (
      before.catalogUrl === after.catalogUrl &&
      before.catalogRefreshIntervalMs === after.catalogRefreshIntervalMs
    ) {
      return;
    }
    const wasPeriodic = this.catalog.isPeriodic;
    this.catalog.stop();
    this.catalog.configure({ url: after.catalogUrl, refreshIntervalMs: after.catalogRefreshIntervalMs });
    if (wasPeriodic || after.catalogRefreshIntervalMs > 0) {
      this.catalog.start();
    }
  }

  private activeJobsFor(reference: string): Job[] {
    const key = normalizeImageReference(reference);
    return this.registry.active().filter((job) => normalizeImageReference(job.request.image) === key);
  }

  private async statusFor(model: ModelDescriptor): Promise<ModelStatus> {
    const localImages = await this.images.list({ refresh: true });
    const status = resolveImageStatus(model, localImages);

    let activity: ModelActivity = 'Idle';
    if (this.images.isPulling(status.image)) {
      activity = 'Pulling';
    } else if (this.activeJobsFor(status.image).some((job) => job.state !== 'Queued')) {
      activity = 'Running';
    }
    return { ...status, activity };
  }
}
