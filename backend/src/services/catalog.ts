import { z } from 'zod';
import type { ImageReference, ModelCatalogSnapshot, ModelDescriptor } from '@medrun/shared';
import { BackendError, errorMessage } from '../lib/errors';
import { parseImageReference } from '../lib/imageReference';
import logger from '../lib/logger';
import { withRetry } from '../lib/retry';

export interface CatalogOptions {
  url: string;
  imageNamespace: string;
  documentationBaseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  /** 0 = refresh on demand only */
  refreshIntervalMs: number;
  fetchImpl?: typeof fetch;
  /** Backoff before the first retry; lowered in tests */
  retryDelayMs?: number;
}

class CatalogHttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'CatalogHttpError';
  }
}

const stringList = z
  .array(z.union([z.string(), z.object({ name: z.string() }).passthrough()]))
  .default([])
  .transform((items) => items.map((item) => (typeof item === 'string' ? item : item.name)));

const catalogImageSchema = z.union([
  z.string().min(1),
  z
    .object({
      repository: z.string().min(1),
      tag: z.string().min(1).optional(),
      digest: z.string().min(1).optional(),
    })
    .passthrough(),
]);

/**
 * One catalog entry. Unknown fields are ignored; anything that fails here
 * drops just that entry.
 */
export const catalogEntrySchema = z
  .object({
    id: z.union([z.string().min(1), z.number().int()]).transform(String),
    name: z.string().min(1).regex(/^[a-z0-9][a-z0-9._-]*$/, 'Model name must be a valid image name'),
    label: z.string().optional(),
    description: z.string().default(''),
    modalities: stringList,
    categories: stringList,
    segmentations: stringList,
    regions: stringList,
    inputs: z
      .array(
        z
          .object({
            description: z.string().default(''),
            format: z.string().default(''),
          })
          .passthrough()
      )
      .default([]),
    cite: z.string().nullable().optional(),
    image: catalogImageSchema.optional(),
    digest: z.string().min(1).optional(),
  })
  .passthrough();

const catalogPayloadSchema = z.union([
  z.object({ data: z.array(z.unknown()) }).passthrough(),
  z.array(z.unknown()),
]);

/**
 * Runnable by this runner: one DICOM input, producing a segmentation or prediction
 */
export function inputsCompatible(model: Pick<ModelDescriptor, 'inputs' | 'categories'>): boolean {
  return (
    model.inputs.length === 1 &&
    model.inputs.every((input) => input.format.toUpperCase() === 'DICOM') &&
    model.categories.some((category) => category === 'Segmentation' || category === 'Prediction')
  );
}

function resolveImage(entry: z.infer<typeof catalogEntrySchema>, namespace: string): ImageReference {
  let image: ImageReference;
  if (typeof entry.image === 'string') {
    image = parseImageReference(entry.image);
  } else if (entry.image) {
    image = parseImageReference(`${entry.image.repository}:${entry.image.tag ?? 'latest'}`);
    if (entry.image.digest) image.digest = entry.image.digest;
  } else {
    image = { repository: `${namespace}/${entry.name}`, tag: 'latest' };
  }
  if (!image.digest && entry.digest) {
    image.digest = entry.digest;
  }
  return image;
}

/**
 * Validate a raw catalog payload into descriptors, collecting one warning per dropped entry
 */
export function parseCatalog(
  payload: unknown,
  options: Pick<CatalogOptions, 'imageNamespace' | 'documentationBaseUrl'>
): { models: ModelDescriptor[]; warnings: string[] } {
  const envelope = catalogPayloadSchema.safeParse(payload);
  if (!envelope.success) {
    throw new BackendError('CatalogUnreachable', 'Catalog payload is not a model list');
  }
  const entries = Array.isArray(envelope.data) ? envelope.data : envelope.data.data;

  const models: ModelDescriptor[] = [];
  const warnings: string[] = [];
  const seen = new Set<string>();

  entries.forEach((raw, index) => {
    const result = catalogEntrySchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.errors.map((e) => `${e.path.join('.') || 'entry'}: ${e.message}`).join(', ');
      warnings.push(`Dropped catalog entry #${index}: ${issues}`);
      return;
    }

    const entry = result.data;
    if (seen.has(entry.id)) {
      warnings.push(`Dropped catalog entry #${index}: duplicate id ${entry.id}`);
      return;
    }
    seen.add(entry.id);

    const inputs = entry.inputs.map((input) => ({ description: input.description, format: input.format }));
    const descriptor: ModelDescriptor = {
      id: entry.id,
      name: entry.name,
      label: entry.label || entry.name,
      description: entry.description,
      modalities: entry.modalities,
      categories: entry.categories,
      regions: entry.regions.length > 0 ? entry.regions : entry.segmentations,
      inputs,
      inputsCompatible: inputsCompatible({ inputs, categories: entry.categories }),
      image: resolveImage(entry, options.imageNamespace),
      documentationUrl: `${options.documentationBaseUrl.replace(/\/+$/, '')}/${entry.name}`,
      ...(entry.cite ? { cite: entry.cite } : {}),
    };
    models.push(descriptor);
  });

  return { models, warnings };
}

/**
 * Case-insensitive substring match over the searchable fields
 */
export function matchesQuery(model: ModelDescriptor, query: string): boolean {
  const needle = query.trim().toLowerCase();
  if (!needle) return true;

  const haystack = [
    model.name,
    model.label,
    model.description,
    ...model.modalities,
    ...model.categories,
    ...model.regions,
  ];
  return haystack.some((field) => field.toLowerCase().includes(needle));
}

/**
 * Model Catalog
 * Fetches the remote model index and keeps the last good snapshot
 */
export class CatalogService {
  private snapshot: ModelCatalogSnapshot | null = null;
  private inflight: Promise<ModelCatalogSnapshot> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly fetchImpl: typeof fetch;

  constructor(private options: CatalogOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Apply new settings; restarts the periodic refresh if it was running
   */
  configure(options: Partial<Omit<CatalogOptions, 'fetchImpl'>>): void {
    const urlChanged = options.url !== undefined && options.url !== this.options.url;
    this.options = { ...this.options, ...options };
    if (urlChanged) {
      this.snapshot = null;
    }
    if (this.timer) {
      this.stop();
      this.start();
    }
  }

  /** Last good snapshot, if any */
  getSnapshot(): ModelCatalogSnapshot | null {
    return this.snapshot;
  }

  /**
   * Fetch and validate the catalog. Concurrent callers share one request;
   * on failure the previous snapshot stays in place.
   */
  async refresh(): Promise<ModelCatalogSnapshot> {
    if (!this.inflight) {
      this.inflight = this.fetchSnapshot().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /**
   * Current snapshot, fetching it on first use
   */
  async ensureLoaded(): Promise<ModelCatalogSnapshot> {
    return this.snapshot ?? (await this.refresh());
  }

  /**
   * Look a model up by id or machine name
   * @throws BackendError NotFound
   */
  async get(id: string): Promise<ModelDescriptor> {
    const snapshot = await this.ensureLoaded();
    const model = snapshot.models.find((m) => m.id === id) ?? snapshot.models.find((m) => m.name === id);
    if (!model) {
      throw new BackendError('NotFound', `Model not found: ${id}`);
    }
    return model;
  }

  async search(query?: string): Promise<ModelDescriptor[]> {
    const snapshot = await this.ensureLoaded();
    if (!query || !query.trim()) {
      return [...snapshot.models];
    }
    return snapshot.models.filter((model) => matchesQuery(model, query));
  }

  /**
   * Start periodic background refresh when an interval is configured
   */
  start(): void {
    if (this.timer || this.options.refreshIntervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => {
      this.refresh().catch((error: unknown) => {
        logger.warn({ error: errorMessage(error) }, 'Periodic catalog refresh failed; keeping previous snapshot');
      });
    }, this.options.refreshIntervalMs);
    this.timer.unref();
    logger.info({ intervalMs: this.options.refreshIntervalMs }, 'Periodic catalog refresh enabled');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get isPeriodic(): boolean {
    return this.timer !== null;
  }

  private async fetchSnapshot(): Promise<ModelCatalogSnapshot> {
    const { url, timeoutMs, maxRetries } = this.options;

    let payload: unknown;
    try {
      payload = await withRetry(
        async () => {
          const response = await this.fetchImpl(url, {
            headers: { Accept: 'application/json' },
            signal: AbortSignal.timeout(timeoutMs),
          });
          if (!response.ok) {
            throw new CatalogHttpError(response.status, `Catalog responded with HTTP ${response.status}`);
          }
          const body: unknown = await response.json();
          return body;
        },
        {
          maxRetries,
          initialDelayMs: this.options.retryDelayMs ?? 500,
          operationName: 'catalog refresh',
        }
      );
    } catch (error) {
      logger.error({ url, error: errorMessage(error) }, 'Failed to fetch model catalog');
      throw new BackendError('CatalogUnreachable', `Model catalog unreachable: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const { models, warnings } = parseCatalog(payload, this.options);
    for (const warning of warnings) {
      logger.warn({ url }, warning);
    }

    const snapshot: ModelCatalogSnapshot = {
      models,
      fetchedAt: new Date().toISOString(),
      source: url,
      warnings,
    };
    this.snapshot = snapshot;
    logger.info({ url, models: models.length, dropped: warnings.length }, 'Model catalog refreshed');
    return snapshot;
  }
}
