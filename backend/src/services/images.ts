import type { LocalImage, PullProgressEvent } from '@medrun/shared';
import type { EngineClient } from '../engines';
import { normalizeImageReference } from '../lib/imageReference';
import logger from '../lib/logger';
import { KeyedMutex } from '../lib/mutex';
import { indexLocalImages } from './imageRegistry';

export interface PullImageOptions {
  signal?: AbortSignal;
  onProgress?: (event: PullProgressEvent) => void;
  /** Skip the pull when the image turned up locally while waiting for the lock */
  skipIfPresent?: boolean;
}

/**
 * Image Service
 * Caches the engine's local image list and serializes pull/remove per reference
 */
export class ImageService {
  private cache: LocalImage[] | null = null;
  private loading: Promise<LocalImage[]> | null = null;
  private generation = 0;
  private readonly locks = new KeyedMutex();
  private readonly pulling = new Map<string, number>();

  constructor(private engine: EngineClient) {}

  /**
   * Point at a different engine; the cached list belongs to the old one
   */
  setEngine(engine: EngineClient): void {
    this.engine = engine;
    this.invalidate();
  }

  invalidate(): void {
    this.cache = null;
    this.loading = null;
    this.generation++;
  }

  /**
   * Local images, from cache when valid. `refresh` asks the engine again,
   * since images can be pulled or removed outside this service.
   */
  async list(options: { refresh?: boolean } = {}): Promise<LocalImage[]> {
    if (options.refresh) {
      this.invalidate();
    }
    if (this.cache) {
      return this.cache;
    }
    if (!this.loading) {
      const generation = this.generation;
      const loading = this.engine
        .listImages()
        .then((images) => {
          if (generation === this.generation) {
            this.cache = images;
          }
          return images;
        })
        .finally(() => {
          if (this.loading === loading) {
            this.loading = null;
          }
        });
      this.loading = loading;
    }
    return this.loading;
  }

  async isPresent(reference: string, options: { refresh?: boolean } = {}): Promise<boolean> {
    const images = await this.list(options);
    return indexLocalImages(images).has(normalizeImageReference(reference));
  }

  /** Whether a pull of this reference is in progress or waiting */
  isPulling(reference: string): boolean {
    return (this.pulling.get(normalizeImageReference(reference)) ?? 0) > 0;
  }

  /**
   * Pull an image. Pulls and removals of the same reference run one at a time.
   */
  async pull(reference: string, options: PullImageOptions = {}): Promise<void> {
    const key = normalizeImageReference(reference);
    this.pulling.set(key, (this.pulling.get(key) ?? 0) + 1);

    try {
      await this.locks.runExclusive(key, async () => {
        options.signal?.throwIfAborted();
        if (options.skipIfPresent && (await this.isPresent(reference))) {
          logger.debug({ reference }, 'Image already present; skipping pull');
          return;
        }

        logger.info({ reference, engine: this.engine.name }, 'Pulling image');
        try {
          for await (const event of this.engine.pullImage(reference, { signal: options.signal })) {
            options.onProgress?.(event);
          }
          logger.info({ reference }, 'Image pulled');
        } finally {
          this.invalidate();
        }
      });
    } finally {
      const remaining = (this.pulling.get(key) ?? 1) - 1;
      if (remaining > 0) {
        this.pulling.set(key, remaining);
      } else {
        this.pulling.delete(key);
      }
    }
  }

  async remove(reference: string): Promise<void> {
    const key = normalizeImageReference(reference);
    await this.locks.runExclusive(key, async () => {
      logger.info({ reference, engine: this.engine.name }, 'Removing image');
      try {
        await this.engine.removeImage(reference);
      } finally {
        this.invalidate();
      }
    });
  }
}
