import type { GpuDevice } from '@medrun/shared';
import type { EngineClient } from '../engines';

/**
 * GPU Inventory
 * Enumerates devices once and serves the cached list until invalidated
 */
export class GpuInventory {
  private cached: GpuDevice[] | null = null;
  private loading: Promise<GpuDevice[]> | null = null;
  private generation = 0;

  constructor(private source: Pick<EngineClient, 'listGPUs'>) {}

  setSource(source: Pick<EngineClient, 'listGPUs'>): void {
    this.source = source;
    this.invalidate();
  }

  /**
   * Cached device list; concurrent callers share one enumeration
   */
  async list(options: { refresh?: boolean } = {}): Promise<GpuDevice[]> {
    if (options.refresh) {
      this.invalidate();
    }
    if (this.cached) {
      return this.cached;
    }
    if (!this.loading) {
      const generation = this.generation;
      const loading = this.source
        .listGPUs()
        .then((devices) => {
          if (generation === this.generation) {
            this.cached = devices;
          }
          return devices;
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

  invalidate(): void {
    this.cached = null;
    this.loading = null;
    this.generation++;
  }
}
