export interface BroadcastOptions {
  /** Oldest items are dropped once the buffer exceeds this many (0 = unbounded) */
  maxRetained?: number;
}

export interface SubscribeOptions {
  /** Start from the oldest retained item instead of the current position */
  replay?: boolean;
  /** Skip this many items from the start of the stream (absolute position) */
  from?: number;
  signal?: AbortSignal;
}

/**
 * Append-only buffer that any number of readers can follow as async iterables.
 * Every reader sees items in push order; a reader that falls behind the
 * retention window resumes at the oldest retained item.
 */
export class Broadcast<T> {
  private buffer: T[] = [];
  private dropped = 0;
  private closed = false;
  private waiters = new Set<() => void>();
  private readonly maxRetained: number;

  constructor(options: BroadcastOptions = {}) {
    this.maxRetained = options.maxRetained ?? 0;
  }

  /** Total number of items ever pushed */
  get total(): number {
    return this.dropped + this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Append an item; ignored once closed
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    this.buffer.push(item);
    if (this.maxRetained > 0 && this.buffer.length > this.maxRetained) {
      this.buffer.shift();
      this.dropped++;
    }
    this.notify();
    return true;
  }

  /**
   * End the stream; readers finish after draining what is buffered
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.notify();
  }

  /** Retained items, oldest first */
  snapshot(): T[] {
    return [...this.buffer];
  }

  /**
   * Follow the stream. The start position is fixed when this is called,
   * not when iteration begins.
   */
  subscribe(options: SubscribeOptions = {}): AsyncGenerator<T> {
    const start = options.from ?? (options.replay ? this.dropped : this.total);
    return this.follow(start, options.signal);
  }

  private async *follow(start: number, signal?: AbortSignal): AsyncGenerator<T> {
    let position = start;
    while (!signal?.aborted) {
      if (position < this.dropped) {
        position = this.dropped;
      }
      if (position < this.total) {
        const item = this.buffer[position - this.dropped];
        position++;
        yield item;
        continue;
      }
      if (this.closed) {
        return;
      }
      await this.waitForChange(signal);
    }
  }

  private waitForChange(signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const wake = () => {
        this.waiters.delete(wake);
        signal?.removeEventListener('abort', wake);
        resolve();
      };
      this.waiters.add(wake);
      signal?.addEventListener('abort', wake, { once: true });
    });
  }

  private notify(): void {
    for (const wake of [...this.waiters]) {
      wake();
    }
  }
}
