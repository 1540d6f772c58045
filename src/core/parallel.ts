import { DEFAULT_MAX_QUEUED_TASKS } from './constants';
import { CancelledError, ConfigError, ResourceExhaustedError, throwIfAborted } from './errors';

export async function mapLimit<T, R>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  if (concurrency < 1) {
    throw new ConfigError('concurrency must be >= 1');
  }

  const results = new Array<R>(items.length);
  let nextIndex = 0;

  async function run(): Promise<void> {
    while (true) {
      throwIfAborted(signal);
      const current = nextIndex;
      nextIndex += 1;
      if (current >= items.length) {
        return;
      }
      results[current] = await worker(items[current]);
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => run());
  await Promise.all(workers);
  return results;
}

export interface WorkerPoolOptions {
  size: number;
  maxQueued?: number;
  signal?: AbortSignal;
}

interface QueuedTask {
  start: () => void;
  reject: (error: unknown) => void;
}

/**
 * Bounded executor shared by every tool invocation of a run. At most `size`
 * tasks run at once; the rest wait in FIFO order. Aborting the signal rejects
 * everything still queued, running tasks observe the same signal.
 */
export class WorkerPool {
  private readonly size: number;
  private readonly maxQueued: number;
  private readonly signal?: AbortSignal;
  private readonly queue: QueuedTask[] = [];
  private active = 0;
  private peak = 0;

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new ConfigError(`worker pool size must be a positive integer, got ${options.size}`);
    }
    this.size = options.size;
    this.maxQueued = options.maxQueued ?? DEFAULT_MAX_QUEUED_TASKS;
    this.signal = options.signal;
    this.signal?.addEventListener('abort', () => this.rejectQueued(), { once: true });
  }

  get running(): number {
    return this.active;
  }

  get pending(): number {
    return this.queue.length;
  }

  get peakRunning(): number {
    return this.peak;
  }

  run<T>(task: (signal?: AbortSignal) => Promise<T>): Promise<T> {
    if (this.signal?.aborted) {
      return Promise.reject(new CancelledError());
    }
    if (this.active < this.size) {
      return this.execute(task);
    }
    if (this.queue.length >= this.maxQueued) {
      return Promise.reject(
        new ResourceExhaustedError(`worker pool queue is full (${this.maxQueued} pending tasks)`),
      );
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        start: () => {
          this.execute(task).then(resolve, reject);
        },
        reject,
      });
    });
  }

  private async execute<T>(task: (signal?: AbortSignal) => Promise<T>): Promise<T> {
    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
    try {
      return await task(this.signal);
    } finally {
      this.active -= 1;
      this.startNext();
    }
  }

  private startNext(): void {
    if (this.signal?.aborted) {
      this.rejectQueued();
      return;
    }
    const next = this.queue.shift();
    if (next) {
      next.start();
    }
  }

  private rejectQueued(): void {
    const queued = this.queue.splice(0, this.queue.length);
    for (const item of queued) {
      item.reject(new CancelledError());
    }
  }
}
