export interface WorkQueueOptions {
  baseDelayMs?: number;
  maxDelayMs?: number;
}

interface PendingAdd {
  timer: NodeJS.Timeout;
  readyAt: number;
}

/**
 * Deduplicating queue of reconcile keys.
 *
 * A key is handed to at most one worker at a time: adding a key that is
 * being processed only marks it dirty, and it is queued again once the
 * worker calls done(). Each key appears in the queue at most once.
 */
export class WorkQueue {
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;

  private queue: string[] = [];
  private dirty = new Set<string>();
  private processing = new Set<string>();
  private failures = new Map<string, number>();
  private pending = new Map<string, PendingAdd>();
  private waiters: Array<(key: string | undefined) => void> = [];
  private shuttingDown = false;

  constructor(options: WorkQueueOptions = {}) {
    this.baseDelayMs = options.baseDelayMs ?? 5;
    this.maxDelayMs = options.maxDelayMs ?? 1_000_000;
  }

  add(key: string): void {
    if (this.shuttingDown || this.dirty.has(key)) {
      return;
    }
    this.dirty.add(key);
    if (this.processing.has(key)) {
      return;
    }
    this.enqueue(key);
  }

  /**
   * Add `key` once `delayMs` has elapsed. A key already waiting keeps
   * whichever deadline comes first.
   */
  addAfter(key: string, delayMs: number): void {
    if (this.shuttingDown) {
      return;
    }
    if (delayMs <= 0) {
      this.add(key);
      return;
    }
    const readyAt = Date.now() + delayMs;
    const existing = this.pending.get(key);
    if (existing) {
      if (existing.readyAt <= readyAt) {
        return;
      }
      clearTimeout(existing.timer);
    }
    const timer = setTimeout(() => {
      this.pending.delete(key);
      this.add(key);
    }, delayMs);
    this.pending.set(key, { timer, readyAt });
  }

  /**
   * Re-add `key` after an exponential backoff that grows with each call
   * until forget() is called for it
   */
  addRateLimited(key: string): void {
    const failures = this.failures.get(key) ?? 0;
    this.failures.set(key, failures + 1);
    this.addAfter(key, this.backoffFor(failures));
  }

  backoffFor(failures: number): number {
    return Math.min(this.baseDelayMs * 2 ** failures, this.maxDelayMs);
  }

  forget(key: string): void {
    this.failures.delete(key);
  }

  numRequeues(key: string): number {
    return this.failures.get(key) ?? 0;
  }

  /**
   * Resolves with the next key, or undefined once the queue is shut down
   * and drained. The caller must call done() with the key it received.
   */
  get(): Promise<string | undefined> {
    const key = this.queue.shift();
    if (key !== undefined) {
      this.startProcessing(key);
      return Promise.resolve(key);
    }
    if (this.shuttingDown) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  done(key: string): void {
    this.processing.delete(key);
    if (this.dirty.has(key)) {
      this.enqueue(key);
    }
  }

  shutDown(): void {
    this.shuttingDown = true;
    for (const { timer } of this.pending.values()) {
      clearTimeout(timer);
    }
    this.pending.clear();
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  len(): number {
    return this.queue.length;
  }

  private enqueue(key: string): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      this.startProcessing(key);
      waiter(key);
      return;
    }
    this.queue.push(key);
  }

  private startProcessing(key: string): void {
    this.dirty.delete(key);
    this.processing.add(key);
  }
}
