/**
 * Raised when a caller waited in the queue longer than `queueTimeoutMs`.
 */
export class CapacityExceededError extends Error {
  /** Suggested client back-off */
  readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number) {
    super(message);
    this.name = "CapacityExceededError";
    this.retryAfterMs = retryAfterMs;
  }
}

export type ConcurrencyLimiterOptions = {
  /** Tasks allowed to run at once */
  maxConcurrent: number;
  /** 0 waits forever */
  queueTimeoutMs?: number;
};

type Waiter = {
  grant: () => void;
  timer: ReturnType<typeof setTimeout> | undefined;
};

/**
 * Bounds the number of pipeline runs in flight. Excess callers queue in FIFO
 * order; a freed slot is handed straight to the oldest waiter.
 */
export class ConcurrencyLimiter {
  /** Slot count fixed at construction */
  readonly maxConcurrent: number;
  private readonly queueTimeoutMs: number;
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(options: ConcurrencyLimiterOptions) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
      throw new Error("maxConcurrent must be a positive integer");
    }
    this.maxConcurrent = options.maxConcurrent;
    this.queueTimeoutMs = Math.max(0, options.queueTimeoutMs ?? 0);
  }

  /**
   * Tasks currently holding a slot.
   */
  get running(): number {
    return this.active;
  }

  /**
   * Callers waiting for a slot.
   */
  get queued(): number {
    return this.waiters.length;
  }

  /**
   * True when a new caller would have to queue.
   */
  get atCapacity(): boolean {
    return this.active >= this.maxConcurrent;
  }

  /**
   * Snapshot for health endpoints.
   */
  stats(): { running: number; queued: number; atCapacity: boolean; maxConcurrent: number } {
    return {
      running: this.running,
      queued: this.queued,
      atCapacity: this.atCapacity,
      maxConcurrent: this.maxConcurrent
    };
  }

  /**
   * Run `task` once a slot is free and release the slot when it settles.
   *
   * @throws CapacityExceededError when the queue wait times out; `task` is then never started
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { grant: resolve, timer: undefined };
      if (this.queueTimeoutMs > 0) {
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(new CapacityExceededError(`Queue wait exceeded ${this.queueTimeoutMs}ms`, this.queueTimeoutMs));
        }, this.queueTimeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Hand the slot to the oldest waiter, or free it.
   */
  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timer);
      next.grant();
      return;
    }
    this.active--;
  }
}
