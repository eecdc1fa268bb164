export type InflightGateToken = {
  wait_ms: number;
  release: () => void;
};

export type InflightGateOptions = {
  maxInflight: number;
  maxQueue: number;
  // Unset means a waiter stays queued until a slot frees up.
  queueTimeoutMs?: number;
};

export type InflightGateStats = {
  inflight: number;
  queued: number;
  completed: number;
  peak_queued: number;
  max_wait_ms: number;
  max_inflight: number;
  max_queue: number;
};

type Waiter = {
  enqueuedAtMs: number;
  timer: ReturnType<typeof setTimeout> | null;
  resolve: (token: InflightGateToken) => void;
};

export type InflightGateErrorCode = "queue_full" | "queue_timeout";

export class InflightGateError extends Error {
  code: InflightGateErrorCode;
  details: Record<string, unknown>;

  constructor(code: InflightGateErrorCode, message: string, details: Record<string, unknown>) {
    super(message);
    this.name = "InflightGateError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Counting semaphore with a bounded FIFO wait queue.
 *
 * Every probe of a precheck run goes through one shared gate, so the number of
 * concurrently open database sessions never exceeds `maxInflight` no matter how
 * many rules and databases fan out at once.
 */
export class InflightGate {
  private readonly maxInflight: number;
  private readonly maxQueue: number;
  private readonly queueTimeoutMs: number | null;
  private inflight = 0;
  private completed = 0;
  private peakQueued = 0;
  private maxWaitMs = 0;
  private queue: Waiter[] = [];

  constructor(opts: InflightGateOptions) {
    this.maxInflight = Math.max(1, Math.trunc(opts.maxInflight));
    this.maxQueue = Math.max(0, Math.trunc(opts.maxQueue));
    this.queueTimeoutMs = opts.queueTimeoutMs === undefined ? null : Math.max(1, Math.trunc(opts.queueTimeoutMs));
  }

  stats(): InflightGateStats {
    return {
      inflight: this.inflight,
      queued: this.queue.length,
      completed: this.completed,
      peak_queued: this.peakQueued,
      max_wait_ms: this.maxWaitMs,
      max_inflight: this.maxInflight,
      max_queue: this.maxQueue,
    };
  }

  /** Runs `fn` while holding one slot; the slot is released however `fn` settles. */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const token = await this.acquire();
    try {
      return await fn();
    } finally {
      token.release();
    }
  }

  async acquire(): Promise<InflightGateToken> {
    if (this.inflight < this.maxInflight) {
      this.inflight += 1;
      return this.makeToken(0);
    }

    if (this.queue.length >= this.maxQueue) {
      throw new InflightGateError("queue_full", "probe queue is full", {
        inflight: this.inflight,
        queued: this.queue.length,
        max_queue: this.maxQueue,
      });
    }

    const enqueuedAtMs = Date.now();
    const timeoutMs = this.queueTimeoutMs;
    return new Promise<InflightGateToken>((resolve, reject) => {
      const waiter: Waiter = { enqueuedAtMs, timer: null, resolve };
      if (timeoutMs !== null) {
        waiter.timer = setTimeout(() => {
          const idx = this.queue.indexOf(waiter);
          if (idx >= 0) this.queue.splice(idx, 1);
          reject(
            new InflightGateError("queue_timeout", "timed out while waiting for a probe slot", {
              wait_ms: Date.now() - enqueuedAtMs,
              queue_timeout_ms: timeoutMs,
            }),
          );
        }, timeoutMs);
      }
      this.queue.push(waiter);
      this.peakQueued = Math.max(this.peakQueued, this.queue.length);
    });
  }

  private makeToken(waitMs: number): InflightGateToken {
    this.maxWaitMs = Math.max(this.maxWaitMs, waitMs);
    let released = false;
    return {
      wait_ms: waitMs,
      release: () => {
        if (released) return;
        released = true;
        this.completed += 1;
        this.handOff();
      },
    };
  }

  // The slot passes straight to the oldest waiter, so `inflight` only drops when nobody is queued.
  private handOff() {
    const next = this.queue.shift();
    if (next) {
      if (next.timer !== null) clearTimeout(next.timer);
      next.resolve(this.makeToken(Date.now() - next.enqueuedAtMs));
      return;
    }
    this.inflight = Math.max(0, this.inflight - 1);
  }
}
