/**
 * FIFO throttler shared by the scan workers so provider calls start at least
 * `minIntervalMs` apart regardless of how many workers are running.
 * Only starts are spaced; calls may overlap once started.
 */
export class RequestThrottler {
  private lastStart = 0;
  private chain: Promise<void> = Promise.resolve();
  private started = 0;

  constructor(private readonly minIntervalMs: number = 0) {}

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    const turn = this.chain.then(async () => {
      const waitMs = Math.max(0, this.minIntervalMs - (Date.now() - this.lastStart));
      if (waitMs > 0) {
        await sleep(waitMs);
      }
      this.lastStart = Date.now();
      this.started += 1;
    });
    this.chain = turn;
    await turn;
    return fn();
  }

  /** Number of tasks that have been started so far. */
  getStartedCount(): number {
    return this.started;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
