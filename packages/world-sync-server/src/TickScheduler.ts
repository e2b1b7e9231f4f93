/**
 * Fixed-rate timer for the world loop. Fires that happen while nobody is
 * waiting accumulate as a single pending tick; `takePendingTicks` reports how
 * many fires were collapsed into it.
 */
export class TickScheduler {
  private interval: NodeJS.Timeout | null = null;
  private pendingTicks = 0;
  private tickWaiter: { promise: Promise<void>; resolve: () => void } | null = null;

  public readonly periodMs: number;

  constructor(tickHz: number) {
    if (!Number.isFinite(tickHz) || tickHz <= 0) {
      throw new Error(`Tick rate must be a positive number, received ${tickHz}`);
    }
    this.periodMs = 1000 / tickHz;
  }

  public get isRunning(): boolean {
    return this.interval !== null;
  }

  public start() {
    if (this.interval !== null) {
      return;
    }
    this.interval = setInterval(() => {
      this.pendingTicks++;
      if (this.tickWaiter !== null) {
        const { resolve } = this.tickWaiter;
        this.tickWaiter = null;
        resolve();
      }
    }, this.periodMs);
  }

  public stop() {
    if (this.interval !== null) {
      clearInterval(this.interval);
      this.interval = null;
    }
    this.pendingTicks = 0;
  }

  public hasPendingTick(): boolean {
    return this.pendingTicks > 0;
  }

  /**
   * Clears the pending tick and returns the number of timer fires it stood for
   * (0 if none).
   */
  public takePendingTicks(): number {
    const ticks = this.pendingTicks;
    this.pendingTicks = 0;
    return ticks;
  }

  /**
   * Resolves at the next timer fire, or immediately if one is already pending.
   * Repeated calls while waiting share one promise. Never resolves once stopped.
   */
  public waitForTick(): Promise<void> {
    if (this.pendingTicks > 0) {
      return Promise.resolve();
    }
    if (this.tickWaiter === null) {
      let resolve: () => void = () => {};
      const promise = new Promise<void>((res) => {
        resolve = res;
      });
      this.tickWaiter = { promise, resolve };
    }
    return this.tickWaiter.promise;
  }
}
