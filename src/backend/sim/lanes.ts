/**
 * A fixed number of execution slots (DMA channels or compute units). Waiters
 * are admitted in FIFO order.
 */
export class Lane {
  private active = 0;
  private readonly waiters: Array<() => void> = [];
  private peak = 0;

  constructor(
    readonly name: string,
    readonly width: number,
  ) {
    if (!Number.isInteger(width) || width <= 0) {
      throw new Error(`Lane ${name} width must be a positive integer, got ${width}`);
    }
  }

  get inUse(): number {
    return this.active;
  }

  /** Highest number of slots held at once. */
  get peakInUse(): number {
    return this.peak;
  }

  async acquire(): Promise<() => void> {
    if (this.active >= this.width) {
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    } else {
      this.active++;
    }
    this.peak = Math.max(this.peak, this.active);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Hand the slot straight to the next waiter.
        next();
      } else {
        this.active--;
      }
    };
  }
}
