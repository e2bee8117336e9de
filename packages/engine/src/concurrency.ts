/** Counting semaphore; `acquire` resolves with the matching release function. */
export class Semaphore {
  private available: number;
  private queue: Array<() => void> = [];
  private readonly capacity: number;

  constructor(limit: number) {
    this.available = Math.max(1, Math.floor(limit || 1));
    this.capacity = this.available;
  }

  get used(): number {
    return this.capacity - this.available;
  }

  get pending(): number {
    return this.queue.length;
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available -= 1;
      return this.releaser();
    }
    await new Promise<void>((resolve) => this.queue.push(resolve));
    return this.releaser();
  }

  /** Run `fn` while holding one permit. */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  // A waiting acquirer inherits the permit directly, so `available` only
  // grows when nobody is queued.
  private release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
      return;
    }
    this.available = Math.min(this.capacity, this.available + 1);
  }
}
