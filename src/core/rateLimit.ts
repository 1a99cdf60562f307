import { logger } from './logger';

/**
 * Caps how many tasks run at once. Callers over the cap wait in FIFO order until a
 * slot is released.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  async acquire(): Promise<() => void> {
    if (this.active >= this.maxConcurrent) {
      logger.debug({ active: this.active, queued: this.queue.length + 1 }, 'Concurrency limit reached, queuing task');
      await new Promise<void>((resolve) => this.queue.push(resolve));
    } else {
      this.active++;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // the slot passes straight to the next waiter
      next();
    } else {
      this.active--;
    }
  }

  getStatus(): { active: number; queued: number } {
    return { active: this.active, queued: this.queue.length };
  }
}
