import type { AdmissionGate } from '../../domain/ports/AdmissionGate.js';

/**
 * Counting semaphore. Waiters are admitted in FIFO order and the number of
 * outstanding permits never exceeds `capacity`.
 */
export class Semaphore implements AdmissionGate {
  private permits: number;
  private readonly waiters: (() => void)[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('Semaphore capacity must be at least 1');
    }
    this.permits = capacity;
  }

  /** Permits currently held. */
  get inUse(): number {
    return this.capacity - this.permits;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // hand the permit over directly
      next();
      return;
    }
    if (this.permits >= this.capacity) {
      throw new Error('Semaphore released more times than acquired');
    }
    this.permits++;
  }

  /** Run `task` while holding a permit. */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
