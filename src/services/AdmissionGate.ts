/**
 * Counting gate that bounds how many tasks run at once.
 * Waiters are admitted in arrival order.
 */

import { InvalidConfigError } from '../errors.js';

export type Release = () => void;

export class AdmissionGate {
  private activeCount = 0;
  private readonly waiters: Array<(release: Release) => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidConfigError(`limit must be a positive integer, got ${limit}`);
    }
  }

  get active(): number {
    return this.activeCount;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /** Resolves with a release function once a slot is free. */
  acquire(): Promise<Release> {
    if (this.activeCount < this.limit) {
      this.activeCount++;
      return Promise.resolve(this.createRelease());
    }
    return new Promise<Release>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Slot passes straight to the next waiter
        next(this.createRelease());
      } else {
        this.activeCount--;
      }
    };
  }
}
