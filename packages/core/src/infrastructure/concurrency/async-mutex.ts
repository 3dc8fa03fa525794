/**
 * @fileoverview AsyncMutex - Promise-Chain Critical Sections
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/concurrency
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Each holder appends a gate to a promise chain and waits for the gate
 * before it. Waiters are admitted in arrival order.
 *
 * @version 1.0.0
 */

/**
 * Simple async mutex providing FIFO critical sections.
 *
 * @example
 * ```typescript
 * const mutex = new AsyncMutex();
 *
 * await mutex.runExclusive(async () => {
 *   if (!cache.has(key)) {
 *     cache.set(key, await produce());
 *   }
 * });
 * ```
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /**
   * Whether a critical section is running or queued.
   */
  isLocked(): boolean {
    return this.holders > 0;
  }

  /**
   * Run an operation once every earlier holder has finished.
   */
  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const { previous, release } = this.enqueue();
    this.holders++;

    try {
      await previous;
      return await operation();
    } finally {
      this.holders--;
      release();
    }
  }

  private enqueue(): { previous: Promise<void>; release: () => void } {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => gate);
    return { previous, release };
  }
}
