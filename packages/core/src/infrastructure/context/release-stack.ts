/**
 * @fileoverview ReleaseStack - LIFO Resource Release
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Ordered record of acquired resources. Every scope (resolution or shared)
 * owns one; closing the scope unwinds it in exact reverse acquisition order.
 *
 * ```
 * enter(A) ──► enter(B) ──► enter(C)
 *                                   │
 * release(A) ◄── release(B) ◄── release(C)
 * ```
 *
 * @version 1.0.0
 */

import { type Dependency, type IAsyncResource, type IResource } from '../../domain/dependency';
import { getLogger } from '../config/engine-options';

/**
 * Callback registered for release.
 *
 * @param error - The error unwinding the stack, if any
 */
export type ReleaseCallback = (error?: unknown) => void | Promise<void>;

/**
 * Outcome of the work the stack guarded.
 */
export interface IUnwindOutcome {
  readonly error: unknown;
}

/**
 * ReleaseStack - ordered record of acquired resources.
 *
 * @remarks
 * **Unwinding rules:**
 *
 * 1. Every callback runs, even if an earlier one threw
 * 2. Each callback receives the error currently unwinding the stack
 * 3. A callback that throws replaces that error for the callbacks after it
 * 4. If any callback threw, the last such error is rethrown after unwinding
 *
 * A resource is only registered once it has been entered successfully, so
 * a failed acquisition is never released.
 *
 * @example
 * ```typescript
 * const stack = new ReleaseStack();
 * try {
 *   const file = stack.enter(openFile());
 *   const db = await stack.enterAsync(openConnection());
 *   await work(file, db);
 * } catch (error) {
 *   await stack.close({ error });
 *   throw error;
 * }
 * await stack.close();
 * ```
 */
export class ReleaseStack {
  private readonly callbacks: ReleaseCallback[] = [];
  private closed = false;

  /**
   * Number of pending release callbacks.
   */
  get size(): number {
    return this.callbacks.length;
  }

  /**
   * Whether the stack has been unwound.
   */
  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Register a release callback.
   *
   * @throws Error if the stack has already been unwound
   */
  push(callback: ReleaseCallback): void {
    if (this.closed) {
      throw new Error('Cannot register a release on a stack that has already been unwound');
    }
    this.callbacks.push(callback);
  }

  /**
   * Enter a synchronous resource and register its exit.
   */
  enter<T>(resource: IResource<T>): T {
    const value = resource.enter();
    this.push((error) => resource.exit(error));
    return value;
  }

  /**
   * Enter an asynchronous resource and register its exit.
   */
  async enterAsync<T>(resource: IAsyncResource<T>): Promise<T> {
    const value = await resource.enter();
    this.push((error) => resource.exit(error));
    return value;
  }

  /**
   * Acquire a dependency descriptor and register its release.
   */
  async enterDependency<T>(dependency: Dependency<T>): Promise<T> {
    const value = await dependency.acquire();
    this.push((error) => dependency.release(error));
    return value;
  }

  /**
   * Unwind every registered callback, most recent first.
   *
   * @param outcome - Present when the guarded work failed
   * @throws The last error raised by a release callback, if any
   */
  async close(outcome?: IUnwindOutcome): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;

    let current = outcome;
    let releaseFailed = false;

    for (let callback = this.callbacks.pop(); callback; callback = this.callbacks.pop()) {
      try {
        await callback(current?.error);
      } catch (error) {
        getLogger().warn('Release callback failed while unwinding', {
          error,
          remaining: this.callbacks.length,
        });
        current = { error };
        releaseFailed = true;
      }
    }

    if (releaseFailed && current) {
      throw current.error;
    }
  }
}
