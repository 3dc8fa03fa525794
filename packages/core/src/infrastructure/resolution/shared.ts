/**
 * @fileoverview Shared - Long-Lived Dependencies
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/resolution
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A shared scope brackets many resolutions (typically a worker's whole
 * lifetime). `Shared` descriptors produce their value once per shared scope,
 * and the shared scope's release stack owns their cleanup.
 *
 * ```
 * openSharedScope() ─────────────────────────────────────────────┐
 * │                                                              │
 * │  resolution 1: shared(connectPool) -> pool-1   (invoked)     │
 * │  resolution 2: shared(connectPool) -> pool-1   (cached)      │
 * │  resolution 3: shared(connectPool) -> pool-1   (cached)      │
 * │                                                              │
 * └──── close: release(pool-1) ──────────────────────────────────┘
 * ```
 *
 * ## Exactly-Once Initialization
 *
 * Concurrent first requests for the same producer race past an unlocked
 * cache check, resolve the producer's own dependencies, then serialize on
 * the scope's mutex. The first holder invokes the producer; the others find
 * the value on the second check.
 *
 * @version 1.0.0
 */

import { AsyncLocalStorage } from 'async_hooks';

import {
  type DependencyFactory,
  NoActiveSharedScopeError,
  SharedScopeStateError,
} from '../../domain/dependency';
import { AsyncMutex } from '../concurrency/async-mutex';
import { getLogger } from '../config/engine-options';
import { ProducerCache } from '../context/producer-cache';
import { ReleaseStack } from '../context/release-stack';
import { ResolutionScope } from '../context/resolution-scope';

import { FunctionalDependency } from './functional-dependency';
import { resolveProducerResult } from './producer-adapter';

/**
 * Lifecycle state of a shared scope.
 */
export type SharedScopeState = 'unopened' | 'open' | 'closed';

/**
 * Singleton AsyncLocalStorage instance for shared scopes.
 * @internal
 */
const sharedStorage = new AsyncLocalStorage<SharedScope>();

let nextSharedScopeId = 1;

// ============================================================================
// SharedScope
// ============================================================================

/**
 * SharedScope - cache, mutex and release stack outliving single resolutions.
 *
 * @remarks
 * **States:** `unopened` → `open` → `closed`. A scope opens once; running it
 * again, open or closed, throws `SharedScopeStateError`.
 *
 * While {@link run} is executing, the scope is the active shared scope for
 * all async work spawned by the callback. An outer scope is shadowed, not
 * modified, and is active again once the callback settles.
 *
 * @example
 * ```typescript
 * const scope = new SharedScope();
 *
 * await scope.run(async () => {
 *   await Promise.all(jobs.map((job) => processJob({ job })));
 * });
 *
 * scope.state; // 'closed'
 * ```
 */
export class SharedScope {
  /**
   * Identifier for logging.
   */
  readonly id = nextSharedScopeId++;

  /**
   * Identity-keyed producer cache.
   */
  readonly cache = new ProducerCache();

  /**
   * Serializes first-time initialization.
   */
  readonly mutex = new AsyncMutex();

  /**
   * Release stack unwound when the scope closes.
   */
  readonly stack = new ReleaseStack();

  private currentState: SharedScopeState = 'unopened';

  get state(): SharedScopeState {
    return this.currentState;
  }

  /**
   * Get the active shared scope, if any. May be a closed scope still
   * referenced by work that outlived it.
   */
  static current(): SharedScope | undefined {
    return sharedStorage.getStore();
  }

  /**
   * Get the active, open shared scope or throw.
   *
   * @throws NoActiveSharedScopeError if none is active or it has closed
   */
  static require(producerName: string, resolutionPath: readonly string[] = []): SharedScope {
    const scope = sharedStorage.getStore();
    if (!scope || scope.state !== 'open') {
      throw new NoActiveSharedScopeError(producerName, [...resolutionPath]);
    }
    return scope;
  }

  /**
   * Open the scope, run the callback within it, then close it.
   *
   * @remarks
   * Closing unwinds the release stack whether the callback succeeded or
   * not. An error thrown by the callback is passed to every release and
   * then rethrown; a release failure replaces it.
   *
   * @throws SharedScopeStateError if the scope was already opened
   */
  async run<R>(callback: () => Promise<R> | R): Promise<R> {
    if (this.currentState !== 'unopened') {
      throw new SharedScopeStateError(this.currentState);
    }

    this.currentState = 'open';
    getLogger().debug('Shared scope opened', { sharedScope: this.id });

    let result: Awaited<R>;
    try {
      result = await sharedStorage.run(this, callback);
    } catch (error) {
      await this.close({ error });
      throw error;
    }

    await this.close();
    return result;
  }

  private async close(outcome?: { readonly error: unknown }): Promise<void> {
    this.currentState = 'closed';
    getLogger().debug('Shared scope closing', {
      sharedScope: this.id,
      pending: this.stack.size,
    });
    await this.stack.close(outcome);
  }

  toString(): string {
    return `SharedScope(id=${this.id}, state=${this.currentState}, cached=${this.cache.size})`;
  }
}

/**
 * Open a fresh shared scope around a callback.
 *
 * @example
 * ```typescript
 * await openSharedScope(async () => {
 *   const run = withoutDependencies(handleRequest);
 *   await Promise.all(requests.map((request) => run({ request })));
 * });
 * ```
 */
export function openSharedScope<R>(callback: () => Promise<R> | R): Promise<R> {
  return new SharedScope().run(callback);
}

// ============================================================================
// Shared Descriptor
// ============================================================================

/**
 * Shared - a producer resolved once per shared scope.
 *
 * @template T - The value the producer resolves to
 *
 * @remarks
 * The producer's own dependencies are entered into the shared release
 * stack. A nested `depends()` is still cached, and released, by the
 * resolution scope that first triggered it.
 */
export class Shared<T> extends FunctionalDependency<T> {
  async acquire(): Promise<T> {
    const resolution = ResolutionScope.current();
    const sharedScope = SharedScope.require(this.producerName, resolution?.path);

    const cached = sharedScope.cache.get(this.factory);
    if (cached) {
      return cached.value;
    }

    const initialize = (): Promise<T> => this.initialize(sharedScope);
    return resolution ? resolution.descend(this.producerName, initialize) : initialize();
  }

  private async initialize(sharedScope: SharedScope): Promise<T> {
    const args = await this.resolveArguments(sharedScope.stack);

    return sharedScope.mutex.runExclusive(async () => {
      const cached = sharedScope.cache.get(this.factory);
      if (cached) {
        return cached.value;
      }

      getLogger().debug(`Invoking shared producer '${this.producerName}'`, {
        sharedScope: sharedScope.id,
      });

      const value = await resolveProducerResult(
        sharedScope.stack,
        this.invoke(args),
        this.producerName,
      );

      sharedScope.cache.set(this.factory, value);
      return value;
    });
  }
}

/**
 * Declare a dependency on a producer that lives as long as the shared scope.
 *
 * @example
 * ```typescript
 * async function* connectPool() {
 *   const pool = await createPool();
 *   try {
 *     yield pool;
 *   } finally {
 *     await pool.end();
 *   }
 * }
 *
 * const handler = injectable(
 *   { inject: { pool: shared(connectPool) } },
 *   async ({ pool }: { pool: Pool }) => pool.query('SELECT 1'),
 * );
 * ```
 */
export function shared<T>(factory: DependencyFactory<T>): Shared<T> {
  return new Shared(factory);
}
