/**
 * @fileoverview ResolutionScope - AsyncLocalStorage-based Per-Call Scope
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * One resolution scope exists per engine call. It owns the producer cache
 * and the release stack for that call and travels implicitly through the
 * async call chain, so descriptors can reach it without parameters.
 *
 * ```
 * ResolutionScope.run() ────────────────────────────────────┐
 * │                                                          │
 * │  cache:                                                  │
 * │    openConnection -> connection-1                        │
 * │    loadUser       -> user-1                              │
 * │                                                          │
 * │  stack: [openConnection.exit]                            │
 * │                                                          │
 * └──────────────────────────────────────────────────────────┘
 * ```
 *
 * Concurrent calls each run inside their own store and never observe each
 * other's cache.
 *
 * @version 1.0.0
 */

import { AsyncLocalStorage } from 'async_hooks';

import {
  NoActiveResolutionScopeError,
  ResolutionDepthExceededError,
} from '../../domain/dependency';
import { getEngineOptions } from '../config/engine-options';

import { ProducerCache } from './producer-cache';
import { ReleaseStack } from './release-stack';

/**
 * Singleton AsyncLocalStorage instance for resolution scopes.
 * @internal
 */
const scopeStorage = new AsyncLocalStorage<ResolutionScope>();

let nextScopeId = 1;

/**
 * ResolutionScope - cache and release stack for one engine call.
 *
 * @remarks
 * **Usage Pattern: Static Factory + Instance Methods**
 *
 * ```typescript
 * await ResolutionScope.run(async (scope) => {
 *   try {
 *     // ... acquire dependencies
 *   } finally {
 *     await scope.stack.close();
 *   }
 * });
 * ```
 *
 * Nested producers run in a child view created by {@link descend}: the
 * child shares the cache and stack, and extends the resolution path used for
 * depth limiting and error messages.
 */
export class ResolutionScope {
  /**
   * Identifier for logging.
   */
  readonly id: number;

  /**
   * Identity-keyed producer cache.
   */
  readonly cache: ProducerCache;

  /**
   * Release stack unwound when the call ends.
   */
  readonly stack: ReleaseStack;

  /**
   * Producers currently being resolved, outermost first.
   */
  readonly path: readonly string[];

  private constructor(
    id: number,
    cache: ProducerCache,
    stack: ReleaseStack,
    path: readonly string[],
  ) {
    this.id = id;
    this.cache = cache;
    this.stack = stack;
    this.path = path;
  }

  // ============================================================================
  // Static Factory Methods
  // ============================================================================

  /**
   * Create a fresh scope and run a function within it.
   *
   * @remarks
   * The scope is active for the duration of the callback, including all
   * async operations spawned within it. Any outer scope is shadowed, not
   * modified, and is visible again once the callback settles.
   */
  static run<R>(callback: (scope: ResolutionScope) => R): R {
    const scope = new ResolutionScope(nextScopeId++, new ProducerCache(), new ReleaseStack(), []);
    return scopeStorage.run(scope, () => callback(scope));
  }

  /**
   * Get the active scope, if any.
   */
  static current(): ResolutionScope | undefined {
    return scopeStorage.getStore();
  }

  /**
   * Get the active scope or throw.
   *
   * @param producerName - Producer being resolved, for the error message
   * @throws NoActiveResolutionScopeError if no scope is active
   */
  static require(producerName: string): ResolutionScope {
    const scope = scopeStorage.getStore();
    if (!scope) {
      throw new NoActiveResolutionScopeError(producerName);
    }
    return scope;
  }

  // ============================================================================
  // Nesting
  // ============================================================================

  /**
   * Run a producer's own resolution one level deeper.
   *
   * @throws ResolutionDepthExceededError past `maxResolutionDepth`
   */
  descend<R>(producerName: string, callback: () => R): R {
    const path = [...this.path, producerName];
    const { maxResolutionDepth } = getEngineOptions();

    if (path.length > maxResolutionDepth) {
      throw new ResolutionDepthExceededError(maxResolutionDepth, path);
    }

    const child = new ResolutionScope(this.id, this.cache, this.stack, path);
    return scopeStorage.run(child, callback);
  }

  /**
   * Returns a string representation for debugging.
   */
  toString(): string {
    return `ResolutionScope(id=${this.id}, cached=${this.cache.size}, pending=${this.stack.size}, depth=${this.path.length})`;
  }
}
