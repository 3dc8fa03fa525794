/**
 * @fileoverview Bridge - Calling Functions Without Their Dependencies
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/resolution
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * `withoutDependencies()` turns a function with declared dependencies into
 * one its callers can invoke with only the arguments they own. Every call
 * of the bridge runs in its own resolution scope.
 *
 * ```
 * handler({ userId, db = depends(connect) })
 *        │
 *        ▼ withoutDependencies(handler)
 * bridged({ userId })  ── resolves db, calls handler({ userId, db }),
 *                         releases db, returns the result
 * ```
 *
 * Bridges are memoized per original function in an LRU cache sized by the
 * `bridgeCacheSize` engine option.
 *
 * @version 1.0.0
 */

import { type ICacheStats, LRUCache } from '../cache/lru-cache';
import { getEngineOptions, onEngineOptionsChange } from '../config/engine-options';
import {
  getAnnotationDependencies,
  getDependencyParameters,
  getSignature,
} from '../introspection/introspection';

import { resolvedDependencies } from './resolver';

/**
 * A function taking a single keyword-arguments object.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
type KeywordFunction = (args: any) => unknown;

/**
 * The callable returned by {@link withoutDependencies}.
 *
 * @template TArgs - Keyword arguments of the original function
 * @template R - Return type of the original function
 *
 * @remarks
 * Callers pass only the arguments they own; declared dependencies are
 * filled in. `parameters` lists what remains visible.
 */
export type BridgedFunction<TArgs, R> = ((args?: Partial<TArgs>) => R | Promise<Awaited<R>>) & {
  readonly parameters?: readonly string[];
};

let bridgeCacheSize = getEngineOptions().bridgeCacheSize;
let bridges = new LRUCache<KeywordFunction, KeywordFunction>(bridgeCacheSize);

onEngineOptionsChange((options) => {
  if (options.bridgeCacheSize !== bridgeCacheSize) {
    bridgeCacheSize = options.bridgeCacheSize;
    bridges = new LRUCache(bridgeCacheSize);
  }
});

/**
 * Produce a callable whose declared dependencies are resolved on every call.
 *
 * @returns The function itself when it declares no scoped and no tag-bound
 * dependencies; otherwise an async wrapper
 *
 * @remarks
 * **Wrapper behavior:**
 *
 * - Opens a fresh resolution scope per invocation
 * - A caller-supplied argument overrides the matching dependency, which is
 *   then never resolved
 * - Resolved values are merged under the caller's arguments (caller wins)
 * - The result is awaited before the scope unwinds
 * - `name` is the original's; `parameters` omits scoped-dependency
 *   parameters, while tag-bound parameters stay visible
 *
 * Calling `withoutDependencies()` twice with the same function returns the
 * same bridge while it remains in the cache.
 *
 * @example
 * ```typescript
 * const getUser = injectable(
 *   { inject: { db: depends(openConnection) } },
 *   async ({ userId, db }: { userId: number; db: Connection }) => db.users.find(userId),
 * );
 *
 * const run = withoutDependencies(getUser);
 * const user = await run({ userId: 7 });
 * run.parameters; // ['userId']
 * ```
 */
export function withoutDependencies<TArgs, R>(fn: (args: TArgs) => R): BridgedFunction<TArgs, R>;
export function withoutDependencies(fn: KeywordFunction): KeywordFunction {
  const cached = bridges.get(fn);
  if (cached) {
    return cached;
  }

  const bridge = createBridge(fn);
  bridges.set(fn, bridge);
  return bridge;
}

function createBridge(fn: KeywordFunction): KeywordFunction {
  const dependencyNames = new Set(Object.keys(getDependencyParameters(fn)));
  const annotated = Object.keys(getAnnotationDependencies(fn));

  if (dependencyNames.size === 0 && annotated.length === 0) {
    return fn;
  }

  const visible = getSignature(fn).parameters.filter((name) => !dependencyNames.has(name));

  const bridge = async (args: Readonly<Record<string, unknown>> = {}): Promise<unknown> =>
    resolvedDependencies(fn, args, async (resolved) => fn({ ...resolved, ...args }));

  Object.defineProperty(bridge, 'name', { value: fn.name, configurable: true });
  Object.defineProperty(bridge, 'parameters', {
    value: Object.freeze(visible),
    enumerable: true,
  });

  return bridge;
}

/**
 * Hit and miss counts of the bridge cache.
 */
export function getBridgeCacheStats(): ICacheStats {
  return bridges.stats();
}

/**
 * Drop every memoized bridge.
 */
export function clearBridgeCache(): void {
  bridges.clear();
}
