/**
 * @fileoverview Resolver - Resolving a Function's Dependencies
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/resolution
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Opens a resolution scope, resolves every declared dependency of a
 * function, binds its tag-bound descriptors, hands the resolved arguments to
 * a callback and unwinds the scope once the callback settles.
 *
 * ```
 * resolvedDependencies(fn, overrides, callback)
 *   │
 *   ├─ 1. open resolution scope (fresh cache + release stack)
 *   ├─ 2. scoped dependencies, in declaration order
 *   │      override given  -> use it, skip resolution
 *   │      acquire fails   -> FailedDependency(parameter, error)
 *   ├─ 3. tag-bound dependencies (failures propagate)
 *   ├─ 4. callback(arguments)
 *   └─ 5. unwind release stack (LIFO), always
 * ```
 *
 * @version 1.0.0
 */

import { FailedDependency, getFunctionName } from '../../domain/dependency';
import { getLogger } from '../config/engine-options';
import { ResolutionScope } from '../context/resolution-scope';
import { getDependencyParameters } from '../introspection/introspection';

import { bindAnnotationDependencies } from './annotation-binder';

/**
 * Parameter name to resolved value, or a {@link FailedDependency} for a
 * scoped dependency that could not be acquired.
 */
export type ResolvedArguments = Record<string, unknown>;

/**
 * Work to run while resolved dependencies are held.
 */
export type ResolutionCallback<R> = (args: ResolvedArguments) => Promise<R> | R;

type Overrides = Readonly<Record<string, unknown>>;

function isResolutionCallback<R>(
  value: Overrides | ResolutionCallback<R>,
): value is ResolutionCallback<R> {
  return typeof value === 'function';
}

/**
 * Resolve every dependency declared on a function and run a callback with
 * the results.
 *
 * @param fn - Function carrying `inject` and `annotate` declarations
 * @param overrides - Caller-supplied values; a scoped parameter present
 * here is never resolved
 * @param callback - Receives the resolved arguments
 * @returns Whatever the callback returns
 *
 * @remarks
 * The release stack unwinds after the callback settles, whether it
 * succeeded or threw. An error from the callback is passed to every release
 * and then rethrown, unless a release itself fails; the last release
 * failure then takes its place.
 *
 * Tag-bound parameters never appear in the resolved arguments.
 *
 * @example
 * ```typescript
 * const report = await resolvedDependencies(handler, { userId: 7 }, async (args) => {
 *   if (isFailedDependency(args.db)) {
 *     throw args.db.error;
 *   }
 *   return handler({ userId: 7, ...args });
 * });
 * ```
 */
export function resolvedDependencies<R>(fn: object, callback: ResolutionCallback<R>): Promise<R>;
export function resolvedDependencies<R>(
  fn: object,
  overrides: Overrides,
  callback: ResolutionCallback<R>,
): Promise<R>;
export function resolvedDependencies<R>(
  fn: object,
  overridesOrCallback: Overrides | ResolutionCallback<R>,
  maybeCallback?: ResolutionCallback<R>,
): Promise<R> {
  let overrides: Overrides = {};
  let callback = maybeCallback;

  if (isResolutionCallback(overridesOrCallback)) {
    callback = overridesOrCallback;
  } else {
    overrides = overridesOrCallback;
  }

  if (!callback) {
    return Promise.reject(new TypeError('resolvedDependencies() requires a callback'));
  }

  const work = callback;
  return ResolutionScope.run((scope) => runInScope(scope, fn, overrides, work));
}

async function runInScope<R>(
  scope: ResolutionScope,
  fn: object,
  overrides: Overrides,
  callback: ResolutionCallback<R>,
): Promise<R> {
  const logger = getLogger();
  logger.debug('Resolution scope opened', { scope: scope.id, target: getFunctionName(fn) });

  let result: Awaited<R>;
  try {
    const args = await resolveScopedArguments(fn, overrides, scope);
    await bindAnnotationDependencies(fn, args, overrides, scope.stack);
    result = await callback(args);
  } catch (error) {
    logger.debug('Resolution scope closing after failure', { scope: scope.id });
    await scope.stack.close({ error });
    throw error;
  }

  logger.debug('Resolution scope closing', { scope: scope.id, pending: scope.stack.size });
  await scope.stack.close();
  return result;
}

async function resolveScopedArguments(
  fn: object,
  overrides: Overrides,
  scope: ResolutionScope,
): Promise<ResolvedArguments> {
  const args: ResolvedArguments = {};

  for (const [parameter, dependency] of Object.entries(getDependencyParameters(fn))) {
    if (Object.hasOwn(overrides, parameter)) {
      args[parameter] = overrides[parameter];
      continue;
    }

    try {
      args[parameter] = await scope.stack.enterDependency(dependency);
    } catch (error) {
      getLogger().debug(`Dependency for '${parameter}' failed`, { scope: scope.id, error });
      args[parameter] = new FailedDependency(parameter, error);
    }
  }

  return args;
}
