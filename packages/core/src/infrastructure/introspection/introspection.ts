/**
 * @fileoverview Introspection - Reading Static Declarations
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/introspection
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Reads the `inject`, `annotate` and `parameters` declarations attached to a
 * function (see `injectable()`). Each reader caches its result once per function, keyed by
 * identity, so declarations are treated as fixed after the first call.
 *
 * @version 1.0.0
 */

import { type Dependency, getFunctionName, isDependency } from '../../domain/dependency';
import { getLogger } from '../config/engine-options';

/**
 * Visible parameter list of a function.
 */
export interface ISignature {
  readonly parameters: readonly string[];
}

const parameterCache = new WeakMap<object, Readonly<Record<string, Dependency>>>();
const annotationCache = new WeakMap<object, Readonly<Record<string, readonly Dependency[]>>>();
const signatureCache = new WeakMap<object, ISignature>();

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find parameters supplied by dependency descriptors.
 *
 * @returns Parameter name to descriptor, in declaration order
 *
 * @example
 * ```typescript
 * const handler = injectable(
 *   { inject: { db: depends(openConnection), retries: new Retry(3) } },
 *   async ({ db, retries }) => { ... },
 * );
 *
 * Object.keys(getDependencyParameters(handler)); // ['db', 'retries']
 * ```
 */
export function getDependencyParameters(
  fn: object,
): Readonly<Record<string, Dependency>> {
  const cached = parameterCache.get(fn);
  if (cached) {
    return cached;
  }

  const dependencies: Record<string, Dependency> = {};
  const declared: unknown = 'inject' in fn ? fn.inject : undefined;

  if (isPlainRecord(declared)) {
    for (const [name, value] of Object.entries(declared)) {
      if (isDependency(value)) {
        dependencies[name] = value;
      }
    }
  }

  const result = Object.freeze(dependencies);
  parameterCache.set(fn, result);
  return result;
}

/**
 * Find descriptors among a function's parameter tags.
 *
 * @remarks
 * Never throws. A declaration that cannot be read (a throwing getter, a
 * malformed shape) yields an empty mapping, which is cached like any other
 * result. Parameters whose tags hold no descriptors are left out.
 */
export function getAnnotationDependencies(
  fn: object,
): Readonly<Record<string, readonly Dependency[]>> {
  const cached = annotationCache.get(fn);
  if (cached) {
    return cached;
  }

  const result: Record<string, readonly Dependency[]> = {};

  try {
    const declared: unknown = 'annotate' in fn ? fn.annotate : undefined;

    if (isPlainRecord(declared)) {
      for (const [name, tags] of Object.entries(declared)) {
        if (!Array.isArray(tags)) {
          continue;
        }
        const dependencies = tags.filter(isDependency);
        if (dependencies.length > 0) {
          result[name] = Object.freeze(dependencies);
        }
      }
    }
  } catch (error) {
    getLogger().debug(`Ignoring unreadable parameter tags on '${getFunctionName(fn)}'`, {
      error,
    });
    for (const name of Object.keys(result)) {
      delete result[name];
    }
  }

  const frozen = Object.freeze(result);
  annotationCache.set(fn, frozen);
  return frozen;
}

/**
 * Get a function's visible parameter list.
 *
 * @remarks
 * Uses the explicit `parameters` declaration when present; otherwise the
 * names declared under `inject`, then those under `annotate`.
 */
export function getSignature(fn: object): ISignature {
  const cached = signatureCache.get(fn);
  if (cached) {
    return cached;
  }

  const declared: unknown = 'parameters' in fn ? fn.parameters : undefined;
  const explicit = Array.isArray(declared)
    ? declared.filter((name): name is string => typeof name === 'string')
    : undefined;
  let parameters: string[];

  if (explicit && Array.isArray(declared) && explicit.length === declared.length) {
    parameters = explicit;
  } else {
    const names = new Set<string>(Object.keys(getDependencyParameters(fn)));
    for (const name of Object.keys(getAnnotationDependencies(fn))) {
      names.add(name);
    }
    parameters = [...names];
  }

  const signature: ISignature = Object.freeze({ parameters: Object.freeze(parameters) });
  signatureCache.set(fn, signature);
  return signature;
}
