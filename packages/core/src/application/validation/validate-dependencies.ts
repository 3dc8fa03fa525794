/**
 * @fileoverview validateDependencies - Exclusivity Checks
 *
 * @packageDocumentation
 * @module @provisio/core/application/validation
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Checks a function's dependency set against the `exclusive` flags of the
 * descriptor types in it. Intended to run once, when a handler is
 * registered, rather than on every call.
 *
 * ## Check Order
 *
 * ```
 * 1. per parameter   two exclusive tags of one exact type on one parameter
 * 2. exact type      two exclusive instances of one exact type
 * 3. ancestor type   two instances inheriting one exclusive ancestor
 * ```
 *
 * Concrete types report before ancestors, so the message names `Retry`
 * rather than the abstract `FailureHandler` it inherits from.
 *
 * The per-parameter check goes first on purpose. Tag-bound descriptors are
 * also part of the set the exact-type check counts, so two exclusive tags
 * on one parameter would otherwise always surface as a plain exact-type
 * conflict and never name the parameter.
 *
 * @version 1.0.0
 */

import {
  type Dependency,
  type DependencyType,
  DependencyValidationError,
  getDependencyAncestry,
  getDependencyType,
  getDependencyTypeName,
} from '../../domain/dependency';
import {
  getAnnotationDependencies,
  getDependencyParameters,
} from '../../infrastructure/introspection/introspection';

/**
 * Group descriptors by exact runtime type, in first-occurrence order.
 */
function groupByType(dependencies: readonly Dependency[]): Map<DependencyType, number> {
  const counts = new Map<DependencyType, number>();
  for (const dependency of dependencies) {
    const type = getDependencyType(dependency);
    counts.set(type, (counts.get(type) ?? 0) + 1);
  }
  return counts;
}

function checkParameterTags(fn: object): void {
  for (const [parameter, dependencies] of Object.entries(getAnnotationDependencies(fn))) {
    for (const [type, count] of groupByType(dependencies)) {
      if (type.exclusive && count > 1) {
        const name = getDependencyTypeName(type);
        throw new DependencyValidationError(
          `Only one ${name} annotation dependency is allowed per parameter, but found ${count} on '${parameter}'`,
          name,
          [name],
          parameter,
        );
      }
    }
  }
}

function checkExactTypes(dependencies: readonly Dependency[]): void {
  for (const [type, count] of groupByType(dependencies)) {
    if (type.exclusive && count > 1) {
      const name = getDependencyTypeName(type);
      throw new DependencyValidationError(`Only one ${name} dependency is allowed`, name, [name]);
    }
  }
}

function checkAncestors(dependencies: readonly Dependency[]): void {
  const exclusiveAncestors = new Set<DependencyType>();

  for (const dependency of dependencies) {
    for (const type of getDependencyAncestry(getDependencyType(dependency))) {
      if (type.exclusive) {
        exclusiveAncestors.add(type);
      }
    }
  }

  for (const ancestor of exclusiveAncestors) {
    const members = dependencies.filter((dependency) => dependency instanceof ancestor);
    if (members.length > 1) {
      const name = getDependencyTypeName(ancestor);
      const offending = members.map((member) => getDependencyTypeName(getDependencyType(member)));
      throw new DependencyValidationError(
        `Only one ${name} dependency is allowed, but found: ${offending.join(', ')}`,
        name,
        offending,
      );
    }
  }
}

/**
 * Check that a function's dependency declarations respect exclusivity.
 *
 * @remarks
 * Scoped (`inject`) and tag-bound (`annotate`) descriptors form one set:
 * an exclusive type may appear at most once across both. Duplicates on a
 * single parameter are reported first, naming that parameter.
 *
 * @throws DependencyValidationError on the first violation found
 *
 * @example
 * ```typescript
 * class Retry extends Dependency<number> {
 *   static readonly exclusive = true;
 *   // ...
 * }
 *
 * const handler = injectable(
 *   { inject: { a: new Retry(3), b: new Retry(5) } },
 *   async () => {},
 * );
 *
 * validateDependencies(handler);
 * // DependencyValidationError: Only one Retry dependency is allowed
 * ```
 */
export function validateDependencies(fn: object): void {
  checkParameterTags(fn);

  const dependencies: Dependency[] = [
    ...Object.values(getDependencyParameters(fn)),
    ...Object.values(getAnnotationDependencies(fn)).flat(),
  ];

  checkExactTypes(dependencies);
  checkAncestors(dependencies);
}
