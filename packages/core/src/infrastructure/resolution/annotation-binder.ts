/**
 * @fileoverview Annotation Binder - Tag-Bound Dependencies
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/resolution
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Descriptors declared among a parameter's tags do not supply that
 * parameter. They observe it: once every scoped dependency is resolved, each
 * one is bound to the parameter's final value and acquired for its side
 * effects (auditing, concurrency limits keyed by the value, and so on).
 *
 * @version 1.0.0
 */

import { getFunctionName } from '../../domain/dependency';
import { getLogger } from '../config/engine-options';
import { type ReleaseStack } from '../context/release-stack';
import { getAnnotationDependencies } from '../introspection/introspection';

/**
 * Bind and acquire every tag-bound descriptor of a function.
 *
 * @param fn - The function whose `annotate` declaration is read
 * @param resolved - Values produced for scoped dependencies
 * @param overrides - Caller-supplied values, which win over resolved ones
 * @param stack - Release stack of the current resolution
 *
 * @remarks
 * A parameter's final value is its override when one is given, otherwise
 * its resolved value, otherwise `undefined`. Failures propagate; they are
 * never turned into a `FailedDependency`.
 */
export async function bindAnnotationDependencies(
  fn: object,
  resolved: Readonly<Record<string, unknown>>,
  overrides: Readonly<Record<string, unknown>>,
  stack: ReleaseStack,
): Promise<void> {
  for (const [parameter, dependencies] of Object.entries(getAnnotationDependencies(fn))) {
    const source = Object.hasOwn(overrides, parameter) ? overrides : resolved;
    const value = Object.hasOwn(source, parameter) ? source[parameter] : undefined;

    for (const dependency of dependencies) {
      getLogger().debug(
        `Binding tag-bound dependency to '${parameter}'`,
        { target: getFunctionName(fn) },
      );
      await stack.enterDependency(dependency.bindToParameter(parameter, value));
    }
  }
}
