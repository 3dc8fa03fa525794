/**
 * @fileoverview FunctionalDependency - Descriptors Backed by a Producer
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/resolution
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Common ground of `Depends` and `Shared`: both wrap a producer function,
 * resolve the producer's own declared dependencies into a keyword-arguments
 * object and invoke it. They differ only in which cache and which release
 * stack they use.
 *
 * @version 1.0.0
 */

import {
  Dependency,
  type DependencyFactory,
  type ProducerResult,
  getFunctionName,
} from '../../domain/dependency';
import { type ReleaseStack } from '../context/release-stack';
import { getDependencyParameters } from '../introspection/introspection';

/**
 * Base class for descriptors that call a producer.
 *
 * @template T - The value the producer resolves to
 */
export abstract class FunctionalDependency<T> extends Dependency<T> {
  /**
   * The wrapped producer. Also the cache key.
   */
  readonly factory: DependencyFactory<T>;

  constructor(factory: DependencyFactory<T>) {
    super();
    this.factory = factory;
  }

  /**
   * Name of the producer, for logs and error messages.
   */
  get producerName(): string {
    return getFunctionName(this.factory);
  }

  /**
   * Acquire every dependency the producer declares, in declaration order,
   * entering each into the given stack.
   */
  protected async resolveArguments(stack: ReleaseStack): Promise<Record<string, unknown>> {
    const args: Record<string, unknown> = {};

    for (const [parameter, dependency] of Object.entries(getDependencyParameters(this.factory))) {
      args[parameter] = await stack.enterDependency(dependency);
    }

    return args;
  }

  /**
   * Call the producer with its resolved arguments.
   */
  protected invoke(args: Record<string, unknown>): ProducerResult<T> {
    return this.factory(args);
  }

  toString(): string {
    return `${this.constructor.name}(${this.producerName})`;
  }
}
