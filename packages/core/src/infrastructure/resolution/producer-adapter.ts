/**
 * @fileoverview Producer Adapter - Normalizing Producer Results
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/resolution
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A producer may return a value, a promise, a scoped resource or a
 * generator. This module turns any of those into the resolved value and
 * registers cleanup on the owning scope's release stack.
 *
 * ## Classification Order
 *
 * ```
 * raw result
 *   1. async resource  (explicit, or async generator) -> enterAsync
 *   2. sync resource   (explicit, or generator)       -> enter
 *   3. thenable                                       -> await
 *   4. anything else                                  -> as is
 * ```
 *
 * An async generator is not thenable, but must still never fall through to
 * the plain-value branch.
 *
 * @version 1.0.0
 */

import {
  type IAsyncResource,
  type IResource,
  type ProducerResult,
  RESOURCE_BRAND,
  ResourceProtocolError,
  isAsyncGenerator,
  isAsyncResource,
  isGenerator,
  isResource,
  isThenable,
} from '../../domain/dependency';
import { type ReleaseStack } from '../context/release-stack';

/**
 * Closed classification of a producer's raw result.
 */
export type ProducedValue<T> =
  | { readonly kind: 'async-resource'; readonly resource: IAsyncResource<T> }
  | { readonly kind: 'resource'; readonly resource: IResource<T> }
  | { readonly kind: 'eventual'; readonly promise: PromiseLike<T> }
  | { readonly kind: 'value'; readonly value: T };

// ============================================================================
// Generator Resources
// ============================================================================

/**
 * Adapt a generator to the enter/exit protocol.
 *
 * @remarks
 * The first yielded value is the resource. On exit the generator is resumed
 * (or has the unwinding error thrown in at the `yield`) and must finish.
 * Rethrowing the same error is the normal way to let it propagate and is not
 * a release failure.
 */
export function generatorResource<T>(
  generator: Generator<T, unknown, undefined>,
  producerName: string,
): IResource<T> {
  return {
    [RESOURCE_BRAND]: 'sync',
    enter(): T {
      const step = generator.next();
      if (step.done) {
        throw new ResourceProtocolError(producerName, 'did not yield');
      }
      return step.value;
    },
    exit(error?: unknown): void {
      let step: IteratorResult<T, unknown>;

      if (error === undefined) {
        step = generator.next();
      } else {
        try {
          step = generator.throw(error);
        } catch (thrown) {
          if (thrown === error) {
            return;
          }
          throw thrown;
        }
      }

      if (!step.done) {
        generator.return(undefined);
        throw new ResourceProtocolError(producerName, 'yielded more than once');
      }
    },
  };
}

/**
 * Adapt an async generator to the enter/exit protocol.
 */
export function asyncGeneratorResource<T>(
  generator: AsyncGenerator<T, unknown, undefined>,
  producerName: string,
): IAsyncResource<T> {
  return {
    [RESOURCE_BRAND]: 'async',
    async enter(): Promise<T> {
      const step = await generator.next();
      if (step.done) {
        throw new ResourceProtocolError(producerName, 'did not yield');
      }
      return step.value;
    },
    async exit(error?: unknown): Promise<void> {
      let step: IteratorResult<T, unknown>;

      if (error === undefined) {
        step = await generator.next();
      } else {
        try {
          step = await generator.throw(error);
        } catch (thrown) {
          if (thrown === error) {
            return;
          }
          throw thrown;
        }
      }

      if (!step.done) {
        await generator.return(undefined);
        throw new ResourceProtocolError(producerName, 'yielded more than once');
      }
    },
  };
}

// ============================================================================
// Classification
// ============================================================================

function isAsyncResourceResult<T>(raw: ProducerResult<T>): raw is IAsyncResource<T> {
  return isAsyncResource(raw);
}

function isResourceResult<T>(raw: ProducerResult<T>): raw is IResource<T> {
  return isResource(raw);
}

function isAsyncGeneratorResult<T>(
  raw: ProducerResult<T>,
): raw is AsyncGenerator<T, unknown, undefined> {
  return isAsyncGenerator(raw);
}

function isGeneratorResult<T>(raw: ProducerResult<T>): raw is Generator<T, unknown, undefined> {
  return isGenerator(raw);
}

function isEventualResult<T>(raw: ProducerResult<T>): raw is PromiseLike<T> {
  return isThenable(raw);
}

/**
 * Classify a producer's raw result.
 */
export function classifyProducerResult<T>(
  raw: ProducerResult<T>,
  producerName: string,
): ProducedValue<T> {
  if (isAsyncResourceResult(raw)) {
    return { kind: 'async-resource', resource: raw };
  }

  if (isAsyncGeneratorResult(raw)) {
    return { kind: 'async-resource', resource: asyncGeneratorResource(raw, producerName) };
  }

  if (isResourceResult(raw)) {
    return { kind: 'resource', resource: raw };
  }

  if (isGeneratorResult(raw)) {
    return { kind: 'resource', resource: generatorResource(raw, producerName) };
  }

  if (isEventualResult(raw)) {
    return { kind: 'eventual', promise: raw };
  }

  return { kind: 'value', value: raw };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled producer result: ${JSON.stringify(value)}`);
}

/**
 * Turn a producer's raw result into its value, entering resources into the
 * given release stack.
 */
export async function resolveProducerResult<T>(
  stack: ReleaseStack,
  raw: ProducerResult<T>,
  producerName: string,
): Promise<T> {
  const produced = classifyProducerResult(raw, producerName);

  switch (produced.kind) {
    case 'async-resource':
      return stack.enterAsync(produced.resource);

    case 'resource':
      return stack.enter(produced.resource);

    case 'eventual':
      return await produced.promise;

    case 'value':
      return produced.value;

    default:
      return assertNever(produced);
  }
}
