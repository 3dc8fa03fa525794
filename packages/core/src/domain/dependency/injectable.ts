/**
 * @fileoverview Injectable - Static Dependency Declarations on Functions
 *
 * @packageDocumentation
 * @module @provisio/core/domain/dependency
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Functions called through the engine take a single keyword-arguments
 * object. Which of those keywords are dependencies is declared statically,
 * next to the function, rather than discovered by reflection:
 *
 * ```typescript
 * const getUser = injectable(
 *   {
 *     inject: { db: depends(openConnection) },
 *     annotate: { userId: [new RequirePositive()] },
 *     parameters: ['userId', 'db'],
 *   },
 *   async ({ userId, db }: { userId: number; db: Connection }) =>
 *     db.users.find(userId),
 * );
 * ```
 *
 * @version 1.0.0
 */

import { type Dependency } from './dependency';
import { type IAsyncResource, type IResource } from './resource';

/**
 * Everything a producer is allowed to return.
 *
 * @template R - The value that ends up injected
 */
export type ProducerResult<R> =
  | R
  | PromiseLike<R>
  | Generator<R, unknown, undefined>
  | AsyncGenerator<R, unknown, undefined>
  | IResource<R>
  | IAsyncResource<R>;

/**
 * A function that produces a dependency's value.
 *
 * @template R - The value that ends up injected
 *
 * @remarks
 * Producers are identified by reference: two descriptors wrapping the same
 * function share one cached value per scope. A producer receives its own
 * resolved dependencies as a keyword-arguments object.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type DependencyFactory<R = unknown> = (args: any) => ProducerResult<R>;

/**
 * Static dependency declaration attached to a function.
 */
export interface IInjectableDeclaration {
  /**
   * Parameters supplied by dependency descriptors, in resolution order.
   */
  readonly inject?: Readonly<Record<string, Dependency>>;

  /**
   * Metadata tags per parameter. Descriptor instances among the tags are
   * tag-bound dependencies; anything else is ignored by the engine.
   */
  readonly annotate?: Readonly<Record<string, readonly unknown[]>>;

  /**
   * Full ordered parameter list. Derived from `inject` and `annotate` when
   * omitted.
   */
  readonly parameters?: readonly string[];
}

/**
 * A keyword-arguments function carrying a static declaration.
 *
 * @template TArgs - The keyword-arguments object
 * @template R - Return type
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type InjectableFunction<TArgs = any, R = unknown> = ((args: TArgs) => R) &
  IInjectableDeclaration;

/**
 * Attach a dependency declaration to a function.
 *
 * @returns The same function, typed with its declaration
 *
 * @example
 * ```typescript
 * const base = () => 'base';
 * const derived = injectable(
 *   { inject: { b: depends(base) } },
 *   ({ b }: { b: string }) => `${b}-derived`,
 * );
 * ```
 */
export function injectable<TArgs, R>(
  declaration: IInjectableDeclaration,
  fn: (args: TArgs) => R,
): InjectableFunction<TArgs, R> {
  return Object.assign(fn, declaration);
}

/**
 * Get a human-readable name for a function.
 */
export function getFunctionName(fn: { readonly name?: string } | ((...args: never[]) => unknown)): string {
  return fn.name || 'anonymous';
}
