/**
 * @fileoverview Depends - Call-Scoped Resolution
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/resolution
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A `Depends` descriptor resolves its producer at most once per resolution
 * scope. Every other request for the same producer in that scope, however
 * deep in the graph, gets the cached value.
 *
 * ```
 * handler({ a = depends(connect), b = depends(loadUser) })
 *                      │                    │
 *                      │        loadUser({ db = depends(connect) })
 *                      │                                 │
 *                      └──────── connect() ◄─────────────┘  (invoked once)
 * ```
 *
 * @version 1.0.0
 */

import { type DependencyFactory } from '../../domain/dependency';
import { getLogger } from '../config/engine-options';
import { ResolutionScope } from '../context/resolution-scope';

import { FunctionalDependency } from './functional-dependency';
import { resolveProducerResult } from './producer-adapter';

/**
 * Depends - a producer resolved once per resolution scope.
 *
 * @template T - The value the producer resolves to
 *
 * @remarks
 * Acquiring outside of a resolution scope fails with
 * `NoActiveResolutionScopeError`. Resources the producer opens are released
 * when the resolution scope closes, never by `release()` itself.
 */
export class Depends<T> extends FunctionalDependency<T> {
  async acquire(): Promise<T> {
    const scope = ResolutionScope.require(this.producerName);

    const cached = scope.cache.get(this.factory);
    if (cached) {
      return cached.value;
    }

    return scope.descend(this.producerName, async () => {
      const args = await this.resolveArguments(scope.stack);

      getLogger().debug(`Invoking producer '${this.producerName}'`, { scope: scope.id });

      const value = await resolveProducerResult(
        scope.stack,
        this.invoke(args),
        this.producerName,
      );

      scope.cache.set(this.factory, value);
      return value;
    });
  }
}

/**
 * Declare a call-scoped dependency on a producer.
 *
 * @example
 * ```typescript
 * function* openConnection() {
 *   const connection = connect();
 *   try {
 *     yield connection;
 *   } finally {
 *     connection.close();
 *   }
 * }
 *
 * const handler = injectable(
 *   { inject: { db: depends(openConnection) } },
 *   async ({ db }: { db: Connection }) => db.query('SELECT 1'),
 * );
 * ```
 */
export function depends<T>(factory: DependencyFactory<T>): Depends<T> {
  return new Depends(factory);
}
