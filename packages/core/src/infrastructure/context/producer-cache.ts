/**
 * @fileoverview ProducerCache - Identity-Keyed Resolved Values
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Maps a producer function to the value it produced. Keys are compared by
 * reference, never by value, so two producers with equal outputs stay
 * distinct.
 *
 * @internal
 */

import { type DependencyFactory } from '../../domain/dependency';

/**
 * A cache hit. Boxed so a producer that legitimately returns `undefined`
 * still counts as resolved.
 */
export interface ICachedValue<T> {
  readonly value: T;
}

/**
 * ProducerCache - producer identity to resolved value.
 */
export class ProducerCache {
  private readonly values = new Map<DependencyFactory, ICachedValue<unknown>>();

  /**
   * Look up the value a producer resolved to in this cache.
   */
  get<T>(factory: DependencyFactory<T>): ICachedValue<T> | undefined {
    // Values are only ever stored by set() under their own producer
    return this.values.get(factory) as ICachedValue<T> | undefined;
  }

  set<T>(factory: DependencyFactory<T>, value: T): void {
    this.values.set(factory, { value });
  }

  get size(): number {
    return this.values.size;
  }
}
