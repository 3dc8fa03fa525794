/**
 * @fileoverview FailedDependency - Failure Marker for Scoped Dependencies
 *
 * @packageDocumentation
 * @module @provisio/core/domain/dependency
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * When a scoped dependency's producer throws, resolution carries on and the
 * parameter receives a FailedDependency instead of a value. Callers that
 * need best-effort injection inspect the resolved arguments for markers;
 * callers that need fail-fast semantics use tag-bound descriptors instead.
 *
 * @version 1.0.0
 */

/**
 * Placeholder for a dependency that raised during resolution.
 *
 * @example
 * ```typescript
 * await resolvedDependencies(handler, async (args) => {
 *   if (isFailedDependency(args.db)) {
 *     logger.warn(`db unavailable: ${String(args.db.error)}`);
 *     return;
 *   }
 *   // args.db is usable
 * });
 * ```
 */
export class FailedDependency {
  constructor(
    public readonly parameter: string,
    public readonly error: unknown,
  ) {}

  /**
   * Returns a string representation for debugging.
   */
  toString(): string {
    const reason = this.error instanceof Error ? this.error.message : String(this.error);
    return `FailedDependency(${this.parameter}: ${reason})`;
  }
}

/**
 * Check if a resolved value is a failure marker.
 */
export function isFailedDependency(value: unknown): value is FailedDependency {
  return value instanceof FailedDependency;
}
