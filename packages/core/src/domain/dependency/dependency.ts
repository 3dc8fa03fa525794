/**
 * @fileoverview Dependency - The Descriptor Capability
 *
 * @packageDocumentation
 * @module @provisio/core/domain/dependency
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Every resolvable entity implements this contract: asynchronously acquire a
 * value, optionally release it. The resolution engine enters each descriptor
 * into a release stack, so releases run in reverse acquisition order when the
 * owning scope ends.
 *
 * ## Zero-Reflection Declaration
 *
 * Descriptors are attached to a function through a static declaration
 * instead of parameter defaults or decorators:
 *
 * ```typescript
 * const handler = injectable(
 *   { inject: { db: depends(openConnection) } },
 *   async ({ db }: { db: Connection }) => db.query('SELECT 1'),
 * );
 * ```
 *
 * @version 1.0.0
 */

/**
 * Base class for all injectable dependencies.
 *
 * @template T - The value produced by {@link Dependency.acquire}
 *
 * @remarks
 * Subclasses implement `acquire()` to produce the injected value and may
 * override `release()` for cleanup. `release()` receives the error that is
 * unwinding the scope, if any.
 *
 * **Exclusivity:**
 *
 * Set `static readonly exclusive = true` on a subclass to allow at most one
 * instance of that type (or of any subclass) in a function's dependency set.
 * The flag is inherited through the constructor chain.
 *
 * @example
 * ```typescript
 * class Timeout extends Dependency<AbortSignal> {
 *   static readonly exclusive = true;
 *
 *   private controller = new AbortController();
 *   private timer?: NodeJS.Timeout;
 *
 *   constructor(private readonly ms: number) {
 *     super();
 *   }
 *
 *   async acquire(): Promise<AbortSignal> {
 *     this.timer = setTimeout(() => this.controller.abort(), this.ms);
 *     return this.controller.signal;
 *   }
 *
 *   async release(): Promise<void> {
 *     clearTimeout(this.timer);
 *   }
 * }
 * ```
 */
export abstract class Dependency<T = unknown> {
  /**
   * At most one instance of this type, or an inheriting type, may appear
   * across a function's dependency set.
   */
  static readonly exclusive: boolean = false;

  /**
   * Return a descriptor bound to a parameter's name and final value.
   *
   * @remarks
   * Called when the descriptor is declared as a parameter tag. Subclasses
   * override to capture the parameter context, typically by returning a
   * fresh instance. The default returns `this` unchanged.
   */
  bindToParameter(_name: string, _value: unknown): Dependency<T> {
    return this;
  }

  /**
   * Produce the value for this dependency.
   */
  abstract acquire(): Promise<T>;

  /**
   * Release whatever {@link Dependency.acquire} took hold of.
   *
   * @param _error - The error unwinding the owning scope, if any
   */
  async release(_error?: unknown): Promise<void> {}
}

/**
 * Runtime type of a dependency descriptor.
 *
 * @remarks
 * Covers abstract intermediate classes too, since exclusivity is usually
 * declared on an abstract family base (e.g. `Runtime`) and inherited by the
 * concrete members (`Timeout`, `Deadline`).
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type DependencyType = (abstract new (...args: any[]) => Dependency<unknown>) & {
  readonly exclusive: boolean;
};

/**
 * Check if a value is a dependency descriptor.
 */
export function isDependency(value: unknown): value is Dependency {
  return value instanceof Dependency;
}

/**
 * Check if a value is {@link Dependency} or one of its subclasses.
 */
export function isDependencyType(value: unknown): value is DependencyType {
  return (
    typeof value === 'function' && (value === Dependency || value.prototype instanceof Dependency)
  );
}

/**
 * Get the runtime type of a descriptor.
 */
export function getDependencyType(dependency: Dependency): DependencyType {
  const ctor: unknown = dependency.constructor;
  return isDependencyType(ctor) ? ctor : Dependency;
}

/**
 * Get a human-readable name for a descriptor type.
 *
 * @example
 * ```typescript
 * getDependencyTypeName(Timeout); // 'Timeout'
 * ```
 */
export function getDependencyTypeName(type: DependencyType): string {
  return type.name || 'AnonymousDependency';
}

/**
 * Walk a descriptor type's ancestry, nearest first.
 *
 * @returns The type itself followed by every ancestor up to, but excluding,
 * the {@link Dependency} base class.
 */
export function getDependencyAncestry(type: DependencyType): DependencyType[] {
  const chain: DependencyType[] = [];
  let current: unknown = type;

  while (isDependencyType(current) && current !== Dependency) {
    chain.push(current);
    current = Object.getPrototypeOf(current);
  }

  return chain;
}
