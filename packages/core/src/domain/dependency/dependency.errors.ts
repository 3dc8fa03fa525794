/**
 * @fileoverview Dependency Errors - Resolution Error Classes
 *
 * @packageDocumentation
 * @module @provisio/core/domain/dependency
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines error classes for resolution failures. Scoped producer
 * failures are NOT errors at this level: they become {@link FailedDependency}
 * markers in the resolved arguments. Everything here aborts the call.
 *
 * @version 1.0.0
 */

/**
 * Base error class for all engine errors.
 *
 * @remarks
 * ```typescript
 * try {
 *   await withoutDependencies(handler)({ orderId: 7 });
 * } catch (error) {
 *   if (error instanceof DependencyError) {
 *     console.error('Resolution Path:', error.resolutionPath.join(' -> '));
 *   }
 * }
 * ```
 */
export abstract class DependencyError extends Error {
  /**
   * The chain of producers being resolved when the error occurred.
   */
  public readonly resolutionPath: string[];

  constructor(message: string, resolutionPath: string[] = []) {
    super(message);
    this.name = this.constructor.name;
    this.resolutionPath = resolutionPath;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown when a function's declared dependencies break an exclusivity
 * rule.
 *
 * @remarks
 * **Three rules, checked in this order:**
 *
 * 1. One exclusive tag of a given type per parameter
 * 2. One exclusive descriptor of a given concrete type per function
 * 3. One descriptor per exclusive ancestor type per function
 *
 * @example
 * ```typescript
 * // Timeout and Deadline both extend the exclusive Runtime
 * const handler = injectable(
 *   { inject: { a: new Timeout(1000), b: new Deadline(at) } },
 *   async () => {},
 * );
 *
 * validateDependencies(handler);
 * // DependencyValidationError:
 * //   Only one Runtime dependency is allowed, but found: Timeout, Deadline
 * ```
 */
export class DependencyValidationError extends DependencyError {
  /**
   * Name of the exclusive type that was violated.
   */
  public readonly dependencyType: string;

  /**
   * Names of the concrete types that collided.
   */
  public readonly offendingTypes: string[];

  /**
   * Parameter the collision was found on, for per-parameter tag checks.
   */
  public readonly parameter?: string;

  constructor(
    message: string,
    dependencyType: string,
    offendingTypes: string[],
    parameter?: string,
  ) {
    super(message);
    this.dependencyType = dependencyType;
    this.offendingTypes = offendingTypes;
    this.parameter = parameter;
  }
}

/**
 * Error thrown when a shared dependency is requested with no open shared
 * scope.
 *
 * @remarks
 * The engine never improvises a shared scope:
 *
 * ```typescript
 * // ❌ Will throw NoActiveSharedScopeError
 * await resolvedDependencies(handler, async (args) => { ... });
 *
 * // ✅ Correct
 * await openSharedScope(async () => {
 *   await resolvedDependencies(handler, async (args) => { ... });
 * });
 * ```
 */
export class NoActiveSharedScopeError extends DependencyError {
  /**
   * The producer that was requested.
   */
  public readonly producerName: string;

  constructor(producerName: string, resolutionPath: string[] = []) {
    const message =
      `Cannot resolve shared dependency '${producerName}' outside of an open shared scope.\n\n` +
      `Wrap the calls that need it:\n` +
      `  await openSharedScope(async () => {\n` +
      `    await handler();\n` +
      `  });`;

    super(message, [...resolutionPath, `${producerName} (NO SHARED SCOPE)`]);
    this.producerName = producerName;
  }
}

/**
 * Error thrown when a scoped dependency is acquired outside of any
 * resolution.
 */
export class NoActiveResolutionScopeError extends DependencyError {
  public readonly producerName: string;

  constructor(producerName: string) {
    super(
      `Cannot resolve dependency '${producerName}' outside of a resolution scope. ` +
        `Resolve through resolvedDependencies() or withoutDependencies().`,
    );
    this.producerName = producerName;
  }
}

/**
 * Error thrown when a shared scope is opened twice or used after close.
 */
export class SharedScopeStateError extends DependencyError {
  constructor(state: string) {
    super(`Shared scope is ${state}. Create a new scope with openSharedScope().`);
  }
}

/**
 * Error thrown when a generator-based resource breaks the enter/exit
 * protocol.
 *
 * @remarks
 * A resource generator must yield exactly once:
 *
 * ```typescript
 * function* connection() {
 *   const c = connect();
 *   yield c;       // the injected value
 *   c.close();     // runs on release
 * }
 * ```
 */
export class ResourceProtocolError extends DependencyError {
  constructor(producerName: string, problem: 'did not yield' | 'yielded more than once') {
    super(`Resource generator '${producerName}' ${problem}.`);
  }
}

/**
 * Error thrown when nested dependencies go deeper than the configured limit.
 *
 * @remarks
 * Usually the sign of a producer that depends on itself, directly or
 * through other producers:
 *
 * ```
 * session -> user -> session -> user -> ...
 * ```
 *
 * Raise `maxResolutionDepth` with configureEngine() if the graph is
 * legitimately that deep.
 */
export class ResolutionDepthExceededError extends DependencyError {
  public readonly maxDepth: number;

  constructor(maxDepth: number, resolutionPath: string[]) {
    const tail = resolutionPath.slice(-6).join(' -> ');
    super(
      `Dependency resolution exceeded the maximum depth of ${maxDepth}. ` +
        `A producer probably depends on itself.\n\nMost recent producers:\n  ${tail}`,
      resolutionPath,
    );
    this.maxDepth = maxDepth;
  }
}
