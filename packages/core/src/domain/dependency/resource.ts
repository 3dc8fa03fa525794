/**
 * @fileoverview Resources - Values With a Release Obligation
 *
 * @packageDocumentation
 * @module @provisio/core/domain/dependency
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A producer may hand back a *scoped resource* instead of a plain value.
 * The resource is entered into the owning scope's release stack and is
 * released when that scope ends.
 *
 * Two shapes are supported, each sync or async:
 *
 * 1. **Generators** (the most compact form)
 *    ```typescript
 *    async function* openConnection() {
 *      const connection = await pool.connect();
 *      try {
 *        yield connection;
 *      } finally {
 *        connection.release();
 *      }
 *    }
 *    ```
 *
 * 2. **Explicit resources**
 *    ```typescript
 *    const openConnection = () =>
 *      asyncResource({
 *        acquire: () => pool.connect(),
 *        release: (connection) => connection.release(),
 *      });
 *    ```
 *
 * @version 1.0.0
 */

/**
 * Brand used to recognise explicit resources among produced values.
 * @internal
 */
export const RESOURCE_BRAND = Symbol('provisio:resource');

/**
 * Synchronous scoped resource.
 *
 * @template T - The value handed to the consumer
 */
export interface IResource<T> {
  readonly [RESOURCE_BRAND]: 'sync';

  /**
   * Take hold of the resource and return its value.
   */
  enter(): T;

  /**
   * Give the resource back.
   *
   * @param error - The error unwinding the owning scope, if any
   */
  exit(error?: unknown): void;
}

/**
 * Asynchronous scoped resource.
 *
 * @template T - The value handed to the consumer
 */
export interface IAsyncResource<T> {
  readonly [RESOURCE_BRAND]: 'async';

  enter(): Promise<T>;

  exit(error?: unknown): Promise<void>;
}

/**
 * Lifecycle hooks for {@link resource}.
 */
export interface IResourceHooks<T> {
  acquire(): T;
  release?(value: T, error?: unknown): void;
}

/**
 * Lifecycle hooks for {@link asyncResource}.
 */
export interface IAsyncResourceHooks<T> {
  acquire(): T | PromiseLike<T>;
  release?(value: T, error?: unknown): void | PromiseLike<void>;
}

/**
 * Create a synchronous scoped resource.
 *
 * @example
 * ```typescript
 * const lockFile = () =>
 *   resource({
 *     acquire: () => fs.openSync('app.lock', 'wx'),
 *     release: (fd) => fs.closeSync(fd),
 *   });
 * ```
 */
export function resource<T>(hooks: IResourceHooks<T>): IResource<T> {
  let entered: { value: T } | undefined;

  return {
    [RESOURCE_BRAND]: 'sync',
    enter(): T {
      const value = hooks.acquire();
      entered = { value };
      return value;
    },
    exit(error?: unknown): void {
      if (entered && hooks.release) {
        hooks.release(entered.value, error);
      }
    },
  };
}

/**
 * Create an asynchronous scoped resource.
 */
export function asyncResource<T>(hooks: IAsyncResourceHooks<T>): IAsyncResource<T> {
  let entered: { value: T } | undefined;

  return {
    [RESOURCE_BRAND]: 'async',
    async enter(): Promise<T> {
      const value = await hooks.acquire();
      entered = { value };
      return value;
    },
    async exit(error?: unknown): Promise<void> {
      if (entered && hooks.release) {
        await hooks.release(entered.value, error);
      }
    },
  };
}

/**
 * Check if a value is an explicit synchronous resource.
 */
export function isResource(value: unknown): value is IResource<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    RESOURCE_BRAND in value &&
    value[RESOURCE_BRAND] === 'sync'
  );
}

/**
 * Check if a value is an explicit asynchronous resource.
 */
export function isAsyncResource(value: unknown): value is IAsyncResource<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    RESOURCE_BRAND in value &&
    value[RESOURCE_BRAND] === 'async'
  );
}

/**
 * Check if a value is a generator object.
 */
export function isGenerator(value: unknown): value is Generator<unknown, unknown, undefined> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    'next' in value &&
    'throw' in value &&
    typeof value.next === 'function' &&
    typeof value.throw === 'function'
  );
}

/**
 * Check if a value is an async generator object.
 *
 * @remarks
 * Async generators are not thenable, so this must be checked before
 * treating a value as eventual.
 */
export function isAsyncGenerator(
  value: unknown,
): value is AsyncGenerator<unknown, unknown, undefined> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.asyncIterator in value &&
    'next' in value &&
    'throw' in value &&
    typeof value.next === 'function' &&
    typeof value.throw === 'function'
  );
}

/**
 * Check if a value is thenable.
 */
export function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
