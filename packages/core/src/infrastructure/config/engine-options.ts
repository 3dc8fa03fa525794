/**
 * @fileoverview Engine Options - Process-Wide Engine Configuration
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/config
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Options are merged over defaults once, at configure time, so the hot
 * resolution path reads plain fields:
 *
 * ```typescript
 * configureEngine({ bridgeCacheSize: 10_000, maxResolutionDepth: 64 });
 * ```
 *
 * @version 1.0.0
 */

import { ConsoleLogger, type ILogger } from '../logging/logger';

/**
 * Options for the resolution engine.
 */
export interface IEngineOptions {
  /**
   * Maximum number of bridged functions kept by withoutDependencies().
   *
   * @remarks
   * Least recently used bridges are evicted first. Changing this value
   * drops every cached bridge.
   *
   * Default: 5000
   */
  bridgeCacheSize?: number;

  /**
   * Maximum nesting of producers that depend on other producers.
   *
   * @remarks
   * A self-referential dependency graph would otherwise recurse forever,
   * since async recursion never overflows the call stack.
   *
   * Default: 256
   */
  maxResolutionDepth?: number;

  /**
   * Logger receiving engine diagnostics.
   *
   * Default: ConsoleLogger at the `PROVISIO_LOG_LEVEL` level (or `warn`)
   */
  logger?: ILogger;
}

export const DEFAULT_BRIDGE_CACHE_SIZE = 5_000;
export const DEFAULT_MAX_RESOLUTION_DEPTH = 256;

type EngineOptionsListener = (options: Readonly<Required<IEngineOptions>>) => void;

function createDefaults(): Required<IEngineOptions> {
  return {
    bridgeCacheSize: DEFAULT_BRIDGE_CACHE_SIZE,
    maxResolutionDepth: DEFAULT_MAX_RESOLUTION_DEPTH,
    logger: new ConsoleLogger(),
  };
}

let current: Required<IEngineOptions> = createDefaults();
const listeners = new Set<EngineOptionsListener>();

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Update engine options. Unspecified options keep their current value.
 *
 * @throws RangeError if a numeric option is not a positive integer
 */
export function configureEngine(options: IEngineOptions): void {
  const next: Required<IEngineOptions> = {
    bridgeCacheSize: options.bridgeCacheSize ?? current.bridgeCacheSize,
    maxResolutionDepth: options.maxResolutionDepth ?? current.maxResolutionDepth,
    logger: options.logger ?? current.logger,
  };

  assertPositiveInteger('bridgeCacheSize', next.bridgeCacheSize);
  assertPositiveInteger('maxResolutionDepth', next.maxResolutionDepth);

  current = next;
  for (const listener of listeners) {
    listener(current);
  }
}

/**
 * Get the effective engine options.
 */
export function getEngineOptions(): Readonly<Required<IEngineOptions>> {
  return current;
}

/**
 * Restore every option to its default.
 */
export function resetEngineOptions(): void {
  current = createDefaults();
  for (const listener of listeners) {
    listener(current);
  }
}

/**
 * Get the engine logger.
 */
export function getLogger(): ILogger {
  return current.logger;
}

/**
 * Be notified whenever options change.
 *
 * @returns Unsubscribe function
 * @internal
 */
export function onEngineOptionsChange(listener: EngineOptionsListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}
