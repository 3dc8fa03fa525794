/**
 * @fileoverview Infrastructure Layer Exports
 *
 * The Infrastructure layer contains the resolution engine and the
 * concerns around it: scopes, caching, configuration and logging.
 *
 * @module @provisio/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// Logging
// ============================================================================
export {
  type LogLevel,
  type ILogger,
  ConsoleLogger,
  isLogLevel,
  getDefaultLogLevel,
} from './logging/logger';

// ============================================================================
// Configuration
// ============================================================================
export {
  type IEngineOptions,
  DEFAULT_BRIDGE_CACHE_SIZE,
  DEFAULT_MAX_RESOLUTION_DEPTH,
  configureEngine,
  getEngineOptions,
  resetEngineOptions,
  getLogger,
} from './config/engine-options';

// ============================================================================
// Caching and Concurrency
// ============================================================================
export { LRUCache, type ICacheStats } from './cache/lru-cache';
export { AsyncMutex } from './concurrency/async-mutex';

// ============================================================================
// Context - AsyncLocalStorage implementation
// ============================================================================
export * from './context';

// ============================================================================
// Introspection
// ============================================================================
export {
  type ISignature,
  getDependencyParameters,
  getAnnotationDependencies,
  getSignature,
} from './introspection/introspection';

// ============================================================================
// Resolution
// ============================================================================
export * from './resolution';
