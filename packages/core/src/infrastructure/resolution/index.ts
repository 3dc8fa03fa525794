/**
 * @fileoverview Infrastructure Resolution Module Exports
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/resolution
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module exports the resolution engine:
 *
 * - **Depends / depends()**: producers cached per resolution scope
 * - **Shared / shared()**: producers cached per shared scope
 * - **resolvedDependencies()**: resolve a function's dependencies around a callback
 * - **withoutDependencies()**: a callable that resolves them on every call
 *
 * ## Usage
 *
 * ```typescript
 * import { depends, injectable, withoutDependencies } from '@provisio/core';
 *
 * const handler = injectable(
 *   { inject: { db: depends(openConnection) } },
 *   async ({ db }: { db: Connection }) => db.query('SELECT 1'),
 * );
 *
 * await withoutDependencies(handler)();
 * ```
 */

// ============================================================================
// Producer Results
// ============================================================================

export {
  type ProducedValue,
  generatorResource,
  asyncGeneratorResource,
  classifyProducerResult,
  resolveProducerResult,
} from './producer-adapter';

// ============================================================================
// Descriptors
// ============================================================================

export { FunctionalDependency } from './functional-dependency';
export { Depends, depends } from './depends';
export { Shared, shared, SharedScope, type SharedScopeState, openSharedScope } from './shared';

// ============================================================================
// Resolution
// ============================================================================

export { bindAnnotationDependencies } from './annotation-binder';
export {
  resolvedDependencies,
  type ResolvedArguments,
  type ResolutionCallback,
} from './resolver';
export {
  withoutDependencies,
  type BridgedFunction,
  getBridgeCacheStats,
  clearBridgeCache,
} from './bridge';
