/**
 * @fileoverview Infrastructure Context Module Exports
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * This module exports the per-call resolution scope and the building blocks
 * it is made of:
 *
 * - **ResolutionScope**: AsyncLocalStorage-based scope of one engine call
 * - **ProducerCache**: identity-keyed producer values
 * - **ReleaseStack**: LIFO release of acquired resources
 */

// ============================================================================
// ResolutionScope - AsyncLocalStorage Implementation
// ============================================================================

export { ResolutionScope } from './resolution-scope';

// ============================================================================
// Building Blocks
// ============================================================================

export { ProducerCache, type ICachedValue } from './producer-cache';
export { ReleaseStack, type ReleaseCallback, type IUnwindOutcome } from './release-stack';
