/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer holds the descriptor contract and its vocabulary.
 * NO infrastructure dependencies are allowed here (Hexagonal Architecture).
 *
 * @module @provisio/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// Dependency - Descriptors, resources, declarations and errors
// ============================================================================
export * from './dependency';
