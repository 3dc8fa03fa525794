/**
 * @fileoverview @provisio/core - Main Entry Point
 *
 * Provisio Core
 * Dependency resolution for asynchronous call graphs: declare what a
 * function needs, and the engine produces it, shares it and releases it.
 *
 * @packageDocumentation
 * @module @provisio/core
 * @version 1.0.0
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import { depends, injectable, openSharedScope, shared, withoutDependencies } from '@provisio/core';
 *
 * async function* connectPool() {
 *   const pool = await createPool();
 *   try {
 *     yield pool;
 *   } finally {
 *     await pool.end();
 *   }
 * }
 *
 * const openTransaction = injectable(
 *   { inject: { pool: shared(connectPool) } },
 *   async function* ({ pool }: { pool: Pool }) {
 *     const tx = await pool.begin();
 *     try {
 *       yield tx;
 *       await tx.commit();
 *     } catch (error) {
 *       await tx.rollback();
 *       throw error;
 *     }
 *   },
 * );
 *
 * const createOrder = injectable(
 *   { inject: { tx: depends(openTransaction) } },
 *   async ({ order, tx }: { order: Order; tx: Transaction }) => tx.insert(order),
 * );
 *
 * await openSharedScope(async () => {
 *   await withoutDependencies(createOrder)({ order });
 * });
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Descriptor contract, resources, declarations - NO external dependencies
// ============================================================================
export * from './domain';

// ============================================================================
// Application Layer Exports
// Validation of declared dependencies
// ============================================================================
export * from './application';

// ============================================================================
// Infrastructure Layer Exports
// Resolution engine, scopes, configuration, logging
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0';
