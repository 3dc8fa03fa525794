/**
 * @fileoverview Application Layer Exports
 *
 * The Application layer holds checks run over declared dependencies
 * before any of them is resolved.
 *
 * @module @provisio/core/application
 * @license Apache-2.0
 */

export * from './validation';
