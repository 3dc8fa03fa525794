/**
 * @fileoverview Application Validation Module Exports
 *
 * @packageDocumentation
 * @module @provisio/core/application/validation
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * ## Usage
 *
 * ```typescript
 * import { validateDependencies } from '@provisio/core';
 *
 * validateDependencies(handler); // throws DependencyValidationError
 * ```
 */

export { validateDependencies } from './validate-dependencies';
