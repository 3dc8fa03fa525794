/**
 * @fileoverview Domain Dependency Module Exports
 *
 * @packageDocumentation
 * @module @provisio/core/domain/dependency
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module exports the descriptor contract, resource shapes, static
 * declarations and error classes. The Infrastructure layer implements the
 * resolution engine against these contracts.
 */

// ============================================================================
// Descriptor
// ============================================================================

export {
  Dependency,
  type DependencyType,
  isDependency,
  isDependencyType,
  getDependencyType,
  getDependencyTypeName,
  getDependencyAncestry,
} from './dependency';

// ============================================================================
// Resources
// ============================================================================

export {
  type IResource,
  type IAsyncResource,
  type IResourceHooks,
  type IAsyncResourceHooks,
  RESOURCE_BRAND,
  resource,
  asyncResource,
  isResource,
  isAsyncResource,
  isGenerator,
  isAsyncGenerator,
  isThenable,
} from './resource';

// ============================================================================
// Declarations
// ============================================================================

export {
  type ProducerResult,
  type DependencyFactory,
  type IInjectableDeclaration,
  type InjectableFunction,
  injectable,
  getFunctionName,
} from './injectable';

// ============================================================================
// Failure Marker
// ============================================================================

export { FailedDependency, isFailedDependency } from './failed-dependency';

// ============================================================================
// Errors
// ============================================================================

export {
  DependencyError,
  DependencyValidationError,
  NoActiveSharedScopeError,
  NoActiveResolutionScopeError,
  SharedScopeStateError,
  ResourceProtocolError,
  ResolutionDepthExceededError,
} from './dependency.errors';
