/**
 * @fileoverview validateDependencies Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import { validateDependencies } from '../../../src/application/validation';
import {
  Dependency,
  DependencyValidationError,
  injectable,
} from '../../../src/domain/dependency';

// ============================================================================
// Test Fixtures
// ============================================================================

abstract class FailureHandler extends Dependency<string> {
  static readonly exclusive = true;

  async acquire(): Promise<string> {
    return this.constructor.name;
  }
}

class Retry extends FailureHandler {}
class ExponentialRetry extends Retry {}
class Fallback extends FailureHandler {}

abstract class Runtime extends Dependency<number> {
  static readonly exclusive = true;

  async acquire(): Promise<number> {
    return 0;
  }
}

class Timeout extends Runtime {}
class Deadline extends Runtime {}

class Tag extends Dependency<string> {
  async acquire(): Promise<string> {
    return 'tag';
  }
}


function captureError(fn: object): DependencyValidationError {
  try {
    validateDependencies(fn);
  } catch (error) {
    if (error instanceof DependencyValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected validation to fail');
}

describe('validateDependencies()', () => {
  it('should accept distinct exclusive families', () => {
    const fn = injectable({ inject: { retry: new Retry(), timeout: new Timeout() } }, () => undefined);

    expect(() => validateDependencies(fn)).not.toThrow();
  });

  it('should accept repeated non-exclusive types', () => {
    const fn = injectable({ inject: { a: new Tag(), b: new Tag() } }, () => undefined);

    expect(() => validateDependencies(fn)).not.toThrow();
  });

  it('should accept a function without declarations', () => {
    expect(() => validateDependencies(() => undefined)).not.toThrow();
  });

  it('should reject two instances of one exclusive type', () => {
    const fn = injectable({ inject: { a: new Retry(), b: new Retry() } }, () => undefined);

    const error = captureError(fn);

    expect(error.message).toBe('Only one Retry dependency is allowed');
    expect(error.dependencyType).toBe('Retry');
    expect(error.offendingTypes).toEqual(['Retry']);
  });

  it('should reject two types sharing an exclusive ancestor', () => {
    const fn = injectable({ inject: { a: new Timeout(), b: new Deadline() } }, () => undefined);

    const error = captureError(fn);

    expect(error.message).toBe('Only one Runtime dependency is allowed, but found: Timeout, Deadline');
    expect(error.dependencyType).toBe('Runtime');
    expect(error.offendingTypes).toEqual(['Timeout', 'Deadline']);
  });

  it('should name the nearest exclusive ancestor first', () => {
    const fn = injectable({ inject: { a: new ExponentialRetry(), b: new Retry() } }, () => undefined);

    expect(captureError(fn).message).toBe(
      'Only one Retry dependency is allowed, but found: ExponentialRetry, Retry',
    );
  });

  it('should report concrete duplicates before ancestor conflicts', () => {
    const fn = injectable(
      { inject: { a: new Fallback(), b: new Retry(), c: new Retry() } },
      () => undefined,
    );

    expect(captureError(fn).message).toBe('Only one Retry dependency is allowed');
  });

  it('should check scoped and tag-bound descriptors together', () => {
    const fn = injectable(
      { inject: { retry: new Retry() }, annotate: { userId: [new Retry()] } },
      () => undefined,
    );

    expect(captureError(fn).message).toBe('Only one Retry dependency is allowed');
  });

  it('should reject duplicate exclusive tags on one parameter', () => {
    const fn = injectable({ annotate: { userId: [new Retry(), 'docs', new Retry()] } }, () => undefined);

    const error = captureError(fn);

    expect(error.message).toBe(
      "Only one Retry annotation dependency is allowed per parameter, but found 2 on 'userId'",
    );
    expect(error.parameter).toBe('userId');
  });

  it('should check each parameter before the whole dependency set', () => {
    const fn = injectable(
      {
        inject: { first: new Retry(), second: new Retry() },
        annotate: { userId: [new Retry(), new Retry()] },
      },
      () => undefined,
    );

    expect(captureError(fn).message).toBe(
      "Only one Retry annotation dependency is allowed per parameter, but found 2 on 'userId'",
    );
  });

  it('should reject exclusive tags of one type spread across parameters', () => {
    const fn = injectable(
      { annotate: { userId: [new Retry()], orderId: [new Retry()] } },
      () => undefined,
    );

    expect(captureError(fn).message).toBe('Only one Retry dependency is allowed');
  });

  it('should accept exclusive tags of different families on one parameter', () => {
    const fn = injectable({ annotate: { userId: [new Retry(), new Timeout()] } }, () => undefined);

    expect(() => validateDependencies(fn)).not.toThrow();
  });

  it('should give errors a readable name', () => {
    const fn = injectable({ inject: { a: new Retry(), b: new Retry() } }, () => undefined);

    const error = captureError(fn);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('DependencyValidationError');
  });
});
