/**
 * @fileoverview withoutDependencies Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import { Dependency, injectable } from '../../../src/domain/dependency';
import { configureEngine } from '../../../src/infrastructure/config/engine-options';
import { getSignature } from '../../../src/infrastructure/introspection/introspection';
import {
  clearBridgeCache,
  getBridgeCacheStats,
  withoutDependencies,
} from '../../../src/infrastructure/resolution/bridge';
import { depends } from '../../../src/infrastructure/resolution/depends';

// ============================================================================
// Test Fixtures
// ============================================================================

class Audit extends Dependency<void> {
  constructor(
    private readonly log: string[],
    private readonly value?: unknown,
  ) {
    super();
  }

  bindToParameter(_name: string, value: unknown): Audit {
    return new Audit(this.log, value);
  }

  async acquire(): Promise<void> {
    this.log.push(`audit ${String(this.value)}`);
  }
}

const greeting = (): string => 'hello';

const greet = injectable(
  { inject: { greeting: depends(greeting) }, parameters: ['name', 'greeting'] },
  function greet({ name, greeting }: { name: string; greeting: string }): string {
    return `${greeting}, ${name}`;
  },
);

describe('withoutDependencies()', () => {
  it('should return a function without dependencies unchanged', () => {
    const plain = ({ x }: { x: number }): number => x * 2;

    expect(withoutDependencies(plain)).toBe(plain);
  });

  it('should resolve dependencies on every call', async () => {
    const run = withoutDependencies(greet);

    await expect(run({ name: 'Ada' })).resolves.toBe('hello, Ada');
  });

  it('should let caller arguments win over resolved values', async () => {
    const producer = vi.fn(greeting);
    const fn = injectable(
      { inject: { greeting: depends(producer) } },
      ({ greeting }: { greeting: string }) => greeting,
    );

    await expect(withoutDependencies(fn)({ greeting: 'hi' })).resolves.toBe('hi');
    expect(producer).not.toHaveBeenCalled();
  });

  it('should await async functions before releasing', async () => {
    const events: string[] = [];

    function* connection(): Generator<string, void, undefined> {
      events.push('open');
      yield 'conn';
      events.push('close');
    }

    const query = injectable(
      { inject: { conn: depends(connection) } },
      async ({ conn }: { conn: string }) => {
        await new Promise((resolve) => setTimeout(resolve, 1));
        events.push(`query on ${conn}`);
        return 'rows';
      },
    );

    await expect(withoutDependencies(query)()).resolves.toBe('rows');
    expect(events).toEqual(['open', 'query on conn', 'close']);
  });

  it('should hide scoped dependency parameters from the visible signature', () => {
    const run = withoutDependencies(greet);

    expect(run.parameters).toEqual(['name']);
    expect(getSignature(run).parameters).toEqual(['name']);
  });

  it('should keep tag-bound parameters visible', () => {
    const fn = injectable(
      {
        inject: { greeting: depends(greeting) },
        annotate: { name: [new Audit([])] },
        parameters: ['name', 'greeting'],
      },
      ({ name, greeting }: { name: string; greeting: string }) => `${greeting} ${name}`,
    );

    expect(withoutDependencies(fn).parameters).toEqual(['name']);
  });

  it('should keep the original name', () => {
    expect(withoutDependencies(greet).name).toBe('greet');
  });

  it('should wrap functions with only tag-bound dependencies', async () => {
    const log: string[] = [];
    const fn = injectable(
      { annotate: { orderId: [new Audit(log)] } },
      ({ orderId }: { orderId: number }) => orderId + 1,
    );

    const run = withoutDependencies(fn);

    expect(run).not.toBe(fn);
    await expect(run({ orderId: 41 })).resolves.toBe(42);
    expect(log).toEqual(['audit 41']);
  });

  it('should return the same bridge for the same function', () => {
    expect(withoutDependencies(greet)).toBe(withoutDependencies(greet));
  });

  it('should leave a bridge unchanged when bridged again', () => {
    const run = withoutDependencies(greet);

    expect(withoutDependencies(run)).toBe(run);
  });

  it('should count cache hits and misses', () => {
    withoutDependencies(greet);
    withoutDependencies(greet);

    expect(getBridgeCacheStats()).toMatchObject({ hits: 1, misses: 1, size: 1 });
  });

  it('should evict least recently used bridges beyond the configured size', () => {
    configureEngine({ bridgeCacheSize: 1 });
    const other = injectable({ inject: { greeting: depends(greeting) } }, () => 'other');

    const first = withoutDependencies(greet);
    withoutDependencies(other);

    expect(withoutDependencies(greet)).not.toBe(first);
    expect(getBridgeCacheStats().capacity).toBe(1);
  });

  it('should start over after the cache is cleared', () => {
    const first = withoutDependencies(greet);
    clearBridgeCache();

    expect(withoutDependencies(greet)).not.toBe(first);
  });
});
