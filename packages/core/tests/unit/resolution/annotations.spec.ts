/**
 * @fileoverview Tag-Bound Dependency Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import { Dependency, injectable } from '../../../src/domain/dependency';
import { depends } from '../../../src/infrastructure/resolution/depends';
import { resolvedDependencies } from '../../../src/infrastructure/resolution/resolver';

// ============================================================================
// Test Fixtures
// ============================================================================

/**
 * Records the parameter it is bound to and its own lifecycle.
 */
class Tracker extends Dependency<Tracker> {
  static readonly exclusive = true;

  parameter?: string;
  value?: unknown;

  constructor(private readonly events: string[] = []) {
    super();
  }

  bindToParameter(name: string, value: unknown): Tracker {
    const bound = new Tracker(this.events);
    bound.parameter = name;
    bound.value = value;
    return bound;
  }

  async acquire(): Promise<Tracker> {
    this.events.push(`enter ${this.parameter}=${String(this.value)}`);
    return this;
  }

  async release(): Promise<void> {
    this.events.push(`exit ${this.parameter}`);
  }
}

class Exploding extends Dependency<never> {
  async acquire(): Promise<never> {
    throw new Error('tag exploded');
  }
}

describe('Tag-Bound Dependencies', () => {
  it('should return the descriptor itself from the default binding', () => {
    class Plain extends Dependency<string> {
      async acquire(): Promise<string> {
        return 'plain';
      }
    }

    const dependency = new Plain();

    expect(dependency.bindToParameter('x', 42)).toBe(dependency);
  });

  it('should bind a copy, leaving the declared descriptor untouched', () => {
    const declared = new Tracker();
    const bound = declared.bindToParameter('customerId', 99);

    expect(bound).not.toBe(declared);
    expect(bound.parameter).toBe('customerId');
    expect(bound.value).toBe(99);
    expect(declared.parameter).toBeUndefined();
  });

  it('should enter and exit around the callback', async () => {
    const events: string[] = [];
    const fn = injectable(
      { annotate: { customerId: [new Tracker(events)] } },
      ({ customerId }: { customerId: number }) => customerId,
    );

    await resolvedDependencies(fn, { customerId: 7 }, async () => {
      events.push('work');
    });

    expect(events).toEqual(['enter customerId=7', 'work', 'exit customerId']);
  });

  it('should never add tag-bound parameters to the resolved arguments', async () => {
    const fn = injectable(
      { annotate: { customerId: [new Tracker()] } },
      ({ customerId }: { customerId: number }) => customerId,
    );

    const args = await resolvedDependencies(fn, { customerId: 7 }, async (resolved) => resolved);

    expect(args).toEqual({});
  });

  it('should observe the resolved value after scoped dependencies', async () => {
    const events: string[] = [];
    const loadAccount = (): string => {
      events.push('load account');
      return 'acct-1';
    };
    const fn = injectable(
      {
        inject: { account: depends(loadAccount) },
        annotate: { account: [new Tracker(events)] },
      },
      ({ account }: { account: string }) => account,
    );

    await resolvedDependencies(fn, async () => undefined);

    expect(events).toEqual(['load account', 'enter account=acct-1', 'exit account']);
  });

  it('should prefer the override over the resolved value', async () => {
    const events: string[] = [];
    const loadAccount = (): string => 'acct-1';
    const fn = injectable(
      {
        inject: { account: depends(loadAccount) },
        annotate: { account: [new Tracker(events)] },
      },
      ({ account }: { account: string }) => account,
    );

    await resolvedDependencies(fn, { account: 'acct-override' }, async () => undefined);

    expect(events[0]).toBe('enter account=acct-override');
  });

  it('should bind undefined when no value is known', async () => {
    const events: string[] = [];
    const fn = injectable({ annotate: { note: [new Tracker(events)] } }, () => undefined);

    await resolvedDependencies(fn, async () => undefined);

    expect(events[0]).toBe('enter note=undefined');
  });

  it('should not mistake Object.prototype members for overrides', async () => {
    const events: string[] = [];
    const fn = injectable(
      { annotate: { valueOf: [new Tracker(events)] } },
      ({ valueOf }: { valueOf: unknown }) => valueOf,
    );

    await resolvedDependencies(fn, async () => undefined);

    expect(events).toEqual(['enter valueOf=undefined', 'exit valueOf']);
  });

  it('should bind every descriptor on a parameter in declaration order', async () => {
    const events: string[] = [];

    class Second extends Tracker {}

    const fn = injectable(
      { annotate: { id: [new Tracker(events), 'docs', new Second(events)] } },
      () => undefined,
    );

    await resolvedDependencies(fn, { id: 1 }, async () => undefined);

    expect(events).toEqual(['enter id=1', 'enter id=1', 'exit id', 'exit id']);
  });

  it('should propagate tag-bound failures and still unwind', async () => {
    const events: string[] = [];
    const fn = injectable(
      { annotate: { first: [new Tracker(events)], second: [new Exploding()] } },
      () => undefined,
    );

    await expect(resolvedDependencies(fn, async () => 'unreachable')).rejects.toThrow(
      'tag exploded',
    );
    expect(events).toEqual(['enter first=undefined', 'exit first']);
  });
});
