/**
 * @fileoverview Request Lifecycle Integration Tests
 *
 * End-to-end tests combining shared and call-scoped dependencies, tag-bound
 * observers, overrides and validation the way a worker would use them.
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import {
  Dependency,
  depends,
  injectable,
  openSharedScope,
  shared,
  validateDependencies,
  withoutDependencies,
} from '../../../src';

// ============================================================================
// Test Fixtures
// ============================================================================

interface IFakePool {
  readonly id: number;
  begin(): IFakeTransaction;
}

interface IFakeTransaction {
  readonly rows: string[];
  insert(row: string): void;
}

/**
 * Builds a fresh set of producers recording their lifecycle into `events`.
 */
function createWorld() {
  const events: string[] = [];
  let pools = 0;
  const committed: string[] = [];

  async function* connectPool(): AsyncGenerator<IFakePool, void, undefined> {
    const id = ++pools;
    events.push(`pool ${id} up`);
    try {
      yield {
        id,
        begin: () => {
          const rows: string[] = [];
          return { rows, insert: (row: string) => rows.push(row) };
        },
      };
    } finally {
      events.push(`pool ${id} down`);
    }
  }

  const openTransaction = injectable(
    { inject: { pool: shared(connectPool) } },
    function* openTransaction({
      pool,
    }: {
      pool: IFakePool;
    }): Generator<IFakeTransaction, void, undefined> {
      const tx = pool.begin();
      events.push(`begin on pool ${pool.id}`);
      try {
        yield tx;
        committed.push(...tx.rows);
        events.push('commit');
      } catch (error) {
        events.push('rollback');
        throw error;
      }
    },
  );

  class ConcurrencyLimit extends Dependency<void> {
    static readonly exclusive = true;

    constructor(private readonly key?: unknown) {
      super();
    }

    bindToParameter(_name: string, value: unknown): ConcurrencyLimit {
      return new ConcurrencyLimit(value);
    }

    async acquire(): Promise<void> {
      events.push(`limit ${String(this.key)} acquired`);
    }

    async release(): Promise<void> {
      events.push(`limit ${String(this.key)} released`);
    }
  }

  const createOrder = injectable(
    {
      inject: { tx: depends(openTransaction) },
      annotate: { customerId: [new ConcurrencyLimit()] },
      parameters: ['customerId', 'item', 'tx'],
    },
    async function createOrder({
      customerId,
      item,
      tx,
    }: {
      customerId: string;
      item: string;
      tx: IFakeTransaction;
    }): Promise<string> {
      if (item === 'forbidden') {
        throw new Error(`cannot sell ${item}`);
      }
      tx.insert(`${customerId}:${item}`);
      return `order for ${customerId}`;
    },
  );

  return { events, committed, createOrder, getPoolCount: () => pools };
}

describe('Request lifecycle', () => {
  it('should run a request from pool to commit and tear everything down in order', async () => {
    const world = createWorld();
    const run = withoutDependencies(world.createOrder);

    const result = await openSharedScope(() => run({ customerId: 'c-1', item: 'book' }));

    expect(result).toBe('order for c-1');
    expect(world.committed).toEqual(['c-1:book']);
    expect(world.events).toEqual([
      'pool 1 up',
      'begin on pool 1',
      'limit c-1 acquired',
      'limit c-1 released',
      'commit',
      'pool 1 down',
    ]);
  });

  it('should roll back a failed request without closing the shared pool', async () => {
    const world = createWorld();
    const run = withoutDependencies(world.createOrder);

    await openSharedScope(async () => {
      await expect(run({ customerId: 'c-1', item: 'forbidden' })).rejects.toThrow(
        'cannot sell forbidden',
      );
      await run({ customerId: 'c-2', item: 'pen' });
    });

    expect(world.committed).toEqual(['c-2:pen']);
    expect(world.events.filter((event) => event === 'rollback')).toHaveLength(1);
    expect(world.events.at(-1)).toBe('pool 1 down');
  });

  it('should share one pool between many concurrent requests', async () => {
    const world = createWorld();
    const run = withoutDependencies(world.createOrder);
    const customers = ['a', 'b', 'c', 'd', 'e'];

    const results = await openSharedScope(() =>
      Promise.all(customers.map((customerId) => run({ customerId, item: 'tea' }))),
    );

    expect(results).toEqual(customers.map((customerId) => `order for ${customerId}`));
    expect(world.getPoolCount()).toBe(1);
    expect([...world.committed].sort()).toEqual(['a:tea', 'b:tea', 'c:tea', 'd:tea', 'e:tea']);
    expect(world.events.filter((event) => event === 'commit')).toHaveLength(5);
  });

  it('should use a caller-supplied transaction instead of opening one', async () => {
    const world = createWorld();
    const run = withoutDependencies(world.createOrder);
    const rows: string[] = [];
    const tx: IFakeTransaction = { rows, insert: (row) => rows.push(row) };

    await run({ customerId: 'c-9', item: 'lamp', tx });

    expect(rows).toEqual(['c-9:lamp']);
    expect(world.getPoolCount()).toBe(0);
    expect(world.events).toEqual(['limit c-9 acquired', 'limit c-9 released']);
  });

  it('should expose only caller-owned parameters', () => {
    const world = createWorld();

    expect(withoutDependencies(world.createOrder).parameters).toEqual(['customerId', 'item']);
  });

  it('should validate the declared dependency set', () => {
    const world = createWorld();

    expect(() => validateDependencies(world.createOrder)).not.toThrow();
  });
});
