/**
 * @fileoverview ReleaseStack Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import { Dependency, asyncResource, resource } from '../../../src/domain/dependency';
import { configureEngine } from '../../../src/infrastructure/config/engine-options';
import { ReleaseStack } from '../../../src/infrastructure/context/release-stack';

// ============================================================================
// Test Fixtures
// ============================================================================

class Recorder extends Dependency<string> {
  constructor(
    private readonly label: string,
    private readonly events: string[],
  ) {
    super();
  }

  async acquire(): Promise<string> {
    this.events.push(`acquire:${this.label}`);
    return this.label;
  }

  async release(error?: unknown): Promise<void> {
    this.events.push(`release:${this.label}:${error instanceof Error ? error.message : 'ok'}`);
  }
}

describe('ReleaseStack', () => {
  it('should release in reverse acquisition order', async () => {
    const events: string[] = [];
    const stack = new ReleaseStack();

    await stack.enterDependency(new Recorder('a', events));
    await stack.enterDependency(new Recorder('b', events));
    await stack.enterDependency(new Recorder('c', events));
    await stack.close();

    expect(events).toEqual([
      'acquire:a',
      'acquire:b',
      'acquire:c',
      'release:c:ok',
      'release:b:ok',
      'release:a:ok',
    ]);
  });

  it('should pass the unwinding error to every release', async () => {
    const events: string[] = [];
    const stack = new ReleaseStack();

    await stack.enterDependency(new Recorder('a', events));
    await stack.enterDependency(new Recorder('b', events));
    await stack.close({ error: new Error('boom') });

    expect(events.slice(2)).toEqual(['release:b:boom', 'release:a:boom']);
  });

  it('should enter sync and async resources', async () => {
    const events: string[] = [];
    const stack = new ReleaseStack();

    const file = stack.enter(
      resource({
        acquire: () => 'file',
        release: (value) => {
          events.push(`close ${value}`);
        },
      }),
    );
    const db = await stack.enterAsync(
      asyncResource({
        acquire: async () => 'db',
        release: async (value) => {
          events.push(`close ${value}`);
        },
      }),
    );
    await stack.close();

    expect([file, db]).toEqual(['file', 'db']);
    expect(events).toEqual(['close db', 'close file']);
  });

  it('should not register a resource whose acquisition failed', async () => {
    const release = vi.fn();
    const stack = new ReleaseStack();

    expect(() =>
      stack.enter(
        resource({
          acquire: () => {
            throw new Error('refused');
          },
          release,
        }),
      ),
    ).toThrow('refused');

    expect(stack.size).toBe(0);
    await stack.close();
    expect(release).not.toHaveBeenCalled();
  });

  it('should keep unwinding after a release fails and rethrow the last failure', async () => {
    configureEngine({
      logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
    });
    const seen: string[] = [];
    const stack = new ReleaseStack();

    stack.push((error) => {
      seen.push(`first:${error instanceof Error ? error.message : 'ok'}`);
    });
    stack.push(() => {
      throw new Error('second failed');
    });
    stack.push(() => {
      throw new Error('third failed');
    });

    await expect(stack.close()).rejects.toThrow('second failed');
    expect(seen).toEqual(['first:second failed']);
  });

  it('should log release failures as warnings', async () => {
    const warn = vi.fn();
    configureEngine({ logger: { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() } });
    const failure = new Error('cannot close');
    const stack = new ReleaseStack();

    stack.push(() => {
      throw failure;
    });

    await expect(stack.close()).rejects.toBe(failure);
    expect(warn).toHaveBeenCalledWith('Release callback failed while unwinding', {
      error: failure,
      remaining: 0,
    });
  });

  it('should unwind only once', async () => {
    const release = vi.fn();
    const stack = new ReleaseStack();
    stack.push(release);

    await stack.close();
    await stack.close();

    expect(release).toHaveBeenCalledTimes(1);
    expect(stack.isClosed()).toBe(true);
    expect(() => stack.push(release)).toThrow(
      'Cannot register a release on a stack that has already been unwound',
    );
  });
});
