import { describe, expect, it } from 'vitest';
import { ConflictError } from '@seedsync/core';
import { FetchRegistry } from './fetchRegistry.js';

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

describe('FetchRegistry', () => {
  it('allows one fetch per transfer', async () => {
    const registry = new FetchRegistry();
    registry.start('t1', untilAborted);

    expect(registry.isActive('t1')).toBe(true);
    expect(() => registry.start('t1', untilAborted)).toThrow(ConflictError);

    await registry.cancel('t1');
  });

  it('aborts a fetch and waits for it to stop', async () => {
    const registry = new FetchRegistry();
    let stopped = false;
    registry.start('t1', async (signal) => {
      await untilAborted(signal);
      stopped = true;
    });

    expect(await registry.cancel('t1')).toBe(true);
    expect(stopped).toBe(true);
    expect(registry.isActive('t1')).toBe(false);
  });

  it('reports nothing to cancel for an idle transfer', async () => {
    expect(await new FetchRegistry().cancel('t1')).toBe(false);
  });

  it('returns the result of a fetch it waits for', async () => {
    const registry = new FetchRegistry();

    await expect(registry.run('t1', async () => 42)).resolves.toBe(42);
    expect(registry.size).toBe(0);
  });

  it('passes the error of a fetch it waits for to the caller', async () => {
    const registry = new FetchRegistry();

    await expect(
      registry.run('t1', async () => {
        throw new Error('disk full');
      })
    ).rejects.toThrow('disk full');
    expect(registry.isActive('t1')).toBe(false);
  });

  it('settles once background fetches have ended, failed ones included', async () => {
    const registry = new FetchRegistry();
    const finished: string[] = [];
    registry.start('t1', async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      finished.push('t1');
    });
    registry.start('t2', async () => {
      throw new Error('boom');
    });

    await registry.settled();

    expect(finished).toEqual(['t1']);
    expect(registry.size).toBe(0);
  });
});
