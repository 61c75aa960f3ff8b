import { describe, it, expect } from 'vitest';
import { KeyedMutex, Mutex } from '../../src/services/keyed-mutex.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Mutex', () => {
  it('runs holders one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive(async () => {
      order.push('second');
    });
    const third = mutex.runExclusive(() => {
      order.push('third');
    });

    await Promise.resolve();
    expect(mutex.isLocked()).toBe(true);
    expect(mutex.getWaiting()).toBe(2);

    gate.resolve();
    await Promise.all([first, second, third]);
    expect(order).toEqual(['first:start', 'first:end', 'second', 'third']);
    expect(mutex.isLocked()).toBe(false);
  });

  it('releases the lock when the holder throws', async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(() => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(mutex.isLocked()).toBe(false);
    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });

  it('ignores a second call to the same release function', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    const next = mutex.acquire();
    release();
    release();
    const releaseNext = await next;
    expect(mutex.isLocked()).toBe(true);
    releaseNext();
    expect(mutex.isLocked()).toBe(false);
  });
});

describe('KeyedMutex', () => {
  it('serializes work on the same key', async () => {
    const locks = new KeyedMutex();
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      Array.from({ length: 5 }, () =>
        locks.runExclusive('orders-value', async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await new Promise((r) => setTimeout(r, 1));
          active--;
        }),
      ),
    );

    expect(maxActive).toBe(1);
  });

  it('lets different keys proceed concurrently', async () => {
    const locks = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const blocked = locks.runExclusive('a-value', async () => {
      await gate.promise;
      order.push('a');
    });
    await locks.runExclusive('b-value', () => {
      order.push('b');
    });
    expect(locks.isLocked('a-value')).toBe(true);

    gate.resolve();
    await blocked;
    expect(order).toEqual(['b', 'a']);
  });

  it('drops idle keys', async () => {
    const locks = new KeyedMutex();
    await locks.runExclusive('a-value', () => undefined);
    expect(locks.size()).toBe(0);
    expect(locks.isLocked('a-value')).toBe(false);
  });
});
