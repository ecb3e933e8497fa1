import { describe, it, expect } from 'vitest';
import { KeyedMutex, Mutex } from '../src/editor/mutex';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Mutex', () => {
  it('runs tasks one at a time in call order', async () => {
    const mutex = new Mutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive(() => {
      order.push('second');
    });

    expect(mutex.pending).toBe(2);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.pending).toBe(0);
  });

  it('releases the lock when a task throws', async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });
});

describe('KeyedMutex', () => {
  it('serializes the same key but not different keys', async () => {
    const locks = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const a1 = locks.runExclusive('a', async () => {
      await gate.promise;
      order.push('a1');
    });
    const a2 = locks.runExclusive('a', () => {
      order.push('a2');
    });
    const b = locks.runExclusive('b', () => {
      order.push('b');
    });

    await b;
    expect(order).toEqual(['b']);

    gate.resolve();
    await Promise.all([a1, a2]);
    expect(order).toEqual(['b', 'a1', 'a2']);
  });

  it('drops idle locks', async () => {
    const locks = new KeyedMutex();
    await locks.runExclusive('x', () => 'done');
    expect(locks.size).toBe(0);
  });
});
