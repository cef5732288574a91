import { describe, test, expect } from 'vitest';
import { KeyedMutex, Mutex } from './mutex';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Mutex', () => {
  test('runs callers one after another in call order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive(async () => {
      order.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  test('a rejected run does not block the next caller', async () => {
    const mutex = new Mutex();
    const failed = mutex.runExclusive(async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive(async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});

describe('KeyedMutex', () => {
  test('serializes the same key but not different keys', async () => {
    const locks = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const a1 = locks.runExclusive('a', async () => {
      await gate.promise;
      order.push('a1');
    });
    const a2 = locks.runExclusive('a', async () => {
      order.push('a2');
    });
    const b = locks.runExclusive('b', async () => {
      order.push('b');
    });

    await b;
    expect(order).toEqual(['b']);
    expect(locks.isLocked('a')).toBe(true);

    gate.resolve();
    await Promise.all([a1, a2]);
    expect(order).toEqual(['b', 'a1', 'a2']);
  });

  test('drops idle keys', async () => {
    const locks = new KeyedMutex();
    await locks.runExclusive('a', async () => undefined);
    await expect(locks.runExclusive('b', async () => Promise.reject(new Error('x')))).rejects.toThrow('x');
    expect(locks.size).toBe(0);
    expect(locks.isLocked('a')).toBe(false);
  });
});
