import { describe, expect, test } from 'vitest';
import { KeyedLock } from './keyed-lock.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe('KeyedLock', () => {
  test('runs work for one key in submission order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run('p', async () => {
        order.push('a:start');
        await tick();
        order.push('a:end');
      }),
      lock.run('p', async () => {
        order.push('b:start');
        order.push('b:end');
      }),
    ]);

    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  test('lets different keys interleave', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run('p', async () => {
        order.push('p:start');
        await tick();
        order.push('p:end');
      }),
      lock.run('q', async () => {
        order.push('q:start');
      }),
    ]);

    expect(order).toEqual(['p:start', 'q:start', 'p:end']);
  });

  test('a failure does not block the next holder', async () => {
    const lock = new KeyedLock();
    const failed = lock.run('p', async () => {
      throw new Error('write failed');
    });
    const next = lock.run('p', async () => 'ok');

    await expect(failed).rejects.toThrow('write failed');
    await expect(next).resolves.toBe('ok');
  });

  test('forgets idle keys', async () => {
    const lock = new KeyedLock();
    await lock.run('p', async () => undefined);
    await tick();
    expect(lock.pendingKeys).toBe(0);
  });
});
