/**
 * KeyedMutex Unit Tests
 */

import { KeyedMutex } from '../KeyedMutex';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('KeyedMutex', () => {
  it('should serialize callers on the same key in FIFO order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive('account:1', async () => {
        order.push('a:start');
        await delay(20);
        order.push('a:end');
      }),
      mutex.runExclusive('account:1', async () => {
        order.push('b:start');
        order.push('b:end');
      }),
    ]);

    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should not block callers on different keys', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive('account:1', async () => {
        await delay(20);
        order.push('slow');
      }),
      mutex.runExclusive('account:2', async () => {
        order.push('fast');
      }),
    ]);

    expect(order).toEqual(['fast', 'slow']);
  });

  it('should release the lock when fn throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('k', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('k', async () => 42)).resolves.toBe(42);
    expect(mutex.isLocked('k')).toBe(false);
    expect(mutex.size).toBe(0);
  });
});
