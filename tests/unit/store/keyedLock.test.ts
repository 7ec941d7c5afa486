/**
 * Unit tests for KeyedLock
 */

import { KeyedLock, LockTimeoutError } from '../../../src/store/keyedLock';

describe('KeyedLock', () => {
  it('should grant a free key immediately', async () => {
    const locks = new KeyedLock();
    const release = await locks.acquire('account:r1', 100);

    expect(locks.isLocked('account:r1')).toBe(true);
    release();
    expect(locks.isLocked('account:r1')).toBe(false);
  });

  it('should serve waiters in arrival order', async () => {
    const locks = new KeyedLock();
    const order: string[] = [];

    const releaseFirst = await locks.acquire('k', 1000);
    const second = locks.acquire('k', 1000).then((release) => {
      order.push('second');
      release();
    });
    const third = locks.acquire('k', 1000).then((release) => {
      order.push('third');
      release();
    });

    order.push('first');
    releaseFirst();
    await Promise.all([second, third]);

    expect(order).toEqual(['first', 'second', 'third']);
  });

  it('should not block other keys', async () => {
    const locks = new KeyedLock();
    const releaseA = await locks.acquire('a', 100);
    const releaseB = await locks.acquire('b', 100);

    releaseA();
    releaseB();
    expect(locks.isLocked('a')).toBe(false);
    expect(locks.isLocked('b')).toBe(false);
  });

  it('should time out while the key is held', async () => {
    const locks = new KeyedLock();
    const release = await locks.acquire('k', 100);

    await expect(locks.acquire('k', 20)).rejects.toBeInstanceOf(LockTimeoutError);
    release();
  });

  it('should keep later waiters queued behind the holder after a timeout', async () => {
    const locks = new KeyedLock();
    const events: string[] = [];

    const releaseHolder = await locks.acquire('k', 1000);
    const timedOut = locks.acquire('k', 10).catch(() => {
      events.push('timed out');
    });
    const patient = locks.acquire('k', 1000).then((release) => {
      events.push('patient acquired');
      release();
    });

    await timedOut;
    events.push('holder releasing');
    releaseHolder();
    await patient;

    expect(events).toEqual(['timed out', 'holder releasing', 'patient acquired']);
  });

  it('should free the key once the holder releases after a waiter timed out', async () => {
    const locks = new KeyedLock();
    const releaseHolder = await locks.acquire('k', 1000);

    await expect(locks.acquire('k', 10)).rejects.toBeInstanceOf(LockTimeoutError);
    expect(locks.isLocked('k')).toBe(true);

    releaseHolder();
    await new Promise((resolve) => setImmediate(resolve));

    expect(locks.isLocked('k')).toBe(false);
  });

  it('should ignore a second release call', async () => {
    const locks = new KeyedLock();
    const release = await locks.acquire('k', 100);
    release();
    release();

    const again = await locks.acquire('k', 100);
    expect(locks.isLocked('k')).toBe(true);
    again();
  });
});
