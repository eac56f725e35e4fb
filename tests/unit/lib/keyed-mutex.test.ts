import { describe, it, expect } from 'vitest';

import { KeyedMutex } from '@/lib/keyed-mutex.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedMutex', () => {
  it('should run work for one key in arrival order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive('user-1', async () => {
        events.push('a:start');
        await delay(20);
        events.push('a:end');
      }),
      mutex.runExclusive('user-1', () => {
        events.push('b');
      }),
    ]);

    expect(events).toEqual(['a:start', 'a:end', 'b']);
  });

  it('should not serialize different keys', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive('user-1', async () => {
        events.push('slow:start');
        await delay(20);
        events.push('slow:end');
      }),
      mutex.runExclusive('user-2', () => {
        events.push('other');
      }),
    ]);

    expect(events).toEqual(['slow:start', 'other', 'slow:end']);
  });

  it('should release the lock when work throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('user-1', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('user-1', () => 'next')).resolves.toBe('next');
    expect(mutex.isLocked('user-1')).toBe(false);
  });

  it('should drop idle keys', async () => {
    const mutex = new KeyedMutex();
    const running = mutex.runExclusive('user-1', () => delay(5));

    expect(mutex.isLocked('user-1')).toBe(true);
    expect(mutex.size).toBe(1);

    await running;
    expect(mutex.size).toBe(0);
  });
});
