import { describe, expect, it } from 'vitest';
import { Mutex } from './lock';

describe('Mutex', () => {
  it('runs queued callers one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const task = (name: string, ticks: number) =>
      mutex.runExclusive(async () => {
        order.push(`${name}:start`);
        for (let i = 0; i < ticks; i++) {
          await Promise.resolve();
        }
        order.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([task('a', 3), task('b', 0), task('c', 1)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    expect(mutex.isLocked).toBe(false);
  });

  it('releases the lock when the callback throws', async () => {
    const mutex = new Mutex();

    const failed = mutex.runExclusive(() => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive(() => 'after');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('after');
    expect(mutex.isLocked).toBe(false);
  });
});
