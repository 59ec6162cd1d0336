import { describe, expect, it } from 'vitest';
import { KeyedMutex } from '../keyedMutex';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe('KeyedMutex', () => {
  it('runs tasks for one key one at a time, in order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      mutex.runExclusive('KXMP', task('a')),
      mutex.runExclusive('KXMP', task('b')),
    ]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('lets different keys overlap', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
    };

    await Promise.all([mutex.runExclusive('KXMP', task('a')), mutex.runExclusive('KQRT', task('b'))]);

    expect(events.slice(0, 2)).toEqual(['a:start', 'b:start']);
  });

  it('releases the lock when a task throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('KXMP', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('KXMP', async () => 'next')).resolves.toBe('next');
  });
});
