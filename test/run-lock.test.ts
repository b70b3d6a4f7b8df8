import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { RunLock } from '../src/orchestrator/run-lock.js';

describe('RunLock', () => {
  it('should run holders one at a time in call order', async () => {
    const lock = new RunLock();
    const events: string[] = [];

    const task = (name: string, ms: number) => async (): Promise<string> => {
      events.push(`start ${name}`);
      await sleep(ms);
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([
      lock.runExclusive(task('first', 20)),
      lock.runExclusive(task('second', 1)),
      lock.runExclusive(task('third', 1)),
    ]);

    expect(results).toEqual(['first', 'second', 'third']);
    expect(events).toEqual([
      'start first',
      'end first',
      'start second',
      'end second',
      'start third',
      'end third',
    ]);
  });

  it('should release the lock when a holder rejects', async () => {
    const lock = new RunLock();

    const failed = lock.runExclusive(async () => {
      throw new Error('holder failed');
    });
    const next = lock.runExclusive(async () => 'next');

    await expect(failed).rejects.toThrow('holder failed');
    await expect(next).resolves.toBe('next');
  });

  it('should report whether a holder is running or waiting', async () => {
    const lock = new RunLock();
    expect(lock.isLocked).toBe(false);

    const pending = lock.runExclusive(() => sleep(5));
    expect(lock.isLocked).toBe(true);

    await pending;
    expect(lock.isLocked).toBe(false);
  });
});
