import { describe, it, expect } from 'vitest';
import { Mutex } from './mutex.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('Mutex', () => {
  it('runs critical sections one at a time, in call order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    await Promise.all(
      [30, 10, 0].map((ms, i) =>
        mutex.runExclusive(async () => {
          events.push(`start-${i}`);
          await delay(ms);
          events.push(`end-${i}`);
        }),
      ),
    );

    expect(events).toEqual(['start-0', 'end-0', 'start-1', 'end-1', 'start-2', 'end-2']);
  });

  it('keeps a shared counter consistent under concurrency', async () => {
    const mutex = new Mutex();
    let counter = 0;

    await Promise.all(
      Array.from({ length: 50 }, () =>
        mutex.runExclusive(async () => {
          const current = counter;
          await delay(0);
          counter = current + 1;
        }),
      ),
    );

    expect(counter).toBe(50);
  });

  it('releases the lock when the section throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
    expect(mutex.locked).toBe(false);
  });

  it('reports waiters', async () => {
    const mutex = new Mutex();
    let signalEntered: (release: () => void) => void = () => {};
    const entered = new Promise<() => void>((resolve) => {
      signalEntered = resolve;
    });
    const first = mutex.runExclusive(
      () => new Promise<void>((resolve) => signalEntered(() => resolve())),
    );
    const second = mutex.runExclusive(() => undefined);

    expect(mutex.waiting).toBe(2);
    // The first section starts only after the lock is taken.
    const unblock = await entered;
    expect(mutex.waiting).toBe(2);
    unblock();
    await Promise.all([first, second]);
    expect(mutex.waiting).toBe(0);
    expect(mutex.locked).toBe(false);
  });
});
