/**
 * Semaphore tests
 */

import { describe, it, expect, vi } from 'vitest';
import { Semaphore, SemaphoreFullError } from '../../src/utils/semaphore.js';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  },
}));

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Semaphore', () => {
  it('should start with every permit available', () => {
    const semaphore = new Semaphore('test', { permits: 3 });

    expect(semaphore.available).toBe(3);
    expect(semaphore.waiting).toBe(0);
  });

  it('should run waiters in arrival order', async () => {
    const semaphore = new Semaphore('test', { permits: 1 });
    const gate = deferred();
    const order: number[] = [];

    const holder = semaphore.run(() => gate.promise);
    const first = semaphore.run(async () => {
      order.push(1);
    });
    const second = semaphore.run(async () => {
      order.push(2);
    });

    expect(semaphore.available).toBe(0);
    expect(semaphore.waiting).toBe(2);

    gate.resolve();
    await Promise.all([holder, first, second]);

    expect(order).toEqual([1, 2]);
    expect(semaphore.available).toBe(1);
  });

  it('should bound concurrent runs', async () => {
    const semaphore = new Semaphore('test', { permits: 2 });
    let running = 0;
    let peak = 0;

    const work = async (): Promise<void> => {
      running++;
      peak = Math.max(peak, running);
      await new Promise(resolve => setTimeout(resolve, 5));
      running--;
    };

    await Promise.all(Array.from({ length: 6 }, () => semaphore.run(work)));

    expect(peak).toBe(2);
    expect(semaphore.available).toBe(2);
  });

  it('should turn callers away once the wait list is full', async () => {
    const semaphore = new Semaphore('test', { permits: 1, maxWaiting: 1 });
    const gate = deferred();

    const holder = semaphore.run(() => gate.promise);
    const queued = semaphore.run(async () => 'queued');

    await expect(semaphore.run(async () => 'rejected')).rejects.toBeInstanceOf(SemaphoreFullError);
    expect(semaphore.waiting).toBe(1);

    gate.resolve();
    await holder;

    await expect(queued).resolves.toBe('queued');
    expect(semaphore.available).toBe(1);
  });

  it('should return the permit when the work throws', async () => {
    const semaphore = new Semaphore('test', { permits: 1 });

    await expect(semaphore.run(async () => {
      throw new Error('failed');
    })).rejects.toThrow('failed');

    expect(semaphore.available).toBe(1);
  });
});
