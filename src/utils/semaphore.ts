/**
 * Counting semaphore with a bounded wait list.
 *
 * The notifier runs each delivery through one of these. Once every permit
 * is taken, callers wait in FIFO order; once the wait list is full they are
 * turned away with SemaphoreFullError, so a stalled collector cannot pile
 * up unbounded pending deliveries.
 */

import { logger } from './logger.js';

const log = logger.child('semaphore');

export interface SemaphoreOptions {
  permits: number;
  maxWaiting?: number;
}

export class SemaphoreFullError extends Error {
  constructor(name: string, maxWaiting: number) {
    super(`Semaphore ${name} already has ${maxWaiting} waiting`);
    this.name = 'SemaphoreFullError';
  }
}

export class Semaphore {
  private readonly name: string;
  private readonly permits: number;
  private readonly maxWaiting: number;
  private active = 0;
  private waiters: Array<() => void> = [];

  constructor(name: string, options: SemaphoreOptions) {
    this.name = name;
    this.permits = options.permits;
    this.maxWaiting = options.maxWaiting ?? Number.POSITIVE_INFINITY;
  }

  get available(): number {
    return this.permits - this.active;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Run fn once a permit is free; the permit is returned however fn ends
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.enter();
    try {
      return await fn();
    } finally {
      this.leave();
    }
  }

  private enter(): Promise<void> {
    if (this.active < this.permits) {
      this.active++;
      return Promise.resolve();
    }

    if (this.waiters.length >= this.maxWaiting) {
      return Promise.reject(new SemaphoreFullError(this.name, this.maxWaiting));
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
      log.debug('Waiting for permit', { name: this.name, waiting: this.waiters.length });
    });
  }

  private leave(): void {
    const next = this.waiters.shift();
    if (next) {
      // The permit passes straight to the waiter, `active` is unchanged
      next();
    } else {
      this.active--;
    }
  }
}
