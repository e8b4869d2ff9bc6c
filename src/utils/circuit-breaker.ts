/**
 * Circuit breaker - stops calling a failing dependency for a cool-down period
 */

import { logger } from './logger.js';

const log = logger.child('circuit');

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  cooldownMs?: number;
}

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export class CircuitOpenError extends Error {
  constructor(name: string) {
    super(`Circuit breaker is OPEN for ${name}`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private nextAttemptTime = 0;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly name: string;

  constructor(name: string, options: CircuitBreakerOptions = {}) {
    this.name = name;
    this.failureThreshold = options.failureThreshold ?? 5;
    this.cooldownMs = options.cooldownMs ?? 60000;
  }

  getState(): CircuitState {
    return this.state;
  }

  /**
   * Open circuits move to HALF_OPEN once the cool-down has passed
   */
  isOpen(): boolean {
    if (this.state !== 'OPEN') {
      return false;
    }
    if (Date.now() >= this.nextAttemptTime) {
      log.info('Circuit half-open, allowing a trial call', { name: this.name });
      this.state = 'HALF_OPEN';
      return false;
    }
    return true;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.isOpen()) {
      throw new CircuitOpenError(this.name);
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  private onSuccess(): void {
    this.failureCount = 0;

    // One successful trial call closes a half-open circuit
    if (this.state === 'HALF_OPEN') {
      log.info('Circuit closed', { name: this.name });
      this.state = 'CLOSED';
    }
  }

  private onFailure(): void {
    this.failureCount++;

    if (this.state === 'HALF_OPEN' || this.failureCount >= this.failureThreshold) {
      log.warn('Circuit opened', {
        name: this.name,
        failureCount: this.failureCount,
        cooldownMs: this.cooldownMs,
      });
      this.state = 'OPEN';
      this.nextAttemptTime = Date.now() + this.cooldownMs;
    }
  }

  reset(): void {
    this.state = 'CLOSED';
    this.failureCount = 0;
    this.nextAttemptTime = 0;
  }
}
