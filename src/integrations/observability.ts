/**
 * Observability notifier - fire-and-forget delivery of lifecycle events
 * to an external HTTP collector
 */

import type { CoordinatorEventType, EventPayload, Notifier, ObservabilityConfig } from '../types.js';
import { CircuitBreaker } from '../utils/circuit-breaker.js';
import { Semaphore } from '../utils/semaphore.js';
import { logger } from '../utils/logger.js';

const log = logger.child('observability');

export interface ObservabilityEvent {
  source_app: string;
  session_id: string;
  hook_event_type: CoordinatorEventType;
  payload: EventPayload;
  timestamp: number;
}

export interface HttpNotifierOptions extends ObservabilityConfig {
  serverUrl: string;
}

export function buildEvent(
  eventType: CoordinatorEventType,
  payload: EventPayload,
  options: Pick<ObservabilityConfig, 'sourceApp' | 'sessionId'>,
  now: number = Date.now()
): ObservabilityEvent {
  return {
    source_app: options.sourceApp,
    session_id: options.sessionId,
    hook_event_type: eventType,
    payload,
    timestamp: now,
  };
}

/**
 * Discards every event
 */
export class NullNotifier implements Notifier {
  notify(): void {
    // nothing to deliver
  }

  async flush(): Promise<void> {}
}

/**
 * POSTs each event to `<serverUrl>/events`. Failures are logged as warnings
 * and never retried; engine state does not depend on delivery.
 */
export class HttpNotifier implements Notifier {
  private readonly options: HttpNotifierOptions;
  private readonly endpoint: string;
  private readonly semaphore: Semaphore;
  private readonly breaker: CircuitBreaker;
  private inFlight: Set<Promise<void>> = new Set();
  private dropped = 0;

  constructor(options: HttpNotifierOptions) {
    this.options = options;
    this.endpoint = `${options.serverUrl.replace(/\/+$/, '')}/events`;
    this.semaphore = new Semaphore('observability', {
      permits: options.maxInFlight,
      maxWaiting: options.maxQueued,
    });
    this.breaker = new CircuitBreaker('observability', {
      failureThreshold: options.failureThreshold,
      cooldownMs: options.cooldownMs,
    });
  }

  isEnabled(): boolean {
    return this.options.enabled;
  }

  notify(eventType: CoordinatorEventType, payload: EventPayload): void {
    if (!this.options.enabled) {
      return;
    }

    const event = buildEvent(eventType, payload, this.options);
    const delivery: Promise<void> = this.deliver(event).finally(() => {
      this.inFlight.delete(delivery);
    });
    this.inFlight.add(delivery);
  }

  /**
   * Wait for deliveries already started
   */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  getStats(): { inFlight: number; dropped: number; circuit: string } {
    return {
      inFlight: this.inFlight.size,
      dropped: this.dropped,
      circuit: this.breaker.getState(),
    };
  }

  private async deliver(event: ObservabilityEvent): Promise<void> {
    if (this.breaker.isOpen()) {
      this.dropped++;
      log.debug('Collector unavailable, event dropped', { eventType: event.hook_event_type });
      return;
    }

    try {
      await this.semaphore.run(() => this.breaker.execute(() => this.post(event)));
    } catch (error) {
      this.dropped++;
      log.warn('Could not send event to observability server', {
        eventType: event.hook_event_type,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async post(event: ObservabilityEvent): Promise<void> {
    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(event),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Observability server responded with ${response.status}`);
    }
  }
}

/**
 * Notifier for a loaded configuration
 */
export function createNotifier(serverUrl: string, options: ObservabilityConfig): Notifier {
  if (!options.enabled) {
    return new NullNotifier();
  }
  return new HttpNotifier({ ...options, serverUrl });
}
