import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  HttpNotifier,
  NullNotifier,
  buildEvent,
  createNotifier,
  type HttpNotifierOptions,
} from '../../../src/integrations/observability.js';
import type { ObservabilityConfig } from '../../../src/types.js';

const warn = vi.hoisted(() => vi.fn());

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn,
      error: vi.fn(),
    }),
  },
}));

const baseConfig: ObservabilityConfig = {
  enabled: true,
  sourceApp: 'multi-agent-coordinator',
  sessionId: 'session-1',
  timeoutMs: 5000,
  maxInFlight: 10,
  maxQueued: 1000,
  failureThreshold: 5,
  cooldownMs: 60000,
};

function options(overrides: Partial<HttpNotifierOptions> = {}): HttpNotifierOptions {
  return { ...baseConfig, serverUrl: 'http://collector.test/', ...overrides };
}

describe('observability', () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = vi.fn().mockResolvedValue(new Response(null, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    warn.mockClear();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('buildEvent', () => {
    it('should wrap the payload in the collector envelope', () => {
      expect(buildEvent('task_created', { task_id: 't1' }, baseConfig, 1700000000000)).toEqual({
        source_app: 'multi-agent-coordinator',
        session_id: 'session-1',
        hook_event_type: 'task_created',
        payload: { task_id: 't1' },
        timestamp: 1700000000000,
      });
    });
  });

  describe('HttpNotifier', () => {
    it('should POST the event as JSON to /events', async () => {
      const notifier = new HttpNotifier(options());

      notifier.notify('task_assigned', { task_id: 't1', agent_id: 'a1' });
      await notifier.flush();

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe('http://collector.test/events');
      expect(init).toMatchObject({ method: 'POST', headers: { 'Content-Type': 'application/json' } });
      expect(JSON.parse(String(init?.body))).toEqual({
        source_app: 'multi-agent-coordinator',
        session_id: 'session-1',
        hook_event_type: 'task_assigned',
        payload: { task_id: 't1', agent_id: 'a1' },
        timestamp: expect.any(Number),
      });
    });

    it('should not call the collector when disabled', async () => {
      const notifier = new HttpNotifier(options({ enabled: false }));

      notifier.notify('task_created', {});
      await notifier.flush();

      expect(notifier.isEnabled()).toBe(false);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should log a warning for a non-2xx response', async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 503 }));
      const notifier = new HttpNotifier(options());

      notifier.notify('task_failed', { task_id: 't1' });
      await notifier.flush();

      expect(warn).toHaveBeenCalledWith('Could not send event to observability server', {
        eventType: 'task_failed',
        error: 'Observability server responded with 503',
      });
      expect(notifier.getStats().dropped).toBe(1);
    });

    it('should swallow network errors without retrying', async () => {
      fetchMock.mockRejectedValue(new Error('connect ECONNREFUSED'));
      const notifier = new HttpNotifier(options());

      expect(() => notifier.notify('task_created', {})).not.toThrow();
      await notifier.flush();

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith('Could not send event to observability server', {
        eventType: 'task_created',
        error: 'connect ECONNREFUSED',
      });
    });

    it('should stop calling the collector once the circuit opens', async () => {
      fetchMock.mockRejectedValue(new Error('down'));
      const notifier = new HttpNotifier(options({ failureThreshold: 2, maxInFlight: 1 }));

      for (let i = 0; i < 4; i++) {
        notifier.notify('task_created', { n: i });
        await notifier.flush();
      }

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(notifier.getStats()).toEqual({ inFlight: 0, dropped: 4, circuit: 'OPEN' });
    });

    it('should bound in-flight requests', async () => {
      const pending: Array<(response: Response) => void> = [];
      fetchMock.mockImplementation(() => new Promise<Response>(resolve => pending.push(resolve)));
      const notifier = new HttpNotifier(options({ maxInFlight: 1 }));

      notifier.notify('task_created', { n: 1 });
      notifier.notify('task_created', { n: 2 });
      await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1));
      await new Promise(resolve => setImmediate(resolve));

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(notifier.getStats().inFlight).toBe(2);

      pending.shift()?.(new Response(null, { status: 200 }));
      await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(2));
      pending.shift()?.(new Response(null, { status: 200 }));
      await notifier.flush();

      expect(notifier.getStats()).toEqual({ inFlight: 0, dropped: 0, circuit: 'CLOSED' });
    });
  });

  describe('createNotifier', () => {
    it('should return a NullNotifier when disabled', () => {
      expect(createNotifier('http://collector.test', { ...baseConfig, enabled: false })).toBeInstanceOf(NullNotifier);
    });

    it('should return an HttpNotifier when enabled', () => {
      expect(createNotifier('http://collector.test', baseConfig)).toBeInstanceOf(HttpNotifier);
    });
  });
});
