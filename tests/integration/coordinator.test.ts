/**
 * End-to-end coordination against an in-process observability collector
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { createServer, type Server } from 'node:http';
import { createCoordinator, type Coordinator } from '../../src/coordination/coordinator.js';
import { StaticTemplateProvider } from '../../src/agents/templates.js';
import { getDefaultConfig } from '../../src/utils/config.js';
import { logger } from '../../src/utils/logger.js';
import type { Agent, CoordinatorConfig, Task, WorkerHandle, WorkerSupervisor } from '../../src/types.js';

interface ReceivedEvent {
  source_app: string;
  session_id: string;
  hook_event_type: string;
  payload: Record<string, unknown>;
  timestamp: number;
}

function isReceivedEvent(value: unknown): value is ReceivedEvent {
  return typeof value === 'object' && value !== null && 'hook_event_type' in value && 'payload' in value;
}

/**
 * Worker stand-in: acknowledges every task on the next turn and completes it,
 * failing the first attempt of tasks titled "flaky"
 */
class ScriptedSupervisor implements WorkerSupervisor {
  readonly log: string[] = [];

  dispatch(task: Task, agent: Agent, handle: WorkerHandle): void {
    setImmediate(() => {
      handle.start();
      if (task.title === 'flaky' && task.retryCount === 0) {
        this.log.push(`${task.title}:fail@${agent.id}`);
        handle.fail('transient error');
        return;
      }
      this.log.push(`${task.title}:done@${agent.id}`);
      handle.complete(`${task.title} finished`);
    });
  }
}

async function waitUntil(condition: () => boolean, timeoutMs: number = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await new Promise(resolve => setTimeout(resolve, 10));
  }
}

describe('Coordinator integration', () => {
  let server: Server;
  let serverUrl: string;
  let received: ReceivedEvent[];
  let coordinator: Coordinator;

  beforeAll(async () => {
    logger.setLevel('error');

    server = createServer((req, res) => {
      let body = '';
      req.setEncoding('utf-8');
      req.on('data', (chunk: string) => {
        body += chunk;
      });
      req.on('end', () => {
        if (req.method === 'POST' && req.url === '/events') {
          const parsed: unknown = JSON.parse(body);
          if (isReceivedEvent(parsed)) {
            received.push(parsed);
          }
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end('{"ok":true}');
          return;
        }
        res.writeHead(404);
        res.end();
      });
    });

    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Collector is not listening on a TCP port');
    }
    serverUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    logger.setLevel('info');
  });

  beforeEach(() => {
    received = [];
  });

  afterEach(async () => {
    await coordinator.shutdown();
  });

  function config(overrides: Partial<CoordinatorConfig> = {}): CoordinatorConfig {
    const defaults = getDefaultConfig();
    return {
      ...defaults,
      observabilityServer: serverUrl,
      observability: { ...defaults.observability, sessionId: 'integration' },
      ...overrides,
    };
  }

  it('should run a dependency chain to completion and report every step', async () => {
    const supervisor = new ScriptedSupervisor();
    const templates = new StaticTemplateProvider([
      { role: 'backend', name: 'Backend Developer', capabilities: ['nodejs', 'sql'] },
      { role: 'qa', name: 'QA Engineer', capabilities: ['testing'] },
    ]);
    coordinator = createCoordinator({ config: config(), templates, supervisor });
    coordinator.start();

    coordinator.registerFromTemplate('backend', 'backend-1');
    coordinator.registerFromTemplate('qa', 'qa-1');

    const schema = coordinator.createTask({ title: 'schema', priority: 'HIGH', requiredCapabilities: ['sql'] });
    const api = coordinator.createTask({
      title: 'api',
      priority: 'CRITICAL',
      dependencies: [schema.id],
      requiredCapabilities: ['nodejs'],
    });
    const tests = coordinator.createTask({
      title: 'flaky',
      dependencies: [api.id],
      requiredCapabilities: ['testing'],
    });

    await waitUntil(() => coordinator.getTask(tests.id)?.status === 'completed');
    await coordinator.shutdown();

    expect(supervisor.log).toEqual([
      'schema:done@backend-1',
      'api:done@backend-1',
      'flaky:fail@qa-1',
      'flaky:done@qa-1',
    ]);
    expect(coordinator.getTask(tests.id)?.retryCount).toBe(1);
    expect(coordinator.listAgents().every(agent => agent.status === 'idle')).toBe(true);

    const types = received.map(event => event.hook_event_type);
    expect(types.filter(type => type === 'task_completed')).toHaveLength(3);
    expect(types.filter(type => type === 'task_retried')).toHaveLength(1);
    expect(types.filter(type => type === 'agent_registered')).toHaveLength(2);
    expect(received.every(event => event.source_app === 'multi-agent-coordinator')).toBe(true);
    expect(received.every(event => event.session_id === 'integration')).toBe(true);
  });

  it('should keep scheduling when the collector is unreachable', async () => {
    coordinator = createCoordinator({
      config: config({ observabilityServer: 'http://127.0.0.1:1' }),
      supervisor: new ScriptedSupervisor(),
    });
    coordinator.start();

    coordinator.registerAgent({ id: 'dev-1', name: 'Dev', role: 'backend' });
    const task = coordinator.createTask({ title: 'work' });

    await waitUntil(() => coordinator.getTask(task.id)?.status === 'completed');

    expect(coordinator.getTask(task.id)?.result).toBe('work finished');
    expect(received).toEqual([]);
  });

  it('should leave an unmatched task pending and report it in the health check', async () => {
    coordinator = createCoordinator({ config: config(), supervisor: new ScriptedSupervisor() });
    coordinator.start();

    coordinator.registerAgent({ id: 'node-1', name: 'Node Dev', role: 'backend', capabilities: ['nodejs'] });
    const task = coordinator.createTask({ title: 'rewrite in go', requiredCapabilities: ['go'] });

    await new Promise(resolve => setTimeout(resolve, 50));

    expect(coordinator.getTask(task.id)?.status).toBe('pending');
    expect(coordinator.getAgent('node-1')?.status).toBe('idle');
    expect(coordinator.getHealth().checks.queue.details).toEqual({ queueSize: 1, unmatched: [task.id] });
  });
});
