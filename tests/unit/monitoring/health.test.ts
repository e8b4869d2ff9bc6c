import { describe, it, expect, vi } from 'vitest';
import { HealthMonitor, type HealthSource } from '../../../src/monitoring/health.js';
import { getDefaultConfig } from '../../../src/utils/config.js';
import type { BlockedTask } from '../../../src/coordination/scheduler.js';
import type { Agent, AgentStatus, CoordinatorStatus, Task, TaskStatus } from '../../../src/types.js';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  },
}));

const now = new Date('2026-01-01T12:00:00Z');

function agent(id: string, status: AgentStatus, capabilities: string[] = []): Agent {
  return {
    id,
    name: id,
    role: 'developer',
    capabilities,
    status,
    projectPath: '.',
    maxConcurrentTasks: 1,
    registeredAt: now,
    lastActivity: now,
  };
}

function task(id: string, status: TaskStatus, overrides: Partial<Task> = {}): Task {
  return {
    id,
    title: id,
    description: '',
    priority: 2,
    status,
    dependencies: [],
    requiredCapabilities: [],
    createdAt: now,
    retryCount: 0,
    sequence: 1,
    cancelRequested: false,
    ...overrides,
  };
}

function monitor(agents: Agent[], tasks: Task[], blocked: BlockedTask[] = []): HealthMonitor {
  const status: CoordinatorStatus = {
    agents: Object.fromEntries(agents.map(a => [a.id, a])),
    tasks: Object.fromEntries(tasks.map(t => [t.id, t])),
    queueSize: tasks.filter(t => t.status === 'pending').length,
    messageCount: 0,
    running: true,
  };
  const source: HealthSource = {
    getStatus: () => status,
    getBlockedTasks: () => blocked,
  };
  return new HealthMonitor(source, { ...getDefaultConfig(), taskTimeoutMinutes: 30 });
}

describe('HealthMonitor', () => {
  it('should be healthy with idle agents and no work', () => {
    const result = monitor([agent('a1', 'idle')], []).performHealthCheck(now);

    expect(result.status).toBe('healthy');
    expect(result.timestamp).toBe('2026-01-01T12:00:00.000Z');
    expect(result.version).toBe('1.0.0');
  });

  it('should be unhealthy when every agent is in error', () => {
    const result = monitor([agent('a1', 'error'), agent('a2', 'error')], []).performHealthCheck(now);

    expect(result.status).toBe('unhealthy');
    expect(result.checks.agents.message).toBe('All agents are in error');
  });

  it('should be degraded when some agents are in error', () => {
    const result = monitor([agent('a1', 'error'), agent('a2', 'idle')], []).performHealthCheck(now);

    expect(result.status).toBe('degraded');
    expect(result.checks.agents.message).toBe('1 agent(s) in error');
  });

  it('should warn when tasks are queued with no agents', () => {
    const result = monitor([], [task('t1', 'pending')]).performHealthCheck(now);

    expect(result.checks.agents.status).toBe('warn');
    expect(result.checks.queue.status).toBe('pass');
  });

  it('should flag tasks past the timeout', () => {
    const overdue = task('t1', 'in_progress', { assignedAt: new Date('2026-01-01T11:00:00Z'), assignedAgent: 'a1' });
    const fresh = task('t2', 'assigned', { assignedAt: new Date('2026-01-01T11:45:00Z'), assignedAgent: 'a2' });

    const result = monitor([agent('a1', 'working'), agent('a2', 'working')], [overdue, fresh]).performHealthCheck(now);

    expect(result.checks.tasks.status).toBe('warn');
    expect(result.checks.tasks.message).toBe('1 task(s) past timeout');
    expect(result.checks.tasks.details).toEqual({ overdue: ['t1'], unsatisfiable: [] });
  });

  it('should flag unsatisfiable dependencies', () => {
    const stuck = task('t1', 'pending', { dependencies: ['gone'] });
    const blocked: BlockedTask[] = [
      { task: stuck, unmetDependencies: [{ taskId: 'gone', reason: 'missing' }], satisfiable: false },
    ];

    const result = monitor([agent('a1', 'idle')], [stuck], blocked).performHealthCheck(now);

    expect(result.checks.tasks.message).toBe('1 task(s) with unsatisfiable dependencies');
  });

  it('should flag queued tasks no registered agent can take', () => {
    const goTask = task('t1', 'pending', { requiredCapabilities: ['go'] });

    const result = monitor([agent('a1', 'idle', ['nodejs'])], [goTask]).performHealthCheck(now);

    expect(result.status).toBe('degraded');
    expect(result.checks.queue.message).toBe('1 queued task(s) match no registered agent');
    expect(result.checks.queue.details).toEqual({ queueSize: 1, unmatched: ['t1'] });
  });
});
