/**
 * Health checks over a coordinator snapshot
 */

import type { CoordinatorConfig, CoordinatorStatus } from '../types.js';
import type { BlockedTask } from '../coordination/scheduler.js';
import { isActiveTaskStatus } from '../coordination/transitions.js';
import { logger } from '../utils/logger.js';

const log = logger.child('health');

export interface HealthCheck {
  status: 'pass' | 'warn' | 'fail';
  message?: string;
  details?: Record<string, unknown>;
}

export interface HealthCheckResult {
  status: 'healthy' | 'degraded' | 'unhealthy';
  checks: {
    agents: HealthCheck;
    tasks: HealthCheck;
    queue: HealthCheck;
  };
  timestamp: string;
  uptime: number;
  version: string;
}

export interface HealthSource {
  getStatus(): CoordinatorStatus;
  getBlockedTasks(): BlockedTask[];
}

export class HealthMonitor {
  private readonly source: HealthSource;
  private readonly config: CoordinatorConfig;
  private readonly startTime: number = Date.now();

  constructor(source: HealthSource, config: CoordinatorConfig) {
    this.source = source;
    this.config = config;
  }

  performHealthCheck(now: Date = new Date()): HealthCheckResult {
    const status = this.source.getStatus();

    const agents = this.checkAgents(status);
    const tasks = this.checkTasks(status, this.source.getBlockedTasks(), now);
    const queue = this.checkQueue(status);

    const checks = [agents, tasks, queue];
    const overallStatus = checks.some(check => check.status === 'fail')
      ? 'unhealthy'
      : checks.some(check => check.status === 'warn')
        ? 'degraded'
        : 'healthy';

    log.debug('Health check completed', { status: overallStatus });

    return {
      status: overallStatus,
      checks: { agents, tasks, queue },
      timestamp: now.toISOString(),
      uptime: (now.getTime() - this.startTime) / 1000,
      version: this.config.version,
    };
  }

  private checkAgents(status: CoordinatorStatus): HealthCheck {
    const agents = Object.values(status.agents);
    const inError = agents.filter(agent => agent.status === 'error').map(agent => agent.id);
    const details = { total: agents.length, inError };

    if (agents.length > 0 && inError.length === agents.length) {
      return { status: 'fail', message: 'All agents are in error', details };
    }
    if (inError.length > 0) {
      return { status: 'warn', message: `${inError.length} agent(s) in error`, details };
    }
    if (agents.length === 0 && status.queueSize > 0) {
      return { status: 'warn', message: 'Tasks are queued but no agents are registered', details };
    }
    return { status: 'pass', details };
  }

  private checkTasks(status: CoordinatorStatus, blocked: BlockedTask[], now: Date): HealthCheck {
    const timeoutMs = this.config.taskTimeoutMinutes * 60_000;

    const overdue = Object.values(status.tasks)
      .filter(task => isActiveTaskStatus(task.status) && task.assignedAt
        && now.getTime() - task.assignedAt.getTime() > timeoutMs)
      .map(task => task.id);

    const unsatisfiable = blocked
      .filter(entry => !entry.satisfiable)
      .map(entry => ({
        taskId: entry.task.id,
        unmet: entry.unmetDependencies,
      }));

    const details = { overdue, unsatisfiable };

    if (overdue.length > 0 || unsatisfiable.length > 0) {
      const parts: string[] = [];
      if (overdue.length > 0) parts.push(`${overdue.length} task(s) past timeout`);
      if (unsatisfiable.length > 0) parts.push(`${unsatisfiable.length} task(s) with unsatisfiable dependencies`);
      return { status: 'warn', message: parts.join(', '), details };
    }
    return { status: 'pass', details };
  }

  /**
   * Queued tasks whose capabilities no registered agent covers will never run
   */
  private checkQueue(status: CoordinatorStatus): HealthCheck {
    const agents = Object.values(status.agents);

    const unmatched = Object.values(status.tasks)
      .filter(task => task.status === 'pending')
      .filter(task => !agents.some(agent =>
        task.requiredCapabilities.every(tag => agent.capabilities.includes(tag))))
      .map(task => task.id);

    const details = { queueSize: status.queueSize, unmatched };

    if (agents.length > 0 && unmatched.length > 0) {
      return { status: 'warn', message: `${unmatched.length} queued task(s) match no registered agent`, details };
    }
    return { status: 'pass', details };
  }
}
