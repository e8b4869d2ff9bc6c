/**
 * Task store - owns task records and their status transitions
 */

import { randomUUID } from 'node:crypto';
import type { Task, TaskStatus } from '../types.js';
import type { NewTask } from '../utils/validation.js';
import { InvalidTransitionError, UnknownTaskError } from '../errors.js';
import { canTransitionTask } from './transitions.js';
import { logger } from '../utils/logger.js';

const log = logger.child('tasks');

export function cloneTask(task: Task): Task {
  return {
    ...task,
    dependencies: [...task.dependencies],
    requiredCapabilities: [...task.requiredCapabilities],
  };
}

export class TaskStore {
  private tasks: Map<string, Task> = new Map();
  private sequence = 0;

  /**
   * Store a new pending task. Input must already be validated.
   */
  create(input: NewTask, now: Date = new Date()): Task {
    const task: Task = {
      id: randomUUID(),
      title: input.title,
      description: input.description,
      priority: input.priority,
      status: 'pending',
      dependencies: [...input.dependencies],
      requiredCapabilities: [...input.requiredCapabilities],
      createdAt: now,
      retryCount: 0,
      sequence: ++this.sequence,
      cancelRequested: false,
    };

    this.tasks.set(task.id, task);
    log.debug('Task stored', { taskId: task.id, sequence: task.sequence });

    return cloneTask(task);
  }

  get(id: string): Task | null {
    const task = this.tasks.get(id);
    return task ? cloneTask(task) : null;
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  /**
   * Status of a task without copying the record
   */
  statusOf(id: string): TaskStatus | null {
    return this.tasks.get(id)?.status ?? null;
  }

  /**
   * Dependency ids of a task without copying the record
   */
  dependenciesOf(id: string): readonly string[] | null {
    return this.tasks.get(id)?.dependencies ?? null;
  }

  list(status?: TaskStatus): Task[] {
    const tasks: Task[] = [];
    for (const task of this.tasks.values()) {
      if (!status || task.status === status) {
        tasks.push(cloneTask(task));
      }
    }
    return tasks;
  }

  countByStatus(): Record<TaskStatus, number> {
    const counts: Record<TaskStatus, number> = {
      pending: 0,
      assigned: 0,
      in_progress: 0,
      completed: 0,
      failed: 0,
    };
    for (const task of this.tasks.values()) {
      counts[task.status]++;
    }
    return counts;
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Bind a pending task to an agent
   */
  assign(id: string, agentId: string, now: Date = new Date()): Task {
    const task = this.transition(id, 'assigned');
    task.assignedAgent = agentId;
    task.assignedAt = now;
    task.startedAt ??= now;
    return cloneTask(task);
  }

  /**
   * The worker acknowledged the task
   */
  markInProgress(id: string): Task {
    return cloneTask(this.transition(id, 'in_progress'));
  }

  complete(id: string, result: string, now: Date = new Date()): Task {
    const task = this.transition(id, 'completed');
    task.result = result;
    task.error = undefined;
    task.completedAt = now;
    task.assignedAgent = undefined;
    return cloneTask(task);
  }

  /**
   * Count a failed attempt and put the task back in the pool
   */
  requeue(id: string, error: string): Task {
    const task = this.transition(id, 'pending');
    task.retryCount++;
    task.error = error;
    task.assignedAgent = undefined;
    task.assignedAt = undefined;
    return cloneTask(task);
  }

  /**
   * Terminal failure. Counts an attempt unless the task never ran.
   */
  fail(id: string, error: string, now: Date = new Date()): Task {
    const task = this.require(id);
    const ran = task.status !== 'pending';
    this.transition(id, 'failed');
    if (ran) {
      task.retryCount++;
    }
    task.error = error;
    task.result = undefined;
    task.completedAt = now;
    task.assignedAgent = undefined;
    return cloneTask(task);
  }

  requestCancel(id: string): Task {
    const task = this.require(id);
    task.cancelRequested = true;
    return cloneTask(task);
  }

  private require(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) {
      throw new UnknownTaskError(id);
    }
    return task;
  }

  private transition(id: string, to: TaskStatus): Task {
    const task = this.require(id);
    if (!canTransitionTask(task.status, to)) {
      throw new InvalidTransitionError('task', id, task.status, to);
    }

    log.debug('Task transition', { taskId: id, from: task.status, to });
    task.status = to;
    return task;
  }
}
