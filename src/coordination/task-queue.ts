/**
 * Task queue - the ordered pool of pending tasks
 */

import { EventEmitter } from 'node:events';
import type { Task, TaskPriority } from '../types.js';
import { logger } from '../utils/logger.js';

const log = logger.child('queue');

export interface QueuedTask {
  taskId: string;
  priority: TaskPriority;
  sequence: number;
  addedAt: Date;
}

/**
 * Higher priority first, then earlier insertion
 */
export function compareQueued(
  a: Pick<QueuedTask, 'priority' | 'sequence'>,
  b: Pick<QueuedTask, 'priority' | 'sequence'>
): number {
  if (a.priority !== b.priority) {
    return a.priority > b.priority ? -1 : 1;
  }
  if (a.sequence !== b.sequence) {
    return a.sequence < b.sequence ? -1 : 1;
  }
  return 0;
}

/**
 * Emits 'task:added' with the queued entry
 */
export class TaskQueue extends EventEmitter {
  private queue: QueuedTask[] = [];
  private index: Map<string, QueuedTask> = new Map();

  /**
   * Add a pending task. A task already queued is left where it is.
   */
  enqueue(task: Pick<Task, 'id' | 'priority' | 'sequence'>): boolean {
    if (this.index.has(task.id)) {
      return false;
    }

    const entry: QueuedTask = {
      taskId: task.id,
      priority: task.priority,
      sequence: task.sequence,
      addedAt: new Date(),
    };

    const insertIndex = this.queue.findIndex(queued => compareQueued(entry, queued) < 0);
    if (insertIndex === -1) {
      this.queue.push(entry);
    } else {
      this.queue.splice(insertIndex, 0, entry);
    }
    this.index.set(entry.taskId, entry);

    this.emit('task:added', entry);
    log.debug('Task enqueued', { taskId: task.id, priority: task.priority, queueSize: this.queue.length });
    return true;
  }

  /**
   * Remove a task from the pool (assigned or cancelled)
   */
  remove(taskId: string): boolean {
    const entry = this.index.get(taskId);
    if (!entry) return false;

    this.queue.splice(this.queue.indexOf(entry), 1);
    this.index.delete(taskId);

    log.debug('Task dequeued', { taskId, queueSize: this.queue.length });
    return true;
  }

  has(taskId: string): boolean {
    return this.index.has(taskId);
  }

  /**
   * Snapshot of the queue in scheduling order
   */
  entries(): QueuedTask[] {
    return this.queue.map(entry => ({ ...entry }));
  }

  peek(limit: number = 10): QueuedTask[] {
    return this.entries().slice(0, limit);
  }

  clear(): void {
    this.queue = [];
    this.index.clear();
    log.debug('Queue cleared');
  }

  get length(): number {
    return this.queue.length;
  }

  get isEmpty(): boolean {
    return this.queue.length === 0;
  }
}
