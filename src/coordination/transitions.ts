/**
 * Allowed status edges for tasks and agents
 */

import type { AgentStatus, TaskStatus } from '../types.js';

export const AGENT_TRANSITIONS: Readonly<Record<AgentStatus, readonly AgentStatus[]>> = {
  idle: ['working'],
  working: ['waiting', 'completed', 'error'],
  waiting: ['working'],
  completed: ['idle'],
  error: ['idle'],
};

// pending -> failed is cancellation, assigned/in_progress -> pending is a retry
export const TASK_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  pending: ['assigned', 'failed'],
  assigned: ['in_progress', 'completed', 'failed', 'pending'],
  in_progress: ['completed', 'failed', 'pending'],
  completed: [],
  failed: [],
};

export const ACTIVE_TASK_STATUSES: readonly TaskStatus[] = ['assigned', 'in_progress'];

export function canTransitionAgent(from: AgentStatus, to: AgentStatus): boolean {
  return AGENT_TRANSITIONS[from].includes(to);
}

export function canTransitionTask(from: TaskStatus, to: TaskStatus): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return TASK_TRANSITIONS[status].length === 0;
}

export function isActiveTaskStatus(status: TaskStatus): boolean {
  return ACTIVE_TASK_STATUSES.includes(status);
}
