/**
 * Coordination module exports
 */

export { Coordinator, createCoordinator, priorityName, type CoordinatorOptions } from './coordinator.js';
export { TaskStore, cloneTask } from './task-store.js';
export { TaskQueue, compareQueued, type QueuedTask } from './task-queue.js';
export {
  Scheduler,
  type Assignment,
  type BlockedTask,
  type SchedulerOptions,
  type UnmetDependency,
  type UnmetReason,
} from './scheduler.js';
export { MessageBus, BROADCAST, type MessageBusOptions } from './message-bus.js';
export {
  AGENT_TRANSITIONS,
  TASK_TRANSITIONS,
  ACTIVE_TASK_STATUSES,
  canTransitionAgent,
  canTransitionTask,
  isActiveTaskStatus,
  isTerminalTaskStatus,
} from './transitions.js';
