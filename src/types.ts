/**
 * Core types for the agent coordinator
 */

import type { LogFormat, LogLevel } from './utils/logger.js';

// Task priority ordinals
export const TaskPriority = {
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
  CRITICAL: 4,
} as const;

export type TaskPriorityName = keyof typeof TaskPriority;
export type TaskPriority = (typeof TaskPriority)[TaskPriorityName];

export type TaskStatus = 'pending' | 'assigned' | 'in_progress' | 'completed' | 'failed';

export interface Task {
  id: string;
  title: string;
  description: string;
  priority: TaskPriority;
  status: TaskStatus;
  assignedAgent?: string;
  dependencies: string[];
  requiredCapabilities: string[];
  createdAt: Date;
  startedAt?: Date;
  assignedAt?: Date;  // Start of the current attempt, used for timeouts
  completedAt?: Date;
  result?: string;
  error?: string;
  retryCount: number;
  sequence: number;   // Insertion order, FIFO tie-break within a priority band
  cancelRequested: boolean;
}

export type AgentStatus = 'idle' | 'working' | 'waiting' | 'error' | 'completed';

export interface Agent {
  id: string;
  name: string;
  role: string;
  capabilities: string[];
  status: AgentStatus;
  currentTask?: string;
  pausedTask?: string;  // Bound task while the agent is waiting
  projectPath: string;
  maxConcurrentTasks: number;
  prompt?: string;
  registeredAt: Date;
  lastActivity: Date;
}

export interface AgentMessage {
  id: number;
  fromAgent: string;
  toAgent: string;
  messageType: string;
  content: string;
  timestamp: Date;
  taskId?: string;
}

// Lifecycle events fanned out to listeners and the observability collector
export type CoordinatorEventType =
  | 'agent_registered'
  | 'agent_status_changed'
  | 'task_created'
  | 'task_assigned'
  | 'task_started'
  | 'task_completed'
  | 'task_failed'
  | 'task_retried'
  | 'task_cancelled'
  | 'message_posted';

export type EventPayload = Record<string, unknown>;

/**
 * Sink for lifecycle events. Implementations must not throw and must not
 * block the caller.
 */
export interface Notifier {
  notify(eventType: CoordinatorEventType, payload: EventPayload): void;
  flush?(): Promise<void>;
}

/**
 * Agent definition produced by a template provider
 */
export interface AgentSpec {
  id: string;
  name: string;
  role: string;
  capabilities: string[];
  projectPath: string;
  maxConcurrentTasks: number;
  prompt: string;
}

export interface TemplateProvider {
  createAgent(role: string, instanceId: string, projectPath?: string): AgentSpec | null;
}

/**
 * Completion contract handed to the worker running a task
 */
export interface WorkerHandle {
  readonly taskId: string;
  readonly agentId: string;
  start(): void;
  complete(result: string): void;
  fail(error: string): void;
}

/**
 * External process supervisor. The coordinator never controls processes,
 * it only hands the supervisor a task and a handle to report back through.
 */
export interface WorkerSupervisor {
  dispatch(task: Task, agent: Agent, handle: WorkerHandle): void | Promise<void>;
}

// Configuration types
export interface ObservabilityConfig {
  enabled: boolean;
  sourceApp: string;
  sessionId: string;
  timeoutMs: number;
  maxInFlight: number;
  maxQueued: number;
  failureThreshold: number;
  cooldownMs: number;
}

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
}

export interface CoordinatorConfig {
  version: string;
  maxConcurrentAgents: number;
  taskTimeoutMinutes: number;
  healthCheckInterval: number;  // seconds
  observabilityServer: string;
  maxTaskRetries: number;
  messageRetentionHours: number;
  autoAssignTasks: boolean;
  agentRestartOnFailure: boolean;
  observability: ObservabilityConfig;
  logging: LoggingConfig;
}

export interface CoordinatorStatus {
  agents: Record<string, Agent>;
  tasks: Record<string, Task>;
  queueSize: number;
  messageCount: number;
  running: boolean;
}
