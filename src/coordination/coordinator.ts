/**
 * Coordinator - the engine facade over the task store, agent registry,
 * scheduler and message bus
 *
 * Every mutating operation runs synchronously to completion on the event
 * loop, so a task is never observed assigned to an agent that is not
 * working on it. Events are emitted after the mutation and delivered to the
 * notifier without awaiting.
 */

import { EventEmitter } from 'node:events';
import type {
  Agent,
  AgentMessage,
  AgentStatus,
  CoordinatorConfig,
  CoordinatorEventType,
  CoordinatorStatus,
  EventPayload,
  Notifier,
  Task,
  TemplateProvider,
  WorkerHandle,
  WorkerSupervisor,
} from '../types.js';
import { TaskStore } from './task-store.js';
import { TaskQueue } from './task-queue.js';
import { Scheduler, type Assignment, type BlockedTask } from './scheduler.js';
import { MessageBus } from './message-bus.js';
import { isActiveTaskStatus } from './transitions.js';
import { AgentRegistry } from '../agents/registry.js';
import { HealthMonitor, type HealthCheckResult } from '../monitoring/health.js';
import { NullNotifier, createNotifier } from '../integrations/observability.js';
import { getConfig, getDefaultConfig } from '../utils/config.js';
import {
  parseInput,
  CreateTaskInputSchema,
  RegisterAgentInputSchema,
  type CreateTaskInput,
  type PostMessageInput,
  type RegisterAgentInput,
} from '../utils/validation.js';
import {
  InvalidTransitionError,
  UnknownAgentError,
  UnknownTaskError,
  UnknownTemplateError,
  errorMessage,
} from '../errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('coordinator');

export interface CoordinatorOptions {
  config?: CoordinatorConfig;
  notifier?: Notifier;
  templates?: TemplateProvider;
  supervisor?: WorkerSupervisor;
}

const PRIORITY_NAMES: Record<Task['priority'], string> = {
  1: 'LOW',
  2: 'MEDIUM',
  3: 'HIGH',
  4: 'CRITICAL',
};

export function priorityName(priority: Task['priority']): string {
  return PRIORITY_NAMES[priority];
}

function taskPayload(task: Task): EventPayload {
  return {
    task_id: task.id,
    title: task.title,
    description: task.description,
    priority: task.priority,
    status: task.status,
    dependencies: task.dependencies,
    required_capabilities: task.requiredCapabilities,
    assigned_agent: task.assignedAgent ?? null,
    retry_count: task.retryCount,
    created_at: task.createdAt.getTime(),
    started_at: task.startedAt?.getTime() ?? null,
    completed_at: task.completedAt?.getTime() ?? null,
  };
}

export class Coordinator extends EventEmitter {
  readonly config: CoordinatorConfig;
  private readonly tasks = new TaskStore();
  private readonly queue = new TaskQueue();
  private readonly agents = new AgentRegistry();
  private readonly bus: MessageBus;
  private readonly scheduler: Scheduler;
  private readonly health: HealthMonitor;
  private readonly notifier: Notifier;
  private readonly templates: TemplateProvider | null;
  private readonly supervisor: WorkerSupervisor | null;
  private timer: NodeJS.Timeout | null = null;
  private tickScheduled = false;
  private running = false;

  constructor(options: CoordinatorOptions = {}) {
    super();
    this.config = options.config ?? getDefaultConfig();
    this.notifier = options.notifier ?? new NullNotifier();
    this.templates = options.templates ?? null;
    this.supervisor = options.supervisor ?? null;
    this.bus = new MessageBus({ retentionMs: this.config.messageRetentionHours * 3_600_000 });
    this.scheduler = new Scheduler(this.tasks, this.queue, this.agents, {
      maxConcurrentAgents: this.config.maxConcurrentAgents,
    });
    this.health = new HealthMonitor(this, this.config);

    // New and re-queued tasks both land here
    this.queue.on('task:added', () => this.requestTick());
  }

  // ---------------------------------------------------------------------------
  // Agents
  // ---------------------------------------------------------------------------

  registerAgent(input: RegisterAgentInput): Agent {
    const data = parseInput(RegisterAgentInputSchema, input, 'agent');
    const agent = this.agents.register(data);

    this.emitEvent('agent_registered', {
      agent_id: agent.id,
      agent_name: agent.name,
      role: agent.role,
      capabilities: agent.capabilities,
    });
    this.requestTick();

    return agent;
  }

  /**
   * Register an agent built by the template provider for `role`
   */
  registerFromTemplate(role: string, instanceId: string, projectPath?: string): Agent {
    const spec = this.templates?.createAgent(role, instanceId, projectPath) ?? null;
    if (!spec) {
      throw new UnknownTemplateError(role);
    }
    return this.registerAgent(spec);
  }

  /**
   * Caller-driven agent transitions. Binding and releasing tasks goes
   * through scheduleTick, completeTask and failTask instead.
   */
  transitionAgent(agentId: string, to: AgentStatus): Agent {
    const agent = this.requireAgent(agentId);
    const from = agent.status;

    switch (to) {
      case 'waiting':
      case 'idle':
        return this.moveAgent(agentId, to);
      case 'working':
        if (from === 'waiting') {
          return this.moveAgent(agentId, to);
        }
        throw new InvalidTransitionError('agent', agentId, from, to, 'tasks are bound by the scheduler');
      case 'completed':
      case 'error':
        throw new InvalidTransitionError('agent', agentId, from, to, 'report the task outcome instead');
    }
  }

  /**
   * The agent is blocked on external input; its task stays bound
   */
  blockAgent(agentId: string): Agent {
    return this.transitionAgent(agentId, 'waiting');
  }

  unblockAgent(agentId: string): Agent {
    return this.transitionAgent(agentId, 'working');
  }

  /**
   * Bring an agent in error (or completed) back to idle
   */
  resetAgent(agentId: string): Agent {
    return this.transitionAgent(agentId, 'idle');
  }

  getAgent(agentId: string): Agent | null {
    return this.agents.get(agentId);
  }

  listAgents(status?: AgentStatus): Agent[] {
    return this.agents.list(status);
  }

  findIdleAgents(required: Iterable<string> = []): Agent[] {
    return this.agents.findIdleWithCapabilities(required);
  }

  // ---------------------------------------------------------------------------
  // Tasks
  // ---------------------------------------------------------------------------

  createTask(input: CreateTaskInput): Task {
    const data = parseInput(CreateTaskInputSchema, input, 'task');
    const task = this.tasks.create(data);
    this.queue.enqueue(task);

    log.info('Created task', { taskId: task.id, title: task.title, priority: priorityName(task.priority) });
    this.emitEvent('task_created', taskPayload(task));

    return task;
  }

  getTask(taskId: string): Task | null {
    return this.tasks.get(taskId);
  }

  listTasks(status?: Task['status']): Task[] {
    return this.tasks.list(status);
  }

  /**
   * Pending tasks whose dependencies are all completed, in scheduling order
   */
  getReadyTasks(): Task[] {
    return this.scheduler.readyTasks();
  }

  /**
   * Pending tasks held back by dependencies, with the reason for each
   */
  getBlockedTasks(): BlockedTask[] {
    return this.scheduler.blockedTasks();
  }

  /**
   * Run one scheduling pass over the current tasks and agents
   */
  scheduleTick(now: Date = new Date()): Assignment[] {
    const assignments = this.scheduler.tick(now);

    for (const assignment of assignments) {
      const { task, agent } = assignment;
      this.emitEvent('agent_status_changed', {
        agent_id: agent.id,
        from: 'idle',
        to: 'working',
        current_task: task.id,
      });
      this.emitEvent('task_assigned', {
        task_id: task.id,
        agent_id: agent.id,
        title: task.title,
        priority: task.priority,
        retry_count: task.retryCount,
      });
      this.dispatch(assignment);
    }

    return assignments;
  }

  /**
   * The worker picked the task up
   */
  startTask(taskId: string): Task {
    const task = this.tasks.markInProgress(taskId);
    this.emitEvent('task_started', { task_id: task.id, agent_id: task.assignedAgent ?? null });
    return task;
  }

  completeTask(taskId: string, result: string): Task {
    const task = this.requireActiveTask(taskId, 'completed');
    const agentId = task.assignedAgent;

    const completed = this.tasks.complete(taskId, result);
    if (agentId) {
      this.releaseAgent(agentId, 'completed');
    }

    log.info('Task completed', { taskId, agentId });
    this.emitEvent('task_completed', { ...taskPayload(completed), result, agent_id: agentId ?? null });
    this.requestTick();

    return completed;
  }

  /**
   * Count a failed attempt. The task is re-queued until maxTaskRetries
   * attempts have failed, then fails for good.
   */
  failTask(taskId: string, error: string): Task {
    const task = this.requireActiveTask(taskId, 'failed');
    const agentId = task.assignedAgent;
    const attempts = task.retryCount + 1;
    const retry = attempts < this.config.maxTaskRetries && !task.cancelRequested;

    let updated: Task;
    if (retry) {
      updated = this.tasks.requeue(taskId, error);
      this.queue.enqueue(updated);
    } else {
      updated = this.tasks.fail(taskId, error);
    }

    if (agentId) {
      this.releaseAgent(agentId, 'error');
    }

    if (retry) {
      log.warn('Task failed, re-queued', { taskId, attempts, maxRetries: this.config.maxTaskRetries, error });
      this.emitEvent('task_retried', { ...taskPayload(updated), error, agent_id: agentId ?? null });
    } else {
      log.error('Task failed', { taskId, attempts, error });
      this.emitEvent('task_failed', { ...taskPayload(updated), error, agent_id: agentId ?? null });
    }
    this.requestTick();

    return updated;
  }

  /**
   * Pending tasks are withdrawn at once. Assigned tasks are only marked;
   * the worker's report (or the timeout) closes them without a retry.
   */
  cancelTask(taskId: string): Task {
    const status = this.tasks.statusOf(taskId);
    if (status === null) {
      throw new UnknownTaskError(taskId);
    }

    if (status === 'pending') {
      const cancelled = this.tasks.fail(taskId, 'cancelled');
      this.queue.remove(taskId);
      log.info('Task cancelled', { taskId });
      this.emitEvent('task_cancelled', { task_id: taskId, status: cancelled.status, requested: false });
      return cancelled;
    }

    if (isActiveTaskStatus(status)) {
      const marked = this.tasks.requestCancel(taskId);
      log.info('Cancellation requested', { taskId, agentId: marked.assignedAgent });
      this.emitEvent('task_cancelled', {
        task_id: taskId,
        status: marked.status,
        requested: true,
        agent_id: marked.assignedAgent ?? null,
      });
      return marked;
    }

    throw new InvalidTransitionError('task', taskId, status, 'failed', 'task already finished');
  }

  /**
   * Fail every task that has been assigned for longer than the timeout
   */
  checkTimeouts(now: Date = new Date()): Task[] {
    const timeoutMs = this.config.taskTimeoutMinutes * 60_000;
    const timedOut: Task[] = [];

    for (const task of [...this.tasks.list('assigned'), ...this.tasks.list('in_progress')]) {
      if (task.assignedAt && now.getTime() - task.assignedAt.getTime() > timeoutMs) {
        log.warn('Task timed out', { taskId: task.id, agentId: task.assignedAgent });
        timedOut.push(this.failTask(task.id, 'timeout'));
      }
    }

    return timedOut;
  }

  // ---------------------------------------------------------------------------
  // Messages
  // ---------------------------------------------------------------------------

  postMessage(input: PostMessageInput): AgentMessage {
    const message = this.bus.post(input);
    this.emitEvent('message_posted', {
      message_id: message.id,
      from_agent: message.fromAgent,
      to_agent: message.toAgent,
      message_type: message.messageType,
      task_id: message.taskId ?? null,
    });
    return message;
  }

  messagesSince(agentId: string, timestamp: Date): Iterable<AgentMessage> {
    return this.bus.since(agentId, timestamp);
  }

  get messages(): MessageBus {
    return this.bus;
  }

  // ---------------------------------------------------------------------------
  // Status and lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Read-only snapshot; does not trigger scheduling
   */
  getStatus(): CoordinatorStatus {
    const agents: Record<string, Agent> = {};
    for (const agent of this.agents.list()) {
      agents[agent.id] = agent;
    }

    const tasks: Record<string, Task> = {};
    for (const task of this.tasks.list()) {
      tasks[task.id] = task;
    }

    return {
      agents,
      tasks,
      queueSize: this.queue.length,
      messageCount: this.bus.count,
      running: this.running,
    };
  }

  getHealth(now: Date = new Date()): HealthCheckResult {
    return this.health.performHealthCheck(now);
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Start the coordination loop: timeout sweep, retention purge and, when
   * autoAssignTasks is on, a scheduling tick every healthCheckInterval
   * seconds and after each mutation
   */
  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.timer = setInterval(() => this.runMaintenance(), this.config.healthCheckInterval * 1000);
    log.info('Coordinator started', {
      autoAssign: this.config.autoAssignTasks,
      intervalSeconds: this.config.healthCheckInterval,
    });
    this.requestTick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      this.running = false;
      log.info('Coordinator stopped');
    }
  }

  /**
   * Stop the loop and wait for pending event deliveries
   */
  async shutdown(): Promise<void> {
    this.stop();
    await this.notifier.flush?.();
  }

  /**
   * One pass of the coordination loop
   */
  runMaintenance(now: Date = new Date()): void {
    try {
      this.checkTimeouts(now);
      this.bus.purgeExpired(now);
      if (this.config.autoAssignTasks) {
        this.scheduleTick(now);
      }

      const health = this.health.performHealthCheck(now);
      if (health.status !== 'healthy') {
        log.warn('Coordinator health degraded', {
          status: health.status,
          agents: health.checks.agents.message,
          tasks: health.checks.tasks.message,
          queue: health.checks.queue.message,
        });
      }
    } catch (error) {
      log.error('Maintenance pass failed', { error });
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private requireAgent(agentId: string): Agent {
    const agent = this.agents.get(agentId);
    if (!agent) {
      throw new UnknownAgentError(agentId);
    }
    return agent;
  }

  private requireActiveTask(taskId: string, to: Task['status']): Task {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new UnknownTaskError(taskId);
    }
    if (!isActiveTaskStatus(task.status)) {
      throw new InvalidTransitionError('task', taskId, task.status, to);
    }
    return task;
  }

  private moveAgent(agentId: string, to: AgentStatus): Agent {
    const from = this.agents.statusOf(agentId);
    const agent = this.agents.transition(agentId, to);
    this.emitEvent('agent_status_changed', {
      agent_id: agent.id,
      from,
      to,
      current_task: agent.currentTask ?? null,
    });
    if (to === 'idle') {
      this.requestTick();
    }
    return agent;
  }

  /**
   * Walk the agent that held a finished task back towards idle
   */
  private releaseAgent(agentId: string, outcome: 'completed' | 'error'): void {
    const status = this.agents.statusOf(agentId);
    if (status === 'waiting') {
      this.moveAgent(agentId, 'working');
    } else if (status !== 'working') {
      log.warn('Agent not working on released task', { agentId, status });
      return;
    }

    this.moveAgent(agentId, outcome);
    if (outcome === 'completed' || this.config.agentRestartOnFailure) {
      this.moveAgent(agentId, 'idle');
    }
  }

  private dispatch(assignment: Assignment): void {
    const supervisor = this.supervisor;
    if (!supervisor) {
      return;
    }

    const { task, agent } = assignment;
    const handle = this.createHandle(task.id, agent.id, task.retryCount);

    void Promise.resolve()
      .then(() => supervisor.dispatch(task, agent, handle))
      .catch((error: unknown) => this.onDispatchFailed(task.id, agent.id, error));
  }

  private onDispatchFailed(taskId: string, agentId: string, error: unknown): void {
    log.error('Worker dispatch failed', { taskId, agentId, error });

    const task = this.tasks.get(taskId);
    if (!task || !isActiveTaskStatus(task.status) || task.assignedAgent !== agentId) {
      return;
    }

    try {
      this.failTask(taskId, `dispatch failed: ${errorMessage(error)}`);
    } catch (failError) {
      log.error('Could not record dispatch failure', { taskId, error: failError });
    }
  }

  /**
   * Handle bound to one attempt; reports from a stale attempt are rejected
   */
  private createHandle(taskId: string, agentId: string, attempt: number): WorkerHandle {
    const ensureCurrent = (to: Task['status']): void => {
      const task = this.tasks.get(taskId);
      if (!task) {
        throw new UnknownTaskError(taskId);
      }
      if (task.assignedAgent !== agentId || task.retryCount !== attempt) {
        throw new InvalidTransitionError('task', taskId, task.status, to, 'stale worker handle');
      }
    };

    return {
      taskId,
      agentId,
      start: () => {
        ensureCurrent('in_progress');
        this.startTask(taskId);
      },
      complete: (result: string) => {
        ensureCurrent('completed');
        this.completeTask(taskId, result);
      },
      fail: (error: string) => {
        ensureCurrent('failed');
        this.failTask(taskId, error);
      },
    };
  }

  /**
   * Schedule a coalesced tick on the next turn of the event loop
   */
  private requestTick(): void {
    if (!this.running || !this.config.autoAssignTasks || this.tickScheduled) {
      return;
    }

    this.tickScheduled = true;
    setImmediate(() => {
      this.tickScheduled = false;
      if (!this.running) return;
      try {
        this.scheduleTick();
      } catch (error) {
        log.error('Scheduling tick failed', { error });
      }
    });
  }

  private emitEvent(type: CoordinatorEventType, payload: EventPayload): void {
    try {
      this.emit(type, payload);
    } catch (error) {
      log.warn('Event listener failed', { eventType: type, error });
    }

    try {
      this.notifier.notify(type, payload);
    } catch (error) {
      log.warn('Notifier failed', { eventType: type, error });
    }
  }
}

/**
 * Coordinator wired to the loaded configuration and its observability server
 */
export function createCoordinator(options: CoordinatorOptions = {}): Coordinator {
  const config = options.config ?? getConfig();
  return new Coordinator({
    ...options,
    config,
    notifier: options.notifier ?? createNotifier(config.observabilityServer, config.observability),
  });
}
