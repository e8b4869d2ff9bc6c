/**
 * Dependency-aware priority scheduler
 *
 * One tick walks the pending pool in queue order (priority desc, insertion
 * asc), skips tasks with unfinished dependencies, and binds each ready task
 * to the longest-idle agent holding every required capability. Tasks that
 * find no agent stay queued for the next tick.
 */

import type { Agent, Task, TaskStatus } from '../types.js';
import type { TaskStore } from './task-store.js';
import type { TaskQueue } from './task-queue.js';
import type { AgentRegistry } from '../agents/registry.js';
import { logger } from '../utils/logger.js';

const log = logger.child('scheduler');

export interface Assignment {
  task: Task;
  agent: Agent;
}

/**
 * Why a dependency is not completed yet.
 * Only 'waiting' can still resolve by itself.
 */
export type UnmetReason = 'missing' | 'failed' | 'cycle' | 'blocked' | 'waiting';

export interface UnmetDependency {
  taskId: string;
  reason: UnmetReason;
}

export interface BlockedTask {
  task: Task;
  unmetDependencies: UnmetDependency[];
  satisfiable: boolean;
}

export interface SchedulerOptions {
  maxConcurrentAgents: number;
}

export class Scheduler {
  private readonly tasks: TaskStore;
  private readonly queue: TaskQueue;
  private readonly agents: AgentRegistry;
  private readonly options: SchedulerOptions;

  constructor(tasks: TaskStore, queue: TaskQueue, agents: AgentRegistry, options: SchedulerOptions) {
    this.tasks = tasks;
    this.queue = queue;
    this.agents = agents;
    this.options = options;
  }

  isReady(taskId: string): boolean {
    if (this.tasks.statusOf(taskId) !== 'pending') {
      return false;
    }
    const dependencies = this.tasks.dependenciesOf(taskId) ?? [];
    return dependencies.every(dep => this.tasks.statusOf(dep) === 'completed');
  }

  /**
   * Ready tasks in scheduling order
   */
  readyTasks(): Task[] {
    const ready: Task[] = [];
    for (const entry of this.queue.entries()) {
      if (this.isReady(entry.taskId)) {
        const task = this.tasks.get(entry.taskId);
        if (task) ready.push(task);
      }
    }
    return ready;
  }

  /**
   * Match ready tasks to idle capable agents. Synchronous, so each
   * task/agent binding is observed as a single step.
   */
  tick(now: Date = new Date()): Assignment[] {
    const counts = this.agents.countByStatus();
    let capacity = this.options.maxConcurrentAgents - counts.working - counts.waiting;
    const assignments: Assignment[] = [];

    for (const entry of this.queue.entries()) {
      if (capacity <= 0) {
        log.debug('Concurrency limit reached', { limit: this.options.maxConcurrentAgents });
        break;
      }

      if (!this.isReady(entry.taskId)) {
        continue;
      }

      const task = this.tasks.get(entry.taskId);
      if (!task) {
        // Queue entries always come from the store
        this.queue.remove(entry.taskId);
        continue;
      }

      const [agent] = this.agents.findIdleWithCapabilities(task.requiredCapabilities);
      if (!agent) {
        log.debug('No idle agent for task', { taskId: task.id, required: task.requiredCapabilities });
        continue;
      }

      // Agent first: it is idle and the task is pending, so neither step can fail
      const working = this.agents.transition(agent.id, 'working', task.id, now);
      const assigned = this.tasks.assign(task.id, agent.id, now);
      this.queue.remove(task.id);

      assignments.push({ task: assigned, agent: working });
      capacity--;

      log.info('Task assigned', { taskId: task.id, agentId: agent.id, priority: task.priority });
    }

    return assignments;
  }

  /**
   * Dependencies of a task that are not completed, with the reason
   */
  unmetDependencies(taskId: string): UnmetDependency[] {
    return this.unmetWith(taskId, new DependencyGraph(this.tasks));
  }

  /**
   * Pending tasks held back by dependencies. The dependency graph is
   * analysed once for the whole query.
   */
  blockedTasks(): BlockedTask[] {
    const graph = new DependencyGraph(this.tasks);
    const blocked: BlockedTask[] = [];

    for (const task of this.tasks.list('pending')) {
      const unmetDependencies = this.unmetWith(task.id, graph);
      if (unmetDependencies.length === 0) continue;

      blocked.push({
        task,
        unmetDependencies,
        satisfiable: unmetDependencies.every(dep => dep.reason === 'waiting'),
      });
    }

    return blocked;
  }

  private unmetWith(taskId: string, graph: DependencyGraph): UnmetDependency[] {
    const unmet: UnmetDependency[] = [];

    for (const dep of this.tasks.dependenciesOf(taskId) ?? []) {
      if (this.tasks.statusOf(dep) === 'completed') continue;
      unmet.push({ taskId: dep, reason: graph.classify(taskId, dep) });
    }

    return unmet;
  }
}

interface NodeState {
  index: number;
  low: number;
}

/**
 * Open tasks (neither completed nor failed) and the dependency edges
 * between them, split into strongly connected components. A component
 * with more than one task, or a task that depends on itself, is a cycle.
 */
class DependencyGraph {
  private readonly tasks: TaskStore;
  private readonly component = new Map<string, number>();
  private readonly cyclic = new Set<number>();
  private readonly dead = new Map<string, boolean>();
  private components = 0;

  constructor(tasks: TaskStore) {
    this.tasks = tasks;

    const state = new Map<string, NodeState>();
    const stack: string[] = [];
    const onStack = new Set<string>();

    const connect = (id: string): NodeState => {
      const node: NodeState = { index: state.size, low: state.size };
      state.set(id, node);
      stack.push(id);
      onStack.add(id);

      for (const dep of this.openDependencies(id)) {
        const seen = state.get(dep);
        if (!seen) {
          node.low = Math.min(node.low, connect(dep).low);
        } else if (onStack.has(dep)) {
          node.low = Math.min(node.low, seen.index);
        }
      }

      if (node.low === node.index) {
        const componentId = this.components++;
        const members: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          this.component.set(member, componentId);
          members.push(member);
        } while (member !== id);

        if (members.length > 1 || this.openDependencies(id).includes(id)) {
          this.cyclic.add(componentId);
        }
      }

      return node;
    };

    for (const task of tasks.list()) {
      if (isOpen(task.status) && !state.has(task.id)) {
        connect(task.id);
      }
    }
  }

  classify(rootId: string, depId: string): UnmetReason {
    const status = this.tasks.statusOf(depId);
    if (status === null) return 'missing';
    if (status === 'failed') return 'failed';
    if (depId === rootId || this.sameCycle(rootId, depId)) return 'cycle';
    if (this.isDead(depId)) return 'blocked';
    return 'waiting';
  }

  private sameCycle(a: string, b: string): boolean {
    const component = this.component.get(a);
    return component !== undefined && component === this.component.get(b) && this.cyclic.has(component);
  }

  /**
   * Whether a task can never complete: it failed, or it sits on a cycle,
   * or something it waits on is missing or dead
   */
  private isDead(id: string): boolean {
    const status = this.tasks.statusOf(id);
    if (status === null || status === 'failed') return true;
    if (status === 'completed') return false;

    const known = this.dead.get(id);
    if (known !== undefined) return known;

    const component = this.component.get(id);
    // Outside a cycle the walk cannot come back to `id`
    const dead = (component !== undefined && this.cyclic.has(component))
      || (this.tasks.dependenciesOf(id) ?? []).some(dep => this.isDead(dep));

    this.dead.set(id, dead);
    return dead;
  }

  private openDependencies(id: string): string[] {
    return (this.tasks.dependenciesOf(id) ?? []).filter(dep => {
      const status = this.tasks.statusOf(dep);
      return status !== null && isOpen(status);
    });
  }
}

function isOpen(status: TaskStatus): boolean {
  return status !== 'completed' && status !== 'failed';
}
