/**
 * Agent registry - agent records, capability index and status transitions
 */

import type { Agent, AgentStatus } from '../types.js';
import type { NewAgent } from '../utils/validation.js';
import { DuplicateAgentError, InvalidTransitionError, UnknownAgentError } from '../errors.js';
import { canTransitionAgent } from '../coordination/transitions.js';
import { logger } from '../utils/logger.js';

const log = logger.child('registry');

export function cloneAgent(agent: Agent): Agent {
  return { ...agent, capabilities: [...agent.capabilities] };
}

export class AgentRegistry {
  private agents: Map<string, Agent> = new Map();
  // capability tag -> agent ids
  private byCapability: Map<string, Set<string>> = new Map();
  // agent id -> registration order, tie-break for equal lastActivity
  private registrationOrder: Map<string, number> = new Map();

  /**
   * Register an agent. Input must already be validated.
   */
  register(input: NewAgent, now: Date = new Date()): Agent {
    if (this.agents.has(input.id)) {
      throw new DuplicateAgentError(input.id);
    }

    const agent: Agent = {
      id: input.id,
      name: input.name,
      role: input.role,
      capabilities: [...input.capabilities],
      status: 'idle',
      projectPath: input.projectPath,
      maxConcurrentTasks: input.maxConcurrentTasks,
      prompt: input.prompt,
      registeredAt: now,
      lastActivity: now,
    };

    this.agents.set(agent.id, agent);
    this.registrationOrder.set(agent.id, this.registrationOrder.size);

    for (const capability of agent.capabilities) {
      let ids = this.byCapability.get(capability);
      if (!ids) {
        ids = new Set();
        this.byCapability.set(capability, ids);
      }
      ids.add(agent.id);
    }

    log.info('Registered agent', { id: agent.id, name: agent.name, role: agent.role });
    return cloneAgent(agent);
  }

  get(id: string): Agent | null {
    const agent = this.agents.get(id);
    return agent ? cloneAgent(agent) : null;
  }

  has(id: string): boolean {
    return this.agents.has(id);
  }

  statusOf(id: string): AgentStatus | null {
    return this.agents.get(id)?.status ?? null;
  }

  list(status?: AgentStatus): Agent[] {
    const agents: Agent[] = [];
    for (const agent of this.agents.values()) {
      if (!status || agent.status === status) {
        agents.push(cloneAgent(agent));
      }
    }
    return agents;
  }

  countByStatus(): Record<AgentStatus, number> {
    const counts: Record<AgentStatus, number> = {
      idle: 0,
      working: 0,
      waiting: 0,
      error: 0,
      completed: 0,
    };
    for (const agent of this.agents.values()) {
      counts[agent.status]++;
    }
    return counts;
  }

  get size(): number {
    return this.agents.size;
  }

  /**
   * Idle agents holding every required capability, longest idle first
   */
  findIdleWithCapabilities(required: Iterable<string> = []): Agent[] {
    const tags = [...new Set(required)];
    const candidates = tags.length === 0 ? [...this.agents.keys()] : this.candidatesFor(tags);

    const matches: Agent[] = [];
    for (const id of candidates) {
      const agent = this.agents.get(id);
      if (agent && agent.status === 'idle') {
        matches.push(agent);
      }
    }

    return matches
      .sort((a, b) => {
        const byActivity = a.lastActivity.getTime() - b.lastActivity.getTime();
        if (byActivity !== 0) return byActivity;
        return (this.registrationOrder.get(a.id) ?? 0) - (this.registrationOrder.get(b.id) ?? 0);
      })
      .map(cloneAgent);
  }

  /**
   * Move an agent along the status table.
   * currentTask is required when an idle agent starts working.
   */
  transition(id: string, to: AgentStatus, currentTask?: string, now: Date = new Date()): Agent {
    const agent = this.agents.get(id);
    if (!agent) {
      throw new UnknownAgentError(id);
    }

    const from = agent.status;
    if (!canTransitionAgent(from, to)) {
      throw new InvalidTransitionError('agent', id, from, to);
    }

    switch (to) {
      case 'working': {
        const task = currentTask ?? agent.pausedTask;
        if (!task) {
          throw new InvalidTransitionError('agent', id, from, to, 'no task to work on');
        }
        agent.currentTask = task;
        agent.pausedTask = undefined;
        break;
      }
      case 'waiting':
        agent.pausedTask = agent.currentTask;
        agent.currentTask = undefined;
        break;
      case 'idle':
      case 'completed':
      case 'error':
        agent.currentTask = undefined;
        agent.pausedTask = undefined;
        break;
    }

    agent.status = to;
    agent.lastActivity = now;

    log.debug('Agent transition', { agentId: id, from, to, currentTask: agent.currentTask });
    return cloneAgent(agent);
  }

  /**
   * Intersect the capability index, smallest set first
   */
  private candidatesFor(tags: string[]): string[] {
    const sets: Set<string>[] = [];
    for (const tag of tags) {
      const ids = this.byCapability.get(tag);
      if (!ids) return [];
      sets.push(ids);
    }

    sets.sort((a, b) => a.size - b.size);
    const [smallest, ...rest] = sets;
    if (!smallest) return [];

    return [...smallest].filter(id => rest.every(ids => ids.has(id)));
  }
}
