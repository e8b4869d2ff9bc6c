/**
 * Message bus - append-only inter-agent message log with time-bounded retention
 */

import { EventEmitter } from 'node:events';
import type { AgentMessage } from '../types.js';
import { parseInput, PostMessageInputSchema, type PostMessageInput } from '../utils/validation.js';
import { logger } from '../utils/logger.js';

const log = logger.child('bus');

export const BROADCAST = '*';

export interface MessageBusOptions {
  retentionMs: number;
}

/**
 * Emits 'message' for every append and 'error' when a subscriber throws
 */
export class MessageBus extends EventEmitter {
  // Purges replace the array, so a reader keeps the one it started on
  private log: AgentMessage[] = [];
  private sequence = 0;
  private readonly retentionMs: number;
  private subscribers: Map<string, Set<(message: AgentMessage) => void>> = new Map();

  constructor(options: MessageBusOptions) {
    super();
    this.retentionMs = options.retentionMs;
  }

  /**
   * Append a message addressed to one agent, or to BROADCAST
   */
  post(input: PostMessageInput, now: Date = new Date()): AgentMessage {
    const data = parseInput(PostMessageInputSchema, input, 'message');

    const message: AgentMessage = Object.freeze({
      id: ++this.sequence,
      fromAgent: data.fromAgent,
      toAgent: data.toAgent,
      messageType: data.messageType,
      content: data.content,
      timestamp: now,
      ...(data.taskId !== undefined ? { taskId: data.taskId } : {}),
    });

    this.purgeExpired(now);
    this.log.push(message);

    this.emit('message', message);
    this.deliver(message);

    log.debug('Message posted', { id: message.id, from: message.fromAgent, to: message.toAgent, type: message.messageType });
    return message;
  }

  /**
   * Send to every agent but the sender
   */
  broadcast(fromAgent: string, messageType: string, content: string, taskId?: string): AgentMessage {
    return this.post({ fromAgent, toAgent: BROADCAST, messageType, content, taskId });
  }

  /**
   * Messages addressed to an agent at or after `timestamp`, in append order.
   * Lazy; every iteration starts over from the log as it is at that moment.
   */
  since(agentId: string, timestamp: Date): Iterable<AgentMessage> {
    const from = timestamp.getTime();
    return {
      [Symbol.iterator]: () => this.iterate(agentId, from),
    };
  }

  private *iterate(agentId: string, from: number): Generator<AgentMessage, void, undefined> {
    const snapshot = this.log;
    const end = snapshot.length;
    for (let i = 0; i < end; i++) {
      const message = snapshot[i];
      if (!message) continue;
      if (message.timestamp.getTime() < from) continue;
      if (message.toAgent === agentId || (message.toAgent === BROADCAST && message.fromAgent !== agentId)) {
        yield message;
      }
    }
  }

  /**
   * Drop entries older than the retention window
   */
  purgeExpired(now: Date = new Date()): number {
    const cutoff = now.getTime() - this.retentionMs;
    const kept = this.log.filter(message => message.timestamp.getTime() >= cutoff);
    const removed = this.log.length - kept.length;

    if (removed > 0) {
      this.log = kept;
      log.debug('Purged expired messages', { removed, remaining: kept.length });
    }
    return removed;
  }

  /**
   * Push delivery for messages addressed to an agent
   */
  subscribe(agentId: string, callback: (message: AgentMessage) => void): () => void {
    let subs = this.subscribers.get(agentId);
    if (!subs) {
      subs = new Set();
      this.subscribers.set(agentId, subs);
    }
    subs.add(callback);

    log.debug('Agent subscribed', { agentId });

    return () => {
      subs?.delete(callback);
      if (subs?.size === 0 && this.subscribers.get(agentId) === subs) {
        this.subscribers.delete(agentId);
      }
    };
  }

  unsubscribe(agentId: string): boolean {
    const deleted = this.subscribers.delete(agentId);
    if (deleted) {
      log.debug('Agent unsubscribed', { agentId });
    }
    return deleted;
  }

  private deliver(message: AgentMessage): void {
    for (const [agentId, subs] of this.subscribers) {
      const addressed = message.toAgent === BROADCAST ? agentId !== message.fromAgent : agentId === message.toAgent;
      if (!addressed) continue;

      for (const callback of subs) {
        try {
          callback(message);
        } catch (error) {
          log.warn('Subscriber failed', { agentId, messageId: message.id, error });
          if (this.listenerCount('error') > 0) {
            this.emit('error', error instanceof Error ? error : new Error(String(error)), message);
          }
        }
      }
    }
  }

  /**
   * Number of retained messages
   */
  get count(): number {
    return this.log.length;
  }

  /**
   * Number of messages ever posted
   */
  get totalPosted(): number {
    return this.sequence;
  }

  clear(): void {
    this.log = [];
    this.subscribers.clear();
    this.removeAllListeners();
    log.debug('Bus cleared');
  }
}
