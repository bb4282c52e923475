/**
 * Conversation Context
 *
 * Per-session memory handed to the intent resolver. A context lives as long as
 * its session does in the SessionContextStore; nothing here is process-global.
 */
import type { Message } from '../llm/types.js';

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
  at: Date;
}

export class ConversationContext {
  readonly sessionId: string;
  private readonly maxTurns: number;
  private turns: ConversationTurn[] = [];

  constructor(sessionId: string, maxTurns = 20) {
    this.sessionId = sessionId;
    this.maxTurns = maxTurns;
  }

  record(role: ConversationTurn['role'], content: string, at: Date = new Date()): void {
    this.turns.push({ role, content, at });
    if (this.turns.length > this.maxTurns) {
      this.turns = this.turns.slice(-this.maxTurns);
    }
  }

  /** Most recent turns, oldest first, as chat messages. */
  history(limit: number = this.maxTurns): Message[] {
    if (limit <= 0) {
      return [];
    }
    return this.turns.slice(-limit).map((turn) => ({ role: turn.role, content: turn.content }));
  }

  get size(): number {
    return this.turns.length;
  }
}

/**
 * Bounded in-memory map of session id → context. The least recently used
 * session is evicted once `maxSessions` is reached.
 */
export class SessionContextStore {
  private readonly contexts = new Map<string, ConversationContext>();
  private readonly maxSessions: number;
  private readonly maxTurns: number;

  constructor(options: { maxSessions?: number; maxTurns?: number } = {}) {
    this.maxSessions = options.maxSessions ?? 500;
    this.maxTurns = options.maxTurns ?? 20;
  }

  get(sessionId: string): ConversationContext {
    const existing = this.contexts.get(sessionId);
    if (existing) {
      // Re-insert to mark as most recently used
      this.contexts.delete(sessionId);
      this.contexts.set(sessionId, existing);
      return existing;
    }

    const context = new ConversationContext(sessionId, this.maxTurns);
    this.contexts.set(sessionId, context);

    while (this.contexts.size > this.maxSessions) {
      const oldest = this.contexts.keys().next();
      if (oldest.done) break;
      this.contexts.delete(oldest.value);
    }

    return context;
  }

  has(sessionId: string): boolean {
    return this.contexts.has(sessionId);
  }

  delete(sessionId: string): boolean {
    return this.contexts.delete(sessionId);
  }

  get size(): number {
    return this.contexts.size;
  }
}
