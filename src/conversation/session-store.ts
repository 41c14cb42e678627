import { StateConflict } from '../lib/errors.js';
import type { ConversationSession, ConversationState } from './types.js';

/** Fields a writer may change; identity and bookkeeping belong to the store. */
export type SessionMutation = Omit<ConversationSession, 'session_id' | 'version' | 'created_at' | 'updated_at'>;

export type NewSession = Omit<ConversationSession, 'version' | 'created_at' | 'updated_at'>;

/**
 * Durable, versioned session persistence. Every write is a compare-and-swap
 * on `version`; a stale writer gets `StateConflict` and must re-read.
 */
export interface SessionStore {
  get(sessionId: string): Promise<ConversationSession | null>;
  /**
   * Inserts a session at version 1, or replaces one whose current version is
   * `replaceVersion` (starting a new review over a finished one).
   */
  create(session: NewSession, replaceVersion?: number): Promise<ConversationSession>;
  compareAndSwap(sessionId: string, expectedVersion: number, next: SessionMutation): Promise<ConversationSession>;
  /** Sessions resting in `state` whose last inbound turn is older than `before`. */
  listIdle(state: ConversationState, before: Date): Promise<ConversationSession[]>;
  close(): Promise<void>;
}

/**
 * Process-local store for development and tests. Records are cloned on the
 * way in and out so callers never share mutable state with the store.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly records = new Map<string, ConversationSession>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async get(sessionId: string): Promise<ConversationSession | null> {
    const record = this.records.get(sessionId);
    return record ? structuredClone(record) : null;
  }

  async create(session: NewSession, replaceVersion?: number): Promise<ConversationSession> {
    const existing = this.records.get(session.session_id);
    const now = this.clock().toISOString();
    if (existing) {
      if (replaceVersion === undefined || existing.version !== replaceVersion) {
        throw new StateConflict(session.session_id, replaceVersion ?? 0, 'Session already exists');
      }
      const replaced: ConversationSession = {
        ...structuredClone(session),
        version: existing.version + 1,
        created_at: now,
        updated_at: now,
      };
      this.records.set(session.session_id, replaced);
      return structuredClone(replaced);
    }
    if (replaceVersion !== undefined) {
      throw new StateConflict(session.session_id, replaceVersion, 'Session to replace no longer exists');
    }
    const created: ConversationSession = {
      ...structuredClone(session),
      version: 1,
      created_at: now,
      updated_at: now,
    };
    this.records.set(session.session_id, created);
    return structuredClone(created);
  }

  async compareAndSwap(
    sessionId: string,
    expectedVersion: number,
    next: SessionMutation,
  ): Promise<ConversationSession> {
    const current = this.records.get(sessionId);
    if (!current || current.version !== expectedVersion) {
      throw new StateConflict(sessionId, expectedVersion);
    }
    const updated: ConversationSession = {
      ...structuredClone(next),
      session_id: sessionId,
      version: current.version + 1,
      created_at: current.created_at,
      updated_at: this.clock().toISOString(),
    };
    this.records.set(sessionId, updated);
    return structuredClone(updated);
  }

  async listIdle(state: ConversationState, before: Date): Promise<ConversationSession[]> {
    const cutoff = before.getTime();
    const idle: ConversationSession[] = [];
    for (const record of this.records.values()) {
      if (record.state !== state) continue;
      const last = Date.parse(record.last_inbound_at ?? record.updated_at);
      if (last < cutoff) idle.push(structuredClone(record));
    }
    return idle;
  }

  async close(): Promise<void> {
    this.records.clear();
  }

  get size(): number {
    return this.records.size;
  }
}
