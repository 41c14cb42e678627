import type { SupabaseClient } from '@supabase/supabase-js';
import { StateConflict } from '../lib/errors.js';
import logger from '../lib/logger.js';
import type { NewSession, SessionMutation, SessionStore } from './session-store.js';
import { conversationSessionSchema, type ConversationSession, type ConversationState } from './types.js';

export const SESSIONS_TABLE = 'review_sessions';

// Postgres unique_violation
const UNIQUE_VIOLATION = '23505';

function parseRow(row: unknown): ConversationSession {
  const parsed = conversationSessionSchema.safeParse(row);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Malformed ${SESSIONS_TABLE} row: ${detail}`);
  }
  return parsed.data;
}

/**
 * Session persistence in a Supabase (Postgres) table. Compare-and-swap is an
 * UPDATE filtered on both `session_id` and `version`; zero rows back means
 * another writer got there first.
 */
export class SupabaseSessionStore implements SessionStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async get(sessionId: string): Promise<ConversationSession | null> {
    const { data, error } = await this.client
      .from(SESSIONS_TABLE)
      .select('*')
      .eq('session_id', sessionId)
      .maybeSingle();
    if (error) {
      throw new Error(`Failed to load session: ${error.message}`);
    }
    return data ? parseRow(data) : null;
  }

  async create(session: NewSession, replaceVersion?: number): Promise<ConversationSession> {
    const now = this.clock().toISOString();
    if (replaceVersion !== undefined) {
      const { session_id: sessionId, ...fields } = session;
      return this.writeIfVersion(sessionId, replaceVersion, { ...fields, created_at: now });
    }

    const { data, error } = await this.client
      .from(SESSIONS_TABLE)
      .insert({ ...session, version: 1, created_at: now, updated_at: now })
      .select('*')
      .single();
    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new StateConflict(session.session_id, 0, 'Session already exists');
      }
      throw new Error(`Failed to create session: ${error.message}`);
    }
    return parseRow(data);
  }

  async compareAndSwap(
    sessionId: string,
    expectedVersion: number,
    next: SessionMutation,
  ): Promise<ConversationSession> {
    return this.writeIfVersion(sessionId, expectedVersion, next);
  }

  async listIdle(state: ConversationState, before: Date): Promise<ConversationSession[]> {
    const { data, error } = await this.client
      .from(SESSIONS_TABLE)
      .select('*')
      .eq('state', state)
      .lt('last_inbound_at', before.toISOString())
      .limit(500);
    if (error) {
      throw new Error(`Failed to list idle sessions: ${error.message}`);
    }
    const rows: unknown[] = Array.isArray(data) ? data : [];
    const sessions: ConversationSession[] = [];
    for (const row of rows) {
      try {
        sessions.push(parseRow(row));
      } catch (err) {
        logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Skipping unreadable session row');
      }
    }
    return sessions;
  }

  async close(): Promise<void> {
    // The HTTP client holds no sockets between requests.
  }

  private async writeIfVersion(
    sessionId: string,
    expectedVersion: number,
    fields: SessionMutation & { created_at?: string },
  ): Promise<ConversationSession> {
    const { data, error } = await this.client
      .from(SESSIONS_TABLE)
      .update({
        ...fields,
        version: expectedVersion + 1,
        updated_at: this.clock().toISOString(),
      })
      .eq('session_id', sessionId)
      .eq('version', expectedVersion)
      .select('*')
      .maybeSingle();
    if (error) {
      throw new Error(`Failed to update session: ${error.message}`);
    }
    if (!data) {
      throw new StateConflict(sessionId, expectedVersion);
    }
    return parseRow(data);
  }
}
