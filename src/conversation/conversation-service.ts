import type { ContentStore, NewsletterChunk } from '../content/content-store.js';
import { DeliveryFailed, GenerationFailed, StateConflict } from '../lib/errors.js';
import { createSessionLogger } from '../lib/logger.js';
import type { MessageComposer } from '../messaging/composer.js';
import {
  deliverBatch,
  idempotencyKey,
  type DeliveryChannel,
  type DeliveryReceipt,
  type DeliveryRetryOptions,
  type OutboundMessage,
} from '../messaging/delivery.js';
import type { IdempotencyLedger } from '../messaging/idempotency.js';
import type { ReviewNarrator } from '../review/narrator.js';
import type { RelevanceScorer } from '../scoring/relevance-scorer.js';
import type { IntentFactory } from './intents.js';
import type { NewSession, SessionStore } from './session-store.js';
import { transition, type MachineConfig, type MachineInput, type TransitionResult } from './state-machine.js';
import type {
  ConversationSession,
  ConversationState,
  MessageIntent,
  SessionContext,
  TurnOutcome,
  TurnRecord,
} from './types.js';

export interface ConversationServiceDeps {
  sessions: SessionStore;
  scorer: RelevanceScorer;
  content: ContentStore;
  intents: IntentFactory;
  composer: MessageComposer;
  channel: DeliveryChannel;
  ledger: IdempotencyLedger;
  narrator?: ReviewNarrator | null;
  machine: MachineConfig;
  deliveryRetry?: DeliveryRetryOptions;
  clock?: () => Date;
}

export interface StartReviewInput {
  session_id: string;
  resume_text: string;
  job_text?: string | null;
  context?: SessionContext;
}

export interface TurnReport {
  session_id: string;
  /** Resting state after the turn; null when no session exists. */
  state: ConversationState | null;
  outcome: TurnOutcome | 'NO_SESSION';
  intents: MessageIntent[];
  receipts: DeliveryReceipt[];
  /** True when the inbound event had already been processed. */
  replayed: boolean;
  session: ConversationSession | null;
}

const RESTARTABLE_STATES: ReadonlySet<ConversationState> = new Set(['COMPLETED', 'ERROR']);

/** Position of `history[index]` in the session's lifetime turn sequence. */
function turnIndexOf(session: ConversationSession, historyIndex: number): number {
  return session.turn_count - session.history.length + historyIndex;
}

/**
 * Finds the stored turn for a provider event. Only the retained history
 * (`MAX_HISTORY` turns) is searched: an event redelivered after its turn was
 * trimmed is processed as a new turn.
 */
function findTurn(session: ConversationSession, eventId: string): { record: TurnRecord; turn: number } | null {
  const index = session.history.findIndex((r) => r.event_id === eventId);
  if (index < 0) return null;
  return { record: session.history[index], turn: turnIndexOf(session, index) };
}

/**
 * Orchestrates a review conversation: scoring at the start, then one
 * read-compute-CAS-deliver cycle per inbound turn. The state machine stays
 * pure; persistence, delivery and collaborator failures are handled here.
 */
export class ConversationService {
  private readonly clock: () => Date;

  constructor(private readonly deps: ConversationServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async startReview(input: StartReviewInput): Promise<TurnReport> {
    const log = createSessionLogger(input.session_id);
    // ValidationError surfaces here, before any session is touched.
    const score = this.deps.scorer.scoreOrDegrade(input.resume_text, input.job_text ?? null);

    const existing = await this.deps.sessions.get(input.session_id);
    if (existing && !RESTARTABLE_STATES.has(existing.state)) {
      throw new StateConflict(input.session_id, existing.version, 'A review is already in progress for this session');
    }

    const context: SessionContext = { ...input.context };
    let generationError: GenerationFailed | null = null;
    if (this.deps.narrator) {
      try {
        context.narrative = await this.deps.narrator.narrate(score, this.citedChunks(score.citations), context);
      } catch (err) {
        if (!(err instanceof GenerationFailed)) throw err;
        log.error({ err: err.message }, 'Review narrative unavailable');
        generationError = err;
      }
    }

    const fresh: NewSession = {
      session_id: input.session_id,
      state: 'INIT',
      last_choice: null,
      covered_topics: [],
      score_result: score,
      history: [],
      // Carried over so idempotency keys never repeat across reviews.
      turn_count: existing?.turn_count ?? 0,
      rate_window_start: existing?.rate_window_start ?? null,
      rate_window_count: existing?.rate_window_count ?? 0,
      last_inbound_at: null,
      context,
    };
    const created = await this.deps.sessions.create(fresh, existing?.version);
    log.info({ band: score.band, degraded: score.degraded, replaced: Boolean(existing) }, 'Review started');

    const firstTurn: MachineInput = generationError
      ? { kind: 'failure', reason: generationError.message }
      : { kind: 'start' };
    return this.advance(created, firstTurn);
  }

  async handleInbound(sessionId: string, text: string, eventId?: string): Promise<TurnReport> {
    const log = createSessionLogger(sessionId, eventId ? { event: eventId } : undefined);
    const session = await this.deps.sessions.get(sessionId);
    if (!session) {
      log.info('Inbound message for unknown session');
      return this.replyWithoutSession(sessionId, eventId);
    }

    if (eventId) {
      const prior = findTurn(session, eventId);
      if (prior) {
        log.info({ turn: prior.turn }, 'Duplicate inbound event; replaying stored turn');
        return this.replay(session, prior.record, prior.turn);
      }
    }

    return this.advance(session, { kind: 'message', text, ...(eventId ? { event_id: eventId } : {}) });
  }

  /** Closes followup sessions idle past the timeout. Returns how many closed. */
  async expireIdleSessions(now: Date = this.clock()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.deps.machine.followupTimeoutMs);
    const idle = await this.deps.sessions.listIdle('AWAITING_FOLLOWUP', cutoff);
    let closed = 0;
    for (const session of idle) {
      const log = createSessionLogger(session.session_id);
      try {
        const report = await this.advance(session, { kind: 'timeout' }, now);
        if (report.state === 'COMPLETED') closed += 1;
      } catch (err) {
        if (err instanceof StateConflict) {
          log.debug('Session changed during sweep; leaving it for the next pass');
          continue;
        }
        log.error({ err: err instanceof Error ? err.message : String(err) }, 'Failed to expire idle session');
      }
    }
    return closed;
  }

  getSession(sessionId: string): Promise<ConversationSession | null> {
    return this.deps.sessions.get(sessionId);
  }

  /**
   * Computes and persists one turn, re-reading and recomputing once on a
   * version conflict, then delivers it.
   */
  private async advance(session: ConversationSession, input: MachineInput, at?: Date): Promise<TurnReport> {
    const log = createSessionLogger(session.session_id);
    let current = session;

    for (let attempt = 1; ; attempt++) {
      const now = at ?? this.clock();
      const result = transition(current, input, now, this.deps.machine, this.deps.intents);

      // The sweeper does not spend a deferral message on a user who is idle.
      if (input.kind === 'timeout' && (result.outcome === 'RATE_LIMIT_EXCEEDED' || result.intents.length === 0)) {
        return this.report(current, result.outcome, [], [], false);
      }

      let saved: ConversationSession;
      try {
        saved = await this.deps.sessions.compareAndSwap(current.session_id, current.version, result.next);
      } catch (err) {
        if (!(err instanceof StateConflict) || attempt >= 2) throw err;
        log.warn({ expectedVersion: current.version }, 'Session version conflict; recomputing turn');
        const latest = await this.deps.sessions.get(current.session_id);
        if (!latest) throw err;
        if (input.kind === 'message' && input.event_id) {
          const prior = findTurn(latest, input.event_id);
          if (prior) return this.replay(latest, prior.record, prior.turn);
        }
        current = latest;
        continue;
      }

      log.info({ from: current.state, to: saved.state, outcome: result.outcome, turn: current.turn_count }, 'Turn advanced');
      return this.dispatch(saved, result, current.turn_count, input);
    }
  }

  private async dispatch(
    saved: ConversationSession,
    result: TransitionResult,
    turn: number,
    input: MachineInput,
  ): Promise<TurnReport> {
    try {
      const receipts = await this.deliverTurn(saved, result.intents, turn);
      return this.report(saved, result.outcome, result.intents, receipts, false);
    } catch (err) {
      if (!(err instanceof DeliveryFailed)) throw err;
      const log = createSessionLogger(saved.session_id);
      log.error({ err: err.message, key: err.idempotencyKey }, 'Outbound delivery failed');
      if (input.kind === 'failure') {
        // Already the apology turn; nothing further to send.
        return this.report(saved, 'ERROR', result.intents, [], false);
      }
      return this.advance(saved, { kind: 'failure', reason: err.message });
    }
  }

  private async replay(session: ConversationSession, record: TurnRecord, turn: number): Promise<TurnReport> {
    const receipts = await this.deliverTurn(session, record.outbound_intents, turn);
    return this.report(session, record.outcome, record.outbound_intents, receipts, true);
  }

  private async deliverTurn(
    session: ConversationSession,
    intents: readonly MessageIntent[],
    turn: number,
  ): Promise<DeliveryReceipt[]> {
    const messages: OutboundMessage[] = intents.map((intent, i) => ({
      to: session.session_id,
      body: this.deps.composer.render(intent, session.score_result, session),
      idempotency_key: idempotencyKey(session.session_id, turn, i),
    }));
    return deliverBatch(this.deps.channel, this.deps.ledger, messages, this.deps.deliveryRetry);
  }

  private async replyWithoutSession(sessionId: string, eventId: string | undefined): Promise<TurnReport> {
    const intent: MessageIntent = { template_id: 'help', variables: {} };
    const key = `${sessionId}:help:${eventId ?? this.clock().toISOString()}`;
    const receipts = await deliverBatch(
      this.deps.channel,
      this.deps.ledger,
      [{ to: sessionId, body: this.deps.composer.renderStandalone(intent), idempotency_key: key }],
      this.deps.deliveryRetry,
    );
    return {
      session_id: sessionId,
      state: null,
      outcome: 'NO_SESSION',
      intents: [intent],
      receipts,
      replayed: false,
      session: null,
    };
  }

  private citedChunks(citations: readonly string[]): NewsletterChunk[] {
    if (!this.deps.content.isLoaded()) return [];
    return citations.flatMap((id) => {
      const chunk = this.deps.content.get(id);
      return chunk ? [chunk] : [];
    });
  }

  private report(
    session: ConversationSession,
    outcome: TurnOutcome,
    intents: MessageIntent[],
    receipts: DeliveryReceipt[],
    replayed: boolean,
  ): TurnReport {
    return { session_id: session.session_id, state: session.state, outcome, intents, receipts, replayed, session };
  }
}
