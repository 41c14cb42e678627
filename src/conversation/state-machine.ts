import { RateLimitExceeded } from '../lib/errors.js';
import type { IntentFactory } from './intents.js';
import type { SessionMutation } from './session-store.js';
import {
  MAX_HISTORY,
  type ConversationSession,
  type ConversationState,
  type MessageIntent,
  type Topic,
  type TurnOutcome,
  type TurnRecord,
} from './types.js';

export interface MachineConfig {
  rateCap: number;
  rateWindowMs: number;
  followupTimeoutMs: number;
}

export const MAX_INPUT_CHARS = 2000;

/**
 * What drives a turn: an inbound message, the start of a review, the
 * followup sweeper, or a collaborator failure reported by the service.
 */
export type MachineInput =
  | { kind: 'start' }
  | { kind: 'message'; text: string; event_id?: string }
  | { kind: 'timeout' }
  | { kind: 'failure'; reason: string };

export interface TransitionResult {
  next: SessionMutation;
  intents: MessageIntent[];
  outcome: TurnOutcome;
  /** States passed through, ending with the resting state. */
  states: ConversationState[];
}

const TOPIC_ALIASES: ReadonlyMap<string, Topic> = new Map([
  ['1', 'skills'],
  ['skills', 'skills'],
  ['skill', 'skills'],
  ['keywords', 'skills'],
  ['2', 'experience'],
  ['experience', 'experience'],
  ['experiences', 'experience'],
  ['achievements', 'experience'],
  ['3', 'formatting'],
  ['formatting', 'formatting'],
  ['format', 'formatting'],
  ['ats', 'formatting'],
  ['4', 'all'],
  ['all', 'all'],
  ['complete', 'all'],
  ['everything', 'all'],
]);

const COMPLETION_WORDS = new Set(['done', 'no', 'nope', 'bye', 'thanks', 'thank you', 'stop']);

export function normalizeInput(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/^[\p{P}\p{S}\s]+|[\p{P}\p{S}\s]+$/gu, '')
    .replace(/\s+/g, ' ');
}

export function isUnparseable(text: string): boolean {
  return text.trim().length === 0 || text.length > MAX_INPUT_CHARS;
}

export function parseTopic(normalized: string): Topic | null {
  return TOPIC_ALIASES.get(normalized) ?? null;
}

export function isCompletion(normalized: string): boolean {
  return COMPLETION_WORDS.has(normalized);
}

interface Plan {
  state: ConversationState;
  states: ConversationState[];
  intents: MessageIntent[];
  outcome: TurnOutcome;
  last_choice: Topic | null;
  covered_topics: Topic[];
}

function addCovered(covered: readonly Topic[], topic: Topic): Topic[] {
  const next = new Set<Topic>(covered);
  if (topic === 'all') {
    next.add('skills').add('experience').add('formatting');
  }
  next.add(topic);
  return [...next];
}

function followupTimedOut(session: ConversationSession, now: Date, config: MachineConfig): boolean {
  if (!session.last_inbound_at) return false;
  return now.getTime() - Date.parse(session.last_inbound_at) > config.followupTimeoutMs;
}

/** Decides the transition and its intents, ignoring the rate budget. */
function plan(
  session: ConversationSession,
  input: MachineInput,
  now: Date,
  config: MachineConfig,
  intents: IntentFactory,
): Plan {
  const keep = { last_choice: session.last_choice, covered_topics: [...session.covered_topics] };
  const fail = (): Plan => ({
    ...keep,
    state: 'ERROR',
    states: ['ERROR'],
    intents: [intents.apology()],
    outcome: 'ERROR',
  });
  const detail = (topic: Topic): Plan => {
    const covered = addCovered(session.covered_topics, topic);
    return {
      state: 'AWAITING_FOLLOWUP',
      states: ['DETAIL_SENT', 'AWAITING_FOLLOWUP'],
      intents: [intents.detail(topic, session), intents.followupPrompt(session, covered)],
      outcome: 'ADVANCED',
      last_choice: topic,
      covered_topics: covered,
    };
  };
  const close = (outcome: TurnOutcome): Plan => ({
    ...keep,
    state: 'COMPLETED',
    states: ['COMPLETED'],
    intents: [intents.closing()],
    outcome,
  });
  // Unrecognized input: one clarification, state unchanged.
  const clarify = (): Plan => ({
    ...keep,
    state: session.state,
    states: [session.state],
    intents: [session.state === 'AWAITING_CHOICE' ? intents.clarifyChoice() : intents.clarifyFollowup(session)],
    outcome: 'UNRECOGNIZED_INPUT',
  });

  if (input.kind === 'failure') return fail();

  if (input.kind === 'timeout') {
    if (session.state === 'AWAITING_FOLLOWUP' || session.state === 'DETAIL_SENT') return close('TIMEOUT');
    return { ...keep, state: session.state, states: [session.state], intents: [], outcome: 'ADVANCED' };
  }

  if (session.state === 'INIT' || session.state === 'ERROR' || input.kind === 'start') {
    return {
      ...keep,
      state: 'SUMMARY_SENT',
      states: ['SUMMARY_SENT'],
      intents: [intents.summary(session)],
      outcome: 'ADVANCED',
    };
  }

  if (isUnparseable(input.text)) return fail();
  const normalized = normalizeInput(input.text);
  const topic = parseTopic(normalized);

  switch (session.state) {
    case 'SUMMARY_SENT':
      return {
        ...keep,
        state: 'AWAITING_CHOICE',
        states: ['AWAITING_CHOICE'],
        intents: [intents.topicMenu(session)],
        outcome: 'ADVANCED',
      };

    case 'AWAITING_CHOICE':
      return topic ? detail(topic) : clarify();

    case 'DETAIL_SENT':
    case 'AWAITING_FOLLOWUP':
      if (followupTimedOut(session, now, config)) return close('TIMEOUT');
      if (isCompletion(normalized)) return close('ADVANCED');
      return topic ? detail(topic) : clarify();

    default:
      // COMPLETED: a topic reopens the review.
      if (topic) return detail(topic);
      return {
        ...keep,
        state: 'COMPLETED',
        states: ['COMPLETED'],
        intents: [intents.completedReminder()],
        outcome: 'ADVANCED',
      };
  }
}

interface RateWindow {
  start: string;
  count: number;
}

function currentWindow(session: ConversationSession, now: Date, config: MachineConfig): RateWindow {
  const start = session.rate_window_start ? Date.parse(session.rate_window_start) : NaN;
  if (Number.isNaN(start) || now.getTime() >= start + config.rateWindowMs) {
    return { start: now.toISOString(), count: 0 };
  }
  return { start: new Date(start).toISOString(), count: session.rate_window_count };
}

/** Reserves `needed` sends in the window or throws `RateLimitExceeded`. */
function reserveBudget(window: RateWindow, needed: number, config: MachineConfig): RateWindow {
  if (window.count + needed > config.rateCap) {
    throw new RateLimitExceeded(Date.parse(window.start) + config.rateWindowMs);
  }
  return { start: window.start, count: window.count + needed };
}

function appendHistory(history: readonly TurnRecord[], record: TurnRecord): TurnRecord[] {
  const next = [...history, record];
  return next.length > MAX_HISTORY ? next.slice(next.length - MAX_HISTORY) : next;
}

/**
 * Computes one conversation turn. Pure: the caller persists `next` with a
 * compare-and-swap and hands `intents` to the composer.
 */
export function transition(
  session: ConversationSession,
  input: MachineInput,
  now: Date,
  config: MachineConfig,
  intents: IntentFactory,
): TransitionResult {
  const planned = plan(session, input, now, config, intents);
  const window = currentWindow(session, now, config);

  let result: Omit<TransitionResult, 'next'> & { window: RateWindow; plan: Plan };
  try {
    const reserved = reserveBudget(window, planned.intents.length, config);
    result = {
      intents: planned.intents,
      outcome: planned.outcome,
      states: planned.states,
      window: reserved,
      plan: planned,
    };
  } catch (err) {
    if (!(err instanceof RateLimitExceeded)) throw err;
    // Transition stays pending; the user is told when to come back.
    result = {
      intents: [intents.deferred(err.windowResetsAt - now.getTime())],
      outcome: 'RATE_LIMIT_EXCEEDED',
      states: [session.state],
      window: {
        start: session.rate_window_start ?? window.start,
        count: session.rate_window_count,
      },
      plan: {
        state: session.state,
        states: [session.state],
        intents: [],
        outcome: 'RATE_LIMIT_EXCEEDED',
        last_choice: session.last_choice,
        covered_topics: [...session.covered_topics],
      },
    };
  }

  const inbound = input.kind === 'message' ? input.text : '';
  const record: TurnRecord = {
    inbound_text: inbound,
    ...(input.kind === 'message' && input.event_id ? { event_id: input.event_id } : {}),
    outbound_intents: result.intents,
    states: result.states,
    outcome: result.outcome,
    timestamp: now.toISOString(),
  };

  const next: SessionMutation = {
    state: result.plan.state,
    last_choice: result.plan.last_choice,
    covered_topics: result.plan.covered_topics,
    score_result: session.score_result,
    history: appendHistory(session.history, record),
    turn_count: session.turn_count + 1,
    rate_window_start: result.window.start,
    rate_window_count: result.window.count,
    last_inbound_at: input.kind === 'message' || input.kind === 'start' ? now.toISOString() : session.last_inbound_at,
    context: session.context,
  };

  return { next, intents: result.intents, outcome: result.outcome, states: result.states };
}
