import { z } from 'zod';
import { scoreResultSchema, type ScoreResult } from '../scoring/types.js';

export const CONVERSATION_STATES = [
  'INIT',
  'SUMMARY_SENT',
  'AWAITING_CHOICE',
  'DETAIL_SENT',
  'AWAITING_FOLLOWUP',
  'COMPLETED',
  'ERROR',
] as const;
export type ConversationState = (typeof CONVERSATION_STATES)[number];

export const TOPICS = ['skills', 'experience', 'formatting', 'all'] as const;
export type Topic = (typeof TOPICS)[number];

export const TEMPLATE_IDS = [
  'summary',
  'topic_menu',
  'detail_skills',
  'detail_experience',
  'detail_formatting',
  'detail_all',
  'followup_prompt',
  'clarify_choice',
  'clarify_followup',
  'closing',
  'completed_reminder',
  'deferred',
  'apology',
  'help',
  'too_long',
] as const;
export type TemplateId = (typeof TEMPLATE_IDS)[number];

export interface MessageIntent {
  template_id: TemplateId;
  variables: Record<string, string>;
}

export const TURN_OUTCOMES = [
  'ADVANCED',
  'UNRECOGNIZED_INPUT',
  'RATE_LIMIT_EXCEEDED',
  'TIMEOUT',
  'ERROR',
] as const;
export type TurnOutcome = (typeof TURN_OUTCOMES)[number];

export interface TurnRecord {
  inbound_text: string;
  event_id?: string;
  outbound_intents: MessageIntent[];
  /** States passed through during the turn, ending with the resting state. */
  states: ConversationState[];
  outcome: TurnOutcome;
  timestamp: string;
}

/** Presentation data captured when the review was started. */
export interface SessionContext {
  job_title?: string;
  company?: string;
  narrative?: string;
}

export interface ConversationSession {
  session_id: string;
  state: ConversationState;
  last_choice: Topic | null;
  covered_topics: Topic[];
  score_result: ScoreResult;
  history: TurnRecord[];
  /** Index of the next turn; survives history trimming. */
  turn_count: number;
  rate_window_start: string | null;
  rate_window_count: number;
  last_inbound_at: string | null;
  context: SessionContext;
  version: number;
  created_at: string;
  updated_at: string;
}

export const MAX_HISTORY = 50;

const intentSchema = z.object({
  template_id: z.enum(TEMPLATE_IDS),
  variables: z.record(z.string()),
});

const turnRecordSchema = z.object({
  inbound_text: z.string(),
  event_id: z.string().optional(),
  outbound_intents: z.array(intentSchema),
  states: z.array(z.enum(CONVERSATION_STATES)),
  outcome: z.enum(TURN_OUTCOMES),
  timestamp: z.string(),
});

export const conversationSessionSchema = z.object({
  session_id: z.string().min(1),
  state: z.enum(CONVERSATION_STATES),
  last_choice: z.enum(TOPICS).nullable(),
  covered_topics: z.array(z.enum(TOPICS)),
  score_result: scoreResultSchema,
  history: z.array(turnRecordSchema),
  turn_count: z.number().int().nonnegative(),
  rate_window_start: z.string().nullable(),
  rate_window_count: z.number().int().nonnegative(),
  last_inbound_at: z.string().nullable(),
  context: z.object({
    job_title: z.string().optional(),
    company: z.string().optional(),
    narrative: z.string().optional(),
  }),
  version: z.number().int().positive(),
  created_at: z.string(),
  updated_at: z.string(),
});
