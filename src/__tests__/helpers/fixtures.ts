import type { NewsletterChunkInput } from '../../content/content-store.js';
import type { NewSession, SessionMutation } from '../../conversation/session-store.js';
import type { ConversationSession } from '../../conversation/types.js';
import type { ScoreResult } from '../../scoring/types.js';

export const T0 = new Date('2026-03-02T09:00:00.000Z');

export function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60_000);
}

export function makeScore(overrides: Partial<ScoreResult> = {}): ScoreResult {
  return {
    confidence: 14,
    band: 'very_low',
    jd_overlap_ratio: 0.2,
    newsletter_relevance_ratio: 0,
    matched_keywords: ['product'],
    missing_keywords: ['director', 'enterprise', 'leadership', 'strategic'],
    citations: [],
    degraded: false,
    ...overrides,
  };
}

export function makeSession(overrides: Partial<ConversationSession> = {}): ConversationSession {
  return {
    session_id: '+15550000001',
    state: 'INIT',
    last_choice: null,
    covered_topics: [],
    score_result: makeScore(),
    history: [],
    turn_count: 0,
    rate_window_start: null,
    rate_window_count: 0,
    last_inbound_at: null,
    context: {},
    version: 1,
    created_at: T0.toISOString(),
    updated_at: T0.toISOString(),
    ...overrides,
  };
}

export function makeNewSession(overrides: Partial<NewSession> = {}): NewSession {
  const { version: _version, created_at: _created, updated_at: _updated, ...fresh } = makeSession(overrides);
  return fresh;
}

export function mutationOf(session: ConversationSession, overrides: Partial<SessionMutation> = {}): SessionMutation {
  const { session_id: _id, version: _version, created_at: _created, updated_at: _updated, ...fields } = session;
  return { ...fields, ...overrides };
}

export const ADVICE_CHUNKS: NewsletterChunkInput[] = [
  {
    id: 'keywords-1',
    text: 'Keywords\nMirror the exact product terms from the posting. Recruiters search for them.',
    topic_tags: ['skills', 'keywords'],
    source_article: 'Beating the Filter',
    source_url: 'https://newsletter.example.com/p/beating-the-filter',
    order_index: 0,
  },
  {
    id: 'impact-1',
    text: 'Show Impact\nLead each product bullet with a measurable result.',
    topic_tags: ['experience', 'quantification'],
    source_article: 'Bullets That Land',
    source_url: 'https://newsletter.example.com/p/bullets-that-land',
    order_index: 1,
  },
  {
    id: 'layout-1',
    text: 'Layout\nKeep one column and standard section names.',
    topic_tags: ['formatting'],
    source_article: 'Bullets That Land',
    source_url: 'https://newsletter.example.com/p/bullets-that-land',
    order_index: 2,
  },
];
