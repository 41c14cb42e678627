import { describe, it, expect, beforeAll } from 'vitest';
import { ContentStore } from '../content/content-store.js';
import { KeywordExtractor } from '../content/keyword-extractor.js';
import { ReviewIntentFactory } from '../conversation/intents.js';
import {
  isCompletion,
  normalizeInput,
  parseTopic,
  transition,
  type MachineConfig,
} from '../conversation/state-machine.js';
import type { TurnRecord } from '../conversation/types.js';
import { loadConfig } from '../lib/config.js';
import { ADVICE_CHUNKS, makeSession, minutesAfter, T0 } from './helpers/fixtures.js';

const DEFAULTS = loadConfig({ NODE_ENV: 'test' });
const CONFIG: MachineConfig = {
  rateCap: DEFAULTS.RATE_CAP_MESSAGES,
  rateWindowMs: DEFAULTS.RATE_WINDOW_MS,
  followupTimeoutMs: DEFAULTS.FOLLOWUP_TIMEOUT_MS,
};

let intents: ReviewIntentFactory;

beforeAll(() => {
  const store = new ContentStore(new KeywordExtractor());
  store.load(ADVICE_CHUNKS);
  intents = new ReviewIntentFactory(store);
});

function templateIds(result: ReturnType<typeof transition>): string[] {
  return result.intents.map((i) => i.template_id);
}

describe('input parsing', () => {
  it('normalizes case, whitespace and surrounding punctuation', () => {
    expect(normalizeInput('  Thank   You!! ')).toBe('thank you');
    expect(normalizeInput('"Skills."')).toBe('skills');
  });

  it('maps digits and aliases to topics', () => {
    expect(parseTopic('1')).toBe('skills');
    expect(parseTopic('achievements')).toBe('experience');
    expect(parseTopic('ats')).toBe('formatting');
    expect(parseTopic('4')).toBe('all');
    expect(parseTopic('5')).toBeNull();
  });

  it('recognizes completion words', () => {
    expect(isCompletion('done')).toBe(true);
    expect(isCompletion('thank you')).toBe(true);
    expect(isCompletion('more')).toBe(false);
  });
});

describe('transition', () => {
  it('sends the summary when a review starts', () => {
    const result = transition(makeSession(), { kind: 'start' }, T0, CONFIG, intents);

    expect(templateIds(result)).toEqual(['summary']);
    expect(result.outcome).toBe('ADVANCED');
    expect(result.states).toEqual(['SUMMARY_SENT']);
    expect(result.next.state).toBe('SUMMARY_SENT');
    expect(result.next.turn_count).toBe(1);
    expect(result.next.rate_window_start).toBe(T0.toISOString());
    expect(result.next.rate_window_count).toBe(1);
    expect(result.next.last_inbound_at).toBe(T0.toISOString());
    expect(result.next.history).toHaveLength(1);
    expect(result.next.history[0].inbound_text).toBe('');
  });

  it('answers any message after the summary with the topic menu', () => {
    const result = transition(
      makeSession({ state: 'SUMMARY_SENT' }),
      { kind: 'message', text: 'ok', event_id: 'SM1' },
      T0,
      CONFIG,
      intents,
    );
    expect(templateIds(result)).toEqual(['topic_menu']);
    expect(result.next.state).toBe('AWAITING_CHOICE');
    expect(result.next.history[0].event_id).toBe('SM1');
  });

  it('sends exactly one clarification for an unrecognized choice and keeps the state', () => {
    const session = makeSession({ state: 'AWAITING_CHOICE' });
    const result = transition(session, { kind: 'message', text: '5' }, T0, CONFIG, intents);

    expect(templateIds(result)).toEqual(['clarify_choice']);
    expect(result.outcome).toBe('UNRECOGNIZED_INPUT');
    expect(result.next.state).toBe('AWAITING_CHOICE');
    expect(result.next.last_choice).toBeNull();
  });

  it('sends the detail and a followup prompt for a chosen topic', () => {
    const result = transition(
      makeSession({ state: 'AWAITING_CHOICE' }),
      { kind: 'message', text: ' Skills! ' },
      T0,
      CONFIG,
      intents,
    );

    expect(templateIds(result)).toEqual(['detail_skills', 'followup_prompt']);
    expect(result.states).toEqual(['DETAIL_SENT', 'AWAITING_FOLLOWUP']);
    expect(result.next.state).toBe('AWAITING_FOLLOWUP');
    expect(result.next.last_choice).toBe('skills');
    expect(result.next.covered_topics).toEqual(['skills']);
    expect(result.intents[1].variables.remaining).toBe('EXPERIENCE or FORMATTING');
    expect(result.next.rate_window_count).toBe(2);
  });

  it('marks every topic covered when ALL is chosen', () => {
    const result = transition(
      makeSession({ state: 'AWAITING_CHOICE' }),
      { kind: 'message', text: '4' },
      T0,
      CONFIG,
      intents,
    );
    expect(templateIds(result)).toEqual(['detail_all', 'followup_prompt']);
    expect(result.next.covered_topics).toEqual(['skills', 'experience', 'formatting', 'all']);
    expect(result.intents[1].variables.remaining).toBe('SKILLS, EXPERIENCE, FORMATTING or ALL');
  });

  describe('rate budget', () => {
    const windowStart = minutesAfter(T0, -60).toISOString();

    it('defers the next send once 9 messages went out in the window', () => {
      const session = makeSession({
        state: 'SUMMARY_SENT',
        rate_window_start: windowStart,
        rate_window_count: 9,
      });
      const result = transition(session, { kind: 'message', text: 'ok' }, T0, CONFIG, intents);

      expect(templateIds(result)).toEqual(['deferred']);
      expect(result.intents[0].variables.resume_after).toBe('about 23 hours');
      expect(result.outcome).toBe('RATE_LIMIT_EXCEEDED');
      expect(result.next.state).toBe('SUMMARY_SENT');
      expect(result.next.rate_window_count).toBe(9);
      expect(result.next.rate_window_start).toBe(windowStart);
    });

    it('defers a two-message turn that would pass the cap and leaves the choice pending', () => {
      const session = makeSession({
        state: 'AWAITING_CHOICE',
        rate_window_start: windowStart,
        rate_window_count: 8,
      });
      const result = transition(session, { kind: 'message', text: 'skills' }, T0, CONFIG, intents);

      expect(templateIds(result)).toEqual(['deferred']);
      expect(result.next.state).toBe('AWAITING_CHOICE');
      expect(result.next.rate_window_count).toBe(8);
      expect(result.next.covered_topics).toEqual([]);
      expect(result.next.last_choice).toBeNull();
      expect(result.next.turn_count).toBe(1);
    });

    it('allows a single-message turn that exactly reaches the cap', () => {
      const session = makeSession({
        state: 'SUMMARY_SENT',
        rate_window_start: windowStart,
        rate_window_count: 8,
      });
      const result = transition(session, { kind: 'message', text: 'ok' }, T0, CONFIG, intents);
      expect(templateIds(result)).toEqual(['topic_menu']);
      expect(result.next.rate_window_count).toBe(9);
    });

    it('opens a fresh window once the previous one has elapsed', () => {
      const session = makeSession({
        state: 'AWAITING_CHOICE',
        rate_window_start: minutesAfter(T0, -24 * 60).toISOString(),
        rate_window_count: 9,
      });
      const result = transition(session, { kind: 'message', text: '2' }, T0, CONFIG, intents);
      expect(templateIds(result)).toEqual(['detail_experience', 'followup_prompt']);
      expect(result.next.rate_window_start).toBe(T0.toISOString());
      expect(result.next.rate_window_count).toBe(2);
    });
  });

  describe('followup', () => {
    const recent = minutesAfter(T0, -5).toISOString();

    it('closes the review on a completion word', () => {
      const session = makeSession({ state: 'AWAITING_FOLLOWUP', last_inbound_at: recent, covered_topics: ['skills'] });
      const result = transition(session, { kind: 'message', text: 'Done.' }, T0, CONFIG, intents);
      expect(templateIds(result)).toEqual(['closing']);
      expect(result.outcome).toBe('ADVANCED');
      expect(result.next.state).toBe('COMPLETED');
      expect(result.next.covered_topics).toEqual(['skills']);
    });

    it('moves to another topic', () => {
      const session = makeSession({ state: 'AWAITING_FOLLOWUP', last_inbound_at: recent, covered_topics: ['skills'] });
      const result = transition(session, { kind: 'message', text: 'format' }, T0, CONFIG, intents);
      expect(templateIds(result)).toEqual(['detail_formatting', 'followup_prompt']);
      expect(result.next.covered_topics).toEqual(['skills', 'formatting']);
      expect(result.intents[1].variables.remaining).toBe('EXPERIENCE');
    });

    it('asks again with the remaining topics on unrecognized input', () => {
      const session = makeSession({ state: 'AWAITING_FOLLOWUP', last_inbound_at: recent, covered_topics: ['skills'] });
      const result = transition(session, { kind: 'message', text: 'maybe later' }, T0, CONFIG, intents);
      expect(templateIds(result)).toEqual(['clarify_followup']);
      expect(result.intents[0].variables.remaining).toBe('EXPERIENCE or FORMATTING');
      expect(result.outcome).toBe('UNRECOGNIZED_INPUT');
      expect(result.next.state).toBe('AWAITING_FOLLOWUP');
    });

    it('treats a reply after the followup timeout as a timeout', () => {
      const session = makeSession({
        state: 'AWAITING_FOLLOWUP',
        last_inbound_at: minutesAfter(T0, -31).toISOString(),
      });
      const result = transition(session, { kind: 'message', text: 'experience' }, T0, CONFIG, intents);
      expect(templateIds(result)).toEqual(['closing']);
      expect(result.outcome).toBe('TIMEOUT');
      expect(result.next.state).toBe('COMPLETED');
    });

    it('closes an idle followup on a sweeper timeout without touching last_inbound_at', () => {
      const session = makeSession({ state: 'AWAITING_FOLLOWUP', last_inbound_at: recent });
      const result = transition(session, { kind: 'timeout' }, T0, CONFIG, intents);
      expect(templateIds(result)).toEqual(['closing']);
      expect(result.outcome).toBe('TIMEOUT');
      expect(result.next.last_inbound_at).toBe(recent);
    });

    it('ignores a sweeper timeout outside the followup states', () => {
      const session = makeSession({ state: 'AWAITING_CHOICE' });
      const result = transition(session, { kind: 'timeout' }, T0, CONFIG, intents);
      expect(result.intents).toEqual([]);
      expect(result.next.state).toBe('AWAITING_CHOICE');
      expect(result.next.rate_window_count).toBe(0);
    });
  });

  describe('completed and error states', () => {
    it('reopens a completed review on a topic', () => {
      const session = makeSession({ state: 'COMPLETED', covered_topics: ['skills'] });
      const result = transition(session, { kind: 'message', text: 'experience' }, T0, CONFIG, intents);
      expect(templateIds(result)).toEqual(['detail_experience', 'followup_prompt']);
      expect(result.next.state).toBe('AWAITING_FOLLOWUP');
    });

    it('reminds the user that a completed review is done', () => {
      const session = makeSession({ state: 'COMPLETED' });
      const result = transition(session, { kind: 'message', text: 'hello?' }, T0, CONFIG, intents);
      expect(templateIds(result)).toEqual(['completed_reminder']);
      expect(result.next.state).toBe('COMPLETED');
    });

    it('moves to ERROR with an apology on unparseable input', () => {
      const blank = transition(makeSession({ state: 'SUMMARY_SENT' }), { kind: 'message', text: '   ' }, T0, CONFIG, intents);
      expect(templateIds(blank)).toEqual(['apology']);
      expect(blank.outcome).toBe('ERROR');
      expect(blank.next.state).toBe('ERROR');

      const huge = transition(
        makeSession({ state: 'AWAITING_CHOICE' }),
        { kind: 'message', text: 'a'.repeat(2001) },
        T0,
        CONFIG,
        intents,
      );
      expect(huge.next.state).toBe('ERROR');
    });

    it('moves to ERROR when a collaborator failure is reported', () => {
      const result = transition(
        makeSession({ state: 'AWAITING_FOLLOWUP' }),
        { kind: 'failure', reason: 'delivery' },
        T0,
        CONFIG,
        intents,
      );
      expect(templateIds(result)).toEqual(['apology']);
      expect(result.next.state).toBe('ERROR');
    });

    it('restarts with the summary on any message in ERROR', () => {
      const result = transition(makeSession({ state: 'ERROR' }), { kind: 'message', text: '' }, T0, CONFIG, intents);
      expect(templateIds(result)).toEqual(['summary']);
      expect(result.next.state).toBe('SUMMARY_SENT');
    });
  });

  it('keeps only the newest history entries', () => {
    const old: TurnRecord = {
      inbound_text: 'old',
      outbound_intents: [],
      states: ['AWAITING_CHOICE'],
      outcome: 'ADVANCED',
      timestamp: T0.toISOString(),
    };
    const session = makeSession({
      state: 'SUMMARY_SENT',
      history: Array.from({ length: 50 }, () => old),
      turn_count: 50,
    });
    const result = transition(session, { kind: 'message', text: 'next' }, T0, CONFIG, intents);
    expect(result.next.history).toHaveLength(50);
    expect(result.next.history[49].inbound_text).toBe('next');
    expect(result.next.turn_count).toBe(51);
  });

  it('does not mutate the session it is given', () => {
    const session = makeSession({ state: 'AWAITING_CHOICE', covered_topics: ['experience'] });
    const before = structuredClone(session);
    transition(session, { kind: 'message', text: 'all' }, T0, CONFIG, intents);
    expect(session).toEqual(before);
  });
});
