import type { ContentStore, NewsletterChunk } from '../content/content-store.js';
import type { ConversationSession, MessageIntent, Topic } from './types.js';

const TOPIC_TAGS: Readonly<Record<Exclude<Topic, 'all'>, readonly string[]>> = {
  skills: ['skills', 'keywords', 'ats'],
  experience: ['experience', 'quantification', 'story'],
  formatting: ['formatting', 'ats'],
};

const MAX_LISTED_KEYWORDS = 8;
const MAX_SOURCES = 3;

/** Builds message intents (template id + variables) from session data. */
export interface IntentFactory {
  summary(session: ConversationSession): MessageIntent;
  topicMenu(session: ConversationSession): MessageIntent;
  detail(topic: Topic, session: ConversationSession): MessageIntent;
  followupPrompt(session: ConversationSession, coveredAfter: readonly Topic[]): MessageIntent;
  clarifyChoice(): MessageIntent;
  clarifyFollowup(session: ConversationSession): MessageIntent;
  closing(): MessageIntent;
  completedReminder(): MessageIntent;
  deferred(resetsInMs: number): MessageIntent;
  apology(): MessageIntent;
}

function chunkLines(chunk: NewsletterChunk): { headings: string[]; body: string[] } {
  const all = chunk.text.split('\n').map((l) => l.trim()).filter((l) => l.length > 0);
  const bodyStart = all.findIndex((l) => /[.!?]$/.test(l));
  if (bodyStart < 0) return { headings: [], body: all };
  return { headings: all.slice(0, bodyStart), body: all.slice(bodyStart) };
}

/** The most specific heading above the chunk body. */
export function chunkHeadline(chunk: NewsletterChunk): string {
  const { headings } = chunkLines(chunk);
  return headings.length > 0 ? headings[headings.length - 1] : chunk.source_article;
}

/** First sentence of the chunk body. */
export function chunkInsight(chunk: NewsletterChunk): string {
  const body = chunkLines(chunk).body.join(' ').replace(/\s+/g, ' ');
  const sentence = /^.*?[.!?](?=\s|$)/.exec(body);
  return (sentence ? sentence[0] : body).trim();
}

function lines(values: readonly string[]): string {
  return values.join('\n');
}

function roleDescription(session: ConversationSession): string {
  const { job_title: title, company } = session.context;
  if (title && company) return `the ${title} role at ${company}`;
  if (title) return `the ${title} role`;
  if (company) return `the role at ${company}`;
  return 'your target role';
}

/** "EXPERIENCE or FORMATTING"; every topic again once all are covered. */
export function remainingTopics(covered: readonly Topic[]): string {
  const uncovered = (['skills', 'experience', 'formatting'] as const).filter((t) => !covered.includes(t));
  const names = (uncovered.length > 0 ? uncovered : ['skills', 'experience', 'formatting', 'all'])
    .map((t) => t.toUpperCase());
  if (names.length === 1) return names[0];
  return `${names.slice(0, -1).join(', ')} or ${names[names.length - 1]}`;
}

/**
 * Default factory. Citation details are looked up in the current content
 * snapshot; ids that have since disappeared are skipped.
 */
export class ReviewIntentFactory implements IntentFactory {
  constructor(private readonly store: ContentStore) {}

  summary(session: ConversationSession): MessageIntent {
    const result = session.score_result;
    return {
      template_id: 'summary',
      variables: {
        role: roleDescription(session),
        strengths: result.matched_keywords.slice(0, 5).join(', '),
        gaps: result.missing_keywords.slice(0, 5).join(', '),
        narrative: session.context.narrative ?? '',
        advice_note: result.degraded
          ? 'My advice library is offline right now, so this first pass is based on the job description only.'
          : '',
      },
    };
  }

  topicMenu(session: ConversationSession): MessageIntent {
    return {
      template_id: 'topic_menu',
      variables: { role: roleDescription(session) },
    };
  }

  detail(topic: Topic, session: ConversationSession): MessageIntent {
    const result = session.score_result;
    if (topic === 'all') {
      const cited = this.citedChunks(session);
      return {
        template_id: 'detail_all',
        variables: {
          strengths: result.matched_keywords.slice(0, 5).join(', '),
          gaps: result.missing_keywords.slice(0, 5).join(', '),
          tips: lines(cited.slice(0, 3).map(chunkHeadline)),
          sources: this.sourceLines(cited),
        },
      };
    }

    const chunks = this.chunksForTopic(topic, session);
    const variables: Record<string, string> = {
      insight: chunks[0] ? chunkInsight(chunks[0]) : '',
      tips: lines(chunks.slice(0, 3).map(chunkHeadline)),
      sources: this.sourceLines(chunks),
    };
    if (topic === 'skills') {
      variables.matched = result.matched_keywords.slice(0, MAX_LISTED_KEYWORDS).join(', ');
      variables.missing = result.missing_keywords.slice(0, MAX_LISTED_KEYWORDS).join(', ');
      variables.actions = lines(result.missing_keywords.slice(0, 3).map((kw) => `Work "${kw}" into a bullet where it reflects real experience`));
    }
    return { template_id: `detail_${topic}`, variables };
  }

  followupPrompt(_session: ConversationSession, coveredAfter: readonly Topic[]): MessageIntent {
    return {
      template_id: 'followup_prompt',
      variables: { remaining: remainingTopics(coveredAfter) },
    };
  }

  clarifyChoice(): MessageIntent {
    return { template_id: 'clarify_choice', variables: {} };
  }

  clarifyFollowup(session: ConversationSession): MessageIntent {
    return {
      template_id: 'clarify_followup',
      variables: { remaining: remainingTopics(session.covered_topics) },
    };
  }

  closing(): MessageIntent {
    return { template_id: 'closing', variables: {} };
  }

  completedReminder(): MessageIntent {
    return { template_id: 'completed_reminder', variables: {} };
  }

  deferred(resetsInMs: number): MessageIntent {
    const hours = Math.max(1, Math.ceil(resetsInMs / 3_600_000));
    return {
      template_id: 'deferred',
      variables: { resume_after: hours === 1 ? 'about an hour' : `about ${hours} hours` },
    };
  }

  apology(): MessageIntent {
    return { template_id: 'apology', variables: {} };
  }

  private citedChunks(session: ConversationSession): NewsletterChunk[] {
    if (!this.store.isLoaded()) return [];
    const chunks: NewsletterChunk[] = [];
    for (const id of session.score_result.citations) {
      const chunk = this.store.get(id);
      if (chunk) chunks.push(chunk);
    }
    return chunks;
  }

  /** Cited chunks tagged for the topic, falling back to the whole corpus. */
  private chunksForTopic(topic: Exclude<Topic, 'all'>, session: ConversationSession): NewsletterChunk[] {
    const tags = TOPIC_TAGS[topic];
    const tagged = (chunk: NewsletterChunk) => tags.some((t) => chunk.topic_tags.has(t));
    const cited = this.citedChunks(session).filter(tagged);
    if (cited.length > 0 || !this.store.isLoaded()) return cited;
    return this.store.chunks().filter(tagged).slice(0, MAX_SOURCES);
  }

  private sourceLines(chunks: readonly NewsletterChunk[]): string {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const chunk of chunks) {
      if (seen.has(chunk.source_article)) continue;
      seen.add(chunk.source_article);
      out.push(chunk.source_url ? `${chunk.source_article}: ${chunk.source_url}` : chunk.source_article);
      if (out.length >= MAX_SOURCES) break;
    }
    return lines(out);
  }
}
