import type { NewsletterChunk } from '../content/content-store.js';
import type { SessionContext } from '../conversation/types.js';
import { BAND_LABELS, type ScoreResult } from '../scoring/types.js';

export interface ReviewPrompt {
  system: string;
  user: string;
}

const MAX_EXCERPT_CHARS = 400;
const MAX_PROMPT_KEYWORDS = 15;

export const REVIEW_SYSTEM_PROMPT = `You are a résumé coach writing the opening lines of a text-message review.
Write at most three short sentences in plain text, no markdown and no lists.
Name one real strength and the most important gap, using only the keywords and advice excerpts you are given.
Never state a score, percentage or any other number about the candidate's fit. Use the fit label instead.`;

function excerpt(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  if (flat.length <= MAX_EXCERPT_CHARS) return flat;
  const cut = flat.slice(0, MAX_EXCERPT_CHARS);
  const lastSpace = cut.lastIndexOf(' ');
  return `${lastSpace > 0 ? cut.slice(0, lastSpace) : cut}…`;
}

/**
 * Builds the narrative prompt. Every cited chunk appears with its id so the
 * model's claims can be traced back to the advice they came from.
 */
export function buildReviewPrompt(
  score: ScoreResult,
  chunks: readonly NewsletterChunk[],
  context: SessionContext,
): ReviewPrompt {
  const role = [context.job_title, context.company && `at ${context.company}`].filter(Boolean).join(' ');
  const matched = score.matched_keywords.slice(0, MAX_PROMPT_KEYWORDS);
  const missing = score.missing_keywords.slice(0, MAX_PROMPT_KEYWORDS);

  const sections = [
    `Target role: ${role || 'not specified'}`,
    `Fit label: ${BAND_LABELS[score.band]}`,
    `Keywords the résumé shares with the job: ${matched.length > 0 ? matched.join(', ') : 'none found'}`,
    `Job keywords missing from the résumé: ${missing.length > 0 ? missing.join(', ') : 'none found'}`,
  ];

  const cited = chunks.filter((c) => score.citations.includes(c.id));
  if (cited.length > 0) {
    sections.push(
      'Advice excerpts:',
      ...cited.map((c) => `[${c.id}] (${c.source_article}) ${excerpt(c.text)}`),
    );
  } else {
    sections.push('Advice excerpts: none available; rely on the keywords only.');
  }

  return { system: REVIEW_SYSTEM_PROMPT, user: sections.join('\n') };
}
