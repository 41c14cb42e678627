import type Anthropic from '@anthropic-ai/sdk';
import type { NewsletterChunk } from '../content/content-store.js';
import type { SessionContext } from '../conversation/types.js';
import { extractResponseText } from '../lib/anthropic.js';
import { GenerationFailed } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { splitSentences } from '../lib/sentences.js';
import { withRetry, type RetryOptions } from '../lib/retry.js';
import type { ScoreResult } from '../scoring/types.js';
import { buildReviewPrompt } from './review-prompt.js';

/** Short prose woven into the executive summary. */
export interface ReviewNarrator {
  narrate(score: ScoreResult, chunks: readonly NewsletterChunk[], context: SessionContext): Promise<string>;
}

export interface AnthropicNarratorOptions {
  model: string;
  maxTokens: number;
  retry?: Pick<RetryOptions, 'maxAttempts' | 'baseDelay' | 'timeoutMs'>;
}

const MAX_NARRATIVE_CHARS = 360;
const NUMERIC_SCORE = /\d+\s*(%|percent|\/\s*100|out of)/i;

/**
 * Keeps whole sentences up to the length cap and drops any sentence that
 * quotes a numeric score.
 */
export function sanitizeNarrative(text: string): string {
  let out = '';
  for (const sentence of splitSentences(text.replace(/\s+/g, ' '))) {
    if (NUMERIC_SCORE.test(sentence)) continue;
    const next = out ? `${out} ${sentence}` : sentence;
    if (next.length > MAX_NARRATIVE_CHARS) break;
    out = next;
  }
  return out;
}

export class AnthropicReviewNarrator implements ReviewNarrator {
  constructor(
    private readonly client: Pick<Anthropic, 'messages'>,
    private readonly options: AnthropicNarratorOptions,
  ) {}

  async narrate(score: ScoreResult, chunks: readonly NewsletterChunk[], context: SessionContext): Promise<string> {
    const prompt = buildReviewPrompt(score, chunks, context);
    let text: string;
    try {
      const response = await withRetry(
        () =>
          this.client.messages.create({
            model: this.options.model,
            max_tokens: this.options.maxTokens,
            system: prompt.system,
            messages: [{ role: 'user', content: prompt.user }],
          }),
        {
          ...this.options.retry,
          label: 'review narrative',
          onRetry: (attempt, err) => {
            logger.warn({ attempt, err: err.message }, 'Retrying review narrative');
          },
        },
      );
      text = extractResponseText(response);
    } catch (err) {
      throw new GenerationFailed(
        `Review narrative failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    const narrative = sanitizeNarrative(text);
    if (!narrative) {
      throw new GenerationFailed('Review narrative was empty');
    }
    return narrative;
  }
}
