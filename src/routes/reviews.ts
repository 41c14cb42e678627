import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../app-context.js';
import type { SessionContext } from '../conversation/types.js';
import { jobTextFromPosting, selectJdExtractor } from '../jobs/jd-extractors.js';
import { parseJsonBody } from '../lib/http-body.js';
import { parseWith } from '../lib/validate.js';

const MAX_REVIEW_BODY_BYTES = 2_500_000;

const startReviewSchema = z
  .object({
    session_id: z.string().trim().min(3).max(64),
    resume_text: z.string(),
    job_text: z.string().optional(),
    job_url: z.string().url().optional(),
    job_html: z.string().max(2_000_000).optional(),
    job_title: z.string().trim().min(1).max(200).optional(),
    company: z.string().trim().min(1).max(200).optional(),
  })
  .refine((body) => !body.job_html || body.job_url, {
    message: 'job_html requires job_url',
    path: ['job_url'],
  });

type StartReviewBody = z.infer<typeof startReviewSchema>;

/** Job text and presentation context, from pasted text or posting HTML. */
function resolveJob(body: StartReviewBody): { jobText: string | null; context: SessionContext } {
  const context: SessionContext = {
    ...(body.job_title ? { job_title: body.job_title } : {}),
    ...(body.company ? { company: body.company } : {}),
  };
  if (body.job_text !== undefined) return { jobText: body.job_text, context };
  if (!body.job_html || !body.job_url) return { jobText: null, context };

  const posting = selectJdExtractor(body.job_url).extract(body.job_html);
  if (!context.job_title && posting.title !== 'Unknown') context.job_title = posting.title;
  if (!context.company && posting.company !== 'Unknown') context.company = posting.company;
  return { jobText: jobTextFromPosting(posting), context };
}

export function createReviewRoutes(ctx: AppContext) {
  const reviews = new Hono();

  // POST /reviews: score a résumé and send the executive summary
  reviews.post('/', async (c) => {
    const parsedBody = await parseJsonBody(c, MAX_REVIEW_BODY_BYTES);
    if (!parsedBody.ok) return parsedBody.response;
    const body = parseWith(startReviewSchema, parsedBody.data);

    const { jobText, context } = resolveJob(body);
    const report = await ctx.service.startReview({
      session_id: body.session_id,
      resume_text: body.resume_text,
      job_text: jobText,
      context,
    });

    const score = report.session?.score_result;
    c.get('log').info({ state: report.state, outcome: report.outcome }, 'Review request handled');
    return c.json(
      {
        session_id: report.session_id,
        state: report.state,
        score: score
          ? {
              band: score.band,
              confidence: score.confidence,
              citations: score.citations,
              matched_keywords: score.matched_keywords,
              missing_keywords: score.missing_keywords,
              degraded: score.degraded,
            }
          : null,
      },
      201,
    );
  });

  return reviews;
}
