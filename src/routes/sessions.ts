import { Hono } from 'hono';
import type { AppContext } from '../app-context.js';
import { BAND_LABELS } from '../scoring/types.js';

export function createSessionRoutes(ctx: AppContext) {
  const sessions = new Hono();

  // GET /sessions/:id: conversation status (no résumé text, no history bodies)
  sessions.get('/:id', async (c) => {
    const session = await ctx.service.getSession(c.req.param('id'));
    if (!session) {
      return c.json({ error: 'Session not found' }, 404);
    }
    return c.json({
      session_id: session.session_id,
      state: session.state,
      last_choice: session.last_choice,
      covered_topics: session.covered_topics,
      band: session.score_result.band,
      band_label: BAND_LABELS[session.score_result.band],
      degraded: session.score_result.degraded,
      turn_count: session.turn_count,
      history_length: session.history.length,
      version: session.version,
      updated_at: session.updated_at,
    });
  });

  return sessions;
}
