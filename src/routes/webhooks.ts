import { Hono } from 'hono';
import twilio from 'twilio';
import { z } from 'zod';
import type { AppContext } from '../app-context.js';
import { parseWebhookBody } from '../lib/http-body.js';
import { parseWith } from '../lib/validate.js';

const MAX_WEBHOOK_BODY_BYTES = 64_000;
const EMPTY_TWIML = '<?xml version="1.0" encoding="UTF-8"?><Response></Response>';

const inboundSchema = z.object({
  From: z.string().trim().min(3).max(64),
  Body: z.string().default(''),
  MessageSid: z.string().trim().min(1).max(64).optional(),
});

function stringParams(data: unknown): Record<string, string> {
  if (typeof data !== 'object' || data === null) return {};
  return Object.fromEntries(
    Object.entries(data).filter((entry): entry is [string, string] => typeof entry[1] === 'string'),
  );
}

export function createWebhookRoutes(ctx: AppContext) {
  const webhooks = new Hono();
  const { TWILIO_AUTH_TOKEN: authToken, WEBHOOK_PUBLIC_URL: publicUrl } = ctx.config;

  // POST /webhooks/inbound: one conversation turn per provider event
  webhooks.post('/inbound', async (c) => {
    const parsedBody = await parseWebhookBody(c, MAX_WEBHOOK_BODY_BYTES);
    if (!parsedBody.ok) return parsedBody.response;

    if (authToken && publicUrl) {
      const signature = c.req.header('x-twilio-signature') ?? '';
      const url = new URL('/api/webhooks/inbound', publicUrl).toString();
      if (!twilio.validateRequest(authToken, signature, url, stringParams(parsedBody.data))) {
        c.get('log').warn('Rejected inbound webhook with invalid signature');
        return c.json({ error: 'Invalid signature' }, 403);
      }
    }

    const event = parseWith(inboundSchema, parsedBody.data);
    const report = await ctx.service.handleInbound(event.From, event.Body, event.MessageSid);
    c.get('log').info(
      { outcome: report.outcome, state: report.state, replayed: report.replayed, sent: report.receipts.length },
      'Inbound message handled',
    );

    // Replies go out through the delivery channel, never inline.
    return c.body(EMPTY_TWIML, 200, { 'Content-Type': 'text/xml' });
  });

  return webhooks;
}
