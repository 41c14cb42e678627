import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { requestIdMiddleware, resolveRequestId } from '../middleware/request-id.js';

describe('resolveRequestId', () => {
  it('keeps a trimmed safe id', () => {
    expect(resolveRequestId('  twilio:SM123.retry-1 ')).toBe('twilio:SM123.retry-1');
  });

  it('caps long ids at 64 characters', () => {
    expect(resolveRequestId('b'.repeat(100))).toBe('b'.repeat(64));
  });

  it('mints a uuid for missing or unsafe ids', () => {
    expect(resolveRequestId(undefined)).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(resolveRequestId('')).not.toBe('');
    expect(resolveRequestId('<script>')).not.toBe('<script>');
  });
});

describe('requestIdMiddleware', () => {
  it('exposes the id to handlers and echoes it in the response', async () => {
    const app = new Hono();
    app.use('*', requestIdMiddleware);
    app.get('/id', (c) => c.json({ requestId: c.get('requestId') }));

    const res = await app.request('http://test/id', { headers: { 'X-Request-ID': 'req-42' } });

    expect(res.headers.get('X-Request-ID')).toBe('req-42');
    expect(await res.json()).toEqual({ requestId: 'req-42' });
  });
});
