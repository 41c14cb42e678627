import type { Context } from 'hono';

export type BodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

type BodyReadResult =
  | { ok: true; raw: string }
  | { ok: false; response: Response };

function tooLarge(c: Context, maxBytes: number): Response {
  return c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413);
}

export function rejectOversizedBody(c: Context, maxBytes: number): Response | null {
  const contentLength = Number.parseInt(c.req.header('content-length') ?? '', 10);
  if (!Number.isFinite(contentLength) || contentLength < 0) return null;
  return contentLength > maxBytes ? tooLarge(c, maxBytes) : null;
}

/** Reads the body as UTF-8, counting bytes as they arrive. */
async function readBodyWithLimit(c: Context, maxBytes: number): Promise<BodyReadResult> {
  const upfront = rejectOversizedBody(c, maxBytes);
  if (upfront) return { ok: false, response: upfront };

  const stream = c.req.raw.body;
  if (!stream) return { ok: true, raw: '' };

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      total += value.byteLength;
      if (total > maxBytes) {
        await reader.cancel();
        return { ok: false, response: tooLarge(c, maxBytes) };
      }
      chunks.push(value);
    }
  } catch {
    return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
  }

  return { ok: true, raw: Buffer.concat(chunks).toString('utf8') };
}

/** JSON body; malformed JSON is a 400 rather than an empty object. */
export async function parseJsonBody(c: Context, maxBytes: number): Promise<BodyParseResult> {
  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return { ok: false, response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415) };
  }
  const read = await readBodyWithLimit(c, maxBytes);
  if (!read.ok) return read;
  if (!read.raw.trim()) return { ok: true, data: {} };
  try {
    const data: unknown = JSON.parse(read.raw);
    return { ok: true, data };
  } catch {
    return { ok: false, response: c.json({ error: 'Malformed JSON body' }, 400) };
  }
}

/**
 * Webhook body: providers post `application/x-www-form-urlencoded`, test
 * tooling often posts JSON. Both come back as a plain record.
 */
export async function parseWebhookBody(c: Context, maxBytes: number): Promise<BodyParseResult> {
  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType.includes('application/json')) return parseJsonBody(c, maxBytes);

  const read = await readBodyWithLimit(c, maxBytes);
  if (!read.ok) return read;
  return { ok: true, data: Object.fromEntries(new URLSearchParams(read.raw)) };
}
