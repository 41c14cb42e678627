import twilio from 'twilio';
import { DeliveryFailed } from '../lib/errors.js';
import logger, { maskSessionId } from '../lib/logger.js';
import { withRetry, type RetryOptions } from '../lib/retry.js';
import type { IdempotencyLedger } from './idempotency.js';

export interface OutboundMessage {
  to: string;
  body: string;
  idempotency_key: string;
}

export interface DeliveryReceipt {
  idempotency_key: string;
  /** Provider message id; absent when the key had already been sent. */
  provider_id?: string;
  skipped: boolean;
}

/** Messaging provider edge. Implementations perform exactly one send per call. */
export interface DeliveryChannel {
  readonly name: string;
  send(message: OutboundMessage): Promise<{ provider_id: string }>;
}

export class TwilioDeliveryChannel implements DeliveryChannel {
  readonly name = 'twilio';
  private readonly client: ReturnType<typeof twilio>;

  constructor(accountSid: string, authToken: string, private readonly from: string) {
    this.client = twilio(accountSid, authToken);
  }

  async send(message: OutboundMessage): Promise<{ provider_id: string }> {
    const sent = await this.client.messages.create({
      to: message.to,
      from: this.from,
      body: message.body,
    });
    return { provider_id: sent.sid };
  }
}

/** Development channel: logs instead of sending. */
export class LoggingDeliveryChannel implements DeliveryChannel {
  readonly name = 'log';
  private counter = 0;

  async send(message: OutboundMessage): Promise<{ provider_id: string }> {
    this.counter += 1;
    logger.info(
      { to: maskSessionId(message.to), key: message.idempotency_key, chars: message.body.length },
      'Outbound message (not sent)',
    );
    return { provider_id: `log-${this.counter}` };
  }
}

export type DeliveryRetryOptions = Pick<RetryOptions, 'maxAttempts' | 'baseDelay' | 'timeoutMs'>;

/**
 * Sends a turn's messages in order. Each key is claimed in the ledger first,
 * so a replayed turn skips what already went out. A send that still fails
 * after retries releases its key and raises `DeliveryFailed`; later messages
 * in the batch are not attempted.
 */
export async function deliverBatch(
  channel: DeliveryChannel,
  ledger: IdempotencyLedger,
  messages: readonly OutboundMessage[],
  retry: DeliveryRetryOptions = {},
): Promise<DeliveryReceipt[]> {
  const receipts: DeliveryReceipt[] = [];
  for (const message of messages) {
    const claimed = await ledger.claim(message.idempotency_key);
    if (!claimed) {
      logger.debug({ key: message.idempotency_key }, 'Duplicate send suppressed');
      receipts.push({ idempotency_key: message.idempotency_key, skipped: true });
      continue;
    }

    try {
      const { provider_id } = await withRetry(() => channel.send(message), {
        ...retry,
        label: `${channel.name} send`,
        onRetry: (attempt, err) => {
          logger.warn({ key: message.idempotency_key, attempt, err: err.message }, 'Retrying outbound message');
        },
      });
      receipts.push({ idempotency_key: message.idempotency_key, provider_id, skipped: false });
    } catch (err) {
      await ledger.release(message.idempotency_key);
      throw new DeliveryFailed(
        message.idempotency_key,
        `Delivery via ${channel.name} failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  }
  return receipts;
}

export function idempotencyKey(sessionId: string, turn: number, index: number): string {
  return `${sessionId}:turn:${turn}:${index}`;
}
