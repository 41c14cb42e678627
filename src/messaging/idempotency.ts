import type { Redis } from 'ioredis';
import logger from '../lib/logger.js';

/**
 * Send-once guard for outbound messages. A key is claimed before sending and
 * released only when the send fails, so a replayed turn finds it taken.
 */
export interface IdempotencyLedger {
  /** True when the key was free and is now held by the caller. */
  claim(key: string): Promise<boolean>;
  release(key: string): Promise<void>;
}

export const DEFAULT_LEDGER_TTL_MS = 48 * 60 * 60 * 1000;
const MAX_LEDGER_ENTRIES = 50_000;

export class InMemoryIdempotencyLedger implements IdempotencyLedger {
  private readonly claims = new Map<string, number>();

  constructor(
    private readonly ttlMs: number = DEFAULT_LEDGER_TTL_MS,
    private readonly clock: () => number = Date.now,
  ) {}

  async claim(key: string): Promise<boolean> {
    const now = this.clock();
    const expiresAt = this.claims.get(key);
    if (expiresAt !== undefined && expiresAt > now) return false;

    this.claims.delete(key);
    while (this.claims.size >= MAX_LEDGER_ENTRIES) {
      const oldest = this.claims.keys().next().value;
      if (oldest === undefined) break;
      this.claims.delete(oldest);
    }
    this.claims.set(key, now + this.ttlMs);
    return true;
  }

  async release(key: string): Promise<void> {
    this.claims.delete(key);
  }

  get size(): number {
    return this.claims.size;
  }
}

export type RedisLedgerClient = Pick<Redis, 'set' | 'del'>;

/**
 * Redis-backed ledger (`SET key 1 PX ttl NX`), shared across instances.
 * Any Redis error falls through to the in-memory ledger so delivery never
 * depends on Redis being up.
 */
export class RedisIdempotencyLedger implements IdempotencyLedger {
  constructor(
    private readonly redis: RedisLedgerClient,
    private readonly fallback: IdempotencyLedger = new InMemoryIdempotencyLedger(),
    private readonly ttlMs: number = DEFAULT_LEDGER_TTL_MS,
    private readonly prefix = 'idem:',
  ) {}

  async claim(key: string): Promise<boolean> {
    try {
      const result = await this.redis.set(`${this.prefix}${key}`, '1', 'PX', this.ttlMs, 'NX');
      return result === 'OK';
    } catch (err) {
      logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Redis idempotency claim failed; using memory');
      return this.fallback.claim(key);
    }
  }

  async release(key: string): Promise<void> {
    try {
      await this.redis.del(`${this.prefix}${key}`);
    } catch (err) {
      logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Redis idempotency release failed');
    }
    await this.fallback.release(key);
  }
}
