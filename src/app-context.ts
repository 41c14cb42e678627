import { ContentStore, type NewsletterChunkInput } from './content/content-store.js';
import { readCorpusFile } from './content/corpus-loader.js';
import { KeywordExtractor } from './content/keyword-extractor.js';
import { ConversationService } from './conversation/conversation-service.js';
import { ReviewIntentFactory } from './conversation/intents.js';
import { InMemorySessionStore, type SessionStore } from './conversation/session-store.js';
import { SupabaseSessionStore } from './conversation/supabase-session-store.js';
import { getAnthropicClient } from './lib/anthropic.js';
import type { AppConfig } from './lib/config.js';
import { FF_KEYWORD_STEMMING, FF_REDIS_IDEMPOTENCY, FF_REVIEW_NARRATIVE } from './lib/feature-flags.js';
import logger from './lib/logger.js';
import { getRedisClient, shutdownRedis } from './lib/redis-client.js';
import { getSupabaseAdmin } from './lib/supabase.js';
import { MessageComposer } from './messaging/composer.js';
import {
  LoggingDeliveryChannel,
  TwilioDeliveryChannel,
  type DeliveryChannel,
  type DeliveryRetryOptions,
} from './messaging/delivery.js';
import {
  InMemoryIdempotencyLedger,
  RedisIdempotencyLedger,
  type IdempotencyLedger,
} from './messaging/idempotency.js';
import { AnthropicReviewNarrator, type ReviewNarrator } from './review/narrator.js';
import { RelevanceScorer } from './scoring/relevance-scorer.js';

export interface AppContext {
  config: AppConfig;
  content: ContentStore;
  sessions: SessionStore;
  scorer: RelevanceScorer;
  channel: DeliveryChannel;
  ledger: IdempotencyLedger;
  service: ConversationService;
  close(): Promise<void>;
}

/** Collaborators a caller (usually a test) can supply instead of the configured ones. */
export interface AppContextOverrides {
  corpus?: readonly NewsletterChunkInput[];
  sessions?: SessionStore;
  channel?: DeliveryChannel;
  ledger?: IdempotencyLedger;
  narrator?: ReviewNarrator | null;
  clock?: () => Date;
}

function createSessionStore(config: AppConfig): SessionStore {
  if (config.SESSION_STORE === 'supabase') {
    return new SupabaseSessionStore(getSupabaseAdmin(config.SUPABASE_URL, config.SUPABASE_SERVICE_ROLE_KEY));
  }
  return new InMemorySessionStore();
}

function createLedger(config: AppConfig): IdempotencyLedger {
  const memory = new InMemoryIdempotencyLedger();
  if (!FF_REDIS_IDEMPOTENCY) return memory;
  const redis = getRedisClient(config.REDIS_URL);
  if (!redis) {
    logger.warn('FF_REDIS_IDEMPOTENCY is on but Redis is not configured; using in-memory ledger');
    return memory;
  }
  return new RedisIdempotencyLedger(redis, memory);
}

function createChannel(config: AppConfig): DeliveryChannel {
  const { TWILIO_ACCOUNT_SID: sid, TWILIO_AUTH_TOKEN: token, TWILIO_FROM_NUMBER: from } = config;
  if (sid && token && from) return new TwilioDeliveryChannel(sid, token, from);
  logger.warn('Twilio credentials not configured; outbound messages will only be logged');
  return new LoggingDeliveryChannel();
}

function createNarrator(config: AppConfig, retry: DeliveryRetryOptions): ReviewNarrator | null {
  if (!FF_REVIEW_NARRATIVE) return null;
  return new AnthropicReviewNarrator(getAnthropicClient(config.ANTHROPIC_API_KEY), {
    model: config.ANTHROPIC_MODEL,
    maxTokens: config.NARRATIVE_MAX_TOKENS,
    retry,
  });
}

/**
 * Builds every long-lived collaborator once. Nothing here is a module-level
 * singleton apart from the lazily created network clients.
 */
export async function createAppContext(
  config: AppConfig,
  overrides: AppContextOverrides = {},
): Promise<AppContext> {
  const extractor = new KeywordExtractor({ stemming: FF_KEYWORD_STEMMING });
  const content = new ContentStore(extractor);
  try {
    content.load(overrides.corpus ?? (await readCorpusFile(config.NEWSLETTER_CORPUS_PATH)));
  } catch (err) {
    // Scoring degrades to job-only results until a corpus loads.
    logger.error(
      { err: err instanceof Error ? err.message : String(err), path: config.NEWSLETTER_CORPUS_PATH },
      'Advice corpus failed to load',
    );
  }

  const retry: DeliveryRetryOptions = {
    maxAttempts: config.COLLABORATOR_MAX_ATTEMPTS,
    baseDelay: config.COLLABORATOR_BASE_DELAY_MS,
    timeoutMs: config.COLLABORATOR_TIMEOUT_MS,
  };

  const sessions = overrides.sessions ?? createSessionStore(config);
  const scorer = new RelevanceScorer(extractor, content);
  const channel = overrides.channel ?? createChannel(config);
  const ledger = overrides.ledger ?? createLedger(config);
  const narrator = overrides.narrator !== undefined ? overrides.narrator : createNarrator(config, retry);

  const service = new ConversationService({
    sessions,
    scorer,
    content,
    intents: new ReviewIntentFactory(content),
    composer: new MessageComposer(config.MESSAGE_CHAR_BUDGET),
    channel,
    ledger,
    narrator,
    machine: {
      rateCap: config.RATE_CAP_MESSAGES,
      rateWindowMs: config.RATE_WINDOW_MS,
      followupTimeoutMs: config.FOLLOWUP_TIMEOUT_MS,
    },
    deliveryRetry: retry,
    clock: overrides.clock,
  });

  return {
    config,
    content,
    sessions,
    scorer,
    channel,
    ledger,
    service,
    async close() {
      await sessions.close();
      await shutdownRedis();
      content.teardown();
    },
  };
}
