import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { z } from 'zod';

const DEFAULT_CORPUS_PATH = fileURLToPath(new URL('../../data/newsletter-corpus.json', import.meta.url));

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().catch(fallback);

const configSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(3001),

  NEWSLETTER_CORPUS_PATH: z.string().min(1).default(DEFAULT_CORPUS_PATH),

  MESSAGE_CHAR_BUDGET: z.coerce.number().int().min(160).max(4096).catch(1600),
  RATE_CAP_MESSAGES: positiveInt(9),
  RATE_WINDOW_MS: positiveInt(24 * 60 * 60 * 1000),
  FOLLOWUP_TIMEOUT_MS: positiveInt(30 * 60 * 1000),
  IDLE_SWEEP_INTERVAL_MS: positiveInt(60_000),

  COLLABORATOR_TIMEOUT_MS: positiveInt(15_000),
  COLLABORATOR_MAX_ATTEMPTS: positiveInt(3),
  COLLABORATOR_BASE_DELAY_MS: positiveInt(1000),

  SESSION_STORE: z.enum(['memory', 'supabase']).default('memory'),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),

  REDIS_URL: z.string().min(1).optional(),

  TWILIO_ACCOUNT_SID: z.string().min(1).optional(),
  TWILIO_AUTH_TOKEN: z.string().min(1).optional(),
  TWILIO_FROM_NUMBER: z.string().min(1).optional(),
  /** Public base URL the provider posts to; enables webhook signature checks. */
  WEBHOOK_PUBLIC_URL: z.string().url().optional(),

  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  ANTHROPIC_MODEL: z.string().min(1).default('claude-3-5-haiku-latest'),
  NARRATIVE_MAX_TOKENS: positiveInt(400),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Parses configuration from an environment map. Throws with every offending
 * key listed when a required combination is missing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${detail}`);
  }

  const config = parsed.data;
  if (config.SESSION_STORE === 'supabase' && (!config.SUPABASE_URL || !config.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new Error('SESSION_STORE=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
  }
  return {
    ...config,
    NEWSLETTER_CORPUS_PATH: path.resolve(config.NEWSLETTER_CORPUS_PATH),
  };
}
