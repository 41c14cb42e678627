function envBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return fallback;
  return val === '1' || val.toLowerCase() === 'true';
}

/**
 * FF_KEYWORD_STEMMING: Apply light suffix stripping to extracted keywords.
 *
 * Default: false. Matching is exact-token unless this is enabled; turning it
 * on changes every score, so cached results keyed without it must be dropped.
 */
export const FF_KEYWORD_STEMMING = envBool('FF_KEYWORD_STEMMING', false);

/**
 * FF_REDIS_IDEMPOTENCY: Claim outbound idempotency keys in Redis instead of
 * process memory, so duplicate webhook deliveries landing on different
 * instances still send once.
 *
 * Requires REDIS_URL. Falls back to the in-memory ledger when Redis errors.
 */
export const FF_REDIS_IDEMPOTENCY = envBool('FF_REDIS_IDEMPOTENCY', false);

/**
 * FF_REVIEW_NARRATIVE: Ask the language model for a short narrative that is
 * woven into the executive summary. Requires ANTHROPIC_API_KEY.
 */
export const FF_REVIEW_NARRATIVE = envBool('FF_REVIEW_NARRATIVE', false);
