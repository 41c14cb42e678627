import { z } from 'zod';

export const CONFIDENCE_BANDS = ['very_low', 'low', 'medium', 'high'] as const;
export type ConfidenceBand = (typeof CONFIDENCE_BANDS)[number];

/**
 * Immutable outcome of one scoring request. Keyword sets are stored as
 * sorted arrays so equal inputs serialize identically.
 */
export interface ScoreResult {
  readonly confidence: number;
  readonly band: ConfidenceBand;
  readonly jd_overlap_ratio: number;
  readonly newsletter_relevance_ratio: number;
  readonly matched_keywords: readonly string[];
  readonly missing_keywords: readonly string[];
  readonly citations: readonly string[];
  /** True when the advice corpus was unavailable and the result carries no citations. */
  readonly degraded: boolean;
}

export const scoreResultSchema = z.object({
  confidence: z.number().int().min(0).max(100),
  band: z.enum(CONFIDENCE_BANDS),
  jd_overlap_ratio: z.number().min(0).max(1),
  newsletter_relevance_ratio: z.number().min(0).max(1),
  matched_keywords: z.array(z.string()),
  missing_keywords: z.array(z.string()),
  citations: z.array(z.string()),
  degraded: z.boolean().default(false),
});

export const BAND_LABELS: Readonly<Record<ConfidenceBand, string>> = {
  very_low: 'Early fit',
  low: 'Partial fit',
  medium: 'Good fit',
  high: 'Strong fit',
};
