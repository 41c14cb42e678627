import { createHash } from 'node:crypto';
import type { ContentStore } from '../content/content-store.js';
import {
  difference,
  intersect,
  sortedKeywords,
  type KeywordExtractor,
  type KeywordSet,
} from '../content/keyword-extractor.js';
import { ContentUnavailable, ValidationError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import type { ConfidenceBand, ScoreResult } from './types.js';

export const JD_WEIGHT = 70;
export const NEWSLETTER_WEIGHT = 30;
export const MAX_CITED_CHUNKS = 5;

const MAX_RESUME_CHARS = 100_000;
const MAX_JOB_CHARS = 50_000;
const MAX_MEMO_ENTRIES = 500;

export function bandFor(confidence: number): ConfidenceBand {
  if (confidence <= 20) return 'very_low';
  if (confidence <= 50) return 'low';
  if (confidence <= 80) return 'medium';
  return 'high';
}

export function combineConfidence(jdOverlapRatio: number, newsletterRelevanceRatio: number): number {
  const raw = Math.round(JD_WEIGHT * jdOverlapRatio + NEWSLETTER_WEIGHT * newsletterRelevanceRatio);
  return Math.min(100, Math.max(0, raw));
}

interface JobComparison {
  jd_overlap_ratio: number;
  matched_keywords: string[];
  missing_keywords: string[];
}

function compareWithJob(resumeKw: KeywordSet, jobKw: KeywordSet | null): JobComparison {
  if (!jobKw) return { jd_overlap_ratio: 0, matched_keywords: [], missing_keywords: [] };
  const matched = intersect(resumeKw, jobKw);
  return {
    jd_overlap_ratio: jobKw.size > 0 ? matched.size / jobKw.size : 0,
    matched_keywords: sortedKeywords(matched),
    missing_keywords: sortedKeywords(difference(jobKw, resumeKw)),
  };
}

export function validateScoringInput(resumeText: string, jobText?: string | null): void {
  const issues: string[] = [];
  if (!resumeText.trim()) issues.push('resume_text: must not be empty');
  if (resumeText.length > MAX_RESUME_CHARS) issues.push(`resume_text: exceeds ${MAX_RESUME_CHARS} characters`);
  if (jobText != null) {
    if (!jobText.trim()) issues.push('job_text: must not be empty when provided');
    if (jobText.length > MAX_JOB_CHARS) issues.push(`job_text: exceeds ${MAX_JOB_CHARS} characters`);
  }
  if (issues.length > 0) throw new ValidationError('Invalid scoring input', issues);
}

/**
 * Combines résumé/job keyword overlap (70%) with advice-corpus relevance
 * (30%) into a single confidence score with chunk citations.
 *
 * Results depend only on the inputs and the store's current snapshot, so
 * they are memoized by input hash plus snapshot generation.
 */
export class RelevanceScorer {
  private readonly memo = new Map<string, ScoreResult>();

  constructor(
    private readonly extractor: KeywordExtractor,
    private readonly store: ContentStore,
  ) {}

  score(resumeText: string, jobText?: string | null): ScoreResult {
    validateScoringInput(resumeText, jobText);

    // Throws ContentUnavailable before any work when the corpus is missing.
    const generation = this.store.generation;
    const key = this.memoKey(resumeText, jobText ?? null, generation);
    const cached = this.memo.get(key);
    if (cached) {
      // Refresh insertion order so the oldest entries are evicted first.
      this.memo.delete(key);
      this.memo.set(key, cached);
      return cached;
    }

    const resumeKw = this.extractor.extract(resumeText);
    const jobKw = jobText != null ? this.extractor.extract(jobText) : null;
    const job = compareWithJob(resumeKw, jobKw);

    const ranked = this.store.retrieveRanked(resumeKw, MAX_CITED_CHUNKS);
    const newsletterRatio = ranked.length > 0
      ? ranked.reduce((sum, r) => sum + r.relevance, 0) / ranked.length
      : 0;

    const confidence = combineConfidence(job.jd_overlap_ratio, newsletterRatio);
    const result: ScoreResult = Object.freeze({
      confidence,
      band: bandFor(confidence),
      jd_overlap_ratio: job.jd_overlap_ratio,
      newsletter_relevance_ratio: newsletterRatio,
      matched_keywords: Object.freeze(job.matched_keywords),
      missing_keywords: Object.freeze(job.missing_keywords),
      citations: Object.freeze(ranked.map((r) => r.chunk.id)),
      degraded: false,
    });

    while (this.memo.size >= MAX_MEMO_ENTRIES) {
      const oldest = this.memo.keys().next().value;
      if (oldest === undefined) break;
      this.memo.delete(oldest);
    }
    this.memo.set(key, result);
    return result;
  }

  /**
   * Caller-side degradation: when the corpus is unavailable, returns a
   * citation-free result scored on the job overlap alone and flagged as
   * degraded. Every other error propagates.
   */
  scoreOrDegrade(resumeText: string, jobText?: string | null): ScoreResult {
    try {
      return this.score(resumeText, jobText);
    } catch (err) {
      if (!(err instanceof ContentUnavailable)) throw err;
      logger.error({ err: err.message }, 'Advice corpus unavailable; returning degraded score');
      const job = compareWithJob(
        this.extractor.extract(resumeText),
        jobText != null ? this.extractor.extract(jobText) : null,
      );
      const confidence = combineConfidence(job.jd_overlap_ratio, 0);
      return Object.freeze({
        confidence,
        band: bandFor(confidence),
        jd_overlap_ratio: job.jd_overlap_ratio,
        newsletter_relevance_ratio: 0,
        matched_keywords: Object.freeze(job.matched_keywords),
        missing_keywords: Object.freeze(job.missing_keywords),
        citations: Object.freeze([]),
        degraded: true,
      });
    }
  }

  clearCache(): void {
    this.memo.clear();
  }

  get cacheSize(): number {
    return this.memo.size;
  }

  private memoKey(resumeText: string, jobText: string | null, generation: number): string {
    return createHash('sha256')
      .update(resumeText)
      .update('\u0000')
      .update(jobText === null ? '\u0001' : `\u0002${jobText}`)
      .update(`\u0000${generation}:${this.extractor.stemming ? 's' : 'e'}`)
      .digest('hex');
  }
}
