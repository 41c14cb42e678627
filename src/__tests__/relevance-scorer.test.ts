import { describe, it, expect, beforeEach } from 'vitest';
import { ContentStore, type NewsletterChunkInput } from '../content/content-store.js';
import { KeywordExtractor } from '../content/keyword-extractor.js';
import { ContentUnavailable, ValidationError } from '../lib/errors.js';
import { bandFor, combineConfidence, RelevanceScorer } from '../scoring/relevance-scorer.js';

const RESUME = 'Product management';
const JOB = 'Director, Enterprise Strategic Leadership (Product)';

function chunk(id: string, text: string, orderIndex: number): NewsletterChunkInput {
  return { id, text, topic_tags: [], source_article: 'Test Article', order_index: orderIndex };
}

describe('bandFor', () => {
  it.each([
    [0, 'very_low'],
    [20, 'very_low'],
    [21, 'low'],
    [50, 'low'],
    [51, 'medium'],
    [80, 'medium'],
    [81, 'high'],
    [100, 'high'],
  ] as const)('confidence %i maps to %s', (confidence, band) => {
    expect(bandFor(confidence)).toBe(band);
  });
});

describe('combineConfidence', () => {
  it('weights job overlap 70 and advice relevance 30, rounded', () => {
    expect(combineConfidence(0.2, 0)).toBe(14);
    expect(combineConfidence(0, 1)).toBe(30);
    expect(combineConfidence(1, 1)).toBe(100);
    expect(combineConfidence(0.5, 0.5)).toBe(50);
  });

  it('clamps to the 0..100 range', () => {
    expect(combineConfidence(2, 2)).toBe(100);
    expect(combineConfidence(-1, 0)).toBe(0);
  });
});

describe('RelevanceScorer', () => {
  let extractor: KeywordExtractor;
  let store: ContentStore;
  let scorer: RelevanceScorer;

  beforeEach(() => {
    extractor = new KeywordExtractor();
    store = new ContentStore(extractor);
    scorer = new RelevanceScorer(extractor, store);
  });

  it('scores job overlap alone when no advice chunk overlaps', () => {
    store.load([chunk('fonts', 'fonts layout', 0)]);
    const result = scorer.score(RESUME, JOB);

    expect(result.jd_overlap_ratio).toBe(0.2);
    expect(result.newsletter_relevance_ratio).toBe(0);
    expect(result.confidence).toBe(14);
    expect(result.band).toBe('very_low');
    expect(result.matched_keywords).toEqual(['product']);
    expect(result.missing_keywords).toEqual(['director', 'enterprise', 'leadership', 'strategic']);
    expect(result.citations).toEqual([]);
    expect(result.degraded).toBe(false);
  });

  it('adds the mean relevance of retrieved chunks and cites them in order', () => {
    store.load([
      chunk('pm', 'product management roadmap', 0),
      chunk('fonts', 'fonts layout', 1),
      chunk('product', 'product', 2),
    ]);
    const result = scorer.score(RESUME, JOB);

    // product: 1/1, pm: 2/3
    expect(result.citations).toEqual(['product', 'pm']);
    expect(result.newsletter_relevance_ratio).toBeCloseTo(5 / 6, 10);
    expect(result.confidence).toBe(39);
    expect(result.band).toBe('low');
  });

  it('uses zero job overlap and empty keyword lists without job text', () => {
    store.load([chunk('fonts', 'fonts layout', 0)]);
    const result = scorer.score(RESUME);
    expect(result.jd_overlap_ratio).toBe(0);
    expect(result.matched_keywords).toEqual([]);
    expect(result.missing_keywords).toEqual([]);
    expect(result.confidence).toBe(0);
  });

  it('handles a résumé with no keywords', () => {
    store.load([chunk('pm', 'product management', 0)]);
    const result = scorer.score('the and of', JOB);
    expect(result.newsletter_relevance_ratio).toBe(0);
    expect(result.jd_overlap_ratio).toBe(0);
    expect(result.confidence).toBe(0);
  });

  it('handles a job text with no keywords', () => {
    store.load([chunk('fonts', 'fonts layout', 0)]);
    expect(scorer.score(RESUME, 'the and of').jd_overlap_ratio).toBe(0);
  });

  it('rejects empty or oversized input before scoring', () => {
    store.load([chunk('fonts', 'fonts layout', 0)]);
    expect(() => scorer.score('')).toThrow(ValidationError);
    expect(() => scorer.score('   ')).toThrow(ValidationError);
    expect(() => scorer.score(RESUME, '  ')).toThrow(ValidationError);
    expect(() => scorer.score('x'.repeat(100_001))).toThrow(ValidationError);
  });

  it('returns frozen, bit-identical results for identical inputs', () => {
    store.load([chunk('pm', 'product management roadmap', 0)]);
    const first = scorer.score(RESUME, JOB);
    expect(Object.isFrozen(first)).toBe(true);
    expect(scorer.score(RESUME, JOB)).toBe(first);

    const fresh = new RelevanceScorer(extractor, store);
    expect(JSON.stringify(fresh.score(RESUME, JOB))).toBe(JSON.stringify(first));
  });

  it('keys the memo on the content generation', () => {
    store.load([chunk('pm', 'product management roadmap', 0)]);
    const before = scorer.score(RESUME, JOB);
    store.load([chunk('fonts', 'fonts layout', 0)]);
    const after = scorer.score(RESUME, JOB);

    expect(scorer.cacheSize).toBe(2);
    expect(before.citations).toEqual(['pm']);
    expect(after.citations).toEqual([]);

    scorer.clearCache();
    expect(scorer.cacheSize).toBe(0);
  });

  it('propagates ContentUnavailable when the corpus is not loaded', () => {
    expect(() => scorer.score(RESUME, JOB)).toThrow(ContentUnavailable);
  });

  it('degrades to a citation-free job-only score when the corpus is unavailable', () => {
    const result = scorer.scoreOrDegrade(RESUME, JOB);
    expect(result).toEqual({
      confidence: 14,
      band: 'very_low',
      jd_overlap_ratio: 0.2,
      newsletter_relevance_ratio: 0,
      matched_keywords: ['product'],
      missing_keywords: ['director', 'enterprise', 'leadership', 'strategic'],
      citations: [],
      degraded: true,
    });
  });

  it('still rejects invalid input when degrading', () => {
    expect(() => scorer.scoreOrDegrade('')).toThrow(ValidationError);
  });
});
