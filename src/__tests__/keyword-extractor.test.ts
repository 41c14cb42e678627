import { describe, it, expect } from 'vitest';
import {
  difference,
  intersect,
  intersectionSize,
  KeywordExtractor,
  lightStem,
  sortedKeywords,
} from '../content/keyword-extractor.js';

describe('KeywordExtractor', () => {
  const extractor = new KeywordExtractor();

  it('lowercases, splits on punctuation and drops stopwords', () => {
    const keywords = extractor.extract('Led the Product-Management team, and shipped APIs!');
    expect(sortedKeywords(keywords)).toEqual(['apis', 'led', 'management', 'product', 'shipped', 'team']);
  });

  it('deletes apostrophes instead of splitting on them', () => {
    expect(sortedKeywords(extractor.extract("Manager's role isn't remote"))).toEqual([
      'isnt',
      'managers',
      'remote',
      'role',
    ]);
  });

  it('drops single-character tokens', () => {
    expect(sortedKeywords(extractor.extract('C R x 3 go'))).toEqual(['go']);
  });

  it('returns an empty set for empty or whitespace-only input', () => {
    expect(extractor.extract('').size).toBe(0);
    expect(extractor.extract('   \n\t ').size).toBe(0);
    expect(extractor.extract('the and of').size).toBe(0);
  });

  it('is deterministic and deduplicates', () => {
    const text = 'Strategic leadership; strategic LEADERSHIP.';
    const first = sortedKeywords(extractor.extract(text));
    const second = sortedKeywords(extractor.extract(text));
    expect(first).toEqual(['leadership', 'strategic']);
    expect(second).toEqual(first);
  });

  it('accepts a custom stopword list', () => {
    const custom = new KeywordExtractor({ stopwords: ['Resume'] });
    expect(sortedKeywords(custom.extract('the resume review'))).toEqual(['review', 'the']);
  });

  it('keeps exact tokens unless stemming is enabled', () => {
    expect(sortedKeywords(extractor.extract('managing managers'))).toEqual(['managers', 'managing']);

    const stemming = new KeywordExtractor({ stemming: true });
    expect(stemming.stemming).toBe(true);
    expect(sortedKeywords(stemming.extract('managing managers'))).toEqual(['manag']);
  });
});

describe('lightStem', () => {
  it('strips the longest matching suffix', () => {
    expect(lightStem('integrations')).toBe('integr');
    expect(lightStem('strategies')).toBe('strategy');
    expect(lightStem('launched')).toBe('launch');
    expect(lightStem('skills')).toBe('skill');
  });

  it('leaves short stems and double-s words alone', () => {
    expect(lightStem('bus')).toBe('bus');
    expect(lightStem('process')).toBe('process');
    expect(lightStem('sql')).toBe('sql');
  });
});

describe('set helpers', () => {
  const a = new Set(['product', 'management', 'roadmap']);
  const b = new Set(['product', 'director', 'roadmap', 'enterprise']);

  it('intersect and intersectionSize agree', () => {
    expect(sortedKeywords(intersect(a, b))).toEqual(['product', 'roadmap']);
    expect(intersectionSize(a, b)).toBe(2);
  });

  it('difference keeps tokens only in the first set', () => {
    expect(sortedKeywords(difference(b, a))).toEqual(['director', 'enterprise']);
  });
});
