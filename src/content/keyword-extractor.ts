import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export type KeywordSet = ReadonlySet<string>;

const STOPWORDS_PATH = fileURLToPath(new URL('../../data/stopwords.json', import.meta.url));

let defaultStopwords: ReadonlySet<string> | null = null;

export function loadDefaultStopwords(): ReadonlySet<string> {
  if (!defaultStopwords) {
    const raw: unknown = JSON.parse(readFileSync(STOPWORDS_PATH, 'utf8'));
    defaultStopwords = new Set(z.array(z.string().min(1)).parse(raw).map((w) => w.toLowerCase()));
  }
  return defaultStopwords;
}

const MIN_TOKEN_LENGTH = 2;
const APOSTROPHES = /['‘’`]/g;
const PUNCTUATION_OR_SYMBOL = /[\p{P}\p{S}]+/gu;

// Longest suffix first; the remaining stem must keep at least three letters.
const STEM_SUFFIXES = ['ations', 'ation', 'ings', 'ing', 'ies', 'ers', 'ed', 'es', 's'];

/**
 * Light suffix stripping. Only used behind FF_KEYWORD_STEMMING; matching is
 * exact-token otherwise.
 */
export function lightStem(token: string): string {
  for (const suffix of STEM_SUFFIXES) {
    if (token.length - suffix.length >= 3 && token.endsWith(suffix)) {
      if (suffix === 'ies') return `${token.slice(0, -3)}y`;
      if (suffix === 's' && token.endsWith('ss')) return token;
      return token.slice(0, -suffix.length);
    }
  }
  return token;
}

export interface KeywordExtractorOptions {
  stopwords?: Iterable<string>;
  stemming?: boolean;
}

/**
 * Normalizes free text into a canonical keyword set:
 * lowercase → strip punctuation → split on whitespace → drop stopwords →
 * drop tokens shorter than two characters → deduplicate.
 */
export class KeywordExtractor {
  private readonly stopwords: ReadonlySet<string>;
  readonly stemming: boolean;

  constructor(options: KeywordExtractorOptions = {}) {
    this.stopwords = options.stopwords
      ? new Set(Array.from(options.stopwords, (w) => w.toLowerCase()))
      : loadDefaultStopwords();
    this.stemming = options.stemming ?? false;
  }

  extract(text: string): KeywordSet {
    const keywords = new Set<string>();
    if (!text.trim()) return keywords;

    const normalized = text
      .toLowerCase()
      .replace(APOSTROPHES, '')
      .replace(PUNCTUATION_OR_SYMBOL, ' ');

    for (const raw of normalized.split(/\s+/)) {
      if (!raw || this.stopwords.has(raw)) continue;
      const token = this.stemming ? lightStem(raw) : raw;
      if (token.length < MIN_TOKEN_LENGTH) continue;
      keywords.add(token);
    }
    return keywords;
  }
}

export function intersect(a: KeywordSet, b: KeywordSet): Set<string> {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  const out = new Set<string>();
  for (const token of small) {
    if (large.has(token)) out.add(token);
  }
  return out;
}

export function difference(a: KeywordSet, b: KeywordSet): Set<string> {
  const out = new Set<string>();
  for (const token of a) {
    if (!b.has(token)) out.add(token);
  }
  return out;
}

export function intersectionSize(a: KeywordSet, b: KeywordSet): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let count = 0;
  for (const token of small) {
    if (large.has(token)) count += 1;
  }
  return count;
}

export function sortedKeywords(set: KeywordSet): string[] {
  return Array.from(set).sort();
}
