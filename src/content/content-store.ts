import { z } from 'zod';
import { ContentUnavailable, ValidationError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { intersectionSize, KeywordExtractor, type KeywordSet } from './keyword-extractor.js';

export interface NewsletterChunk {
  readonly id: string;
  readonly text: string;
  readonly topic_tags: ReadonlySet<string>;
  readonly source_article: string;
  readonly source_url?: string;
  readonly order_index: number;
}

export const newsletterChunkInputSchema = z.object({
  id: z.string().trim().min(1).max(200),
  text: z.string().trim().min(1),
  topic_tags: z.array(z.string().trim().min(1)).default([]),
  source_article: z.string().trim().min(1),
  source_url: z.string().url().optional(),
  order_index: z.number().int().nonnegative(),
});

export type NewsletterChunkInput = z.input<typeof newsletterChunkInputSchema>;

export interface RankedChunk {
  chunk: NewsletterChunk;
  /** |query ∩ chunk_keywords| / |chunk_keywords| */
  relevance: number;
}

interface IndexedChunk {
  chunk: NewsletterChunk;
  keywords: KeywordSet;
}

interface Snapshot {
  readonly generation: number;
  readonly entries: readonly IndexedChunk[];
  readonly byId: ReadonlyMap<string, IndexedChunk>;
}

function compareChunks(a: NewsletterChunk, b: NewsletterChunk): number {
  return a.order_index - b.order_index || a.id.localeCompare(b.id);
}

/**
 * Holds the advice corpus as an immutable snapshot. `load` builds a complete
 * replacement and swaps it in with one assignment, so readers in flight keep
 * the snapshot they started with.
 */
export class ContentStore {
  private snapshot: Snapshot | null = null;
  private generationCounter = 0;

  constructor(private readonly extractor: KeywordExtractor) {}

  load(inputs: readonly NewsletterChunkInput[]): void {
    const issues: string[] = [];
    const seen = new Set<string>();
    const entries: IndexedChunk[] = [];

    inputs.forEach((input, position) => {
      const parsed = newsletterChunkInputSchema.safeParse(input);
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          issues.push(`chunk[${position}].${issue.path.join('.')}: ${issue.message}`);
        }
        return;
      }
      const data = parsed.data;
      if (seen.has(data.id)) {
        issues.push(`chunk[${position}].id: duplicate id "${data.id}"`);
        return;
      }
      seen.add(data.id);

      const chunk: NewsletterChunk = Object.freeze({
        id: data.id,
        text: data.text,
        topic_tags: new Set(data.topic_tags.map((t) => t.toLowerCase())),
        source_article: data.source_article,
        ...(data.source_url ? { source_url: data.source_url } : {}),
        order_index: data.order_index,
      });
      entries.push({ chunk, keywords: this.extractor.extract(data.text) });
    });

    if (issues.length > 0) {
      throw new ValidationError('Advice corpus rejected; previous corpus kept', issues);
    }

    entries.sort((a, b) => compareChunks(a.chunk, b.chunk));
    this.generationCounter += 1;
    this.snapshot = Object.freeze({
      generation: this.generationCounter,
      entries: Object.freeze(entries),
      byId: new Map(entries.map((e) => [e.chunk.id, e])),
    });
    logger.info({ chunks: entries.length, generation: this.generationCounter }, 'Advice corpus loaded');
  }

  /**
   * Chunks ranked by recall-style relevance, ties broken by `order_index`
   * and then `id`.
   * Chunks with no overlap are excluded.
   */
  retrieveRanked(keywords: KeywordSet, maxChunks: number): RankedChunk[] {
    const snapshot = this.requireSnapshot();
    if (maxChunks <= 0 || keywords.size === 0) return [];

    const ranked: RankedChunk[] = [];
    for (const entry of snapshot.entries) {
      if (entry.keywords.size === 0) continue;
      const overlap = intersectionSize(keywords, entry.keywords);
      if (overlap === 0) continue;
      ranked.push({ chunk: entry.chunk, relevance: overlap / entry.keywords.size });
    }

    ranked.sort((a, b) => b.relevance - a.relevance || compareChunks(a.chunk, b.chunk));
    return ranked.slice(0, maxChunks);
  }

  retrieve(keywords: KeywordSet, maxChunks: number): NewsletterChunk[] {
    return this.retrieveRanked(keywords, maxChunks).map((r) => r.chunk);
  }

  get(id: string): NewsletterChunk | undefined {
    return this.requireSnapshot().byId.get(id)?.chunk;
  }

  keywordsOf(id: string): KeywordSet | undefined {
    return this.requireSnapshot().byId.get(id)?.keywords;
  }

  chunks(): readonly NewsletterChunk[] {
    return this.requireSnapshot().entries.map((e) => e.chunk);
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  get generation(): number {
    return this.requireSnapshot().generation;
  }

  get size(): number {
    return this.snapshot?.entries.length ?? 0;
  }

  teardown(): void {
    this.snapshot = null;
  }

  private requireSnapshot(): Snapshot {
    if (!this.snapshot) throw new ContentUnavailable();
    return this.snapshot;
  }
}
