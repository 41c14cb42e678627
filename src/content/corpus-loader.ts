import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError } from '../lib/errors.js';
import type { NewsletterChunkInput } from './content-store.js';

const articleSchema = z.object({
  title: z.string().trim().min(1),
  url: z.string().url().optional(),
  content: z.string().min(1),
});

const corpusFileSchema = z.object({
  articles: z.array(articleSchema).min(1),
});

export type CorpusArticle = z.infer<typeof articleSchema>;

/**
 * Topic tags and the phrases that earn them. The first four line up with the
 * conversation's topic menu.
 */
export const TOPIC_VOCABULARY: Readonly<Record<string, readonly string[]>> = {
  skills: ['skill', 'keyword', 'tool', 'technolog', 'certification'],
  experience: ['experience', 'achievement', 'impact', 'result', 'project', 'led ', 'leadership'],
  formatting: ['format', 'layout', 'font', 'bullet', 'section', 'page', 'length'],
  ats: ['ats', 'applicant tracking', 'screening', 'parse'],
  keywords: ['keyword', 'job description', 'terminology'],
  story: ['story', 'narrative', 'career path', 'straight line'],
  quantification: ['metric', 'quantif', 'number', 'percent', '%'],
  customization: ['tailor', 'customi', 'specific role', 'each application'],
};

const HEADING = /^#{1,3}\s+(.+?)\s*#*\s*$/;

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 60) || 'article';
}

export function tagTopics(text: string): string[] {
  const haystack = ` ${text.toLowerCase()} `;
  return Object.entries(TOPIC_VOCABULARY)
    .filter(([, cues]) => cues.some((cue) => haystack.includes(cue)))
    .map(([topic]) => topic);
}

interface Section {
  heading: string | null;
  lines: string[];
}

function splitSections(markdown: string): Section[] {
  const sections: Section[] = [];
  let current: Section = { heading: null, lines: [] };
  for (const line of markdown.split(/\r?\n/)) {
    const match = HEADING.exec(line.trim());
    if (match) {
      sections.push(current);
      current = { heading: match[1], lines: [] };
    } else {
      current.lines.push(line);
    }
  }
  sections.push(current);
  return sections;
}

/**
 * Splits an article into heading-delimited chunks. A heading with no body is
 * folded into the next chunk's text so section titles are not lost. Chunk ids
 * are `<slug>-<n>`; pass `slug` when the title's own slug is already taken.
 */
export function chunkArticle(
  article: CorpusArticle,
  startIndex: number,
  slug: string = slugify(article.title),
): NewsletterChunkInput[] {
  const chunks: NewsletterChunkInput[] = [];
  let pendingHeadings: string[] = [];

  for (const section of splitSections(article.content)) {
    const body = section.lines.join('\n').trim();
    if (section.heading) pendingHeadings.push(section.heading);
    if (!body) continue;

    const text = [...pendingHeadings, body].join('\n');
    pendingHeadings = [];
    chunks.push({
      id: `${slug}-${chunks.length + 1}`,
      text,
      topic_tags: tagTopics(text),
      source_article: article.title,
      ...(article.url ? { source_url: article.url } : {}),
      order_index: startIndex + chunks.length,
    });
  }
  return chunks;
}

// Titles that slugify alike ("Resume Tips", "Resume tips!") get -2, -3, ...
function uniqueSlug(title: string, taken: Set<string>): string {
  const base = slugify(title);
  let slug = base;
  for (let n = 2; taken.has(slug); n++) slug = `${base}-${n}`;
  taken.add(slug);
  return slug;
}

export function chunkCorpus(articles: readonly CorpusArticle[]): NewsletterChunkInput[] {
  const all: NewsletterChunkInput[] = [];
  const taken = new Set<string>();
  for (const article of articles) {
    all.push(...chunkArticle(article, all.length, uniqueSlug(article.title, taken)));
  }
  return all;
}

export function parseCorpus(raw: unknown): NewsletterChunkInput[] {
  const parsed = corpusFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      'Advice corpus file is malformed',
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    );
  }
  return chunkCorpus(parsed.data.articles);
}

export async function readCorpusFile(filePath: string): Promise<NewsletterChunkInput[]> {
  const raw: unknown = JSON.parse(await readFile(filePath, 'utf8'));
  return parseCorpus(raw);
}
