import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { extractVisibleTextFromHtml, firstText, metaContent, type ElementSelector } from './html.js';

export type JobPlatform = 'linkedin' | 'indeed' | 'greenhouse' | 'lever' | 'workday' | 'generic';

export interface JobPosting {
  platform: JobPlatform;
  title: string;
  company: string;
  skills: string[];
  description: string;
}

export interface JdExtractor {
  readonly platform: JobPlatform;
  extract(html: string): JobPosting;
}

const UNKNOWN = 'Unknown';
const MAX_DESCRIPTION_CHARS = 20_000;
const SKILLS_PATH = fileURLToPath(new URL('../../data/skill-vocabulary.json', import.meta.url));

let skillPatterns: Array<{ skill: string; pattern: RegExp }> | null = null;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function getSkillPatterns() {
  if (!skillPatterns) {
    const raw: unknown = JSON.parse(readFileSync(SKILLS_PATH, 'utf8'));
    skillPatterns = z.array(z.string().min(1)).parse(raw).map((skill) => ({
      skill,
      pattern: new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(skill.toLowerCase())}(?![\\p{L}\\p{N}])`, 'u'),
    }));
  }
  return skillPatterns;
}

/** Vocabulary skills mentioned in `text`, in vocabulary order. */
export function extractSkills(text: string): string[] {
  const lower = text.toLowerCase();
  return getSkillPatterns()
    .filter(({ pattern }) => pattern.test(lower))
    .map(({ skill }) => skill);
}

const GENERIC_HOST_LABELS = new Set(['www', 'jobs', 'careers', 'apply', 'boards', 'job-boards']);

function titleCase(value: string): string {
  return value
    .replace(/[-_]+/g, ' ')
    .replace(/\b\p{L}/gu, (c) => c.toUpperCase())
    .trim();
}

/** company.greenhouse.io, company.wd5.myworkdayjobs.com, jobs.lever.co/company */
export function companyFromUrl(url: URL): string | null {
  const labels = url.hostname.toLowerCase().split('.');
  if (labels.length >= 3 && !GENERIC_HOST_LABELS.has(labels[0])) {
    return titleCase(labels[0]);
  }
  const firstSegment = url.pathname.split('/').find((part) => part.length > 2);
  if (firstSegment && !['job', 'jobs', 'career', 'careers', 'apply', 'view'].includes(firstSegment.toLowerCase())) {
    return titleCase(decodeURIComponent(firstSegment));
  }
  return null;
}

/** "Senior PM at Acme" → "Acme" */
function companyFromTitleTag(html: string): string | null {
  const title = firstText(html, [{ tag: 'title' }]);
  if (!title) return null;
  const at = title.lastIndexOf(' at ');
  return at >= 0 ? title.slice(at + 4).split(/[|\-–]/)[0].trim() || null : null;
}

abstract class SelectorExtractor implements JdExtractor {
  abstract readonly platform: JobPlatform;
  protected abstract readonly titleSelectors: readonly ElementSelector[];
  protected abstract readonly companySelectors: readonly ElementSelector[];
  protected abstract readonly descriptionSelectors: readonly ElementSelector[];

  constructor(protected readonly url: URL) {}

  protected fallbackCompany(html: string): string | null {
    return metaContent(html, 'og:site_name') ?? companyFromUrl(this.url);
  }

  protected fallbackDescription(html: string): string {
    return extractVisibleTextFromHtml(html);
  }

  extract(html: string): JobPosting {
    const title = firstText(html, this.titleSelectors) ?? metaContent(html, 'og:title') ?? UNKNOWN;
    const company = firstText(html, this.companySelectors) ?? this.fallbackCompany(html) ?? UNKNOWN;
    const description = (firstText(html, this.descriptionSelectors) ?? this.fallbackDescription(html))
      .slice(0, MAX_DESCRIPTION_CHARS);
    return {
      platform: this.platform,
      title: title.split('\n')[0].trim(),
      company: company.split('\n')[0].trim(),
      skills: extractSkills(`${title}\n${description}`),
      description,
    };
  }
}

export class LinkedInExtractor extends SelectorExtractor {
  readonly platform = 'linkedin';
  protected readonly titleSelectors = [
    { tag: 'h1', className: 'top-card-layout__title' },
    { tag: 'h1', className: 't-24' },
    { tag: 'h1', attr: { name: 'data-test', value: 'job-title' } },
  ];
  protected readonly companySelectors = [
    { className: 'topcard__org-name-link' },
    { tag: 'span', className: 'jobs-unified-top-card__company-name' },
  ];
  protected readonly descriptionSelectors = [
    { tag: 'div', className: 'show-more-less-html__markup' },
    { tag: 'div', className: 'jobs-description-content__text' },
    { tag: 'div', attr: { name: 'data-test', value: 'job-description' } },
  ];
}

export class IndeedExtractor extends SelectorExtractor {
  readonly platform = 'indeed';
  protected readonly titleSelectors = [
    { tag: 'h1', attr: { name: 'data-testid', value: 'jobsearch-JobInfoHeader-title' } },
    { tag: 'h1', className: 'jobsearch-JobInfoHeader-title' },
  ];
  protected readonly companySelectors = [
    { attr: { name: 'data-testid', value: 'inlineHeader-companyName' } },
    { attr: { name: 'data-company-name', value: 'true' } },
  ];
  protected readonly descriptionSelectors = [
    { tag: 'div', id: 'jobDescriptionText' },
    { tag: 'div', attr: { name: 'data-testid', value: 'jobsearch-jobDescriptionText' } },
  ];
}

export class GreenhouseExtractor extends SelectorExtractor {
  readonly platform = 'greenhouse';
  protected readonly titleSelectors = [
    { tag: 'h1', className: 'app-title' },
    { tag: 'h1' },
  ];
  protected readonly companySelectors = [
    { tag: 'span', className: 'company-name' },
    { className: 'header-company-name' },
  ];
  protected readonly descriptionSelectors = [
    { tag: 'div', id: 'content' },
    { tag: 'div', className: 'job-description' },
    { tag: 'main' },
  ];

  protected fallbackCompany(html: string): string | null {
    return companyFromTitleTag(html) ?? super.fallbackCompany(html);
  }
}

export class LeverExtractor extends SelectorExtractor {
  readonly platform = 'lever';
  protected readonly titleSelectors = [
    { tag: 'h2', attr: { name: 'data-qa', value: 'posting-name' } },
    { tag: 'h2' },
    { tag: 'h1' },
  ];
  protected readonly companySelectors = [
    { className: 'main-header-logo' },
  ];
  protected readonly descriptionSelectors = [
    { tag: 'div', attr: { name: 'data-qa', value: 'job-description' } },
    { tag: 'div', className: 'section-wrapper' },
  ];

  // jobs.lever.co/<company>/<posting-id>
  protected fallbackCompany(html: string): string | null {
    return companyFromUrl(this.url) ?? metaContent(html, 'og:site_name');
  }
}

export class WorkdayExtractor extends SelectorExtractor {
  readonly platform = 'workday';
  protected readonly titleSelectors = [
    { tag: 'h2', attr: { name: 'data-automation-id', value: 'jobPostingHeader' } },
    { tag: 'h1', attr: { name: 'data-automation-id', value: 'jobPostingHeader' } },
    { tag: 'h1' },
  ];
  protected readonly companySelectors: readonly ElementSelector[] = [];
  protected readonly descriptionSelectors = [
    { tag: 'div', attr: { name: 'data-automation-id', value: 'jobPostingDescription' } },
    { tag: 'div', className: 'jobdescription' },
  ];

  protected fallbackCompany(html: string): string | null {
    return companyFromUrl(this.url) ?? metaContent(html, 'og:site_name');
  }
}

export class GenericExtractor extends SelectorExtractor {
  readonly platform = 'generic';
  protected readonly titleSelectors = [
    { tag: 'h1' },
    { tag: 'title' },
  ];
  protected readonly companySelectors: readonly ElementSelector[] = [];
  protected readonly descriptionSelectors = [
    { tag: 'main' },
    { tag: 'article' },
  ];

  protected fallbackCompany(html: string): string | null {
    return metaContent(html, 'og:site_name') ?? companyFromTitleTag(html) ?? companyFromUrl(this.url);
  }
}

const PLATFORM_HOSTS: ReadonlyArray<[string, JobPlatform]> = [
  ['linkedin.com', 'linkedin'],
  ['indeed.com', 'indeed'],
  ['greenhouse.io', 'greenhouse'],
  ['lever.co', 'lever'],
  ['myworkdayjobs.com', 'workday'],
  ['workday.com', 'workday'],
];

export function platformForUrl(url: URL): JobPlatform {
  const host = url.hostname.toLowerCase();
  const hit = PLATFORM_HOSTS.find(([domain]) => host === domain || host.endsWith(`.${domain}`));
  return hit ? hit[1] : 'generic';
}

/** Pure dispatch on the posting URL; unknown hosts get the generic extractor. */
export function selectJdExtractor(rawUrl: string): JdExtractor {
  const url = new URL(rawUrl);
  const platform = platformForUrl(url);
  switch (platform) {
    case 'linkedin':
      return new LinkedInExtractor(url);
    case 'indeed':
      return new IndeedExtractor(url);
    case 'greenhouse':
      return new GreenhouseExtractor(url);
    case 'lever':
      return new LeverExtractor(url);
    case 'workday':
      return new WorkdayExtractor(url);
    case 'generic':
      return new GenericExtractor(url);
  }
}

/** Title, skills and description concatenated as the scorer's job text. */
export function jobTextFromPosting(posting: JobPosting): string {
  return [posting.title === UNKNOWN ? '' : posting.title, posting.skills.join(', '), posting.description]
    .filter((part) => part.trim().length > 0)
    .join('\n');
}
