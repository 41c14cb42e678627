import { describe, it, expect } from 'vitest';
import {
  companyFromUrl,
  extractSkills,
  jobTextFromPosting,
  platformForUrl,
  selectJdExtractor,
} from '../jobs/jd-extractors.js';

describe('platform dispatch', () => {
  it.each([
    ['https://www.linkedin.com/jobs/view/123', 'linkedin'],
    ['https://www.indeed.com/viewjob?jk=abc', 'indeed'],
    ['https://boards.greenhouse.io/acme/jobs/1', 'greenhouse'],
    ['https://jobs.lever.co/acme/abc', 'lever'],
    ['https://acme.wd5.myworkdayjobs.com/en-US/External/job/1', 'workday'],
    ['https://notlinkedin.com/jobs/1', 'generic'],
    ['https://example.org/careers/pm', 'generic'],
  ])('%s → %s', (url, platform) => {
    expect(platformForUrl(new URL(url))).toBe(platform);
    expect(selectJdExtractor(url).platform).toBe(platform);
  });
});

describe('companyFromUrl', () => {
  it('reads the company from a subdomain or the first path segment', () => {
    expect(companyFromUrl(new URL('https://acme.greenhouse.io/jobs/1'))).toBe('Acme');
    expect(companyFromUrl(new URL('https://boards.greenhouse.io/acme/jobs/1'))).toBe('Acme');
    expect(companyFromUrl(new URL('https://jobs.lever.co/north-wind/abc'))).toBe('North Wind');
    expect(companyFromUrl(new URL('https://example.org/careers/pm'))).toBeNull();
  });
});

describe('extractSkills', () => {
  it('matches whole vocabulary terms in vocabulary order', () => {
    expect(extractSkills('Python, SQL and some golang; no rest for the interested')).toEqual(['sql', 'python', 'rest']);
  });
});

describe('platform extractors', () => {
  it('pulls title, company and description from a LinkedIn page', () => {
    const html = [
      '<html><head><title>PM</title></head><body>',
      '<h1 class="top-card-layout__title">Senior Product Manager</h1>',
      '<a class="topcard__org-name-link" href="#">Acme &amp; Co</a>',
      '<div class="show-more-less-html__markup"><p>Own the roadmap.</p>',
      '<ul><li>SQL and A/B testing</li><li>Stakeholder management</li></ul></div>',
      '<script>var x = 1;</script>',
      '</body></html>',
    ].join('');

    const posting = selectJdExtractor('https://www.linkedin.com/jobs/view/123').extract(html);

    expect(posting).toEqual({
      platform: 'linkedin',
      title: 'Senior Product Manager',
      company: 'Acme & Co',
      skills: ['roadmap', 'a/b testing', 'stakeholder management', 'sql'],
      description: 'Own the roadmap.\nSQL and A/B testing\nStakeholder management',
    });
  });

  it('falls back to the page title for the Greenhouse company', () => {
    const html = [
      '<title>Product Manager at Northwind | Greenhouse</title>',
      '<h1 class="app-title">Product Manager</h1>',
      '<div id="content"><p>Lead analytics.</p></div>',
    ].join('');

    const posting = selectJdExtractor('https://boards.greenhouse.io/northwind/jobs/1').extract(html);

    expect(posting.company).toBe('Northwind');
    expect(posting.title).toBe('Product Manager');
    expect(posting.description).toBe('Lead analytics.');
    expect(posting.skills).toEqual(['analytics']);
  });

  it('reads the Workday company from the host', () => {
    const html = [
      '<h2 data-automation-id="jobPostingHeader">Data Analyst</h2>',
      '<div data-automation-id="jobPostingDescription">Python and Tableau.</div>',
    ].join('');

    const posting = selectJdExtractor('https://acme.wd5.myworkdayjobs.com/en-US/External/job/123').extract(html);

    expect(posting.company).toBe('Acme');
    expect(posting.title).toBe('Data Analyst');
    expect(posting.skills).toEqual(['python', 'tableau']);
  });

  it('uses og:site_name and <main> on unknown hosts', () => {
    const html = [
      '<meta property="og:site_name" content="Contoso">',
      '<h1>Ops Lead</h1>',
      '<main>Budgeting &amp; forecasting.</main>',
    ].join('');

    const posting = selectJdExtractor('https://contoso.example.org/jobs/ops').extract(html);

    expect(posting.company).toBe('Contoso');
    expect(jobTextFromPosting(posting)).toBe('Ops Lead\nbudgeting, forecasting\nBudgeting & forecasting.');
  });

  it('reports Unknown fields when nothing matches', () => {
    const posting = selectJdExtractor('https://example.org/careers/pm').extract('<html><body><p>Just text</p></body></html>');

    expect(posting.title).toBe('Unknown');
    expect(posting.company).toBe('Unknown');
    expect(posting.description).toBe('Just text');
    expect(jobTextFromPosting(posting)).toBe('Just text');
  });
});
