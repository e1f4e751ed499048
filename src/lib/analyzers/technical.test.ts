import { describe, expect, it } from 'vitest';
import { makeFetchResult, makeParsedPage } from '../testing/fixtures';
import type { FetchResult } from '../types';
import { analyzeTechnical } from './technical';

const SECURE_HEADERS = {
  'content-security-policy': "default-src 'self'",
  'strict-transport-security': 'max-age=31536000',
  'x-frame-options': 'DENY',
  'x-content-type-options': 'nosniff',
  'referrer-policy': 'same-origin',
};

function cleanPage() {
  return makeParsedPage({
    title: 'A descriptive page title for testing purposes',
    metaDescription: 'd'.repeat(130),
    canonical: 'https://example.com/',
    viewport: 'width=device-width, initial-scale=1',
  });
}

function cleanFetch(overrides: Partial<FetchResult> = {}) {
  return makeFetchResult({
    headers: SECURE_HEADERS,
    robotsTxt: 'User-agent: *\nAllow: /',
    sitemapXml: '<urlset></urlset>',
    ...overrides,
  });
}

describe('analyzeTechnical', () => {
  it('scores a well-formed page at 100 with no issues', () => {
    const result = analyzeTechnical(cleanPage(), cleanFetch());
    expect(result.score).toBe(100);
    expect(result.issues).toEqual([]);
    expect(result.grade).toBe('A+');
    expect(result.weight).toBe(0.2);
  });

  it('accumulates deductions for a bare page', () => {
    const result = analyzeTechnical(makeParsedPage(), makeFetchResult());

    expect(result.issues.map(i => i.id)).toEqual([
      'tech-no-title',
      'tech-no-meta-desc',
      'tech-no-canonical',
      'tech-no-viewport',
      'tech-no-content-security-policy',
      'tech-no-strict-transport-security',
      'tech-no-x-frame-options',
      'tech-no-x-content-type-options',
      'tech-no-referrer-policy',
      'tech-no-robots',
      'tech-no-sitemap',
    ]);
    expect(result.score).toBe(36);
    expect(result.summary).toBe('Technical SEO score: 36/100 with 11 issues found.');
  });

  it('flags a short title and a long meta description', () => {
    const page = { ...cleanPage(), title: 'Short', metaDescription: 'd'.repeat(170) };
    const result = analyzeTechnical(page, cleanFetch());

    expect(result.issues.map(i => [i.id, i.severity])).toEqual([
      ['tech-short-title', 'high'],
      ['tech-long-meta-desc', 'low'],
    ]);
    expect(result.score).toBe(89);
  });

  it('flags noindex, plain HTTP and redirect chains', () => {
    const page = { ...cleanPage(), metaRobots: 'NOINDEX, follow' };
    const fetchResult = cleanFetch({
      finalUrl: 'http://example.com/',
      redirectChain: ['http://example.com', 'http://www.example.com'],
    });
    const result = analyzeTechnical(page, fetchResult);

    expect(result.issues.map(i => i.id)).toEqual(['tech-noindex', 'tech-no-https', 'tech-redirect-chain']);
    expect(result.score).toBe(60);
  });

  it('reads security headers case-insensitively', () => {
    const headers = Object.fromEntries(Object.entries(SECURE_HEADERS).map(([k, v]) => [k.toUpperCase(), v]));
    const result = analyzeTechnical(cleanPage(), cleanFetch({ headers }));
    expect(result.score).toBe(100);
  });

  it('reports blocked AI crawlers without deducting', () => {
    const robotsTxt = 'User-agent: GPTBot\nDisallow: /\n\nUser-agent: PerplexityBot\nDisallow: /';
    const result = analyzeTechnical(cleanPage(), cleanFetch({ robotsTxt }));

    expect(result.score).toBe(100);
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatchObject({
      id: 'tech-ai-crawlers-blocked',
      severity: 'low',
      description: 'Blocked: GPTBot (OpenAI), PerplexityBot (Perplexity)',
    });
  });
});
