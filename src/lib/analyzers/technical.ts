import { type CategoryResult, type FetchResult, type ParsedPage, type Severity, getHeader } from '../types';
import { IssueLedger } from './issue-ledger';
import { AI_CRAWLER_OPERATORS, evaluateCrawlerAccess } from './robots';
import { buildCategoryResult } from './shared';

interface SecurityHeaderRule {
  header: string;
  points: number;
  severity: Severity;
}

export const SECURITY_HEADERS: readonly SecurityHeaderRule[] = Object.freeze([
  { header: 'content-security-policy', points: 2, severity: 'low' },
  { header: 'strict-transport-security', points: 3, severity: 'medium' },
  { header: 'x-frame-options', points: 2, severity: 'low' },
  { header: 'x-content-type-options', points: 2, severity: 'low' },
  { header: 'referrer-policy', points: 2, severity: 'low' },
]);

export function analyzeTechnical(parsed: ParsedPage, fetchResult: FetchResult): CategoryResult {
  const ledger = new IssueLedger('technical');

  const title = parsed.title;
  if (!title) {
    ledger.record('tech-no-title', 'critical', 'Missing title tag',
      'No <title> tag found.', 'Add a descriptive title tag (30-60 chars).',
      'Major ranking factor', 15);
  } else if (title.length < 30) {
    ledger.record('tech-short-title', 'high', 'Title tag too short',
      `Title is ${title.length} chars (min 30).`,
      'Expand title to 30-60 characters.', 'Reduced CTR', 8);
  } else if (title.length > 60) {
    ledger.record('tech-long-title', 'medium', 'Title tag too long',
      `Title is ${title.length} chars (max 60). Google will truncate.`,
      'Shorten to under 60 characters.', 'Truncated in SERPs', 5);
  }

  const desc = parsed.metaDescription;
  if (!desc) {
    ledger.record('tech-no-meta-desc', 'high', 'Missing meta description',
      'No meta description found.',
      'Add a compelling meta description (120-160 chars).',
      'Lower CTR from search results', 10);
  } else if (desc.length < 120) {
    ledger.record('tech-short-meta-desc', 'medium', 'Meta description too short',
      `Meta description is ${desc.length} chars (min 120).`,
      'Expand to 120-160 characters.', 'Missed CTR opportunity', 5);
  } else if (desc.length > 160) {
    ledger.record('tech-long-meta-desc', 'low', 'Meta description too long',
      `Meta description is ${desc.length} chars (max 160).`,
      'Shorten to under 160 characters.', 'Truncated in SERPs', 3);
  }

  if (!parsed.canonical) {
    ledger.record('tech-no-canonical', 'high', 'Missing canonical tag',
      'No canonical URL specified.',
      'Add <link rel="canonical"> to prevent duplicate content.',
      'Duplicate content risk', 8);
  }

  if ((parsed.metaRobots ?? '').toLowerCase().includes('noindex')) {
    ledger.record('tech-noindex', 'critical', 'Page blocked from indexing',
      "Meta robots contains 'noindex'.",
      'Remove noindex if this page should appear in search.',
      'Page invisible to search engines', 20);
  }

  if (!parsed.viewport) {
    ledger.record('tech-no-viewport', 'high', 'Missing viewport meta tag',
      'No viewport meta tag found.',
      'Add <meta name="viewport" content="width=device-width, initial-scale=1">.',
      'Mobile usability issues', 10);
  }

  if (fetchResult.finalUrl.startsWith('http://')) {
    ledger.record('tech-no-https', 'critical', 'Not using HTTPS',
      'Site is served over HTTP.',
      "Migrate to HTTPS. It's a confirmed ranking signal.",
      'Security + ranking penalty', 15);
  }

  for (const rule of SECURITY_HEADERS) {
    if (getHeader(fetchResult.headers, rule.header) === undefined) {
      ledger.record(`tech-no-${rule.header}`, rule.severity,
        `Missing ${rule.header} header`,
        `The ${rule.header} security header is not set.`,
        `Add ${rule.header} header for better security.`,
        'Security vulnerability', rule.points);
    }
  }

  if (!fetchResult.robotsTxt) {
    ledger.record('tech-no-robots', 'medium', 'Missing robots.txt',
      'No robots.txt file found.',
      'Create a robots.txt to guide crawlers.',
      'No crawl guidance', 5);
  }

  if (!fetchResult.sitemapXml) {
    ledger.record('tech-no-sitemap', 'medium', 'Missing XML sitemap',
      'No sitemap.xml found at the root.',
      'Create and submit an XML sitemap.',
      'Slower page discovery', 5);
  }

  const chain = fetchResult.redirectChain;
  if (chain.length > 1) {
    ledger.record('tech-redirect-chain', 'medium', 'Redirect chain detected',
      `${chain.length} redirects before reaching the page.`,
      'Reduce to a single redirect.',
      'Crawl budget waste', 5);
  }

  // Informational: no score impact, the AI-search category owns crawler deductions.
  const access = evaluateCrawlerAccess(fetchResult.robotsTxt, Object.keys(AI_CRAWLER_OPERATORS));
  const blocked = Object.entries(access)
    .filter(([, status]) => status === 'blocked')
    .map(([crawler]) => `${crawler} (${AI_CRAWLER_OPERATORS[crawler]})`);
  if (blocked.length > 0) {
    ledger.record('tech-ai-crawlers-blocked', 'low', 'AI crawlers blocked in robots.txt',
      `Blocked: ${blocked.join(', ')}`,
      'Consider allowing AI crawlers for visibility in AI search.',
      'Reduced AI search visibility', 0);
  }

  return buildCategoryResult('technical', ledger, (score, count) =>
    `Technical SEO score: ${score}/100 with ${count} issues found.`
  );
}
