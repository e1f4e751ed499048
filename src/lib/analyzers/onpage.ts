import type { CategoryResult, FetchResult, ParsedPage } from '../types';
import { IssueLedger } from './issue-ledger';
import { buildCategoryResult } from './shared';

const REQUIRED_OPEN_GRAPH = ['og:title', 'og:description', 'og:image'];

function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return '';
  }
}

export function analyzeOnPage(parsed: ParsedPage, fetchResult: FetchResult): CategoryResult {
  const ledger = new IssueLedger('onpage');
  const { headings } = parsed;

  const h1Count = headings.h1.length;
  if (h1Count === 0) {
    ledger.record('onpage-no-h1', 'critical', 'Missing H1 tag',
      'No H1 heading found on the page.',
      'Add a single, descriptive H1 tag.',
      'Primary on-page ranking signal', 15);
  } else if (h1Count > 1) {
    ledger.record('onpage-multiple-h1', 'medium', 'Multiple H1 tags',
      `Found ${h1Count} H1 tags. Use only one per page.`,
      'Keep one H1 and convert others to H2.',
      'Dilutes heading hierarchy', 6);
  }

  // Hierarchy is judged only by which lower levels exist, not by document order.
  const hasH2 = headings.h2.length > 0;
  const hasH3 = headings.h3.length > 0;
  const hasH4 = headings.h4.length > 0;
  if (hasH3 && !hasH2) {
    ledger.record('onpage-skip-h2', 'medium', 'H3 used without H2',
      'H3 headings found but no H2. Heading hierarchy is broken.',
      'Add H2 headings before H3.', 'Poor document structure', 5);
  }
  if (hasH4 && !hasH3) {
    ledger.record('onpage-skip-h3', 'low', 'H4 used without H3',
      'Heading levels skipped.', 'Maintain proper heading hierarchy.',
      'Minor structure issue', 3);
  }

  const internalLinks = parsed.links.internal;
  if (internalLinks.length === 0) {
    ledger.record('onpage-no-internal-links', 'high', 'No internal links',
      'Page has zero internal links.',
      'Add 3-5 internal links to related pages.',
      'Poor crawlability and link equity distribution', 10);
  } else if (internalLinks.length < 3) {
    ledger.record('onpage-few-internal-links', 'medium', 'Few internal links',
      `Only ${internalLinks.length} internal links (recommended: 3-5).`,
      'Add more contextual internal links.',
      'Suboptimal link equity', 5);
  }

  const path = pathOf(fetchResult.finalUrl);
  if (path.length > 100) {
    ledger.record('onpage-long-url', 'low', 'URL path too long',
      `Path is ${path.length} characters.`,
      'Use shorter, descriptive URLs.', 'Hard to share', 3);
  }
  if (path !== path.toLowerCase()) {
    ledger.record('onpage-uppercase-url', 'low', 'URL contains uppercase letters',
      'URLs should be lowercase to avoid duplicate content.',
      'Use lowercase URLs.', 'Duplicate content risk', 2);
  }
  if (path.includes('_')) {
    ledger.record('onpage-underscore-url', 'low', 'URL uses underscores',
      'Google treats underscores as word joiners, not separators.',
      'Use hyphens (-) instead of underscores (_).',
      'Minor SEO impact', 2);
  }

  const missingOg = REQUIRED_OPEN_GRAPH.filter(tag => !(tag in parsed.openGraph));
  if (missingOg.length > 0) {
    ledger.record('onpage-missing-og', 'medium', 'Incomplete Open Graph tags',
      `Missing: ${missingOg.join(', ')}.`,
      'Add all Open Graph tags for proper social sharing.',
      'Poor social sharing appearance', 5);
  }

  if (!('twitter:card' in parsed.twitterCard)) {
    ledger.record('onpage-no-twitter-card', 'low', 'Missing Twitter Card',
      'No twitter:card meta tag found.',
      'Add <meta name="twitter:card" content="summary_large_image">.',
      'Poor X/Twitter sharing', 3);
  }

  if (!parsed.language) {
    ledger.record('onpage-no-lang', 'medium', 'Missing language attribute',
      'No lang attribute on <html> tag.',
      'Add lang="en" (or appropriate language) to the <html> tag.',
      'Helps search engines determine content language', 4);
  }

  return buildCategoryResult('onpage', ledger, score => `On-page score: ${score}/100.`);
}
