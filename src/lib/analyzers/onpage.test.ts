import { describe, expect, it } from 'vitest';
import { makeFetchResult, makeParsedPage } from '../testing/fixtures';
import type { PageLink } from '../types';
import { analyzeOnPage } from './onpage';

function link(href: string): PageLink {
  return { href, text: 'related', rel: [], nofollow: false };
}

const SOCIAL = {
  openGraph: { 'og:title': 'T', 'og:description': 'D', 'og:image': 'https://example.com/i.png' },
  twitterCard: { 'twitter:card': 'summary_large_image' },
};

describe('analyzeOnPage', () => {
  it('flags a bare page', () => {
    const result = analyzeOnPage(makeParsedPage(), makeFetchResult());

    expect(result.issues.map(i => i.id)).toEqual([
      'onpage-no-h1',
      'onpage-no-internal-links',
      'onpage-missing-og',
      'onpage-no-twitter-card',
      'onpage-no-lang',
    ]);
    expect(result.issues[0].severity).toBe('critical');
    expect(result.issues[2].description).toBe('Missing: og:title, og:description, og:image.');
    expect(result.score).toBe(63);
    expect(result.summary).toBe('On-page score: 63/100.');
  });

  it('passes a page with one H1, enough links and social tags', () => {
    const page = makeParsedPage({
      ...SOCIAL,
      language: 'en',
      headings: { h1: ['Title'], h2: ['Section'], h3: [], h4: [], h5: [], h6: [] },
      links: { internal: [link('/a'), link('/b'), link('/c')], external: [] },
    });
    const result = analyzeOnPage(page, makeFetchResult());
    expect(result.score).toBe(100);
  });

  it('flags multiple H1s and skipped heading levels', () => {
    const page = makeParsedPage({
      ...SOCIAL,
      language: 'en',
      headings: { h1: ['One', 'Two'], h2: [], h3: [], h4: ['Deep'], h5: [], h6: [] },
      links: { internal: [link('/a')], external: [] },
    });
    const result = analyzeOnPage(page, makeFetchResult());

    expect(result.issues.map(i => i.id)).toEqual([
      'onpage-multiple-h1',
      'onpage-skip-h3',
      'onpage-few-internal-links',
    ]);
    expect(result.score).toBe(86);
  });

  it('checks the final URL path for case and underscores', () => {
    const page = makeParsedPage({
      ...SOCIAL,
      language: 'en',
      headings: { h1: ['Title'], h2: [], h3: [], h4: [], h5: [], h6: [] },
      links: { internal: [link('/a'), link('/b'), link('/c')], external: [] },
    });
    const result = analyzeOnPage(page, makeFetchResult({ finalUrl: 'https://example.com/My_Page' }));

    expect(result.issues.map(i => i.id)).toEqual(['onpage-uppercase-url', 'onpage-underscore-url']);
    expect(result.score).toBe(96);
  });
});
