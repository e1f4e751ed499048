import { describe, expect, it } from 'vitest';
import { makeFetchResult, makeImage, makeParsedPage, makeScript, stubInsights, words } from '../testing/fixtures';
import type { PageLink, QuerySimulation, SubScores } from '../types';
import { analyzeAiSearch, compareSubScores, countCitablePassages, llmsTxtStatus, runGeoChecks } from './ai-search';

function link(href: string): PageLink {
  return { href, text: 'source', rel: [], nofollow: false };
}

const FULL_SUB_SCORES: SubScores = { citability: 25, structure: 20, multiModal: 15, authority: 20, technical: 20 };

function optimizedPage() {
  return makeParsedPage({
    wordCount: 600,
    bodyText: 'An audit is a structured review of a page. Traffic grew 45% last year.',
    paragraphs: [words(60), words(60), words(60)],
    headings: { h1: ['Audits'], h2: ['What is an audit?'], h3: [], h4: [], h5: [], h6: [] },
    lists: { ul: 1, ol: 0 },
    images: [makeImage()],
    videos: ['https://www.youtube.com/embed/test'],
    schema: [
      { '@type': 'Organization', name: 'Example', sameAs: ['https://social.example/example'] },
      { '@type': 'Person', name: 'Author' },
      { '@type': 'Article', datePublished: '2024-01-01' },
    ],
    links: { internal: [], external: [link('https://a.example'), link('https://b.example')] },
  });
}

const LLMS_TXT = `# Example\n\n> ${words(12, 'about')}`;

describe('countCitablePassages', () => {
  it('counts paragraphs of 50 to 200 words', () => {
    expect(countCitablePassages([words(50), words(200), words(49), words(201)])).toBe(2);
  });
});

describe('llmsTxtStatus', () => {
  it('classifies by trimmed length', () => {
    expect(llmsTxtStatus(null)).toBe('missing');
    expect(llmsTxtStatus('   # Short   ')).toBe('thin');
    expect(llmsTxtStatus(LLMS_TXT)).toBe('present');
  });
});

describe('runGeoChecks', () => {
  it('gives an optimized page full marks in every bucket', () => {
    const outcome = runGeoChecks(optimizedPage(), makeFetchResult({ llmsTxt: LLMS_TXT }));

    expect(outcome.ledger.issues()).toEqual([]);
    expect(outcome.ledger.finalScore()).toBe(100);
    expect(outcome.ledger.subScores()).toEqual(FULL_SUB_SCORES);
    expect(outcome.citablePassageCount).toBe(3);
    expect(outcome.llmsTxtStatus).toBe('present');
  });

  it('keeps sub-scores summing to the score when no bucket clamps', () => {
    const outcome = runGeoChecks(makeParsedPage(), makeFetchResult());
    const subScores = outcome.ledger.subScores();

    expect(outcome.ledger.issues().map(i => i.id)).toEqual(['geo-no-video', 'geo-no-org-schema', 'geo-no-same-as', 'geo-no-llms-txt']);
    expect(subScores).toEqual({ citability: 25, structure: 20, multiModal: 11, authority: 14, technical: 15 });
    expect(outcome.ledger.finalScore()).toBe(85);
  });

  it('deducts across every bucket for a long unstructured page', () => {
    const page = makeParsedPage({
      wordCount: 2000,
      bodyText: words(400),
      paragraphs: [words(300)],
    });
    const outcome = runGeoChecks(page, makeFetchResult({ robotsTxt: 'User-agent: *\nDisallow: /' }));

    expect(outcome.ledger.issues().map(i => i.id)).toEqual([
      'geo-no-citable-passages',
      'geo-no-direct-answer',
      'geo-no-statistics',
      'geo-no-question-headings',
      'geo-no-lists',
      'geo-wall-of-text',
      'geo-no-images',
      'geo-no-video',
      'geo-no-author',
      'geo-no-dates',
      'geo-no-org-schema',
      'geo-no-source-citations',
      'geo-no-same-as',
      'geo-wildcard-block',
      'geo-no-llms-txt',
    ]);
    expect(outcome.ledger.subScores()).toEqual({ citability: 4, structure: 5, multiModal: 3, authority: 0, technical: 5 });
    expect(outcome.ledger.finalScore()).toBe(17);
    expect(Object.values(outcome.crawlerStatus).every(status => status === 'blocked')).toBe(true);
  });

  it('reports blocked key crawlers when there is no wildcard block', () => {
    const robotsTxt = 'User-agent: GPTBot\nDisallow: /\n\nUser-agent: ClaudeBot\nDisallow: /';
    const outcome = runGeoChecks(optimizedPage(), makeFetchResult({ robotsTxt, llmsTxt: LLMS_TXT }));

    expect(outcome.ledger.issues().map(i => [i.id, i.severity, i.description])).toEqual([
      ['geo-crawlers-blocked', 'high', 'Blocked in robots.txt: GPTBot, ClaudeBot.'],
    ]);
    expect(outcome.ledger.subScores().technical).toBe(12);
    expect(outcome.crawlerStatus.GPTBot).toBe('blocked');
    expect(outcome.crawlerStatus.PerplexityBot).toBe('allowed');
  });

  it('flags few citable passages, missing alt text and script-heavy pages', () => {
    const page = {
      ...optimizedPage(),
      paragraphs: [words(60), words(20)],
      images: [makeImage({ alt: null }), makeImage({ alt: null }), makeImage()],
      scripts: Array.from({ length: 11 }, (_, i) => makeScript(`/s${i}.js`)),
    };
    const outcome = runGeoChecks(page, makeFetchResult({ llmsTxt: LLMS_TXT }));

    expect(outcome.ledger.issues().map(i => i.id)).toEqual([
      'geo-few-citable-passages',
      'geo-images-no-alt',
      'geo-js-dependent',
    ]);
    expect(outcome.ledger.issues()[1].description).toBe('2/3 images have no alt text.');
    expect(outcome.ledger.finalScore()).toBe(86);
  });

  it('accepts an author byline in the markup instead of Person schema', () => {
    const page = { ...optimizedPage(), schema: optimizedPage().schema.filter(block => block['@type'] !== 'Person') };
    const withByline = runGeoChecks(page, makeFetchResult({ llmsTxt: LLMS_TXT, html: '<span class="post-author">A. Writer</span>' }));
    const without = runGeoChecks(page, makeFetchResult({ llmsTxt: LLMS_TXT }));

    expect(withByline.ledger.issues()).toEqual([]);
    expect(without.ledger.issues().map(i => i.id)).toEqual(['geo-no-author']);
  });
});

describe('compareSubScores', () => {
  it('only reports differences beyond three points', () => {
    const ours: SubScores = { citability: 23, structure: 20, multiModal: 15, authority: 16, technical: 20 };
    const theirs: SubScores = { citability: 25, structure: 15, multiModal: 12, authority: 20, technical: 20 };

    expect(compareSubScores(ours, theirs)).toEqual({
      advantages: [{ key: 'structure', label: 'Structure', delta: 5 }],
      gaps: [{ key: 'authority', label: 'Authority', delta: -4 }],
    });
  });
});

describe('analyzeAiSearch', () => {
  it('summarizes crawler access and passage counts', async () => {
    const result = await analyzeAiSearch(makeParsedPage(), makeFetchResult(), stubInsights());

    expect(result.name).toBe('geo');
    expect(result.label).toBe('AI Search (GEO)');
    expect(result.weight).toBe(0.2);
    expect(result.score).toBe(85);
    expect(result.summary).toBe('AI Search (GEO) score: 85/100. 0 citable passages. 9/9 AI crawlers allowed.');
    expect(result.geoDetails.llmsTxtStatus).toBe('missing');
    expect(result.geoDetails.aiSimulation).toBeNull();
    expect(result.competitorComparison).toBeNull();
  });

  it('attaches the query simulation when the provider answers', async () => {
    const simulation: QuerySimulation = {
      simulatedQueries: [{ query: 'what is a page audit', citationLikelihood: 'high', reason: 'Direct definition.' }],
      topChange: 'Add an FAQ section.',
      aiVisibilityRating: 'medium',
    };
    const insights = stubInsights({ 'query-simulation': simulation });
    const result = await analyzeAiSearch(makeParsedPage(), makeFetchResult(), insights);

    expect(insights.calls).toEqual(['query-simulation']);
    expect(result.geoDetails.aiSimulation).toEqual(simulation);
  });

  it('compares against a competitor page with the same checks', async () => {
    const competitor = {
      parsed: makeParsedPage(),
      fetchResult: makeFetchResult({ url: 'https://rival.example/', finalUrl: 'https://rival.example/' }),
    };
    const result = await analyzeAiSearch(optimizedPage(), makeFetchResult({ llmsTxt: LLMS_TXT }), stubInsights(), competitor);

    expect(result.competitorComparison).toEqual({
      competitorUrl: 'https://rival.example/',
      yourScore: 100,
      competitorScore: 85,
      yourSubScores: FULL_SUB_SCORES,
      competitorSubScores: { citability: 25, structure: 20, multiModal: 11, authority: 14, technical: 15 },
      advantages: [
        { key: 'multiModal', label: 'Multi-Modal', delta: 4 },
        { key: 'authority', label: 'Authority', delta: 6 },
        { key: 'technical', label: 'Technical AI Access', delta: 5 },
      ],
      gaps: [],
      competitorIssueCount: 4,
    });
  });
});
