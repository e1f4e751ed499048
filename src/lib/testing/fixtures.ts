import type { AIInsightProvider, InsightPayloads, InsightVariant } from '../analyzers/ai-insights';
import type { FetchResult, PageImage, PageScript, ParsedPage } from '../types';

export function makeParsedPage(overrides: Partial<ParsedPage> = {}): ParsedPage {
  return {
    title: null,
    metaDescription: null,
    metaRobots: null,
    viewport: null,
    canonical: null,
    charset: null,
    language: null,
    headings: { h1: [], h2: [], h3: [], h4: [], h5: [], h6: [] },
    schema: [],
    images: [],
    links: { internal: [], external: [] },
    scripts: [],
    stylesheets: [],
    openGraph: {},
    twitterCard: {},
    hreflang: [],
    paragraphs: [],
    lists: { ul: 0, ol: 0 },
    videos: [],
    wordCount: 0,
    bodyText: '',
    ...overrides,
  };
}

export function makeFetchResult(overrides: Partial<FetchResult> = {}): FetchResult {
  return {
    url: 'https://example.com/',
    finalUrl: 'https://example.com/',
    statusCode: 200,
    html: '',
    headers: {},
    redirectChain: [],
    robotsTxt: null,
    sitemapXml: null,
    llmsTxt: null,
    error: null,
    ...overrides,
  };
}

/** `count` copies of `word`, space-separated. */
export function words(count: number, word = 'lorem'): string {
  return Array.from({ length: count }, () => word).join(' ');
}

export function makeImage(overrides: Partial<PageImage> = {}): PageImage {
  return {
    src: 'https://example.com/photo.webp',
    alt: 'A descriptive photo caption',
    width: '800',
    height: '600',
    loading: 'lazy',
    fetchPriority: null,
    decoding: null,
    ...overrides,
  };
}

export function makeScript(src: string, overrides: Partial<PageScript> = {}): PageScript {
  return { src, async: false, defer: false, type: null, ...overrides };
}

export interface StubInsightProvider extends AIInsightProvider {
  calls: InsightVariant[];
}

/** Answers each variant with the given payload, or `null` when none is given. */
export function stubInsights(payloads: Partial<InsightPayloads> = {}): StubInsightProvider {
  const calls: InsightVariant[] = [];
  return {
    calls,
    async infer<V extends InsightVariant>(variant: V): Promise<InsightPayloads[V] | null> {
      calls.push(variant);
      return payloads[variant] ?? null;
    },
  };
}
