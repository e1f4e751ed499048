import * as cheerio from 'cheerio';
import { type HeadingTag, type PageImage, type PageLink, type PageScript, type ParsedPage, type StructuredDataBlock, isRecord } from '../types';

const BODY_TEXT_LIMIT = 15000;
const LINK_TEXT_LIMIT = 100;
const NON_CONTENT_SELECTOR = 'script, style, nav, footer, header, noscript';
const VIDEO_EMBED_PATTERN = /youtube\.com|youtube-nocookie\.com|youtu\.be|vimeo\.com|wistia\.(com|net)|loom\.com/i;

interface MetaTags {
  metaDescription: string | null;
  metaRobots: string | null;
  viewport: string | null;
  charset: string | null;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function resolveUrl(href: string, baseUrl: string | undefined): string {
  if (!baseUrl || !href) return href;
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).host;
  } catch {
    return null;
  }
}

function attrOrNull(value: string | undefined): string | null {
  return value === undefined ? null : value;
}

function parseJsonLd(raw: string): StructuredDataBlock[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return [];
  }
  const items = Array.isArray(data) ? data : [data];
  return items.filter(isRecord);
}

export function countWords(text: string): number {
  return (text.match(/\b\w+\b/g) ?? []).length;
}

export function parseHtml(html: string, baseUrl?: string): ParsedPage {
  const $ = cheerio.load(html);

  const meta: MetaTags = { metaDescription: null, metaRobots: null, viewport: null, charset: null };
  const openGraph: Record<string, string> = {};
  const twitterCard: Record<string, string> = {};

  $('meta').each((_, el) => {
    const $el = $(el);
    const name = ($el.attr('name') ?? '').toLowerCase();
    const property = ($el.attr('property') ?? '').toLowerCase();
    const content = $el.attr('content') ?? '';
    const charset = $el.attr('charset');

    if (charset) meta.charset = charset;
    if (name === 'description') meta.metaDescription = content;
    else if (name === 'robots') meta.metaRobots = content;
    else if (name === 'viewport') meta.viewport = content;

    if (property.startsWith('og:')) openGraph[property] = content;
    if (name.startsWith('twitter:')) twitterCard[name] = content;
  });

  const titleText = collapse($('title').first().text());
  const language = $('html').attr('lang');

  const headingTexts = (tag: HeadingTag): string[] =>
    $(tag)
      .toArray()
      .map(el => collapse($(el).text()))
      .filter(Boolean);
  const headings: Record<HeadingTag, string[]> = {
    h1: headingTexts('h1'),
    h2: headingTexts('h2'),
    h3: headingTexts('h3'),
    h4: headingTexts('h4'),
    h5: headingTexts('h5'),
    h6: headingTexts('h6'),
  };

  const images: PageImage[] = $('img')
    .toArray()
    .map(el => {
      const $el = $(el);
      return {
        src: resolveUrl($el.attr('src') ?? '', baseUrl),
        alt: attrOrNull($el.attr('alt')),
        width: attrOrNull($el.attr('width')),
        height: attrOrNull($el.attr('height')),
        loading: attrOrNull($el.attr('loading')),
        fetchPriority: attrOrNull($el.attr('fetchpriority')),
        decoding: attrOrNull($el.attr('decoding')),
      };
    });

  const links: { internal: PageLink[]; external: PageLink[] } = { internal: [], external: [] };
  const baseHost = baseUrl ? hostOf(baseUrl) : null;
  if (baseUrl) {
    $('a[href]').each((_, el) => {
      const $el = $(el);
      const href = $el.attr('href') ?? '';
      if (!href || href.startsWith('#') || href.startsWith('javascript:')) return;
      const full = resolveUrl(href, baseUrl);
      const rel = ($el.attr('rel') ?? '').split(/\s+/).filter(Boolean);
      const link: PageLink = {
        href: full,
        text: collapse($el.text()).slice(0, LINK_TEXT_LIMIT),
        rel,
        nofollow: rel.includes('nofollow'),
      };
      if (hostOf(full) === baseHost) links.internal.push(link);
      else links.external.push(link);
    });
  }

  const scripts: PageScript[] = [];
  const schema: StructuredDataBlock[] = [];
  $('script').each((_, el) => {
    const $el = $(el);
    const type = attrOrNull($el.attr('type'));
    if (type === 'application/ld+json') {
      schema.push(...parseJsonLd($el.html() ?? ''));
      return;
    }
    const src = $el.attr('src');
    if (src) {
      scripts.push({
        src: resolveUrl(src, baseUrl),
        async: $el.attr('async') !== undefined,
        defer: $el.attr('defer') !== undefined,
        type,
      });
    }
  });

  const stylesheets = $('link[rel~="stylesheet"]')
    .toArray()
    .map(el => $(el).attr('href'))
    .filter((href): href is string => Boolean(href))
    .map(href => resolveUrl(href, baseUrl));

  const hreflang = $('link[rel~="alternate"][hreflang]')
    .toArray()
    .map(el => ({ lang: $(el).attr('hreflang') ?? '', href: $(el).attr('href') ?? '' }));

  const videos: string[] = [];
  $('video').each((_, el) => {
    const $el = $(el);
    videos.push(resolveUrl($el.attr('src') ?? $el.find('source[src]').first().attr('src') ?? '', baseUrl));
  });
  $('iframe[src]').each((_, el) => {
    const src = $(el).attr('src') ?? '';
    if (VIDEO_EMBED_PATTERN.test(src)) videos.push(resolveUrl(src, baseUrl));
  });

  // Visible text comes from a second copy with chrome and scripts stripped.
  const text$ = cheerio.load(html);
  text$(NON_CONTENT_SELECTOR).remove();
  const paragraphs = text$('p')
    .toArray()
    .map(el => collapse(text$(el).text()))
    .filter(Boolean);
  const lists = { ul: text$('ul').length, ol: text$('ol').length };
  text$('body *').each((_, el) => {
    text$(el).before(' ').after(' ');
  });
  const bodyText = collapse(text$('body').text());

  return {
    title: titleText || null,
    metaDescription: meta.metaDescription,
    metaRobots: meta.metaRobots,
    viewport: meta.viewport,
    canonical: attrOrNull($('link[rel~="canonical"]').first().attr('href')),
    charset: meta.charset,
    language: language ? language : null,
    headings,
    schema,
    images,
    links,
    scripts,
    stylesheets,
    openGraph,
    twitterCard,
    hreflang,
    paragraphs,
    lists,
    videos,
    wordCount: countWords(bodyText),
    bodyText: bodyText.slice(0, BODY_TEXT_LIMIT),
  };
}
