import { describe, expect, it } from 'vitest';
import { countWords, parseHtml } from './index';

const PAGE = `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>  Example
    Page </title>
  <meta name="description" content="A test page.">
  <meta name="robots" content="index, follow">
  <meta name="viewport" content="width=device-width">
  <meta property="og:title" content="OG Title">
  <meta name="twitter:card" content="summary">
  <link rel="canonical" href="https://example.com/page">
  <link rel="stylesheet" href="/styles.css">
  <link rel="alternate" hreflang="de" href="https://example.com/de/">
  <script type="application/ld+json">[{"@type": "Organization", "name": "Example"}, {"@type": "WebSite"}]</script>
  <script type="application/ld+json">{not json</script>
  <script src="/app.js" defer></script>
  <script src="https://cdn.example.net/lib.js"></script>
</head>
<body>
  <nav><a href="/about">About</a><p>Menu text</p></nav>
  <h1>Main <em>heading</em></h1>
  <h2>First</h2>
  <h2>   </h2>
  <p>Hello world.</p>
  <ul><li>One</li></ul>
  <img src="/hero.webp" alt="Hero" width="800" height="400" fetchpriority="high">
  <a href="https://other.example/ref" rel="nofollow noopener">Ref</a>
  <a href="#top">Top</a>
  <a href="javascript:void(0)">JS</a>
  <iframe src="https://www.youtube.com/embed/abc"></iframe>
  <footer><p>Footer</p></footer>
</body>
</html>`;

describe('countWords', () => {
  it('counts word-character runs', () => {
    expect(countWords("It's 2024-ready")).toBe(4);
    expect(countWords('')).toBe(0);
  });
});

describe('parseHtml', () => {
  const parsed = parseHtml(PAGE, 'https://example.com/page');

  it('reads head metadata', () => {
    expect(parsed.title).toBe('Example Page');
    expect(parsed.metaDescription).toBe('A test page.');
    expect(parsed.metaRobots).toBe('index, follow');
    expect(parsed.viewport).toBe('width=device-width');
    expect(parsed.charset).toBe('utf-8');
    expect(parsed.canonical).toBe('https://example.com/page');
    expect(parsed.language).toBe('en');
    expect(parsed.openGraph).toEqual({ 'og:title': 'OG Title' });
    expect(parsed.twitterCard).toEqual({ 'twitter:card': 'summary' });
    expect(parsed.hreflang).toEqual([{ lang: 'de', href: 'https://example.com/de/' }]);
    expect(parsed.stylesheets).toEqual(['https://example.com/styles.css']);
  });

  it('collects non-empty headings', () => {
    expect(parsed.headings.h1).toEqual(['Main heading']);
    expect(parsed.headings.h2).toEqual(['First']);
    expect(parsed.headings.h3).toEqual([]);
  });

  it('flattens JSON-LD arrays and drops invalid blocks', () => {
    expect(parsed.schema).toEqual([{ '@type': 'Organization', name: 'Example' }, { '@type': 'WebSite' }]);
  });

  it('records script loading attributes', () => {
    expect(parsed.scripts).toEqual([
      { src: 'https://example.com/app.js', async: false, defer: true, type: null },
      { src: 'https://cdn.example.net/lib.js', async: false, defer: false, type: null },
    ]);
  });

  it('splits links by host and skips fragments and javascript: links', () => {
    expect(parsed.links.internal).toEqual([
      { href: 'https://example.com/about', text: 'About', rel: [], nofollow: false },
    ]);
    expect(parsed.links.external).toEqual([
      { href: 'https://other.example/ref', text: 'Ref', rel: ['nofollow', 'noopener'], nofollow: true },
    ]);
  });

  it('resolves image attributes', () => {
    expect(parsed.images).toEqual([{
      src: 'https://example.com/hero.webp',
      alt: 'Hero',
      width: '800',
      height: '400',
      loading: null,
      fetchPriority: 'high',
      decoding: null,
    }]);
  });

  it('finds video embeds', () => {
    expect(parsed.videos).toEqual(['https://www.youtube.com/embed/abc']);
  });

  it('extracts visible text without navigation and footer', () => {
    expect(parsed.paragraphs).toEqual(['Hello world.']);
    expect(parsed.lists).toEqual({ ul: 1, ol: 0 });
    expect(parsed.bodyText).toBe('Main heading First Hello world. One Ref Top JS');
    expect(parsed.wordCount).toBe(9);
  });

  it('leaves links empty and URLs relative without a base URL', () => {
    const bare = parseHtml('<body><a href="/x">X</a><img src="/a.png"></body>');
    expect(bare.links).toEqual({ internal: [], external: [] });
    expect(bare.images[0].src).toBe('/a.png');
    expect(bare.title).toBeNull();
    expect(bare.language).toBeNull();
  });

  it('caps body text but counts every word', () => {
    const long = parseHtml(`<body><p>${'word '.repeat(4000)}</p></body>`);
    expect(long.bodyText).toHaveLength(15000);
    expect(long.wordCount).toBe(4000);
  });
});
