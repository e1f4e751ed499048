import type { CategoryResult, FetchResult, ParsedPage } from '../types';
import { IssueLedger } from './issue-ledger';
import { buildCategoryResult, countLegacyImages, imagesWithoutDimensions, roundHalfEven } from './shared';

export function analyzeImages(parsed: ParsedPage, _fetchResult: FetchResult): CategoryResult {
  const ledger = new IssueLedger('images');
  const images = parsed.images;

  if (images.length === 0) {
    return buildCategoryResult('images', ledger, score => `No images found on page. Score: ${score}/100.`);
  }

  const noAlt = images.filter(img => !img.alt);
  if (noAlt.length > 3) {
    ledger.record('img-no-alt-many', 'high', 'Many images without alt text',
      `${noAlt.length}/${images.length} images missing alt text.`,
      'Add descriptive alt text to all non-decorative images.',
      'Accessibility + image search ranking', Math.min(20, noAlt.length * 4));
  } else if (noAlt.length > 0) {
    ledger.record('img-no-alt-some', 'medium', 'Some images without alt text',
      `${noAlt.length} images missing alt text.`,
      'Add alt text describing each image.',
      'Accessibility issue', Math.min(12, noAlt.length * 4));
  }

  const shortAlt = images.find(img => img.alt && img.alt.length < 10);
  if (shortAlt) {
    ledger.record('img-short-alt', 'low', 'Very short alt text',
      `Alt text '${shortAlt.alt}' is too brief.`,
      'Use 10-125 character descriptive alt text.',
      'Weak image SEO signal', 5);
  }

  const legacy = countLegacyImages(images);
  if (legacy / images.length > 0.5) {
    ledger.record('img-old-formats', 'medium', 'Legacy image formats',
      `${legacy}/${images.length} images use JPEG/PNG.`,
      'Convert to WebP or AVIF for better compression.',
      'Slower page load', Math.min(10, roundHalfEven((legacy / images.length) * 10)));
  }

  const noDims = imagesWithoutDimensions(images);
  if (noDims.length > 5) {
    ledger.record('img-no-dims-many', 'high', 'Images without dimensions',
      `${noDims.length} images missing width/height.`,
      'Add width and height attributes.',
      'Causes Cumulative Layout Shift', Math.min(15, noDims.length * 2));
  } else if (noDims.length > 0) {
    ledger.record('img-no-dims-some', 'medium', 'Some images lack dimensions',
      `${noDims.length} images without dimensions.`,
      'Add width/height to prevent layout shifts.',
      'Contributes to CLS', Math.min(6, noDims.length * 2));
  }

  // The first image is treated as the hero; more than 3 eager images after it is flagged.
  const nonLazy = images.slice(1).filter(img => img.loading !== 'lazy');
  if (nonLazy.length > 3) {
    ledger.record('img-no-lazy', 'medium', 'Images not lazy loaded',
      `${nonLazy.length} below-fold images without loading='lazy'.`,
      "Add loading='lazy' to images below the fold.",
      'Wasted bandwidth on initial load', Math.min(10, roundHalfEven(nonLazy.length / 2)));
  }

  const hero = images[0];
  if (hero.fetchPriority !== 'high' && hero.loading !== 'lazy') {
    ledger.record('img-hero-no-priority', 'low', 'Hero image not prioritized',
      "First image doesn't have fetchpriority='high'.",
      "Add fetchpriority='high' to the hero/LCP image.",
      'Slower LCP', 3);
  }
  if (hero.loading === 'lazy') {
    ledger.record('img-hero-lazy', 'high', 'Hero image is lazy loaded',
      "The first image has loading='lazy' which delays LCP.",
      "Remove loading='lazy' from the hero image.",
      'Directly harms Largest Contentful Paint', 10);
  }

  return buildCategoryResult('images', ledger, score =>
    `Image score: ${score}/100. ${images.length} images analyzed.`
  );
}
