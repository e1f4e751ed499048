import { type CategoryResult, type FetchResult, type ParsedPage, getHeader } from '../types';
import { IssueLedger } from './issue-ledger';
import { buildCategoryResult, countLegacyImages, headingCount, imagesWithoutDimensions, renderBlockingScripts } from './shared';

const WEB_FONT_HOSTS = ['fonts.googleapis', 'typekit', 'use.fontawesome'];
const CDN_HEADERS = ['cf-ray', 'x-cache', 'x-cdn', 'x-served-by', 'x-amz-cf-id'];
const DOM_ELEMENT_BUDGET = 800;

export function analyzePerformance(parsed: ParsedPage, fetchResult: FetchResult): CategoryResult {
  const ledger = new IssueLedger('performance');
  const { scripts, stylesheets, images, links } = parsed;

  const blocking = renderBlockingScripts(scripts);
  if (blocking.length > 3) {
    ledger.record('perf-blocking-scripts', 'high', 'Many render-blocking scripts',
      `${blocking.length} scripts without async/defer.`,
      'Add async or defer to non-critical scripts.',
      'Delays Largest Contentful Paint', Math.min(15, blocking.length * 3));
  } else if (blocking.length > 0) {
    ledger.record('perf-some-blocking', 'medium', 'Render-blocking scripts found',
      `${blocking.length} scripts block rendering.`,
      'Add async or defer attributes.',
      'Slows initial page load', Math.min(9, blocking.length * 3));
  }

  if (stylesheets.length > 5) {
    ledger.record('perf-many-css', 'medium', 'Many external stylesheets',
      `${stylesheets.length} external CSS files.`,
      'Combine stylesheets or use critical CSS inlining.',
      'Increases render-blocking time', 5);
  }

  const domEstimate = images.length + links.internal.length + links.external.length
    + headingCount(parsed) + scripts.length;
  if (domEstimate > DOM_ELEMENT_BUDGET) {
    ledger.record('perf-large-dom', 'medium', 'Large DOM size detected',
      `Estimated ${domEstimate}+ elements. Large DOMs slow INP.`,
      `Simplify page structure. Target under ${DOM_ELEMENT_BUDGET} key elements.`,
      'Poor Interaction to Next Paint (INP)', 8);
  }

  if (images.length > 0) {
    const legacy = countLegacyImages(images);
    if ((legacy / images.length) * 100 > 50) {
      ledger.record('perf-old-image-formats', 'medium', 'Legacy image formats',
        `${legacy}/${images.length} images use JPEG/PNG.`,
        'Convert to WebP or AVIF for 30-50% smaller files.',
        'Slower page load', 8);
    }
  }

  const usesWebFonts = stylesheets.some(sheet => {
    const lower = sheet.toLowerCase();
    return WEB_FONT_HOSTS.some(host => lower.includes(host));
  });
  if (usesWebFonts) {
    ledger.record('perf-web-fonts', 'low', 'External web fonts detected',
      'Web fonts add latency.',
      'Use font-display: swap and preload critical fonts.',
      'Flash of invisible text', 2);
  }

  const noDimensions = imagesWithoutDimensions(images);
  if (noDimensions.length > 5) {
    ledger.record('perf-no-img-dimensions', 'high', 'Images without dimensions',
      `${noDimensions.length} images missing width/height.`,
      'Add width and height attributes to all images.',
      '#1 cause of CLS (Cumulative Layout Shift)', Math.min(12, noDimensions.length * 2));
  } else if (noDimensions.length > 0) {
    ledger.record('perf-some-no-dimensions', 'medium', 'Some images lack dimensions',
      `${noDimensions.length} images without width/height.`,
      'Add explicit dimensions to prevent layout shifts.',
      'Contributes to CLS', Math.min(6, noDimensions.length * 2));
  }

  const hasCdn = CDN_HEADERS.some(header => getHeader(fetchResult.headers, header) !== undefined);
  if (!hasCdn) {
    ledger.record('perf-no-cdn', 'low', 'No CDN detected',
      'No CDN headers found.',
      'Use a CDN (Cloudflare, CloudFront, Fastly) for faster delivery.',
      'Slower load times for distant users', 3);
  }

  return buildCategoryResult('performance', ledger, score => `Performance score: ${score}/100.`);
}
