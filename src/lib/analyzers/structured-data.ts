import type { CategoryResult, FetchResult, ParsedPage } from '../types';
import { IssueLedger } from './issue-ledger';
import { buildCategoryResult, schemaType } from './shared';

/** Schema.org types Google no longer renders as rich results, with the retirement date. */
export const DEPRECATED_TYPES: Readonly<Record<string, string>> = Object.freeze({
  HowTo: 'September 2023',
  SpecialAnnouncement: 'July 2025',
  CourseInfo: 'June 2025',
  EstimatedSalary: 'June 2025',
  LearningVideo: 'June 2025',
  ClaimReview: 'June 2025',
  VehicleListing: 'June 2025',
  Dataset: 'Late 2025',
});

export const RESTRICTED_TYPES: Readonly<Record<string, string>> = Object.freeze({
  FAQPage: 'Government and healthcare authority sites only (Aug 2023)',
});

export const REQUIRED_PROPS: Readonly<Record<string, readonly string[]>> = Object.freeze({
  Organization: ['name', 'url'],
  LocalBusiness: ['name', 'address'],
  Product: ['name'],
  Article: ['headline', 'author', 'datePublished'],
  BlogPosting: ['headline', 'author', 'datePublished'],
  NewsArticle: ['headline', 'author', 'datePublished'],
  WebSite: ['name', 'url'],
  BreadcrumbList: ['itemListElement'],
  VideoObject: ['name', 'uploadDate'],
  Event: ['name', 'startDate'],
});

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

export function analyzeStructuredData(parsed: ParsedPage, _fetchResult: FetchResult): CategoryResult {
  const ledger = new IssueLedger('schema');
  const schemas = parsed.schema;

  if (schemas.length === 0) {
    ledger.record('schema-none', 'high', 'No structured data found',
      'No JSON-LD schema markup detected.',
      'Add JSON-LD schema (Organization, WebSite, BreadcrumbList at minimum). Pages with schema have ~2.5x higher chance in AI answers.',
      'Missing rich results + AI visibility', 25);
    return buildCategoryResult('schema', ledger, score =>
      `Schema score: ${score}/100. No structured data found.`
    );
  }

  const foundTypes = new Set<string>();

  for (const block of schemas) {
    const ctx = block['@context'];
    const ctxText = typeof ctx === 'string' ? ctx : ctx ? JSON.stringify(ctx) : '';
    if (!ctxText) {
      ledger.record('schema-no-context', 'high', 'Schema missing @context',
        'JSON-LD block has no @context property.',
        "Add '@context': 'https://schema.org'.", 'Invalid schema', 8);
    } else if (ctxText.includes('http://schema.org') && !ctxText.includes('https')) {
      ledger.record('schema-http-context', 'medium', 'Schema uses http:// context',
        'Use https://schema.org instead of http://.',
        "Change @context to 'https://schema.org'.",
        'May cause validation warnings', 3);
    }

    const type = schemaType(block);
    if (!type) continue;
    foundTypes.add(type);
    const slug = type.toLowerCase();

    const deprecatedSince = lookup(DEPRECATED_TYPES, type);
    if (deprecatedSince) {
      ledger.record(`schema-deprecated-${slug}`, 'high',
        `Deprecated schema type: ${type}`,
        `${type} was deprecated in ${deprecatedSince}.`,
        `Remove ${type} schema. Google no longer supports it.`,
        'No rich results, wasted markup', 10);
    }

    const restriction = lookup(RESTRICTED_TYPES, type);
    if (restriction) {
      ledger.record(`schema-restricted-${slug}`, 'medium',
        `Restricted schema type: ${type}`,
        `${restriction}.`,
        `Only use ${type} if your site qualifies.`,
        'May not generate rich results', 5);
    }

    const required = lookup(REQUIRED_PROPS, type);
    if (required) {
      const missing = required.filter(prop => !(prop in block));
      if (missing.length > 0) {
        ledger.record(`schema-missing-props-${slug}`, 'medium',
          `${type} missing required properties`,
          `Missing: ${missing.join(', ')}.`,
          `Add ${missing.join(', ')} to your ${type} schema.`,
          'Incomplete rich results', 5);
      }
    }
  }

  if (!foundTypes.has('Organization') && !foundTypes.has('LocalBusiness')) {
    ledger.record('schema-no-org', 'medium', 'No Organization/LocalBusiness schema',
      'Missing organizational identity schema.',
      'Add Organization or LocalBusiness schema.',
      'Missing brand knowledge panel', 5);
  }

  if (!foundTypes.has('BreadcrumbList')) {
    ledger.record('schema-no-breadcrumb', 'low', 'No BreadcrumbList schema',
      'Breadcrumb navigation not marked up.',
      'Add BreadcrumbList schema for better SERP display.',
      'Missing breadcrumb rich results', 3);
  }

  if (!foundTypes.has('WebSite')) {
    ledger.record('schema-no-website', 'low', 'No WebSite schema',
      'Missing WebSite schema with search action.',
      'Add WebSite schema for sitelinks searchbox.',
      'Missing sitelinks searchbox', 3);
  }

  // Unlisted: Open Graph is reported by the on-page category.
  if (Object.keys(parsed.openGraph).length === 0) {
    ledger.deduct(5);
  }

  const typeList = [...foundTypes].join(', ') || 'none';
  return buildCategoryResult('schema', ledger, score =>
    `Schema score: ${score}/100. Found ${schemas.length} schema blocks (${typeList}).`
  );
}
