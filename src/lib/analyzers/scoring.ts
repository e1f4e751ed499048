import { type AuditResult, type CategoryResult, type Issue, SEVERITY_ORDER, getGrade } from '../types';
import { roundHalfEven } from './shared';

export const TOP_FIX_LIMIT = 10;

export function calculateOverallScore(categories: CategoryResult[]): number {
  const totalWeight = categories.reduce((sum, c) => sum + c.weight, 0);
  if (totalWeight === 0) return 0;
  return roundHalfEven(categories.reduce((sum, c) => sum + c.score * c.weight, 0) / totalWeight);
}

/**
 * Most severe first; within a severity, issues from heavier categories first.
 * Ties keep the order the analyzers emitted them in.
 */
export function selectTopFixes(categories: CategoryResult[], limit = TOP_FIX_LIMIT): Issue[] {
  const weights = new Map<string, number>();
  for (const category of categories) {
    if (!weights.has(category.name)) weights.set(category.name, category.weight);
  }
  const weightOf = (issue: Issue) => weights.get(issue.category) ?? 0;

  return categories
    .flatMap(c => c.issues)
    .sort((a, b) => {
      const severityDiff = SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity];
      if (severityDiff !== 0) return severityDiff;
      return weightOf(b) - weightOf(a);
    })
    .slice(0, limit);
}

export function extractDomain(url: string): string {
  let host: string;
  try {
    host = new URL(url).host;
  } catch {
    return '';
  }
  return host.startsWith('www.') ? host.slice(4) : host;
}

export interface AuditResultInput {
  categories: CategoryResult[];
  url: string;
  pageTitle: string | null;
  metaDescription: string | null;
  durationMs: number;
  fetchedAt: Date;
}

export function buildAuditResult(input: AuditResultInput): AuditResult {
  const overallScore = calculateOverallScore(input.categories);
  return {
    overallScore,
    overallGrade: getGrade(overallScore),
    categories: input.categories,
    topFixes: selectTopFixes(input.categories),
    url: input.url,
    domain: extractDomain(input.url),
    fetchedAt: input.fetchedAt.toISOString(),
    auditDurationMs: input.durationMs,
    pageTitle: input.pageTitle,
    metaDescription: input.metaDescription,
    error: null,
  };
}

export function buildErrorResult(url: string, error: string, durationMs: number, fetchedAt: Date): AuditResult {
  return {
    overallScore: 0,
    overallGrade: getGrade(0),
    categories: [],
    topFixes: [],
    url,
    domain: extractDomain(url),
    fetchedAt: fetchedAt.toISOString(),
    auditDurationMs: durationMs,
    pageTitle: null,
    metaDescription: null,
    error,
  };
}
