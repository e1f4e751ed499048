import { type AIInsightProvider, insightProviderFromConfig, unavailableInsightProvider } from './analyzers/ai-insights';
import type { CompetitorPage } from './analyzers/ai-search';
import { ANALYZERS } from './analyzers/registry';
import { buildAuditResult, buildErrorResult } from './analyzers/scoring';
import { type AuditConfig, loadConfig } from './config';
import { fetchPage } from './crawler';
import { parseHtml } from './parser';
import type { AuditResult, CategoryResult, FetchResult, ParsedPage } from './types';

export type AuditPhase = 'init' | 'fetched' | 'parsed' | 'analyzed' | 'aggregated' | 'done' | 'failed';

const TRANSITIONS: Readonly<Record<AuditPhase, readonly AuditPhase[]>> = {
  init: ['fetched', 'failed'],
  fetched: ['parsed', 'failed'],
  parsed: ['analyzed'],
  analyzed: ['aggregated'],
  aggregated: ['done'],
  done: [],
  failed: [],
};

export class AuditLifecycle {
  private current: AuditPhase = 'init';
  private readonly history: AuditPhase[] = ['init'];

  get phase(): AuditPhase {
    return this.current;
  }

  get phases(): AuditPhase[] {
    return [...this.history];
  }

  advance(next: AuditPhase): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal audit transition: ${this.current} -> ${next}`);
    }
    this.current = next;
    this.history.push(next);
  }
}

export type ProgressCallback = (step: string, progress: number) => void | Promise<void>;

export interface AuditDependencies {
  fetchPage: (url: string) => Promise<FetchResult>;
  parseHtml: (html: string, baseUrl?: string) => ParsedPage;
  insights: AIInsightProvider;
  now: () => Date;
  /** Receives each phase the audit passes through. */
  onPhase?: (phase: AuditPhase) => void;
}

function loadConfigOrWarn(): AuditConfig | null {
  try {
    return loadConfig();
  } catch (error) {
    console.warn('Ignoring invalid configuration, using defaults:', error instanceof Error ? error.message : error);
    return null;
  }
}

function resolveDependencies(deps: Partial<AuditDependencies> = {}): AuditDependencies {
  // Config only feeds the defaults; a bad value degrades them instead of failing the audit.
  const config = deps.fetchPage && deps.insights ? null : loadConfigOrWarn();
  return {
    fetchPage: deps.fetchPage ?? (url => fetchPage(url, { timeoutMs: config?.fetchTimeoutMs })),
    parseHtml: deps.parseHtml ?? parseHtml,
    insights: deps.insights ?? (config ? insightProviderFromConfig(config) : unavailableInsightProvider),
    now: deps.now ?? (() => new Date()),
    onPhase: deps.onPhase,
  };
}

async function notify(onProgress: ProgressCallback | undefined, step: string, progress: number): Promise<void> {
  if (!onProgress) return;
  try {
    await onProgress(step, progress);
  } catch (error) {
    console.warn(`Progress callback failed at "${step}":`, error instanceof Error ? error.message : error);
  }
}

/**
 * Audits one page: fetch, parse, run every analyzer in order, aggregate.
 * A failed primary fetch ends the audit with an error result; a failed competitor
 * fetch only drops the comparison.
 */
export async function runAudit(
  url: string,
  competitorUrl?: string | null,
  onProgress?: ProgressCallback,
  deps?: Partial<AuditDependencies>
): Promise<AuditResult> {
  const resolved = resolveDependencies(deps);
  const lifecycle = new AuditLifecycle();
  const enter = (phase: AuditPhase) => {
    lifecycle.advance(phase);
    resolved.onPhase?.(phase);
  };
  const startedAt = resolved.now();

  await notify(onProgress, 'Fetching page...', 5);
  const [fetchResult, competitorFetch] = await Promise.all([
    resolved.fetchPage(url),
    competitorUrl ? resolved.fetchPage(competitorUrl) : Promise.resolve(null),
  ]);

  if (fetchResult.error) {
    enter('failed');
    const finishedAt = resolved.now();
    return buildErrorResult(fetchResult.url || url, fetchResult.error, finishedAt.getTime() - startedAt.getTime(), finishedAt);
  }
  enter('fetched');

  await notify(onProgress, 'Parsing HTML...', 15);
  const pageUrl = fetchResult.finalUrl || fetchResult.url;
  const parsed = resolved.parseHtml(fetchResult.html, pageUrl);

  let competitor: CompetitorPage | null = null;
  if (competitorFetch && !competitorFetch.error) {
    competitor = {
      parsed: resolved.parseHtml(competitorFetch.html, competitorFetch.finalUrl || competitorFetch.url),
      fetchResult: competitorFetch,
    };
  } else if (competitorFetch) {
    console.warn(`Competitor fetch failed for ${competitorUrl}:`, competitorFetch.error);
  }
  enter('parsed');

  const categories: CategoryResult[] = [];
  for (const analyzer of ANALYZERS) {
    await notify(onProgress, analyzer.progressLabel, analyzer.progress);
    categories.push(await analyzer.analyze({ parsed, fetchResult, insights: resolved.insights, competitor }));
  }
  enter('analyzed');

  await notify(onProgress, 'Generating report...', 95);
  const finishedAt = resolved.now();
  const result = buildAuditResult({
    categories,
    url: pageUrl,
    pageTitle: parsed.title,
    metaDescription: parsed.metaDescription,
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    fetchedAt: finishedAt,
  });
  enter('aggregated');

  await notify(onProgress, 'Complete', 100);
  enter('done');
  return result;
}
