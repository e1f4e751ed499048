export { runAudit, AuditLifecycle } from './lib/audit';
export type { AuditDependencies, AuditPhase, ProgressCallback } from './lib/audit';
export { ANALYZERS } from './lib/analyzers/registry';
export type { Analyzer, AnalyzerInput } from './lib/analyzers/registry';
export { IssueLedger, BucketedIssueLedger } from './lib/analyzers/issue-ledger';
export { calculateOverallScore, selectTopFixes, extractDomain, buildAuditResult } from './lib/analyzers/scoring';
export { compareSubScores, runGeoChecks } from './lib/analyzers/ai-search';
export {
  createInsightProvider,
  createAnthropicCompletion,
  insightProviderFromConfig,
  unavailableInsightProvider,
} from './lib/analyzers/ai-insights';
export type { AIInsightProvider, CompletionFn, InsightRequest, InsightVariant } from './lib/analyzers/ai-insights';
export { fetchPage } from './lib/crawler';
export { parseHtml } from './lib/parser';
export { loadConfig } from './lib/config';
export type { AuditConfig } from './lib/config';
export { createAuditHandler } from './lib/http/audit-handler';
export * from './lib/types';
