import type { CategoryName, CategoryResult, FetchResult, ParsedPage } from '../types';
import type { AIInsightProvider } from './ai-insights';
import { type CompetitorPage, analyzeAiSearch } from './ai-search';
import { analyzeContent } from './content';
import { analyzeImages } from './images';
import { analyzeOnPage } from './onpage';
import { analyzePerformance } from './performance';
import { analyzeStructuredData } from './structured-data';
import { analyzeTechnical } from './technical';

export interface AnalyzerInput {
  parsed: ParsedPage;
  fetchResult: FetchResult;
  insights: AIInsightProvider;
  competitor: CompetitorPage | null;
}

/**
 * One scoring dimension. An analyzer reads only its input, keeps its own ledger,
 * and may await the insight provider but never fails because of it.
 */
export interface Analyzer {
  name: CategoryName;
  /** Shown to progress listeners just before the analyzer runs. */
  progressLabel: string;
  progress: number;
  analyze(input: AnalyzerInput): CategoryResult | Promise<CategoryResult>;
}

export const ANALYZERS: readonly Analyzer[] = [
  {
    name: 'technical',
    progressLabel: 'Analyzing technical SEO...',
    progress: 25,
    analyze: ({ parsed, fetchResult }) => analyzeTechnical(parsed, fetchResult),
  },
  {
    name: 'content',
    progressLabel: 'Analyzing content quality (AI-powered)...',
    progress: 35,
    analyze: ({ parsed, fetchResult, insights }) => analyzeContent(parsed, fetchResult, insights),
  },
  {
    name: 'onpage',
    progressLabel: 'Analyzing on-page SEO...',
    progress: 55,
    analyze: ({ parsed, fetchResult }) => analyzeOnPage(parsed, fetchResult),
  },
  {
    name: 'schema',
    progressLabel: 'Analyzing structured data...',
    progress: 65,
    analyze: ({ parsed, fetchResult }) => analyzeStructuredData(parsed, fetchResult),
  },
  {
    name: 'performance',
    progressLabel: 'Analyzing performance...',
    progress: 75,
    analyze: ({ parsed, fetchResult }) => analyzePerformance(parsed, fetchResult),
  },
  {
    name: 'images',
    progressLabel: 'Analyzing images...',
    progress: 85,
    analyze: ({ parsed, fetchResult }) => analyzeImages(parsed, fetchResult),
  },
  {
    name: 'geo',
    progressLabel: 'Analyzing AI search readiness...',
    progress: 90,
    analyze: ({ parsed, fetchResult, insights, competitor }) =>
      analyzeAiSearch(parsed, fetchResult, insights, competitor),
  },
];
