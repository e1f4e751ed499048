export type Severity = 'critical' | 'high' | 'medium' | 'low';

export type CategoryName = 'technical' | 'content' | 'onpage' | 'schema' | 'performance' | 'images' | 'geo';

export type HeadingTag = 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6';

export const HEADING_TAGS: readonly HeadingTag[] = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

// ─── Fetch & parse ──────────────────────────────────────────────────────────

export interface FetchResult {
  url: string;
  finalUrl: string;
  statusCode: number;
  html: string;
  /** Keys are lower-cased by the fetcher; read through `getHeader` for case-insensitive access. */
  headers: Record<string, string>;
  redirectChain: string[];
  robotsTxt: string | null;
  sitemapXml: string | null;
  llmsTxt: string | null;
  error: string | null;
}

export interface PageImage {
  src: string;
  alt: string | null;
  width: string | null;
  height: string | null;
  loading: string | null;
  fetchPriority: string | null;
  decoding: string | null;
}

export interface PageLink {
  href: string;
  text: string;
  rel: string[];
  nofollow: boolean;
}

export interface PageScript {
  src: string;
  async: boolean;
  defer: boolean;
  type: string | null;
}

export type StructuredDataBlock = Record<string, unknown>;

export interface ParsedPage {
  title: string | null;
  metaDescription: string | null;
  metaRobots: string | null;
  viewport: string | null;
  canonical: string | null;
  charset: string | null;
  language: string | null;
  headings: Record<HeadingTag, string[]>;
  schema: StructuredDataBlock[];
  images: PageImage[];
  links: { internal: PageLink[]; external: PageLink[] };
  scripts: PageScript[];
  stylesheets: string[];
  openGraph: Record<string, string>;
  twitterCard: Record<string, string>;
  hreflang: { lang: string; href: string }[];
  paragraphs: string[];
  lists: { ul: number; ol: number };
  videos: string[];
  wordCount: number;
  bodyText: string;
}

// ─── Results ────────────────────────────────────────────────────────────────

export interface Issue {
  id: string;
  category: CategoryName;
  severity: Severity;
  title: string;
  description: string;
  recommendation: string;
  impact: string;
}

export interface CategoryResult {
  name: CategoryName;
  label: string;
  score: number;
  grade: string;
  weight: number;
  issues: Issue[];
  summary: string;
}

export interface EeatDimension {
  score: number;
  signals: string[];
}

export interface EeatAssessment {
  experience?: EeatDimension;
  expertise?: EeatDimension;
  authoritativeness?: EeatDimension;
  trustworthiness?: EeatDimension;
  overallScore: number;
  summary: string;
  aiContentRisk: 'low' | 'medium' | 'high';
}

export interface ContentCategoryResult extends CategoryResult {
  name: 'content';
  eeat: EeatAssessment | null;
}

export type SubScoreKey = 'citability' | 'structure' | 'multiModal' | 'authority' | 'technical';

export type SubScores = Record<SubScoreKey, number>;

export type CrawlerStatus = 'allowed' | 'blocked';

export type LlmsTxtStatus = 'present' | 'thin' | 'missing';

export type CitationLikelihood = 'high' | 'medium' | 'low';

export interface SimulatedQuery {
  query: string;
  citationLikelihood: CitationLikelihood;
  reason: string;
}

export interface QuerySimulation {
  simulatedQueries: SimulatedQuery[];
  topChange: string;
  aiVisibilityRating: CitationLikelihood;
}

export interface GeoDetails {
  subScores: SubScores;
  aiCrawlerStatus: Record<string, CrawlerStatus>;
  llmsTxtStatus: LlmsTxtStatus;
  citablePassageCount: number;
  aiSimulation: QuerySimulation | null;
}

export interface SubScoreDelta {
  key: SubScoreKey;
  label: string;
  delta: number;
}

export interface CompetitorComparison {
  competitorUrl: string;
  yourScore: number;
  competitorScore: number;
  yourSubScores: SubScores;
  competitorSubScores: SubScores;
  advantages: SubScoreDelta[];
  gaps: SubScoreDelta[];
  competitorIssueCount: number;
}

export interface AiSearchCategoryResult extends CategoryResult {
  name: 'geo';
  geoDetails: GeoDetails;
  competitorComparison: CompetitorComparison | null;
}

export interface AuditResult {
  overallScore: number;
  overallGrade: string;
  categories: CategoryResult[];
  topFixes: Issue[];
  url: string;
  domain: string;
  fetchedAt: string;
  auditDurationMs: number;
  pageTitle: string | null;
  metaDescription: string | null;
  error: string | null;
}

// ─── Scoring tables ─────────────────────────────────────────────────────────

export function getGrade(score: number): string {
  if (score >= 90) return 'A+';
  if (score >= 80) return 'A';
  if (score >= 70) return 'B';
  if (score >= 60) return 'C';
  if (score >= 50) return 'D';
  return 'F';
}

export const CATEGORY_WEIGHTS: Readonly<Record<CategoryName, number>> = Object.freeze({
  technical: 0.20,
  content: 0.20,
  onpage: 0.15,
  schema: 0.10,
  performance: 0.10,
  images: 0.05,
  geo: 0.20,
});

export const CATEGORY_LABELS: Readonly<Record<CategoryName, string>> = Object.freeze({
  technical: 'Technical SEO',
  content: 'Content Quality',
  onpage: 'On-Page SEO',
  schema: 'Schema & Structured Data',
  performance: 'Performance',
  images: 'Image Optimization',
  geo: 'AI Search (GEO)',
});

export const SEVERITY_ORDER: Readonly<Record<Severity, number>> = Object.freeze({
  critical: 0,
  high: 1,
  medium: 2,
  low: 3,
});

export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
