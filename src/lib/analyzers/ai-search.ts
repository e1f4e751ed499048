import type {
  AiSearchCategoryResult, CompetitorComparison, CrawlerStatus, FetchResult,
  LlmsTxtStatus, ParsedPage, SubScoreDelta, SubScoreKey, SubScores,
} from '../types';
import type { AIInsightProvider } from './ai-insights';
import { BucketedIssueLedger } from './issue-ledger';
import { AI_CRAWLERS, KEY_AI_CRAWLERS, evaluateCrawlerAccess, isCrawlerBlocked, isWildcardBlocked } from './robots';
import { allHeadings, buildCategoryResult, hasDateSignal, renderBlockingScripts, schemaType } from './shared';

export const SUB_SCORE_BUDGETS: Readonly<SubScores> = Object.freeze({
  citability: 25,
  structure: 20,
  multiModal: 15,
  authority: 20,
  technical: 20,
});

export const SUB_SCORE_LABELS: Readonly<Record<SubScoreKey, string>> = Object.freeze({
  citability: 'Citability',
  structure: 'Structure',
  multiModal: 'Multi-Modal',
  authority: 'Authority',
  technical: 'Technical AI Access',
});

const SUB_SCORE_KEYS: readonly SubScoreKey[] = ['citability', 'structure', 'multiModal', 'authority', 'technical'];

/** Bucket differences of this size or less are omitted from a comparison. */
export const COMPARISON_NOISE_THRESHOLD = 3;

const CITABLE_MIN_WORDS = 50;
const CITABLE_MAX_WORDS = 200;
const WALL_OF_TEXT_WORDS = 100;
const MAX_RENDER_BLOCKING_SCRIPTS = 10;
const LLMS_TXT_MIN_CHARS = 50;

const QUESTION_PREFIXES = ['what ', 'how ', 'why ', 'when ', 'where ', 'which ', 'who '];
const DIRECT_ANSWER_PATTERNS = [' is ', ' refers to ', ' defined as ', ' means ', ' are '];
const STATISTICS_PATTERN = /\d+%|\d+\.\d+|\$\d+|[\d,]+\s*(users|customers|companies|revenue|growth)/;
const AUTHOR_BYLINE_PATTERN = /(rel=["']author["']|class=["'][^"']*author[^"']*["']|itemprop=["']author["'])/i;

function wordsIn(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function countCitablePassages(paragraphs: string[]): number {
  return paragraphs.filter(p => {
    const words = wordsIn(p);
    return words >= CITABLE_MIN_WORDS && words <= CITABLE_MAX_WORDS;
  }).length;
}

function averageParagraphWords(paragraphs: string[]): number {
  if (paragraphs.length === 0) return 0;
  return paragraphs.reduce((sum, p) => sum + wordsIn(p), 0) / paragraphs.length;
}

export function llmsTxtStatus(llmsTxt: string | null): LlmsTxtStatus {
  if (!llmsTxt) return 'missing';
  return llmsTxt.trim().length >= LLMS_TXT_MIN_CHARS ? 'present' : 'thin';
}

export interface GeoCheckOutcome {
  ledger: BucketedIssueLedger<SubScoreKey>;
  citablePassageCount: number;
  crawlerStatus: Record<string, CrawlerStatus>;
  llmsTxtStatus: LlmsTxtStatus;
}

/** The deterministic part of the analysis; also what a competitor page is scored with. */
export function runGeoChecks(parsed: ParsedPage, fetchResult: FetchResult): GeoCheckOutcome {
  const ledger = new BucketedIssueLedger<SubScoreKey>('geo', SUB_SCORE_BUDGETS);
  const { wordCount, bodyText, paragraphs, schema } = parsed;
  const robotsTxt = fetchResult.robotsTxt;

  // ─── Citability ──────────────────────────────────────────────────────────
  const citableCount = countCitablePassages(paragraphs);
  if (citableCount === 0 && wordCount > 200) {
    ledger.recordIn('citability', 'geo-no-citable-passages', 'high', 'No citable passages',
      'Zero paragraphs in the 50-200 word sweet spot for AI citations.',
      'Structure content with 50-200 word paragraphs (optimal: 134-167 words).',
      'AI systems cannot extract clean citations', 12);
  } else if (citableCount < 3 && wordCount > 500) {
    ledger.recordIn('citability', 'geo-few-citable-passages', 'medium', 'Few citable passages',
      `Only ${citableCount} passage(s) in the AI-citation sweet spot.`,
      'Break content into more 50-200 word paragraphs.',
      'Limited citation opportunities', 6);
  }

  const opening = bodyText.slice(0, 500).toLowerCase();
  const hasDirectAnswer = DIRECT_ANSWER_PATTERNS.some(pattern => opening.includes(pattern));
  if (!hasDirectAnswer && wordCount > 200) {
    ledger.recordIn('citability', 'geo-no-direct-answer', 'medium', 'No direct answer pattern',
      "Opening content doesn't include direct definitions (e.g., 'X is...').",
      'Start with a clear definition. AI search prefers direct answers early.',
      'Lower citation priority', 5);
  }

  if (!STATISTICS_PATTERN.test(bodyText) && wordCount > 200) {
    ledger.recordIn('citability', 'geo-no-statistics', 'low', 'No data points or statistics',
      'No quantitative data found in body content.',
      'Add specific numbers, percentages, or data points to strengthen citations.',
      'Weaker citation authority', 4);
  }

  // ─── Structural readability ──────────────────────────────────────────────
  const questionHeadings = allHeadings(parsed).filter(h => {
    const lower = h.toLowerCase();
    return QUESTION_PREFIXES.some(q => lower.startsWith(q)) || h.endsWith('?');
  });
  if (questionHeadings.length === 0 && wordCount > 500) {
    ledger.recordIn('structure', 'geo-no-question-headings', 'medium', 'No question-based headings',
      'No headings match AI query patterns (What, How, Why...).',
      'Add question-based H2/H3 headings that match how users ask AI.',
      'Lower AI Overviews citation chance', 6);
  }

  const { h2, h3, h4 } = parsed.headings;
  if ((h3.length > 0 && h2.length === 0) || (h4.length > 0 && h3.length === 0)) {
    ledger.recordIn('structure', 'geo-broken-hierarchy', 'medium', 'Broken heading hierarchy',
      'Heading levels are skipped (e.g., H3 without H2).',
      'Maintain proper H1 → H2 → H3 hierarchy for AI parsing.',
      'AI may misinterpret content structure', 5);
  }

  if (parsed.lists.ul + parsed.lists.ol === 0 && wordCount > 300) {
    ledger.recordIn('structure', 'geo-no-lists', 'low', 'No list elements',
      'No unordered or ordered lists found.',
      'Use bullet/numbered lists. AI search frequently cites list content.',
      'Missed featured snippet opportunity', 4);
  }

  const avgParagraphWords = averageParagraphWords(paragraphs);
  if (avgParagraphWords > WALL_OF_TEXT_WORDS && wordCount > 300) {
    ledger.recordIn('structure', 'geo-wall-of-text', 'medium', 'Wall of text detected',
      `Average paragraph length: ${Math.round(avgParagraphWords)} words.`,
      'Break into shorter paragraphs (50-100 words max).',
      'AI struggles to extract specific claims', 5);
  }

  // ─── Multi-modal ─────────────────────────────────────────────────────────
  const imageCount = parsed.images.length;
  if (imageCount === 0 && wordCount > 300) {
    ledger.recordIn('multiModal', 'geo-no-images', 'medium', 'No images',
      'Page has no images despite substantial text content.',
      'Add relevant images. Multi-modal pages rank higher in AI results.',
      'Lower engagement and AI ranking signals', 8);
  }

  if (parsed.videos.length === 0) {
    ledger.recordIn('multiModal', 'geo-no-video', 'low', 'No video content',
      'No video or video embeds detected.',
      'Consider adding video. AI platforms increasingly surface video content.',
      'Missing multi-modal signal', 4);
  }

  const imagesWithoutAlt = parsed.images.filter(img => !img.alt).length;
  if (imageCount > 0 && imagesWithoutAlt / imageCount > 0.5) {
    ledger.recordIn('multiModal', 'geo-images-no-alt', 'low', 'Most images lack alt text',
      `${imagesWithoutAlt}/${imageCount} images have no alt text.`,
      'Add descriptive alt text to all images for AI understanding.',
      'AI cannot understand image content', 3);
  }

  // ─── Authority & brand ───────────────────────────────────────────────────
  const types = schema.map(schemaType);
  const hasPerson = types.some(t => t === 'Person' || t === 'ProfilePage');
  const hasByline = AUTHOR_BYLINE_PATTERN.test(fetchResult.html);
  if (!hasPerson && !hasByline && wordCount > 300) {
    ledger.recordIn('authority', 'geo-no-author', 'medium', 'No author attribution',
      'No Person schema or author byline found.',
      'Add author information with Person schema. AI values attributed content.',
      'Weaker E-E-A-T signal for AI', 6);
  }

  if (!hasDateSignal(schema) && wordCount > 300) {
    ledger.recordIn('authority', 'geo-no-dates', 'medium', 'No publication dates',
      'No datePublished or dateModified in schema.',
      'Add date metadata. AI search prioritizes fresh, dated content.',
      'AI cannot determine content freshness', 5);
  }

  if (!types.includes('Organization')) {
    ledger.recordIn('authority', 'geo-no-org-schema', 'low', 'No Organization schema',
      'No Organization structured data found.',
      'Add Organization JSON-LD to establish brand authority.',
      'Weaker brand signal for AI', 4);
  }

  const externalLinks = parsed.links.external.length;
  if (externalLinks < 2 && wordCount > 300) {
    ledger.recordIn('authority', 'geo-no-source-citations', 'low', 'Few source citations',
      `Only ${externalLinks} external link(s). AI values well-sourced content.`,
      'Add citations to authoritative sources.',
      'Lower perceived trustworthiness', 3);
  }

  if (!schema.some(block => Boolean(block.sameAs))) {
    ledger.recordIn('authority', 'geo-no-same-as', 'low', 'No sameAs in schema',
      'No sameAs property linking to social profiles.',
      'Add sameAs URLs to Organization/Person schema.',
      'Weaker entity recognition', 2);
  }

  // ─── Technical AI accessibility ──────────────────────────────────────────
  const wildcard = isWildcardBlocked(robotsTxt);
  if (wildcard) {
    ledger.recordIn('technical', 'geo-wildcard-block', 'critical', 'All bots blocked via wildcard',
      "robots.txt blocks all crawlers with 'Disallow: /'. Site is invisible to AI search.",
      'Remove the wildcard block or allow specific AI crawlers.',
      'Completely invisible to AI search', 10);
  } else {
    const keyBlocked = KEY_AI_CRAWLERS.filter(crawler => isCrawlerBlocked(robotsTxt, crawler));
    if (keyBlocked.length > 0) {
      ledger.recordIn('technical', 'geo-crawlers-blocked', 'high', 'AI crawlers blocked',
        `Blocked in robots.txt: ${keyBlocked.join(', ')}.`,
        'Allow GPTBot, ClaudeBot, PerplexityBot to crawl your site.',
        'Invisible to major AI search engines', 8);
    }
  }

  if (!fetchResult.llmsTxt) {
    ledger.recordIn('technical', 'geo-no-llms-txt', 'medium', 'No llms.txt file',
      'No /llms.txt found. This standard helps AI systems understand your site.',
      'Create a /llms.txt file describing your site for AI systems.',
      'Missed AI discoverability signal', 5);
  }

  const blocking = renderBlockingScripts(parsed.scripts).length;
  if (blocking > MAX_RENDER_BLOCKING_SCRIPTS) {
    ledger.recordIn('technical', 'geo-js-dependent', 'medium', 'Heavy JavaScript dependency',
      `${blocking} render-blocking scripts. AI crawlers may not execute JS.`,
      'Add async/defer to scripts. Ensure content is in initial HTML.',
      'AI crawlers may see empty page', 5);
  }

  return {
    ledger,
    citablePassageCount: citableCount,
    crawlerStatus: evaluateCrawlerAccess(robotsTxt, AI_CRAWLERS),
    llmsTxtStatus: llmsTxtStatus(fetchResult.llmsTxt),
  };
}

export function compareSubScores(ours: SubScores, theirs: SubScores): { advantages: SubScoreDelta[]; gaps: SubScoreDelta[] } {
  const advantages: SubScoreDelta[] = [];
  const gaps: SubScoreDelta[] = [];
  for (const key of SUB_SCORE_KEYS) {
    const delta = ours[key] - theirs[key];
    const entry = { key, label: SUB_SCORE_LABELS[key], delta };
    if (delta > COMPARISON_NOISE_THRESHOLD) advantages.push(entry);
    else if (delta < -COMPARISON_NOISE_THRESHOLD) gaps.push(entry);
  }
  return { advantages, gaps };
}

export interface CompetitorPage {
  parsed: ParsedPage;
  fetchResult: FetchResult;
}

function buildComparison(ours: GeoCheckOutcome, competitor: CompetitorPage): CompetitorComparison {
  const theirs = runGeoChecks(competitor.parsed, competitor.fetchResult).ledger;
  const yourSubScores = ours.ledger.subScores();
  const competitorSubScores = theirs.subScores();
  return {
    competitorUrl: competitor.fetchResult.finalUrl || competitor.fetchResult.url,
    yourScore: ours.ledger.finalScore(),
    competitorScore: theirs.finalScore(),
    yourSubScores,
    competitorSubScores,
    ...compareSubScores(yourSubScores, competitorSubScores),
    competitorIssueCount: theirs.issues().length,
  };
}

export async function analyzeAiSearch(
  parsed: ParsedPage,
  fetchResult: FetchResult,
  insights: AIInsightProvider,
  competitor?: CompetitorPage | null
): Promise<AiSearchCategoryResult> {
  const outcome = runGeoChecks(parsed, fetchResult);

  const aiSimulation = await insights.infer('query-simulation', {
    text: parsed.bodyText,
    url: fetchResult.finalUrl || fetchResult.url,
    title: parsed.title,
  });

  const competitorComparison = competitor ? buildComparison(outcome, competitor) : null;
  const crawlerValues = Object.values(outcome.crawlerStatus);
  const allowed = crawlerValues.filter(status => status === 'allowed').length;

  return {
    ...buildCategoryResult('geo', outcome.ledger, score =>
      `AI Search (GEO) score: ${score}/100. ${outcome.citablePassageCount} citable passages. ${allowed}/${crawlerValues.length} AI crawlers allowed.`
    ),
    geoDetails: {
      subScores: outcome.ledger.subScores(),
      aiCrawlerStatus: outcome.crawlerStatus,
      llmsTxtStatus: outcome.llmsTxtStatus,
      citablePassageCount: outcome.citablePassageCount,
      aiSimulation,
    },
    competitorComparison,
  };
}
