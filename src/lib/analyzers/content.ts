import type { ContentCategoryResult, EeatAssessment, FetchResult, ParsedPage } from '../types';
import type { AIInsightProvider } from './ai-insights';
import { IssueLedger } from './issue-ledger';
import { buildCategoryResult, hasDateSignal } from './shared';

const VOWELS = 'aeiouy';

function countSyllables(word: string): number {
  let count = VOWELS.includes(word[0]) ? 1 : 0;
  for (let i = 1; i < word.length; i++) {
    if (VOWELS.includes(word[i]) && !VOWELS.includes(word[i - 1])) count++;
  }
  if (word.endsWith('e')) count--;
  return count === 0 ? 1 : count;
}

/** Flesch Reading Ease, clamped to 0-100. Text without words or sentences scores a neutral 60. */
export function fleschReadingEase(text: string): number {
  const sentences = text.split(/[.!?]+/).map(s => s.trim()).filter(Boolean);
  const words = text.match(/\b\w+\b/g) ?? [];
  if (sentences.length === 0 || words.length === 0) return 60;

  const syllables = words.reduce((sum, word) => sum + countSyllables(word.toLowerCase()), 0);
  const avgSentenceLength = words.length / sentences.length;
  const avgSyllablesPerWord = syllables / words.length;

  const score = 206.835 - 1.015 * avgSentenceLength - 84.6 * avgSyllablesPerWord;
  return Math.max(0, Math.min(100, score));
}

function recordDeterministicChecks(ledger: IssueLedger, parsed: ParsedPage): void {
  const wordCount = parsed.wordCount;

  if (wordCount < 200) {
    ledger.record('content-thin', 'critical', 'Thin content',
      `Only ${wordCount} words. Google considers this thin content.`,
      'Add substantial, valuable content (500+ words recommended).',
      'Major ranking penalty', 20);
  } else if (wordCount < 500) {
    ledger.record('content-short', 'high', 'Short content',
      `Page has ${wordCount} words (recommended: 500+).`,
      'Expand content with valuable information.',
      'Reduced ranking potential', 12);
  }

  if (parsed.bodyText) {
    const readability = fleschReadingEase(parsed.bodyText);
    if (readability < 30) {
      ledger.record('content-hard-read', 'medium', 'Very difficult to read',
        `Flesch score: ${Math.round(readability)}/100. Content is hard to understand.`,
        'Simplify language. Target 60-70 for general audiences.',
        'Poor user engagement', 8);
    } else if (readability < 50) {
      ledger.record('content-readability', 'low', 'Readability could improve',
        `Flesch score: ${Math.round(readability)}/100.`,
        'Use shorter sentences and simpler words.',
        'User engagement', 4);
    }
  }

  if (parsed.headings.h2.length === 0 && wordCount > 300) {
    ledger.record('content-no-h2', 'medium', 'No H2 headings',
      'Long content without subheadings.',
      'Break content into sections with H2 headings.',
      'Poor readability and SEO structure', 6);
  }

  if (!hasDateSignal(parsed.schema) && wordCount > 500) {
    ledger.record('content-no-date', 'low', 'No publication date signals',
      'No datePublished or dateModified found.',
      'Add date metadata via schema markup.',
      'Content freshness signals missing', 3);
  }
}

function recordEeatChecks(ledger: IssueLedger, eeat: EeatAssessment): void {
  const eeatScore = eeat.overallScore;
  if (eeatScore < 40) {
    ledger.record('content-weak-eeat', 'high', 'Weak E-E-A-T signals',
      `E-E-A-T score: ${eeatScore}/100. ${eeat.summary}`,
      'Add author credentials, first-hand experience, citations, and trust signals.',
      'Major ranking factor for helpful content', 15);
  } else if (eeatScore < 60) {
    ledger.record('content-moderate-eeat', 'medium', 'Moderate E-E-A-T signals',
      `E-E-A-T score: ${eeatScore}/100. ${eeat.summary}`,
      'Strengthen expertise signals: add author bio, credentials, case studies.',
      'Competitive ranking disadvantage', 8);
  }

  if (eeat.aiContentRisk === 'high') {
    ledger.record('content-ai-risk-high', 'high', 'High AI-generated content risk',
      'Content shows strong AI-generation patterns.',
      'Add personal anecdotes, specific data, and first-hand experience.',
      "Google's helpful content system penalizes generic AI content", 12);
  } else if (eeat.aiContentRisk === 'medium') {
    ledger.record('content-ai-risk-medium', 'medium', 'Moderate AI content risk',
      'Some AI-generation patterns detected.',
      'Add more specificity and personal expertise signals.',
      'Potential ranking impact', 6);
  }
}

export async function analyzeContent(
  parsed: ParsedPage,
  fetchResult: FetchResult,
  insights: AIInsightProvider
): Promise<ContentCategoryResult> {
  const ledger = new IssueLedger('content');
  recordDeterministicChecks(ledger, parsed);

  let eeat: EeatAssessment | null = null;
  if (parsed.bodyText.length > 100) {
    eeat = await insights.infer('eeat', {
      text: parsed.bodyText,
      url: fetchResult.finalUrl || fetchResult.url,
      title: parsed.title,
    });
  }
  if (eeat) recordEeatChecks(ledger, eeat);

  return {
    ...buildCategoryResult('content', ledger, score =>
      `Content quality score: ${score}/100. Word count: ${parsed.wordCount}.`
    ),
    eeat,
  };
}
