import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { EeatAssessment, QuerySimulation } from '../types';

export interface InsightPayloads {
  'eeat': EeatAssessment;
  'query-simulation': QuerySimulation;
}

export type InsightVariant = keyof InsightPayloads;

export interface InsightRequest {
  text: string;
  url: string;
  title: string | null;
}

/**
 * Qualitative judgments from a language model. `null` means unavailable, which covers a
 * missing API key, a failed call and a response that is not the expected JSON shape.
 */
export interface AIInsightProvider {
  infer<V extends InsightVariant>(variant: V, request: InsightRequest): Promise<InsightPayloads[V] | null>;
}

export type CompletionFn = (prompt: string) => Promise<string>;

const WORD_LIMITS: Record<InsightVariant, number> = {
  'eeat': 3000,
  'query-simulation': 2000,
};

const likelihood = z.enum(['high', 'medium', 'low']);

const EeatDimensionSchema = z.object({
  score: z.number().min(0).max(100),
  signals: z.array(z.string()).default([]),
});

const EeatAssessmentSchema = z.object({
  experience: EeatDimensionSchema.optional(),
  expertise: EeatDimensionSchema.optional(),
  authoritativeness: EeatDimensionSchema.optional(),
  trustworthiness: EeatDimensionSchema.optional(),
  overallScore: z.number().min(0).max(100).default(50),
  summary: z.string().default(''),
  aiContentRisk: likelihood.default('low'),
});

const QuerySimulationSchema = z.object({
  simulatedQueries: z.array(z.object({
    query: z.string(),
    citationLikelihood: likelihood,
    reason: z.string().default(''),
  })),
  topChange: z.string().default(''),
  aiVisibilityRating: likelihood,
});

const INSIGHT_SCHEMAS: { [V in InsightVariant]: z.ZodType<InsightPayloads[V], z.ZodTypeDef, unknown> } = {
  'eeat': EeatAssessmentSchema,
  'query-simulation': QuerySimulationSchema,
};

export function truncateWords(text: string, limit: number): string {
  return text.split(/\s+/).filter(Boolean).slice(0, limit).join(' ');
}

function buildPrompt(variant: InsightVariant, request: InsightRequest): string {
  const truncated = truncateWords(request.text, WORD_LIMITS[variant]);
  const header = `URL: ${request.url}
Title: ${request.title || 'N/A'}
Content (truncated): ${truncated}`;

  if (variant === 'eeat') {
    return `Analyze this webpage content for E-E-A-T (Experience, Expertise, Authoritativeness, Trustworthiness) quality signals. Return ONLY valid JSON.

${header}

Return this exact JSON structure:
{
  "experience": { "score": 0-100, "signals": ["signal1", "signal2"] },
  "expertise": { "score": 0-100, "signals": ["signal1", "signal2"] },
  "authoritativeness": { "score": 0-100, "signals": ["signal1", "signal2"] },
  "trustworthiness": { "score": 0-100, "signals": ["signal1", "signal2"] },
  "overallScore": 0-100,
  "summary": "Brief E-E-A-T assessment",
  "aiContentRisk": "low|medium|high"
}

Score each dimension 0-100. Identify specific signals.
Assess AI content risk based on generic phrasing, lack of specificity,
and absence of first-hand experience markers.

Weights: Experience 20%, Expertise 25%, Authoritativeness 25%, Trustworthiness 30%.`;
  }

  return `Analyze this webpage and simulate how AI search engines would use it.

${header}

Return ONLY valid JSON:
{
  "simulatedQueries": [
    {"query": "example question a user might ask", "citationLikelihood": "high|medium|low", "reason": "brief reason"},
    {"query": "...", "citationLikelihood": "...", "reason": "..."},
    {"query": "...", "citationLikelihood": "...", "reason": "..."}
  ],
  "topChange": "The single most impactful change to improve AI citation likelihood",
  "aiVisibilityRating": "high|medium|low"
}

Generate 3 realistic queries users might ask where this page could be cited. Rate citation likelihood based on content quality, structure, and authority signals.`;
}

/** Pulls the JSON document out of a reply that may be wrapped in a markdown fence. */
export function extractJson(reply: string): unknown {
  let text = reply.trim();
  if (text.includes('```')) {
    text = text.split('```')[1] ?? '';
    if (text.startsWith('json')) text = text.slice(4);
    text = text.trim();
  }
  return JSON.parse(text);
}

export function createInsightProvider(complete: CompletionFn): AIInsightProvider {
  return {
    async infer<V extends InsightVariant>(variant: V, request: InsightRequest): Promise<InsightPayloads[V] | null> {
      let payload: unknown;
      try {
        payload = extractJson(await complete(buildPrompt(variant, request)));
      } catch (error) {
        console.error(`AI insight (${variant}) failed:`, error instanceof Error ? error.message : error);
        return null;
      }

      const parsed = INSIGHT_SCHEMAS[variant].safeParse(payload);
      if (!parsed.success) {
        console.error(`AI insight (${variant}) returned an unexpected shape:`, parsed.error.issues[0]?.message);
        return null;
      }
      return parsed.data;
    },
  };
}

export const unavailableInsightProvider: AIInsightProvider = {
  async infer() {
    return null;
  },
};

export function createAnthropicCompletion(apiKey: string, model: string): CompletionFn {
  const client = new Anthropic({ apiKey });
  return async prompt => {
    const response = await client.messages.create({
      model,
      max_tokens: 1024,
      messages: [{ role: 'user', content: prompt }],
    });
    for (const block of response.content) {
      if (block.type === 'text') return block.text;
    }
    throw new Error('No text content in model response');
  };
}

export function insightProviderFromConfig(config: { anthropicApiKey: string | undefined; insightModel: string }): AIInsightProvider {
  if (!config.anthropicApiKey) return unavailableInsightProvider;
  return createInsightProvider(createAnthropicCompletion(config.anthropicApiKey, config.insightModel));
}
