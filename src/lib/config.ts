import { z } from 'zod';

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalSecret,
  AI_INSIGHT_MODEL: z.string().trim().min(1).default('claude-3-5-haiku-latest'),
  AUDIT_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  API_SECRET_KEY: optionalSecret,
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
});

export interface AuditConfig {
  anthropicApiKey: string | undefined;
  insightModel: string;
  fetchTimeoutMs: number;
  apiSecretKey: string | undefined;
  port: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AuditConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const msg = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Invalid configuration: ${msg}`);
  }

  const parsed = result.data;
  return {
    anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    insightModel: parsed.AI_INSIGHT_MODEL,
    fetchTimeoutMs: parsed.AUDIT_FETCH_TIMEOUT_MS,
    apiSecretKey: parsed.API_SECRET_KEY,
    port: parsed.PORT,
  };
}
