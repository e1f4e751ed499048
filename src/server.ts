import { insightProviderFromConfig } from './lib/analyzers/ai-insights';
import { runAudit } from './lib/audit';
import { loadConfig } from './lib/config';
import { fetchPage } from './lib/crawler';
import { createAuditHandler } from './lib/http/audit-handler';
import { createHttpServer } from './lib/http/node-adapter';

function main(): void {
  const config = loadConfig();
  if (!config.anthropicApiKey) {
    console.warn('ANTHROPIC_API_KEY is not set; AI-assisted checks will be skipped.');
  }

  const insights = insightProviderFromConfig(config);
  const handler = createAuditHandler({
    apiSecretKey: config.apiSecretKey,
    audit: (url, competitorUrl, onProgress) =>
      runAudit(url, competitorUrl, onProgress, {
        fetchPage: target => fetchPage(target, { timeoutMs: config.fetchTimeoutMs }),
        insights,
      }),
  });

  createHttpServer(handler).listen(config.port, () => {
    console.warn(`Audit server listening on port ${config.port}`);
  });
}

if (require.main === module) {
  main();
}
