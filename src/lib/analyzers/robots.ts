import type { CrawlerStatus } from '../types';

export const AI_CRAWLERS: readonly string[] = Object.freeze([
  'GPTBot',
  'ChatGPT-User',
  'ClaudeBot',
  'PerplexityBot',
  'Google-Extended',
  'Amazonbot',
  'Meta-ExternalAgent',
  'Bytespider',
  'Applebot-Extended',
]);

export const KEY_AI_CRAWLERS: readonly string[] = Object.freeze(['GPTBot', 'ClaudeBot', 'PerplexityBot']);

export const AI_CRAWLER_OPERATORS: Readonly<Record<string, string>> = Object.freeze({
  'GPTBot': 'OpenAI',
  'ClaudeBot': 'Anthropic',
  'PerplexityBot': 'Perplexity',
  'Google-Extended': 'Google AI',
});

export interface RobotsRule {
  type: 'allow' | 'disallow';
  path: string;
}

export interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
}

/**
 * Splits robots.txt into user-agent groups. Consecutive `User-agent` lines share one group;
 * the first rule line after them closes the agent list.
 */
export function parseRobotsTxt(robotsTxt: string): RobotsGroup[] {
  const groups: RobotsGroup[] = [];
  let current: RobotsGroup | null = null;
  let collectingAgents = false;

  for (const rawLine of robotsTxt.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    const separator = line.indexOf(':');
    if (separator === -1) continue;

    const field = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (field === 'user-agent') {
      if (!current || !collectingAgents) {
        current = { agents: [], rules: [] };
        groups.push(current);
        collectingAgents = true;
      }
      current.agents.push(value);
    } else if ((field === 'allow' || field === 'disallow') && current) {
      current.rules.push({ type: field, path: value });
      collectingAgents = false;
    } else {
      collectingAgents = false;
    }
  }

  return groups;
}

function isRootPath(path: string): boolean {
  return path === '/' || path === '/*';
}

function blocksEverything(group: RobotsGroup): boolean {
  const disallowsRoot = group.rules.some(r => r.type === 'disallow' && isRootPath(r.path));
  const allowsRoot = group.rules.some(r => r.type === 'allow' && isRootPath(r.path));
  return disallowsRoot && !allowsRoot;
}

export function isWildcardBlocked(robotsTxt: string | null): boolean {
  if (!robotsTxt) return false;
  return parseRobotsTxt(robotsTxt).some(g => g.agents.includes('*') && blocksEverything(g));
}

/** True only for a rule group that names the crawler itself; the wildcard group is not consulted. */
export function isCrawlerBlocked(robotsTxt: string | null, crawler: string): boolean {
  if (!robotsTxt) return false;
  const name = crawler.toLowerCase();
  return parseRobotsTxt(robotsTxt).some(
    g => g.agents.some(agent => agent.toLowerCase() === name) && blocksEverything(g)
  );
}

/** A wildcard block marks every crawler blocked regardless of per-agent rules. */
export function evaluateCrawlerAccess(
  robotsTxt: string | null,
  crawlers: readonly string[] = AI_CRAWLERS
): Record<string, CrawlerStatus> {
  const wildcard = isWildcardBlocked(robotsTxt);
  const status: Record<string, CrawlerStatus> = {};
  for (const crawler of crawlers) {
    status[crawler] = wildcard || isCrawlerBlocked(robotsTxt, crawler) ? 'blocked' : 'allowed';
  }
  return status;
}
