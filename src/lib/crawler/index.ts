import type { FetchResult } from '../types';
import { type TargetCheck, isBlockedTarget } from './target-guard';

const USER_AGENT = 'Mozilla/5.0 (compatible; SiteGrade-Auditor/1.0; +page audit)';
const DEFAULT_TIMEOUT_MS = 15000;
const MAX_REDIRECTS = 10;

const PAGE_HEADERS = {
  'User-Agent': USER_AGENT,
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
};

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchPageOptions {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  /** Consulted before every request, redirect hops included. Defaults to blocking private and internal networks. */
  isBlocked?: TargetCheck;
}

export function normalizeTargetUrl(rawUrl: string): string {
  const candidate = rawUrl.trim();
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(candidate) ? candidate : `https://${candidate}`;
}

function emptyResult(url: string): FetchResult {
  return {
    url,
    finalUrl: url,
    statusCode: 0,
    html: '',
    headers: {},
    redirectChain: [],
    robotsTxt: null,
    sitemapXml: null,
    llmsTxt: null,
    error: null,
  };
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

interface FetchContext {
  fetchImpl: FetchLike;
  timeoutMs: number;
  isBlocked: TargetCheck;
}

interface FollowedResponse {
  response: Response;
  finalUrl: string;
  redirectChain: string[];
}

/** Follows redirects by hand so that every hop passes the target check before it is requested. */
async function followRedirects(url: string, headers: Record<string, string>, ctx: FetchContext): Promise<FollowedResponse> {
  const redirectChain: string[] = [];
  let current = url;

  for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
    if (await ctx.isBlocked(new URL(current))) {
      throw new Error(`Refusing to fetch private or internal address: ${current}`);
    }

    const response = await ctx.fetchImpl(current, {
      headers,
      redirect: 'manual',
      signal: AbortSignal.timeout(ctx.timeoutMs),
    });

    const location = response.headers.get('location');
    if (response.status >= 300 && response.status < 400 && location) {
      await response.body?.cancel();
      redirectChain.push(current);
      current = new URL(location, current).toString();
      continue;
    }

    return { response, finalUrl: current, redirectChain };
  }

  throw new Error(`Too many redirects (more than ${MAX_REDIRECTS})`);
}

interface MainPageResponse {
  finalUrl: string;
  statusCode: number;
  html: string;
  headers: Record<string, string>;
  redirectChain: string[];
}

async function fetchMainPage(url: string, ctx: FetchContext): Promise<MainPageResponse> {
  const { response, finalUrl, redirectChain } = await followRedirects(url, PAGE_HEADERS, ctx);

  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key.toLowerCase()] = value;
  });

  return {
    finalUrl,
    statusCode: response.status,
    html: await response.text(),
    headers,
    redirectChain,
  };
}

async function fetchSiteResource(url: string, ctx: FetchContext): Promise<string | null> {
  try {
    const { response } = await followRedirects(url, { 'User-Agent': USER_AGENT }, ctx);
    if (response.status !== 200) {
      await response.body?.cancel();
      return null;
    }
    return await response.text();
  } catch {
    return null;
  }
}

/**
 * Fetches the page together with robots.txt, sitemap.xml and llms.txt from the same origin.
 * Never rejects: a transport failure on the page itself is reported through `error`, and a
 * failed auxiliary resource is simply `null`.
 */
export async function fetchPage(rawUrl: string, options: FetchPageOptions = {}): Promise<FetchResult> {
  const ctx: FetchContext = {
    fetchImpl: options.fetchImpl ?? fetch,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    isBlocked: options.isBlocked ?? (target => isBlockedTarget(target)),
  };
  const url = normalizeTargetUrl(rawUrl);
  const result = emptyResult(url);

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { ...result, error: `Invalid URL: ${rawUrl}` };
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return { ...result, error: `Invalid URL scheme: ${parsed.protocol.replace(/:$/, '')}` };
  }

  const origin = parsed.origin;
  const [main, robotsTxt, sitemapXml, llmsTxt] = await Promise.all([
    fetchMainPage(url, ctx).catch((error: unknown) => describeError(error)),
    fetchSiteResource(`${origin}/robots.txt`, ctx),
    fetchSiteResource(`${origin}/sitemap.xml`, ctx),
    fetchSiteResource(`${origin}/llms.txt`, ctx),
  ]);

  if (typeof main === 'string') {
    return { ...result, error: main };
  }

  return {
    ...result,
    ...main,
    robotsTxt,
    sitemapXml,
    llmsTxt,
  };
}
