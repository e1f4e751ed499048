import { normalizeTargetUrl } from '../crawler';
import { type HostResolver, isBlockedTarget, resolveWithDns } from '../crawler/target-guard';

export const PRIVATE_TARGET_MESSAGE = 'This URL points to a private/internal network target and cannot be audited.';

/** A submitted audit target the handler refuses with a 400. */
export class TargetUrlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TargetUrlError';
  }
}

/**
 * Turns user input into the absolute URL to audit. Bare hosts get `https://`; anything that is
 * not HTTP(S) or that points into a private or internal network is rejected.
 */
export async function resolveAuditTarget(rawUrl: string, resolveHost: HostResolver = resolveWithDns): Promise<string> {
  let url: URL;
  try {
    url = new URL(normalizeTargetUrl(rawUrl));
  } catch {
    throw new TargetUrlError('Please enter a valid URL');
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new TargetUrlError('Only HTTP(S) URLs are supported');
  }
  if (await isBlockedTarget(url, resolveHost)) {
    throw new TargetUrlError(PRIVATE_TARGET_MESSAGE);
  }
  return url.toString();
}
