import { lookup } from 'node:dns/promises';
import { isIP } from 'node:net';

export type HostResolver = (hostname: string) => Promise<string[]>;

/** Decides whether the fetcher may request a URL. */
export type TargetCheck = (url: URL) => Promise<boolean>;

type Octets = [number, number, number, number];

interface Ipv4Block {
  base: number;
  prefixLength: number;
}

function toUint32([a, b, c, d]: Octets): number {
  return ((a << 24) | (b << 16) | (c << 8) | d) >>> 0;
}

function block(a: number, b: number, prefixLength: number): Ipv4Block {
  return { base: toUint32([a, b, 0, 0]), prefixLength };
}

// Unspecified, private, CGNAT, loopback, link-local and benchmarking space.
const NON_PUBLIC_IPV4: readonly Ipv4Block[] = [
  block(0, 0, 8),
  block(10, 0, 8),
  block(100, 64, 10),
  block(127, 0, 8),
  block(169, 254, 16),
  block(172, 16, 12),
  block(192, 168, 16),
  block(198, 18, 15),
];

const INTERNAL_HOSTNAMES: ReadonlySet<string> = new Set(['localhost', 'host.docker.internal', 'metadata.google.internal']);
const INTERNAL_SUFFIXES = ['.localhost', '.local', '.internal', '.lan', '.home'];

export const resolveWithDns: HostResolver = async hostname => {
  const entries = await lookup(hostname, { all: true, verbatim: true });
  return entries.map(entry => entry.address);
};

export function parseIpv4(address: string): Octets | null {
  const parts = address.split('.');
  if (parts.length !== 4 || !parts.every(part => /^\d{1,3}$/.test(part))) return null;
  const [a, b, c, d] = parts.map(Number);
  if ([a, b, c, d].some(n => n > 255)) return null;
  return [a, b, c, d];
}

/**
 * Expands an IPv6 literal to its eight 16-bit groups. Handles `::` compression, a trailing
 * dotted quad and a zone suffix; returns `null` for anything else.
 */
export function parseIpv6(address: string): number[] | null {
  let text = address.toLowerCase().split('%')[0];

  const trailing: number[] = [];
  const dotted = /(\d{1,3}(?:\.\d{1,3}){3})$/.exec(text);
  if (dotted) {
    const octets = parseIpv4(dotted[1]);
    if (!octets) return null;
    trailing.push((octets[0] << 8) | octets[1], (octets[2] << 8) | octets[3]);
    text = text.slice(0, text.length - dotted[1].length);
    if (text.endsWith(':') && !text.endsWith('::')) text = text.slice(0, -1);
  }

  const halves = text.split('::');
  if (halves.length > 2) return null;

  const hextets = (part: string) =>
    (part === '' ? [] : part.split(':')).map(group => (/^[0-9a-f]{1,4}$/.test(group) ? parseInt(group, 16) : NaN));
  const head = hextets(halves[0]);
  const tail = halves.length === 2 ? [...hextets(halves[1]), ...trailing] : trailing;
  const explicit = head.length + tail.length;

  let groups: number[];
  if (halves.length === 2) {
    if (explicit > 7) return null;
    groups = [...head, ...new Array<number>(8 - explicit).fill(0), ...tail];
  } else {
    if (explicit !== 8) return null;
    groups = [...head, ...tail];
  }
  return groups.some(Number.isNaN) ? null : groups;
}

/** The IPv4 address carried by an IPv4-mapped (`::ffff:a.b.c.d`) or IPv4-compatible (`::a.b.c.d`) address. */
function embeddedIpv4(groups: number[]): Octets | null {
  if (!groups.slice(0, 5).every(group => group === 0)) return null;
  const marker = groups[5];
  if (marker === 0xffff || (marker === 0 && groups[6] !== 0)) {
    return [groups[6] >> 8, groups[6] & 0xff, groups[7] >> 8, groups[7] & 0xff];
  }
  return null;
}

function isNonPublicOctets(octets: Octets): boolean {
  const value = toUint32(octets);
  return NON_PUBLIC_IPV4.some(({ base, prefixLength }) => {
    const shift = 32 - prefixLength;
    return value >>> shift === base >>> shift;
  });
}

export function isPrivateIpv4(address: string): boolean {
  const octets = parseIpv4(address);
  return octets !== null && isNonPublicOctets(octets);
}

export function isPrivateIpv6(address: string): boolean {
  const groups = parseIpv6(address);
  if (!groups) return false;

  const embedded = embeddedIpv4(groups);
  if (embedded) return isNonPublicOctets(embedded);

  // :: and ::1
  if (groups.slice(0, 7).every(group => group === 0)) return groups[7] <= 1;
  // fc00::/7 unique local, fe80::/10 link-local
  return (groups[0] & 0xfe00) === 0xfc00 || (groups[0] & 0xffc0) === 0xfe80;
}

export function isPrivateIpAddress(address: string): boolean {
  switch (isIP(address)) {
    case 4:
      return isPrivateIpv4(address);
    case 6:
      return isPrivateIpv6(address);
    default:
      return false;
  }
}

export function isInternalHostname(hostname: string): boolean {
  const name = hostname.toLowerCase().replace(/\.$/, '');
  return INTERNAL_HOSTNAMES.has(name) || INTERNAL_SUFFIXES.some(suffix => name.endsWith(suffix));
}

/** True for loopback, link-local, private and internal-only targets, including names that resolve to them. */
export async function isBlockedTarget(url: URL, resolveHost: HostResolver = resolveWithDns): Promise<boolean> {
  // URL keeps IPv6 literals bracketed.
  const hostname = url.hostname.replace(/^\[|\]$/g, '');

  if (isInternalHostname(hostname)) return true;
  if (isIP(hostname) !== 0) return isPrivateIpAddress(hostname);

  let addresses: string[];
  try {
    addresses = await resolveHost(hostname);
  } catch {
    // Unresolvable names are left for the fetch itself to report.
    return false;
  }
  return addresses.some(isPrivateIpAddress);
}
