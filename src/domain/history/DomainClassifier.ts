/**
 * Hostname extraction and base-domain grouping
 */

import { HierarchicalDomainStats } from '../models/types';

/**
 * Two-label public suffixes that need three labels to form a registrable domain
 */
const TWO_PART_SUFFIXES = new Set([
  'co.jp', 'or.jp', 'ne.jp', 'ac.jp', 'go.jp', 'ad.jp', 'ed.jp', 'gr.jp', 'lg.jp',
  'co.uk', 'org.uk', 'ac.uk', 'gov.uk', 'me.uk', 'ltd.uk', 'plc.uk', 'net.uk', 'sch.uk',
  'com.au', 'net.au', 'org.au', 'edu.au', 'gov.au', 'id.au',
  'com.br', 'net.br', 'org.br', 'gov.br',
  'co.nz', 'org.nz', 'co.kr', 'or.kr', 'co.in', 'co.za',
  'com.cn', 'com.tw', 'com.hk', 'com.sg', 'com.mx', 'com.ar', 'com.tr',
]);

/**
 * Second-level labels treated as part of the suffix under any two-letter country TLD
 */
const GENERIC_SECOND_LEVEL = new Set(['co', 'com', 'net', 'org', 'gov', 'edu', 'ac', 'or', 'ne', 'go']);

const HOST_TERMINATORS = new Set(['/', '?', ':', '#']);

/**
 * Extract the host part of a URL.
 * Returns '' when the URL has no "://". Stops at the first '/', '?', ':' or '#',
 * so userinfo ("user:pass@host") yields only the user name.
 */
export function extractHostFromURL(url: string): string {
  const schemeEnd = url.indexOf('://');
  if (schemeEnd === -1) {
    return '';
  }

  const rest = url.substring(schemeEnd + 3);
  for (let i = 0; i < rest.length; i++) {
    if (HOST_TERMINATORS.has(rest[i])) {
      return rest.substring(0, i);
    }
  }
  return rest;
}

function isTwoPartSuffix(secondLevel: string, tld: string): boolean {
  if (TWO_PART_SUFFIXES.has(`${secondLevel}.${tld}`)) {
    return true;
  }
  return /^[a-z]{2}$/.test(tld) && GENERIC_SECOND_LEVEL.has(secondLevel);
}

/**
 * Strip subdomain labels from a hostname, keeping the registrable domain.
 *
 * @example
 * extractBaseDomain('www.example.co.jp') // 'example.co.jp'
 * extractBaseDomain('mail.google.com')   // 'google.com'
 */
export function extractBaseDomain(hostname: string): string {
  const labels = hostname.split('.');
  if (labels.length < 2) {
    return hostname;
  }

  const tld = labels[labels.length - 1].toLowerCase();
  const secondLevel = labels[labels.length - 2].toLowerCase();
  const keep = isTwoPartSuffix(secondLevel, tld) ? 3 : 2;

  if (labels.length <= keep) {
    return hostname;
  }
  return labels.slice(-keep).join('.');
}

/**
 * Group (hostname, count) pairs into base-domain buckets.
 * Buckets are sorted by total count, descending; ties keep first-seen order.
 * Subdomains within a bucket are sorted the same way.
 */
export function groupHierarchical(
  entries: Iterable<readonly [hostname: string, count: number]>
): HierarchicalDomainStats[] {
  const buckets = new Map<string, Map<string, number>>();

  for (const [hostname, count] of entries) {
    const base = extractBaseDomain(hostname);
    let hosts = buckets.get(base);
    if (!hosts) {
      hosts = new Map();
      buckets.set(base, hosts);
    }
    hosts.set(hostname, (hosts.get(hostname) ?? 0) + count);
  }

  const result: HierarchicalDomainStats[] = [];
  for (const [baseDomain, hosts] of buckets) {
    const subdomains = [...hosts].map(([subdomain, count]) => ({ subdomain, count }));
    // Array.prototype.sort is stable, so equal counts keep insertion order
    subdomains.sort((a, b) => b.count - a.count);

    result.push({
      baseDomain,
      totalCount: subdomains.reduce((sum, s) => sum + s.count, 0),
      hasSubdomains: subdomains.length > 1,
      subdomains,
    });
  }

  result.sort((a, b) => b.totalCount - a.totalCount);
  return result;
}
