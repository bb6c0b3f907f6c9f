/**
 * Ignore-list pattern matching for domain-facing aggregations
 */

/**
 * Tests whether a domain is covered by an ignore pattern.
 * A pattern matches when it equals the domain, is its leading label group
 * ("youtube" ~ "youtube.com"), its trailing label group ("google" ~ "accounts.google"),
 * or an embedded label group ("google" ~ "accounts.google.com").
 */
export function matchesIgnorePattern(domain: string, pattern: string): boolean {
  return (
    domain === pattern ||
    domain.startsWith(`${pattern}.`) ||
    domain.endsWith(`.${pattern}`) ||
    domain.includes(`.${pattern}.`)
  );
}

/**
 * Returns true if any non-empty pattern matches the domain
 */
export function shouldIgnore(domain: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => pattern !== '' && matchesIgnorePattern(domain, pattern));
}
