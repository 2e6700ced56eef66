import type { CredentialEntry, CredentialQuery } from './types.js';

function sameText(expected: string | null, actual: string): boolean {
  return expected === null || expected.toLowerCase() === actual.toLowerCase();
}

/**
 * Whether every non-wildcard field of `entry` equals the query.
 *
 * Host, database and user compare case-insensitively; port is integer equality.
 */
export function entryMatches(entry: CredentialEntry, query: CredentialQuery): boolean {
  if (!sameText(entry.hostname, query.host)) return false;
  if (entry.port !== null && entry.port !== query.port) return false;
  if (!sameText(entry.database, query.database)) return false;
  if (!sameText(entry.username, query.user)) return false;
  return true;
}

/**
 * Password of the first matching entry, or `null`.
 *
 * Earlier entries win even when a later one is more specific.
 */
export function findPassword(
  entries: readonly CredentialEntry[],
  query: CredentialQuery,
): string | null {
  for (const entry of entries) {
    if (entryMatches(entry, query)) {
      return entry.password;
    }
  }
  return null;
}
