/**
 * Id lookup with exact match first, then unique prefix match.
 *
 * An ambiguous prefix is rejected instead of picking one of the matches.
 */

export type LookupResult<T> =
  | { kind: 'found'; id: string; value: T }
  | { kind: 'not_found' }
  | { kind: 'ambiguous'; matches: string[] };

export function lookupById<T>(entries: Map<string, T>, idOrPrefix: string): LookupResult<T> {
  const query = idOrPrefix.trim();
  if (!query) return { kind: 'not_found' };

  const exact = entries.get(query);
  if (exact !== undefined) {
    return { kind: 'found', id: query, value: exact };
  }

  const matches = [...entries.keys()].filter((id) => id.startsWith(query));
  if (matches.length === 0) return { kind: 'not_found' };
  if (matches.length > 1) return { kind: 'ambiguous', matches };

  const [id] = matches;
  const value = entries.get(id);
  return value === undefined ? { kind: 'not_found' } : { kind: 'found', id, value };
}

/** User-facing short id. */
export function shortId(id: string): string {
  return id.slice(0, 8);
}
