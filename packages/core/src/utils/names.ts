/**
 * Name helpers for matching entities across organizations
 */

/**
 * Normalize a source name or mapping field for case-insensitive matching
 */
export function normalizeName(name: string): string {
  return name.toLowerCase();
}

/**
 * Index items by a derived key. Later items win on duplicate keys.
 */
export function indexBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T> {
  const index = new Map<string, T>();
  for (const item of items) {
    index.set(keyOf(item), item);
  }
  return index;
}
