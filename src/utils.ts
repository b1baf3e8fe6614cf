/** Code-unit order, independent of locale. */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Entries of a map or record sorted by key. */
export function sortedEntries<V>(source: ReadonlyMap<string, V> | Readonly<Record<string, V>>): Array<[string, V]> {
  const entries: Array<[string, V]> =
    source instanceof Map ? [...source.entries()] : Object.entries(source);
  return entries.sort(([a], [b]) => compareStrings(a, b));
}

export function uniq<T>(items: Iterable<T>): T[] {
  return [...new Set(items)];
}
