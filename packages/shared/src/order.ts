/**
 * Case-insensitive ordering of command names.
 *
 * Compares lower-cased names by UTF-16 code unit, so the order does not
 * depend on the host locale.
 */
export function compareCommandNames(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Index at which `name` goes among already-sorted `names`: before the first
 * sibling that compares greater than or equal to it.
 */
export function findSortedIndex(names: readonly string[], name: string): number {
  const idx = names.findIndex((existing) => compareCommandNames(name, existing) <= 0);
  return idx === -1 ? names.length : idx;
}

/** Slash-joined display form of a command path */
export function formatCommandPath(path: readonly string[]): string {
  return path.join('/');
}
