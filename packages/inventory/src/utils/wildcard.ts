import { minimatch } from "minimatch";

/**
 * Shell-style wildcard match against a whole identifier.
 * Supports `*`, `?` and `[...]`; case-sensitive.
 */
export function matchWildcard(pattern: string, text: string): boolean {
  return minimatch(text, pattern, {
    dot: true,
    nocomment: true,
    nonegate: true,
    noglobstar: true,
    nobrace: true,
    noext: true,
  });
}

/**
 * Apply an optional name filter to a list, keeping input order
 */
export function filterByName<T>(
  items: readonly T[],
  getName: (item: T) => string,
  pattern: string | undefined
): T[] {
  if (!pattern) {
    return [...items];
  }
  return items.filter((item) => matchWildcard(pattern, getName(item)));
}
