/**
 * Drop repeated items, keeping the first occurrence of each.
 */
export function uniqueInOrder<T>(items: Iterable<T>): T[] {
  return [...new Set(items)];
}
