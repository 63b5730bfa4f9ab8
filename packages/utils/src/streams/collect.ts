/**
 * Collect async iterable items into array.
 *
 * Used by tests and by helpers that need a whole listing at once
 * (e.g., version labels of a score).
 */
export async function toArray<T>(input: Iterable<T> | AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of input) {
    result.push(item);
  }
  return result;
}
