/**
 * Key-Value Store Interface
 *
 * Minimal byte-oriented contract a score storage backend can be built on.
 * Implementations can wrap an in-memory Map, LevelDB, IndexedDB or a
 * remote key-value service.
 */

/**
 * Abstract key-value store interface
 *
 * All operations are async to support both sync and async backends.
 * Keys are strings, values are Uint8Array (binary).
 */
export interface KVStore {
  /**
   * @returns The value, or undefined if not found
   */
  get(key: string): Promise<Uint8Array | undefined>;

  set(key: string, value: Uint8Array): Promise<void>;

  /**
   * @returns True if key was deleted, false if it didn't exist
   */
  delete(key: string): Promise<boolean>;

  has(key: string): Promise<boolean>;

  /**
   * List all keys with a given prefix (empty string for all keys).
   * Order is not specified.
   */
  list(prefix: string): AsyncIterable<string>;

  /**
   * Get multiple values at once. Missing keys are absent from the result.
   */
  getMany(keys: string[]): Promise<Map<string, Uint8Array>>;

  /**
   * Atomically set `key` to `newValue` if its current value equals
   * `expected` (undefined: the key must not exist).
   *
   * @returns True if update succeeded, false if value didn't match
   */
  compareAndSwap(
    key: string,
    expected: Uint8Array | undefined,
    newValue: Uint8Array,
  ): Promise<boolean>;

  /**
   * Release resources. Optional - some backends don't need explicit cleanup.
   */
  close?(): Promise<void>;
}

/**
 * Byte-wise equality; two undefined values are equal.
 */
export function uint8ArrayEquals(a: Uint8Array | undefined, b: Uint8Array | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined) return false;
  if (a.length !== b.length) return false;

  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }

  return true;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function encodeText(value: string): Uint8Array {
  return encoder.encode(value);
}

export function decodeText(data: Uint8Array): string {
  return decoder.decode(data);
}
