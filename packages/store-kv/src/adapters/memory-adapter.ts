/**
 * In-memory KVStore adapter
 *
 * Map-based implementation for tests and development.
 * No persistence - data is lost when the instance is garbage collected.
 */

import type { KVStore } from "../kv-store.js";
import { uint8ArrayEquals } from "../kv-store.js";

export class MemoryKVAdapter implements KVStore {
  private entries = new Map<string, Uint8Array>();

  async get(key: string): Promise<Uint8Array | undefined> {
    const value = this.entries.get(key);
    // Return a copy to prevent external mutation
    return value ? new Uint8Array(value) : undefined;
  }

  async set(key: string, value: Uint8Array): Promise<void> {
    this.entries.set(key, new Uint8Array(value));
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async has(key: string): Promise<boolean> {
    return this.entries.has(key);
  }

  async *list(prefix: string): AsyncIterable<string> {
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        yield key;
      }
    }
  }

  async getMany(keys: string[]): Promise<Map<string, Uint8Array>> {
    const result = new Map<string, Uint8Array>();
    for (const key of keys) {
      const value = this.entries.get(key);
      if (value) {
        result.set(key, new Uint8Array(value));
      }
    }
    return result;
  }

  async compareAndSwap(
    key: string,
    expected: Uint8Array | undefined,
    newValue: Uint8Array,
  ): Promise<boolean> {
    // No await between read and write: atomic on the event loop
    if (!uint8ArrayEquals(this.entries.get(key), expected)) {
      return false;
    }
    this.entries.set(key, new Uint8Array(newValue));
    return true;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  /**
   * Number of entries in the store (for testing)
   */
  get size(): number {
    return this.entries.size;
  }
}
