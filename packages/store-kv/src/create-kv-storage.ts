/**
 * Factory function for creating KV-backed storage
 */

import type { ScoreStorage } from "@score-history/core";
import { KVBlobStore } from "./kv-blob-store.js";
import { KVHeadStore } from "./kv-head-store.js";
import { KVObjectStore } from "./kv-object-store.js";
import type { KVStore } from "./kv-store.js";
import { KVVersionStore, type KVVersionStoreOptions } from "./kv-version-store.js";

export type KVStorageOptions = KVVersionStoreOptions;

/**
 * Build a ScoreStorage over any KVStore. Closing the storage closes the
 * underlying store.
 */
export function createKVScoreStorage(kv: KVStore, options: KVStorageOptions = {}): ScoreStorage {
  return {
    objects: new KVObjectStore(kv),
    heads: new KVHeadStore(kv),
    versions: new KVVersionStore(kv, options),
    blobs: new KVBlobStore(kv),
    close: async () => {
      await kv.close?.();
    },
  };
}
