/**
 * Factory function for creating in-memory storage
 */

import type { ScoreStorage, VersionStoreOptions } from "@score-history/core";
import { MemoryBlobStore } from "./blob-store.js";
import { MemoryHeadStore } from "./head-store.js";
import { MemoryObjectStore } from "./object-store.js";
import { MemoryVersionStore } from "./version-store.js";

/**
 * Options for creating in-memory storage
 */
export type MemoryStorageOptions = VersionStoreOptions;

/**
 * Create a complete in-memory storage bundle
 *
 * Suitable for testing, development, and short-lived storage needs.
 */
export function createMemoryScoreStorage(options: MemoryStorageOptions = {}): ScoreStorage {
  return {
    objects: new MemoryObjectStore(),
    heads: new MemoryHeadStore(),
    versions: new MemoryVersionStore(options),
    blobs: new MemoryBlobStore(),
  };
}
