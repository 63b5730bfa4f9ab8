/**
 * Tests for KV-based store implementations
 *
 * Uses the parametrized test suites from @score-history/testing
 * to verify the KV implementations follow the interface contracts.
 */

import {
  createBlobStoreTests,
  createHeadStoreTests,
  createObjectStoreTests,
  createScoresTests,
  createVersionStoreTests,
} from "@score-history/testing";
import { MemoryKVAdapter } from "../src/adapters/memory-adapter.js";
import { createKVScoreStorage } from "../src/create-kv-storage.js";
import { KVBlobStore } from "../src/kv-blob-store.js";
import { KVHeadStore } from "../src/kv-head-store.js";
import { KVObjectStore } from "../src/kv-object-store.js";
import { KVVersionStore } from "../src/kv-version-store.js";

createObjectStoreTests("KV", async () => {
  const kv = new MemoryKVAdapter();
  return {
    objectStore: new KVObjectStore(kv),
    cleanup: async () => {
      await kv.close();
    },
  };
});

createHeadStoreTests("KV", async () => {
  const kv = new MemoryKVAdapter();
  return {
    headStore: new KVHeadStore(kv),
    cleanup: async () => {
      await kv.close();
    },
  };
});

createVersionStoreTests("KV", async (options) => {
  const kv = new MemoryKVAdapter();
  return {
    versionStore: new KVVersionStore(kv, options),
    cleanup: async () => {
      await kv.close();
    },
  };
});

createBlobStoreTests("KV", async () => {
  const kv = new MemoryKVAdapter();
  return {
    blobStore: new KVBlobStore(kv),
    cleanup: async () => {
      await kv.close();
    },
  };
});

createScoresTests("KV", async () => {
  const storage = createKVScoreStorage(new MemoryKVAdapter());
  return {
    storage,
    cleanup: async () => {
      await storage.close?.();
    },
  };
});
