/**
 * Tests for in-memory store implementations
 *
 * Uses the parametrized test suites from @score-history/testing
 * to verify the memory implementations follow the interface contracts.
 */

import {
  createBlobStoreTests,
  createHeadStoreTests,
  createObjectStoreTests,
  createScoresTests,
  createVersionStoreTests,
} from "@score-history/testing";
import { describe, expect, it } from "vitest";
import { MemoryBlobStore } from "../src/blob-store.js";
import { createMemoryScoreStorage } from "../src/create-memory-storage.js";
import { MemoryHeadStore } from "../src/head-store.js";
import { MemoryObjectStore } from "../src/object-store.js";
import { MemoryVersionStore } from "../src/version-store.js";

createObjectStoreTests("Memory", async () => ({ objectStore: new MemoryObjectStore() }));

createHeadStoreTests("Memory", async () => ({ headStore: new MemoryHeadStore() }));

createVersionStoreTests("Memory", async (options) => ({
  versionStore: new MemoryVersionStore(options),
}));

createBlobStoreTests("Memory", async () => ({ blobStore: new MemoryBlobStore() }));

createScoresTests("Memory", async () => ({ storage: createMemoryScoreStorage() }));

describe("MemoryObjectStore", () => {
  it("stores each distinct object once", async () => {
    const store = new MemoryObjectStore();
    const page = { type: "page", image: "img", thumbnail: "thumb", number: "1" } as const;

    await store.put(page);
    await store.put({ ...page });
    await store.put({ ...page, number: "2" });

    expect(store.size).toBe(2);
  });
});

describe("MemoryHeadStore", () => {
  it("returns heads that callers cannot mutate", async () => {
    const store = new MemoryHeadStore();
    const score = { owner: "u1", scoreName: "s1" };
    await store.compareAndSwap(score, undefined, { snapshot: "a", property: "p" });

    const head = await store.get(score);
    if (head) head.snapshot = "tampered";

    expect(await store.get(score)).toEqual({ snapshot: "a", property: "p" });
  });
});
