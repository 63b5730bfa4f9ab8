/**
 * Parametrized test suite for BlobStore implementations
 */

import type { BlobStore } from "@score-history/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { decode, encode } from "../test-utils.js";

export interface BlobStoreTestContext {
  blobStore: BlobStore;
  cleanup?: () => Promise<void>;
}

export type BlobStoreFactory = () => Promise<BlobStoreTestContext>;

/**
 * Create the BlobStore test suite with a specific factory
 *
 * @param name Name of the storage implementation (e.g., "Memory", "SQL", "KV")
 * @param factory Factory function to create storage instances
 */
export function createBlobStoreTests(name: string, factory: BlobStoreFactory): void {
  describe(`BlobStore [${name}]`, () => {
    let ctx: BlobStoreTestContext;

    beforeEach(async () => {
      ctx = await factory();
    });

    afterEach(async () => {
      await ctx.cleanup?.();
    });

    it("returns a content-addressed reference", async () => {
      const ref = await ctx.blobStore.put(new Uint8Array(0));
      expect(ref).toBe("sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
    });

    it("stores and loads content", async () => {
      const ref = await ctx.blobStore.put(encode("page image"));

      const content = await ctx.blobStore.get(ref);
      expect(content).toBeDefined();
      expect(content && decode(content)).toBe("page image");
      expect(await ctx.blobStore.has(ref)).toBe(true);
    });

    it("deduplicates identical content", async () => {
      const a = await ctx.blobStore.put(encode("same"));
      const b = await ctx.blobStore.put(encode("same"));
      const c = await ctx.blobStore.put(encode("other"));

      expect(b).toBe(a);
      expect(c).not.toBe(a);
    });

    it("is not affected by later changes to the input", async () => {
      const input = encode("abc");
      const ref = await ctx.blobStore.put(input);
      input[0] = 0x7a;

      const content = await ctx.blobStore.get(ref);
      expect(content && decode(content)).toBe("abc");
    });

    it("returns undefined for unknown references", async () => {
      const ref = `sha256:${"0".repeat(64)}`;
      expect(await ctx.blobStore.get(ref)).toBeUndefined();
      expect(await ctx.blobStore.has(ref)).toBe(false);
    });
  });
}
