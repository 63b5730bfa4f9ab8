/**
 * Parametrized test suite for VersionStore implementations
 *
 * Versions must be ascending and unique per score, also when allocated
 * concurrently, and gap-free unless a version is discarded.
 */

import type { VersionStore, VersionStoreOptions } from "@score-history/core";
import { VersionNotFoundError } from "@score-history/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { collect, scoreId } from "../test-utils.js";

export interface VersionStoreTestContext {
  versionStore: VersionStore;
  cleanup?: () => Promise<void>;
}

export type VersionStoreFactory = (options?: VersionStoreOptions) => Promise<VersionStoreTestContext>;

function snapshot(seed: string): string {
  return seed.padEnd(64, "0");
}

/**
 * Create the VersionStore test suite with a specific factory
 *
 * @param name Name of the storage implementation (e.g., "Memory", "SQL", "KV")
 * @param factory Factory function to create storage instances
 */
export function createVersionStoreTests(name: string, factory: VersionStoreFactory): void {
  describe(`VersionStore [${name}]`, () => {
    let ctx: VersionStoreTestContext;
    const score = scoreId("u1", "s1");

    beforeEach(async () => {
      ctx = await factory();
    });

    afterEach(async () => {
      await ctx.cleanup?.();
    });

    it("allocates sequential numbers starting at 1", async () => {
      expect(await ctx.versionStore.recordVersion(score, snapshot("a"))).toBe(1);
      expect(await ctx.versionStore.recordVersion(score, snapshot("b"))).toBe(2);
      expect(await ctx.versionStore.recordVersion(score, snapshot("c"))).toBe(3);
    });

    it("resolves labels to snapshots", async () => {
      await ctx.versionStore.recordVersion(score, snapshot("a"));
      await ctx.versionStore.recordVersion(score, snapshot("b"));

      expect(await ctx.versionStore.resolve(score, "1")).toBe(snapshot("a"));
      expect(await ctx.versionStore.resolve(score, "2")).toBe(snapshot("b"));
    });

    it.each(["3", "0", "01", "1.0", "one", ""])("rejects label %j", async (label) => {
      await ctx.versionStore.recordVersion(score, snapshot("a"));
      await ctx.versionStore.recordVersion(score, snapshot("b"));

      await expect(ctx.versionStore.resolve(score, label)).rejects.toBeInstanceOf(
        VersionNotFoundError,
      );
    });

    it("lists versions in ascending order, restartably", async () => {
      await ctx.versionStore.recordVersion(score, snapshot("a"));
      await ctx.versionStore.recordVersion(score, snapshot("b"));

      const expected = [
        { version: 1, snapshot: snapshot("a") },
        { version: 2, snapshot: snapshot("b") },
      ];
      expect(await collect(ctx.versionStore.list(score))).toEqual(expected);
      expect(await collect(ctx.versionStore.list(score))).toEqual(expected);
    });

    it("lists nothing for a score without versions", async () => {
      expect(await collect(ctx.versionStore.list(score))).toEqual([]);
    });

    it("keeps scores apart", async () => {
      const other = scoreId("u1", "s1-draft");
      await ctx.versionStore.recordVersion(score, snapshot("a"));
      await ctx.versionStore.recordVersion(other, snapshot("b"));

      expect(await collect(ctx.versionStore.list(score))).toEqual([
        { version: 1, snapshot: snapshot("a") },
      ]);
      expect(await collect(ctx.versionStore.list(other))).toEqual([
        { version: 1, snapshot: snapshot("b") },
      ]);
    });

    it("reports the latest version", async () => {
      expect(await ctx.versionStore.latest(score)).toBeUndefined();

      await ctx.versionStore.recordVersion(score, snapshot("a"));
      await ctx.versionStore.recordVersion(score, snapshot("b"));

      expect(await ctx.versionStore.latest(score)).toEqual({ version: 2, snapshot: snapshot("b") });
    });

    it("withdraws a discarded version without reusing its number", async () => {
      await ctx.versionStore.recordVersion(score, snapshot("a"));
      const discarded = await ctx.versionStore.recordVersion(score, snapshot("b"));

      await ctx.versionStore.discardVersion(score, discarded);

      await expect(ctx.versionStore.resolve(score, "2")).rejects.toBeInstanceOf(
        VersionNotFoundError,
      );
      expect(await ctx.versionStore.latest(score)).toEqual({ version: 1, snapshot: snapshot("a") });
      expect(await ctx.versionStore.recordVersion(score, snapshot("c"))).toBe(3);
      const listed = await collect(ctx.versionStore.list(score));
      expect(listed).toEqual([
        { version: 1, snapshot: snapshot("a") },
        { version: 3, snapshot: snapshot("c") },
      ]);
    });

    it("ignores discarding a version that was never recorded", async () => {
      await ctx.versionStore.recordVersion(score, snapshot("a"));

      await ctx.versionStore.discardVersion(score, 7);

      expect(await ctx.versionStore.latest(score)).toEqual({ version: 1, snapshot: snapshot("a") });
    });

    it("never hands out a number twice under concurrency", async () => {
      const versions = await Promise.all(
        Array.from({ length: 10 }, (_, i) =>
          ctx.versionStore.recordVersion(score, snapshot(String(i))),
        ),
      );

      expect([...versions].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
      const listed = await collect(ctx.versionStore.list(score));
      expect(listed.map((entry) => entry.version)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    });

    describe("with a configured first version", () => {
      beforeEach(async () => {
        await ctx.cleanup?.();
        ctx = await factory({ firstVersion: 0 });
      });

      it("starts numbering at the configured base", async () => {
        expect(await ctx.versionStore.recordVersion(score, snapshot("a"))).toBe(0);
        expect(await ctx.versionStore.recordVersion(score, snapshot("b"))).toBe(1);
        expect(await ctx.versionStore.resolve(score, "0")).toBe(snapshot("a"));
      });
    });
  });
}
