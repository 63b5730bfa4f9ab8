import { beforeEach, describe, expect, it, vi } from "vitest";
import type { PageOperation } from "../../src/commits/index.js";
import { ScoreEngine } from "../../src/engine/score-engine.js";
import { ScoreLock } from "../../src/engine/score-lock.js";
import { SnapshotReader } from "../../src/engine/snapshot-reader.js";
import {
  ConcurrencyConflictError,
  NoChangeError,
  ObjectNotFoundError,
  ScoreNotFoundError,
} from "../../src/errors/index.js";
import type { ScoreHead } from "../../src/history/index.js";
import { createMockStorage, type MockStorage, seedScore } from "../mocks/index.js";

const score = { owner: "u1", scoreName: "s1" };

function add(label: string): PageOperation {
  return { type: "add_page", image: `img-${label}`, thumbnail: `thumb-${label}`, number: label };
}

describe("ScoreEngine", () => {
  let storage: MockStorage;
  let head: ScoreHead;

  beforeEach(async () => {
    storage = createMockStorage();
    head = await seedScore(storage, score, "Sonata");
  });

  it("writes the snapshot, swaps the head and records the version", async () => {
    const engine = new ScoreEngine(storage);

    const result = await engine.commit(score, head.snapshot, [add("A"), add("B")]);

    expect(result.version).toBe(1);
    expect(result.pages.map((p) => p.number)).toEqual(["A", "B"]);
    expect(await storage.heads.get(score)).toEqual({
      snapshot: result.snapshot,
      property: head.property,
    });
    expect(storage.objects.objects.get(result.snapshot)).toMatchObject({
      type: "snapshot",
      parent: head.snapshot,
    });
    expect(await storage.versions.resolve(score, "1")).toBe(result.snapshot);
  });

  it("only stores pages created by the batch", async () => {
    const engine = new ScoreEngine(storage);
    const first = await engine.commit(score, head.snapshot, [add("A"), add("B")]);
    const putsBefore = storage.objects.putCount;

    await engine.commit(score, first.snapshot, [{ type: "delete_page", index: 0 }]);

    // Only the new snapshot is written
    expect(storage.objects.putCount - putsBefore).toBe(1);
  });

  it("rejects an empty batch before touching storage", async () => {
    const engine = new ScoreEngine(storage);
    await expect(engine.commit(score, head.snapshot, [])).rejects.toBeInstanceOf(NoChangeError);
    expect(storage.versions.entries.size).toBe(0);
  });

  it("rejects unknown scores", async () => {
    const engine = new ScoreEngine(storage);
    await expect(
      engine.commit({ owner: "u1", scoreName: "missing" }, head.snapshot, [add("A")]),
    ).rejects.toBeInstanceOf(ScoreNotFoundError);
  });

  it("rejects a stale parent without writing", async () => {
    const engine = new ScoreEngine(storage);
    const putsBefore = storage.objects.putCount;

    const error = await engine.commit(score, "stale", [add("A")]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConcurrencyConflictError);
    expect(error).toMatchObject({ reason: "stale-parent", expected: "stale", actual: head.snapshot });
    expect(storage.objects.putCount).toBe(putsBefore);
  });

  it("reports a head that moved before the swap and records no version", async () => {
    const engine = new ScoreEngine(storage);
    storage.heads.beforeCompareAndSwap = () => {
      storage.heads.heads.set("u1/s1", { snapshot: "other", property: head.property });
    };

    const error = await engine.commit(score, head.snapshot, [add("A")]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConcurrencyConflictError);
    expect(error).toMatchObject({ reason: "head-moved", actual: "other" });
    expect(storage.versions.entries.get("u1/s1")).toEqual([]);
    expect(storage.versions.allocated.get("u1/s1")).toBe(1);
  });

  it("withdraws the version when the head swap throws", async () => {
    const engine = new ScoreEngine(storage);
    storage.heads.beforeCompareAndSwap = () => {
      throw new Error("head store offline");
    };

    await expect(engine.commit(score, head.snapshot, [add("A")])).rejects.toThrow(
      "head store offline",
    );

    expect(storage.versions.entries.get("u1/s1")).toEqual([]);
  });

  it("leaves the head untouched when version allocation fails", async () => {
    const engine = new ScoreEngine(storage);
    storage.versions.failNextRecord = new Error("allocation failed");

    await expect(engine.commit(score, head.snapshot, [add("A")])).rejects.toThrow(
      "allocation failed",
    );

    expect(await storage.heads.get(score)).toEqual(head);
    expect(storage.versions.entries.size).toBe(0);
  });

  it("returns pages the caller cannot use to alter the cache", async () => {
    const reader = new SnapshotReader(storage.objects);
    const engine = new ScoreEngine(storage, { reader });
    const result = await engine.commit(score, head.snapshot, [add("A")]);

    const [page] = result.pages;
    if (page) page.image = "changed";

    const slots = await reader.materialize(result.snapshot);
    expect(slots.map((slot) => slot.page.image)).toEqual(["img-A"]);
  });

  it("validates a batch without writing", async () => {
    const engine = new ScoreEngine(storage);
    const putsBefore = storage.objects.putCount;

    await expect(engine.validate(score, head.snapshot, [add("A")])).resolves.toBeUndefined();
    await expect(
      engine.validate(score, head.snapshot, [{ type: "delete_page", index: 0 }]),
    ).rejects.toMatchObject({ kind: "invalid-operation" });
    await expect(engine.validate(score, "stale", [add("A")])).rejects.toMatchObject({
      reason: "stale-parent",
    });

    expect(storage.objects.putCount).toBe(putsBefore);
    expect(await storage.heads.get(score)).toEqual(head);
  });

  it("serves repeated commits from the snapshot cache", async () => {
    const engine = new ScoreEngine(storage);
    const first = await engine.commit(score, head.snapshot, [add("A")]);
    const batchesBefore = storage.objects.batchCount;

    await engine.commit(score, first.snapshot, [add("B")]);

    expect(storage.objects.batchCount).toBe(batchesBefore);
  });

  it("logs store corruption at error level", async () => {
    const error = vi.fn();
    const reader = new SnapshotReader(storage.objects);
    const engine = new ScoreEngine(storage, { logger: { error }, reader });
    storage.objects.objects.delete(head.snapshot);

    await expect(engine.commit(score, head.snapshot, [add("A")])).rejects.toBeInstanceOf(
      ObjectNotFoundError,
    );
    expect(error).toHaveBeenCalledWith(
      "Store corruption: head of u1/s1 references missing objects",
      [head.snapshot],
    );
  });

  it("logs each commit at debug level", async () => {
    const debug = vi.fn();
    const engine = new ScoreEngine(storage, { logger: { debug } });

    const result = await engine.commit(score, head.snapshot, [add("A")]);

    expect(debug).toHaveBeenCalledWith(
      `Committed 1 operation(s) to u1/s1: version 1, snapshot ${result.snapshot}`,
    );
  });

  it("serializes commits that share a lock", async () => {
    const lock = new ScoreLock();
    const engine = new ScoreEngine(storage, { lock });
    const other = new ScoreEngine(storage, { lock });

    const results = await Promise.allSettled([
      engine.commit(score, head.snapshot, [add("A")]),
      other.commit(score, head.snapshot, [add("B")]),
    ]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected"]);
  });
});
