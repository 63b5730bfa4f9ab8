import { afterEach, describe, expect, it, vi } from "vitest";
import { ScoreLock } from "../../src/engine/score-lock.js";
import { ConcurrencyConflictError } from "../../src/errors/index.js";

const score = { owner: "u1", scoreName: "s1" };

describe("ScoreLock", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("turns a lock timeout into a concurrency conflict", async () => {
    vi.useFakeTimers();
    const lock = new ScoreLock(50);
    let release: () => void = () => {};
    const held = lock.run(
      score,
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );

    const waiting = lock.run(score, async () => "never").catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(50);
    const error = await waiting;

    expect(error).toBeInstanceOf(ConcurrencyConflictError);
    expect(error).toMatchObject({ reason: "lock-timeout" });
    expect(error instanceof Error && error.cause).toBeInstanceOf(Error);

    release();
    await held;
  });

  it("does not block other scores", async () => {
    const lock = new ScoreLock(50);
    let release: () => void = () => {};
    const held = lock.run(
      score,
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );

    await expect(lock.run({ owner: "u1", scoreName: "s2" }, async () => "ok")).resolves.toBe("ok");

    release();
    await held;
  });

  it("passes operation errors through unchanged", async () => {
    const lock = new ScoreLock();
    const failure = new Error("boom");
    await expect(
      lock.run(score, async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);
  });
});
