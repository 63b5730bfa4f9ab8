import { describe, expect, it } from "vitest";
import {
  ConcurrencyConflictError,
  describeError,
  InvalidOperationError,
  isScoreHistoryError,
  NoChangeError,
  ObjectNotFoundError,
  ScoreAlreadyExistsError,
  ScoreNotFoundError,
  UnsupportedOperationError,
  VersionNotFoundError,
} from "../../src/errors/index.js";

const score = { owner: "u1", scoreName: "s1" };

describe("error taxonomy", () => {
  it("formats messages with the score key", () => {
    expect(new ScoreNotFoundError(score).message).toBe("Score u1/s1 not found");
    expect(new VersionNotFoundError(score, "7").message).toBe("Version '7' of score u1/s1 not found");
    expect(new ScoreAlreadyExistsError(score).message).toBe("Score u1/s1 already exists");
  });

  it("describes the conflict", () => {
    const error = new ConcurrencyConflictError(score, "stale-parent", {
      expected: "abc",
      actual: "def",
    });
    expect(error.message).toBe("Stale parent for u1/s1: expected abc, head is def");
    expect(error.name).toBe("ConcurrencyConflictError");
    expect(error.kind).toBe("concurrency-conflict");
  });

  it("keeps the cause of a wrapped error", () => {
    const cause = new Error("timeout");
    const error = new ConcurrencyConflictError(score, "lock-timeout", {}, { cause });
    expect(error.cause).toBe(cause);
    expect(error.message).toBe("Timed out waiting for a concurrent write on u1/s1");
  });

  it("lists missing objects", () => {
    const error = new ObjectNotFoundError(new Set(["a", "b"]));
    expect(error.missing).toEqual(["a", "b"]);
    expect(error.message).toBe("Objects not found: a, b");
  });

  it("treats an existing score as an invalid operation", () => {
    expect(new ScoreAlreadyExistsError(score)).toBeInstanceOf(InvalidOperationError);
  });

  it("recognizes its own errors", () => {
    expect(isScoreHistoryError(new NoChangeError())).toBe(true);
    expect(isScoreHistoryError(new Error("other"))).toBe(false);
    expect(isScoreHistoryError("text")).toBe(false);
  });
});

describe("describeError", () => {
  it("asks the user to refresh on conflicts", () => {
    expect(describeError(new ConcurrencyConflictError(score, "head-moved"))).toEqual({
      category: "conflict",
      message: "The score was changed by someone else. Refresh it and try again.",
      retryable: true,
    });
  });

  it.each([
    [new ScoreNotFoundError(score), "not-found"],
    [new VersionNotFoundError(score, "2"), "not-found"],
    [new InvalidOperationError("bad", 0), "invalid-request"],
    [new ScoreAlreadyExistsError(score), "invalid-request"],
    [new NoChangeError(), "no-change"],
    [new UnsupportedOperationError("rotate_page"), "unsupported"],
    [new Error("boom"), "internal"],
    ["not an error", "internal"],
  ])("maps %s to %s", (error, category) => {
    const description = describeError(error);
    expect(description.category).toBe(category);
    expect(description.retryable).toBe(false);
  });
});
