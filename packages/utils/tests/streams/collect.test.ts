import { describe, expect, it } from "vitest";
import { toArray } from "../../src/streams/index.js";

async function* numbers(count: number): AsyncGenerator<number> {
  for (let i = 0; i < count; i++) {
    yield i;
  }
}

describe("toArray", () => {
  it("collects async iterables in order", async () => {
    expect(await toArray(numbers(3))).toEqual([0, 1, 2]);
  });

  it("accepts sync iterables", async () => {
    expect(await toArray(new Set(["a", "b"]))).toEqual(["a", "b"]);
  });

  it("returns an empty array for empty input", async () => {
    expect(await toArray(numbers(0))).toEqual([]);
  });
});
