import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SqlJsAdapter } from "../src/adapters/sql-js-adapter.js";

describe("SqlJsAdapter", () => {
  let db: SqlJsAdapter;

  beforeEach(async () => {
    db = await SqlJsAdapter.create();
    await db.execute("CREATE TABLE items (id INTEGER PRIMARY KEY, name TEXT, flag INTEGER)");
  });

  afterEach(async () => {
    await db.close();
  });

  it("reports inserted row ids and affected rows", async () => {
    const first = await db.execute("INSERT INTO items (name) VALUES (?)", ["a"]);
    const second = await db.execute("INSERT INTO items (name) VALUES (?)", ["b"]);
    const update = await db.execute("UPDATE items SET name = ?", ["c"]);

    expect(first).toEqual({ lastInsertRowId: 1, changes: 1 });
    expect(second.lastInsertRowId).toBe(2);
    expect(update.changes).toBe(2);
  });

  it("converts booleans and undefined parameters", async () => {
    await db.execute("INSERT INTO items (name, flag) VALUES (?, ?)", [undefined, true]);

    const rows = await db.query<{ name: string | null; flag: number }>(
      "SELECT name, flag FROM items",
    );
    expect(rows).toEqual([{ name: null, flag: 1 }]);
  });

  it("rolls back a failed transaction", async () => {
    await expect(
      db.transaction(async (tx) => {
        await tx.execute("INSERT INTO items (name) VALUES (?)", ["a"]);
        throw new Error("abort");
      }),
    ).rejects.toThrow("abort");

    expect(await db.query("SELECT * FROM items")).toEqual([]);
  });

  it("commits a successful transaction", async () => {
    const result = await db.transaction(async (tx) => {
      await tx.execute("INSERT INTO items (name) VALUES (?)", ["a"]);
      return "done";
    });

    expect(result).toBe("done");
    expect(await db.query("SELECT name FROM items")).toEqual([{ name: "a" }]);
  });
});
