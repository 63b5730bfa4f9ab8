/**
 * Tests for schema migrations
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SqlJsAdapter } from "../src/adapters/sql-js-adapter.js";
import { getSchemaVersion, initializeSchema, migrations } from "../src/migrations/index.js";

describe("Schema Migrations", () => {
  let db: SqlJsAdapter;

  beforeEach(async () => {
    db = await SqlJsAdapter.create();
  });

  afterEach(async () => {
    await db.close();
  });

  it("reports version 0 on an empty database", async () => {
    expect(await getSchemaVersion(db)).toBe(0);
  });

  it("creates every table", async () => {
    await initializeSchema(db);

    const tables = await db.query<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name",
    );
    expect(tables.map((t) => t.name)).toEqual([
      "blobs",
      "heads",
      "objects",
      "schema_version",
      "versions",
    ]);
  });

  it("adds the discarded flag to versions", async () => {
    await initializeSchema(db);

    const columns = await db.query<{ name: string; dflt_value: string }>(
      "PRAGMA table_info(versions)",
    );
    expect(columns.map((c) => c.name)).toEqual([
      "owner",
      "score_name",
      "version",
      "snapshot",
      "discarded",
    ]);
    expect(columns.find((c) => c.name === "discarded")?.dflt_value).toBe("0");
  });

  it("records the latest migration", async () => {
    await initializeSchema(db);
    expect(await getSchemaVersion(db)).toBe(migrations[migrations.length - 1]?.version);
  });

  it("is idempotent", async () => {
    await initializeSchema(db);
    await initializeSchema(db);

    const rows = await db.query<{ count: number }>("SELECT COUNT(*) AS count FROM schema_version");
    expect(rows[0]?.count).toBe(migrations.length);
  });

  it("survives export and reopen", async () => {
    await initializeSchema(db);
    await db.execute("INSERT INTO blobs (ref, content) VALUES (?, ?)", [
      "sha256:test",
      new Uint8Array([1, 2, 3]),
    ]);

    const reopened = await SqlJsAdapter.open(db.export());
    try {
      expect(await getSchemaVersion(reopened)).toBe(2);
      const rows = await reopened.query<{ ref: string }>("SELECT ref FROM blobs");
      expect(rows).toEqual([{ ref: "sha256:test" }]);
    } finally {
      await reopened.close();
    }
  });
});
