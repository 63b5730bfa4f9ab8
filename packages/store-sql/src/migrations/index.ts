/**
 * SQL schema migrations
 *
 * Tracks the applied schema version in `schema_version` and applies
 * pending migrations in order, each in its own transaction.
 */

import type { DatabaseClient } from "../database-client.js";

export interface Migration {
  /** Migration version number (must be sequential) */
  version: number;
  name: string;
  /** SQL statements to apply migration (semicolon-separated) */
  up: string;
}

/**
 * All migrations in order. Append new ones with incrementing versions.
 */
export const migrations: Migration[] = [
  {
    version: 1,
    name: "initial_schema",
    up: `
      CREATE TABLE IF NOT EXISTS objects (
        id TEXT PRIMARY KEY,
        type TEXT NOT NULL,
        content TEXT NOT NULL
      ) WITHOUT ROWID;

      CREATE TABLE IF NOT EXISTS heads (
        owner TEXT NOT NULL,
        score_name TEXT NOT NULL,
        snapshot TEXT NOT NULL,
        property TEXT NOT NULL,
        PRIMARY KEY (owner, score_name)
      ) WITHOUT ROWID;

      CREATE TABLE IF NOT EXISTS versions (
        owner TEXT NOT NULL,
        score_name TEXT NOT NULL,
        version INTEGER NOT NULL,
        snapshot TEXT NOT NULL,
        PRIMARY KEY (owner, score_name, version)
      );

      CREATE TABLE IF NOT EXISTS blobs (
        ref TEXT PRIMARY KEY,
        content BLOB NOT NULL
      ) WITHOUT ROWID
    `,
  },
  {
    version: 2,
    name: "discarded_versions",
    up: `
      ALTER TABLE versions ADD COLUMN discarded INTEGER NOT NULL DEFAULT 0
    `,
  },
];

export async function initializeSchema(db: DatabaseClient): Promise<void> {
  await db.execute(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at INTEGER NOT NULL
    )
  `);

  const currentVersion = await getSchemaVersion(db);

  for (const migration of migrations) {
    if (migration.version > currentVersion) {
      await db.transaction(async (tx) => {
        for (const stmt of splitStatements(migration.up)) {
          await tx.execute(stmt);
        }
        await tx.execute("INSERT INTO schema_version (version, applied_at) VALUES (?, ?)", [
          migration.version,
          Date.now(),
        ]);
      });
    }
  }
}

/**
 * @returns Current version number, or 0 if no migrations have been applied
 */
export async function getSchemaVersion(db: DatabaseClient): Promise<number> {
  const tables = await db.query<{ name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'",
  );
  if (tables.length === 0) return 0;

  const rows = await db.query<{ version: number | null }>(
    "SELECT MAX(version) AS version FROM schema_version",
  );
  return rows[0]?.version ?? 0;
}

function splitStatements(sql: string): string[] {
  return sql
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
