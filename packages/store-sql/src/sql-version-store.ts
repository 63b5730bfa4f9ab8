/**
 * SQL-based VersionStore implementation
 *
 * The next number is computed inside the INSERT itself, so allocation is
 * atomic per statement and the primary key rejects any duplicate. Discarded
 * rows stay in the table as tombstones so their numbers are never reused.
 */

import type {
  ObjectId,
  ScoreId,
  VersionEntry,
  VersionStore,
  VersionStoreOptions,
} from "@score-history/core";
import {
  DEFAULT_FIRST_VERSION,
  parseVersionLabel,
  VersionNotFoundError,
} from "@score-history/core";
import type { DatabaseClient } from "./database-client.js";

/** Rows fetched per query while listing */
const LIST_PAGE_SIZE = 100;

export class SqlVersionStore implements VersionStore {
  private readonly firstVersion: number;

  constructor(
    private readonly db: DatabaseClient,
    options: VersionStoreOptions = {},
  ) {
    this.firstVersion = options.firstVersion ?? DEFAULT_FIRST_VERSION;
  }

  async recordVersion(score: ScoreId, snapshot: ObjectId): Promise<number> {
    const { lastInsertRowId } = await this.db.execute(
      `INSERT INTO versions (owner, score_name, version, snapshot)
       SELECT ?, ?, COALESCE(MAX(version), ?) + 1, ?
       FROM versions WHERE owner = ? AND score_name = ?`,
      [
        score.owner,
        score.scoreName,
        this.firstVersion - 1,
        snapshot,
        score.owner,
        score.scoreName,
      ],
    );
    const rows = await this.db.query<{ version: number }>(
      "SELECT version FROM versions WHERE rowid = ?",
      [lastInsertRowId],
    );
    const row = rows[0];
    if (!row) {
      throw new Error(`Version row ${lastInsertRowId} vanished after insert`);
    }
    return row.version;
  }

  async discardVersion(score: ScoreId, version: number): Promise<void> {
    await this.db.execute(
      "UPDATE versions SET discarded = 1 WHERE owner = ? AND score_name = ? AND version = ?",
      [score.owner, score.scoreName, version],
    );
  }

  async resolve(score: ScoreId, label: string): Promise<ObjectId> {
    const version = parseVersionLabel(label);
    const rows =
      version === undefined
        ? []
        : await this.db.query<{ snapshot: string }>(
            `SELECT snapshot FROM versions
             WHERE owner = ? AND score_name = ? AND version = ? AND discarded = 0`,
            [score.owner, score.scoreName, version],
          );
    const row = rows[0];
    if (!row) {
      throw new VersionNotFoundError(score, label);
    }
    return row.snapshot;
  }

  async *list(score: ScoreId): AsyncIterable<VersionEntry> {
    let after = Number.MIN_SAFE_INTEGER;
    while (true) {
      const rows = await this.db.query<VersionEntry>(
        `SELECT version, snapshot FROM versions
         WHERE owner = ? AND score_name = ? AND version > ? AND discarded = 0
         ORDER BY version LIMIT ?`,
        [score.owner, score.scoreName, after, LIST_PAGE_SIZE],
      );
      for (const row of rows) {
        yield { version: row.version, snapshot: row.snapshot };
      }
      const last = rows[rows.length - 1];
      if (!last || rows.length < LIST_PAGE_SIZE) return;
      after = last.version;
    }
  }

  async latest(score: ScoreId): Promise<VersionEntry | undefined> {
    const rows = await this.db.query<VersionEntry>(
      `SELECT version, snapshot FROM versions
       WHERE owner = ? AND score_name = ? AND discarded = 0
       ORDER BY version DESC LIMIT 1`,
      [score.owner, score.scoreName],
    );
    const row = rows[0];
    return row ? { version: row.version, snapshot: row.snapshot } : undefined;
  }
}
