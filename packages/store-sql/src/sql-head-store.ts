/**
 * SQL-based HeadStore implementation
 *
 * Compare-and-swap is a single conditional statement: an UPDATE guarded
 * by the expected hashes, or an INSERT OR IGNORE for a new score. The
 * affected-row count tells whether the swap happened.
 */

import type { HeadStore, HeadUpdateResult, ScoreHead, ScoreId } from "@score-history/core";
import type { DatabaseClient } from "./database-client.js";

interface HeadRow {
  snapshot: string;
  property: string;
}

export class SqlHeadStore implements HeadStore {
  constructor(private readonly db: DatabaseClient) {}

  async get(score: ScoreId): Promise<ScoreHead | undefined> {
    const rows = await this.db.query<HeadRow>(
      "SELECT snapshot, property FROM heads WHERE owner = ? AND score_name = ?",
      [score.owner, score.scoreName],
    );
    const row = rows[0];
    return row ? { snapshot: row.snapshot, property: row.property } : undefined;
  }

  async compareAndSwap(
    score: ScoreId,
    expected: ScoreHead | undefined,
    next: ScoreHead,
  ): Promise<HeadUpdateResult> {
    const result = expected
      ? await this.db.execute(
          `UPDATE heads SET snapshot = ?, property = ?
           WHERE owner = ? AND score_name = ? AND snapshot = ? AND property = ?`,
          [
            next.snapshot,
            next.property,
            score.owner,
            score.scoreName,
            expected.snapshot,
            expected.property,
          ],
        )
      : await this.db.execute(
          "INSERT OR IGNORE INTO heads (owner, score_name, snapshot, property) VALUES (?, ?, ?, ?)",
          [score.owner, score.scoreName, next.snapshot, next.property],
        );

    if (result.changes === 1) {
      return { success: true, previousValue: expected };
    }

    const current = await this.get(score);
    return {
      success: false,
      previousValue: current,
      errorMessage: current ? "Head was modified concurrently" : "Score does not exist",
    };
  }

  async *list(owner?: string): AsyncIterable<ScoreId> {
    const rows =
      owner === undefined
        ? await this.db.query<{ owner: string; score_name: string }>(
            "SELECT owner, score_name FROM heads ORDER BY owner, score_name",
          )
        : await this.db.query<{ owner: string; score_name: string }>(
            "SELECT owner, score_name FROM heads WHERE owner = ? ORDER BY score_name",
            [owner],
          );
    for (const row of rows) {
      yield { owner: row.owner, scoreName: row.score_name };
    }
  }
}
