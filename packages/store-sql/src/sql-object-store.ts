/**
 * SQL-based ObjectStore implementation
 */

import type { ObjectId, ObjectStore, ScoreObject } from "@score-history/core";
import {
  assertBatchComplete,
  computeObjectHash,
  deserializeObject,
  serializeObject,
  uniqueIds,
} from "@score-history/core";
import type { DatabaseClient } from "./database-client.js";

/** Stay well below SQLite's bound-parameter limit */
const MAX_BATCH_PARAMS = 500;

export class SqlObjectStore implements ObjectStore {
  constructor(private readonly db: DatabaseClient) {}

  async put(object: ScoreObject): Promise<ObjectId> {
    const id = await computeObjectHash(object);
    await this.db.execute("INSERT OR IGNORE INTO objects (id, type, content) VALUES (?, ?, ?)", [
      id,
      object.type,
      serializeObject(object),
    ]);
    return id;
  }

  async getBatch(ids: Iterable<ObjectId>): Promise<Map<ObjectId, ScoreObject>> {
    const requested = uniqueIds(ids);
    const found = new Map<ObjectId, ScoreObject>();

    for (let i = 0; i < requested.length; i += MAX_BATCH_PARAMS) {
      const chunk = requested.slice(i, i + MAX_BATCH_PARAMS);
      const placeholders = chunk.map(() => "?").join(", ");
      const rows = await this.db.query<{ id: string; content: string }>(
        `SELECT id, content FROM objects WHERE id IN (${placeholders})`,
        chunk,
      );
      for (const row of rows) {
        found.set(row.id, deserializeObject(row.content));
      }
    }

    return assertBatchComplete(requested, found);
  }

  async has(id: ObjectId): Promise<boolean> {
    const rows = await this.db.query("SELECT 1 FROM objects WHERE id = ?", [id]);
    return rows.length > 0;
  }
}
