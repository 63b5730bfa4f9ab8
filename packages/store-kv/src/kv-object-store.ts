/**
 * KV-based ObjectStore implementation
 *
 * Each object is stored under `object:<hash>` as canonical JSON bytes.
 */

import type { ObjectId, ObjectStore, ScoreObject } from "@score-history/core";
import {
  assertBatchComplete,
  computeObjectHash,
  deserializeObjectBytes,
  serializeObjectBytes,
  uniqueIds,
} from "@score-history/core";
import type { KVStore } from "./kv-store.js";

const OBJECT_PREFIX = "object:";

export class KVObjectStore implements ObjectStore {
  constructor(private readonly kv: KVStore) {}

  async put(object: ScoreObject): Promise<ObjectId> {
    const id = await computeObjectHash(object);
    const key = `${OBJECT_PREFIX}${id}`;
    // Content-addressed: an existing entry already holds the same bytes
    if (!(await this.kv.has(key))) {
      await this.kv.set(key, serializeObjectBytes(object));
    }
    return id;
  }

  async getBatch(ids: Iterable<ObjectId>): Promise<Map<ObjectId, ScoreObject>> {
    const requested = uniqueIds(ids);
    const values = await this.kv.getMany(requested.map((id) => `${OBJECT_PREFIX}${id}`));
    const found = new Map<ObjectId, ScoreObject>();
    for (const id of requested) {
      const data = values.get(`${OBJECT_PREFIX}${id}`);
      if (data) {
        found.set(id, deserializeObjectBytes(data));
      }
    }
    return assertBatchComplete(requested, found);
  }

  async has(id: ObjectId): Promise<boolean> {
    return this.kv.has(`${OBJECT_PREFIX}${id}`);
  }
}
