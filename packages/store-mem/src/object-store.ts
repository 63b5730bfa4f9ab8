/**
 * In-memory ObjectStore implementation
 *
 * Keeps the canonical JSON of every object in a Map keyed by hash.
 * No persistence - data is lost when the instance is garbage collected.
 */

import type { ObjectId, ObjectStore, ScoreObject } from "@score-history/core";
import {
  assertBatchComplete,
  computeObjectHash,
  deserializeObject,
  serializeObject,
  uniqueIds,
} from "@score-history/core";

export class MemoryObjectStore implements ObjectStore {
  private objects = new Map<ObjectId, string>();

  async put(object: ScoreObject): Promise<ObjectId> {
    const id = await computeObjectHash(object);
    if (!this.objects.has(id)) {
      this.objects.set(id, serializeObject(object));
    }
    return id;
  }

  async getBatch(ids: Iterable<ObjectId>): Promise<Map<ObjectId, ScoreObject>> {
    const requested = uniqueIds(ids);
    const found = new Map<ObjectId, ScoreObject>();
    for (const id of requested) {
      const text = this.objects.get(id);
      if (text !== undefined) {
        // Parse on every read so callers never share mutable instances
        found.set(id, deserializeObject(text));
      }
    }
    return assertBatchComplete(requested, found);
  }

  async has(id: ObjectId): Promise<boolean> {
    return this.objects.has(id);
  }

  /**
   * Number of stored objects (for testing)
   */
  get size(): number {
    return this.objects.size;
  }
}
