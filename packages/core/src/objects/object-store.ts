/**
 * Content object store interface
 *
 * Maps content hashes to immutable objects (pages, snapshots, property
 * records). The store is append-only: objects are never mutated or
 * deleted once written, and writing the same content twice is a no-op.
 */

import type { ObjectId } from "../common/id/index.js";
import type { ScoreObject } from "./object-types.js";

export interface ObjectStore {
  /**
   * Store an object under its canonical hash
   *
   * Idempotent: storing content that already exists returns the existing
   * id without writing. Safe to retry.
   *
   * @returns ObjectId (SHA-256 of the canonical form)
   */
  put(object: ScoreObject): Promise<ObjectId>;

  /**
   * Resolve many objects in one round
   *
   * All-or-nothing: when any id is absent the call fails with
   * ObjectNotFoundError listing every missing id.
   *
   * @param ids Ids to resolve (duplicates are resolved once)
   * @returns Map from every requested id to its object
   * @throws ObjectNotFoundError if any id is missing
   */
  getBatch(ids: Iterable<ObjectId>): Promise<Map<ObjectId, ScoreObject>>;

  /**
   * Check if an object exists
   */
  has(id: ObjectId): Promise<boolean>;
}
