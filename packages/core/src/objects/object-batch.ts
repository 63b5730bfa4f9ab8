/**
 * Shared helpers for batch resolution
 *
 * Backends fetch the records they have, these helpers enforce the
 * all-or-nothing contract of ObjectStore.getBatch, and the typed loaders
 * check that a resolved id names the kind of object the caller expects.
 */

import type { ObjectId } from "../common/id/index.js";
import { ObjectNotFoundError } from "../errors/index.js";
import type { ObjectStore } from "./object-store.js";
import {
  isPageObject,
  isPropertyObject,
  isSnapshotObject,
  type PageObject,
  type PropertyObject,
  type ScoreObject,
  type ScoreObjectType,
  type SnapshotObject,
} from "./object-types.js";

/**
 * Deduplicate ids, keeping first-seen order.
 */
export function uniqueIds(ids: Iterable<ObjectId>): ObjectId[] {
  return [...new Set(ids)];
}

/**
 * Throw ObjectNotFoundError unless every requested id was found.
 */
export function assertBatchComplete(
  requested: readonly ObjectId[],
  found: Map<ObjectId, ScoreObject>,
): Map<ObjectId, ScoreObject> {
  const missing = requested.filter((id) => !found.has(id));
  if (missing.length > 0) {
    throw new ObjectNotFoundError(missing);
  }
  return found;
}

function expectType<T extends ScoreObject>(
  id: ObjectId,
  object: ScoreObject | undefined,
  type: ScoreObjectType,
  guard: (object: ScoreObject) => object is T,
): T {
  if (!object) {
    throw new ObjectNotFoundError([id]);
  }
  if (!guard(object)) {
    throw new Error(`Object ${id} is a ${object.type}, expected ${type}`);
  }
  return object;
}

export async function loadSnapshot(store: ObjectStore, id: ObjectId): Promise<SnapshotObject> {
  const objects = await store.getBatch([id]);
  return expectType(id, objects.get(id), "snapshot", isSnapshotObject);
}

export async function loadProperty(store: ObjectStore, id: ObjectId): Promise<PropertyObject> {
  const objects = await store.getBatch([id]);
  return expectType(id, objects.get(id), "property", isPropertyObject);
}

/**
 * Resolve page ids in one batch, returning pages in the order of `ids`
 * (repeated ids yield repeated pages).
 */
export async function loadPages(
  store: ObjectStore,
  ids: readonly ObjectId[],
): Promise<PageObject[]> {
  if (ids.length === 0) return [];
  const objects = await store.getBatch(ids);
  return ids.map((id) => expectType(id, objects.get(id), "page", isPageObject));
}
