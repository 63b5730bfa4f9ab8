/**
 * Parent-chain traversal
 *
 * Snapshots and property records each form a singly-linked chain through
 * their `parent` hash. Walking is an iterative lookup loop over the flat
 * object store, newest first, ending at the root (parent === null).
 */

import type { ObjectId } from "../common/id/index.js";
import { loadProperty, loadSnapshot } from "../objects/object-batch.js";
import type { ObjectStore } from "../objects/object-store.js";
import type { PropertyObject, SnapshotObject } from "../objects/object-types.js";

export interface ChainEntry<T> {
  id: ObjectId;
  object: T;
}

export interface WalkChainOptions {
  /** Stop after this many entries */
  limit?: number;
}

async function* walk<T extends { parent: ObjectId | null }>(
  load: (id: ObjectId) => Promise<T>,
  start: ObjectId,
  options: WalkChainOptions,
): AsyncGenerator<ChainEntry<T>> {
  const { limit } = options;
  const visited = new Set<ObjectId>();
  let current: ObjectId | null = start;
  let count = 0;

  while (current !== null) {
    if (limit !== undefined && count >= limit) break;
    if (visited.has(current)) {
      throw new Error(`Cycle detected in parent chain at ${current}`);
    }
    visited.add(current);

    const object = await load(current);
    yield { id: current, object };
    count++;
    current = object.parent;
  }
}

/**
 * Walk snapshots from `start` back to the root.
 */
export function walkSnapshots(
  store: ObjectStore,
  start: ObjectId,
  options: WalkChainOptions = {},
): AsyncGenerator<ChainEntry<SnapshotObject>> {
  return walk((id) => loadSnapshot(store, id), start, options);
}

/**
 * Walk property records from `start` back to the root.
 */
export function walkProperties(
  store: ObjectStore,
  start: ObjectId,
  options: WalkChainOptions = {},
): AsyncGenerator<ChainEntry<PropertyObject>> {
  return walk((id) => loadProperty(store, id), start, options);
}
