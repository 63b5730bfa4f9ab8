/**
 * Snapshot materialization
 *
 * Resolves a snapshot hash into its ordered page list: one batch for the
 * snapshot, one for its pages. Results are cached by snapshot hash; since
 * snapshots are immutable, cache entries never go stale. Pages are copied
 * into and out of the cache, so callers may mutate what they receive.
 */

import { LRUCache } from "@score-history/utils";

import type { PageSlot } from "../commits/apply-operations.js";
import type { ObjectId } from "../common/id/index.js";
import { loadPages, loadSnapshot } from "../objects/object-batch.js";
import type { ObjectStore } from "../objects/object-store.js";
import type { Page } from "../objects/object-types.js";

function copySlots(slots: readonly PageSlot[]): PageSlot[] {
  return slots.map((slot) => ({ id: slot.id, page: copyPage(slot.page) }));
}

function copyPage(page: Page): Page {
  return { image: page.image, thumbnail: page.thumbnail, number: page.number };
}

export class SnapshotReader {
  private readonly cache: LRUCache<ObjectId, readonly PageSlot[]>;

  /**
   * @param cacheSize Number of materialized snapshots kept (default: 64)
   */
  constructor(
    private readonly objects: ObjectStore,
    cacheSize = 64,
  ) {
    this.cache = new LRUCache(cacheSize);
  }

  /**
   * Ordered pages of a snapshot, each with its stored id.
   *
   * @throws ObjectNotFoundError if the snapshot or any page is missing
   */
  async materialize(snapshotId: ObjectId): Promise<readonly PageSlot[]> {
    const cached = this.cache.get(snapshotId);
    if (cached) {
      return copySlots(cached);
    }

    const snapshot = await loadSnapshot(this.objects, snapshotId);
    const pages = await loadPages(this.objects, snapshot.pages);
    const slots: PageSlot[] = pages.map((page, i) => ({
      id: snapshot.pages[i],
      page: copyPage(page),
    }));

    this.cache.set(snapshotId, slots);
    return copySlots(slots);
  }

  /**
   * Seed the cache with a snapshot the caller has just written.
   */
  remember(snapshotId: ObjectId, slots: readonly PageSlot[]): void {
    this.cache.set(snapshotId, copySlots(slots));
  }
}
