/**
 * Score Engine - page/version write path
 *
 * Applies an ordered batch of page operations against a declared parent
 * snapshot:
 *
 * 1. load the head (ScoreNotFoundError if absent)
 * 2. validate the declared parent (ConcurrencyConflictError, nothing written)
 * 3. materialize the parent's page list
 * 4. apply operations in order
 * 5. store pages created by the batch; unchanged pages keep their ids
 * 6. store the new snapshot (parent = old head)
 * 7. record the version, then compare-and-swap the head; a lost swap
 *    discards the version again
 *
 * A failure in any step can leave orphan objects behind but never moves
 * the head. The engine does not retry; callers re-read and resubmit.
 */

import { applyPageOperations, type PageSlot } from "../commits/apply-operations.js";
import type { CommitResult, PageOperation } from "../commits/commit-types.js";
import type { ObjectId, ScoreId } from "../common/id/index.js";
import { scoreKey } from "../common/id/index.js";
import {
  ConcurrencyConflictError,
  NoChangeError,
  ObjectNotFoundError,
  ScoreNotFoundError,
} from "../errors/index.js";
import type { HeadUpdateResult, ScoreHead } from "../history/heads/index.js";
import type { ScoreHistoryLogger } from "../logging/index.js";
import { createPageObject } from "../objects/object-types.js";
import type { ScoreStorage } from "../storage/score-storage.js";
import { ScoreLock } from "./score-lock.js";
import { SnapshotReader } from "./snapshot-reader.js";

export interface ScoreEngineOptions {
  logger?: ScoreHistoryLogger;
  /** Lock shared with the property engine (created when omitted) */
  lock?: ScoreLock;
  /** Reader shared with the read path (created when omitted) */
  reader?: SnapshotReader;
}

export class ScoreEngine {
  private readonly lock: ScoreLock;
  private readonly reader: SnapshotReader;
  private readonly logger?: ScoreHistoryLogger;

  constructor(
    private readonly storage: ScoreStorage,
    options: ScoreEngineOptions = {},
  ) {
    this.lock = options.lock ?? new ScoreLock();
    this.reader = options.reader ?? new SnapshotReader(storage.objects);
    this.logger = options.logger;
  }

  /**
   * Apply `operations` on top of `parent`.
   *
   * @param parent Snapshot hash the caller read as current head
   * @throws ScoreNotFoundError, ConcurrencyConflictError,
   * InvalidOperationError, NoChangeError (empty batch)
   */
  async commit(
    score: ScoreId,
    parent: ObjectId,
    operations: readonly PageOperation[],
  ): Promise<CommitResult> {
    if (operations.length === 0) {
      throw new NoChangeError("No page operations to commit");
    }

    return this.lock.run(score, async () => {
      const { head, next } = await this.prepare(score, parent, operations);
      const slots = await this.persistPages(next);

      const snapshot = await this.storage.objects.put({
        type: "snapshot",
        parent: head.snapshot,
        pages: slots.map((slot) => slot.id),
      });

      const version = await this.storage.versions.recordVersion(score, snapshot);
      let update: HeadUpdateResult;
      try {
        update = await this.storage.heads.compareAndSwap(score, head, {
          snapshot,
          property: head.property,
        });
      } catch (error) {
        await this.storage.versions.discardVersion(score, version);
        throw error;
      }
      if (!update.success) {
        await this.storage.versions.discardVersion(score, version);
        throw new ConcurrencyConflictError(score, "head-moved", {
          expected: head.snapshot,
          actual: update.previousValue?.snapshot,
        });
      }

      this.reader.remember(snapshot, slots);

      this.logger?.debug?.(
        `Committed ${operations.length} operation(s) to ${scoreKey(score)}: version ${version}, snapshot ${snapshot}`,
      );

      return { snapshot, version, pages: slots.map((slot) => ({ ...slot.page })) };
    });
  }

  /**
   * Check `operations` against the current head without writing anything.
   *
   * Runs steps 1-4 of a commit outside the lock.
   *
   * @throws ScoreNotFoundError, ConcurrencyConflictError (stale-parent),
   * InvalidOperationError
   */
  async validate(
    score: ScoreId,
    parent: ObjectId,
    operations: readonly PageOperation[],
  ): Promise<void> {
    await this.prepare(score, parent, operations);
  }

  private async prepare(
    score: ScoreId,
    parent: ObjectId,
    operations: readonly PageOperation[],
  ): Promise<{ head: ScoreHead; next: PageSlot[] }> {
    const head = await this.storage.heads.get(score);
    if (!head) {
      throw new ScoreNotFoundError(score);
    }
    if (head.snapshot !== parent) {
      throw new ConcurrencyConflictError(score, "stale-parent", {
        expected: parent,
        actual: head.snapshot,
      });
    }

    const current = await this.materialize(score, head.snapshot);
    return { head, next: applyPageOperations(current, operations) };
  }

  private async materialize(score: ScoreId, snapshot: ObjectId): Promise<readonly PageSlot[]> {
    try {
      return await this.reader.materialize(snapshot);
    } catch (error) {
      if (error instanceof ObjectNotFoundError) {
        this.logger?.error?.(
          `Store corruption: head of ${scoreKey(score)} references missing objects`,
          error.missing,
        );
      }
      throw error;
    }
  }

  /**
   * Store pages that have no id yet. Returns the sequence with every id set.
   */
  private async persistPages(slots: readonly PageSlot[]): Promise<Array<Required<PageSlot>>> {
    return Promise.all(
      slots.map(async (slot) => ({
        id: slot.id ?? (await this.storage.objects.put(createPageObject(slot.page))),
        page: slot.page,
      })),
    );
  }
}
