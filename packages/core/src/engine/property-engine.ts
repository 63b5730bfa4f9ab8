/**
 * Property Engine - property write path
 *
 * Same optimistic-concurrency shape as the Score Engine, over the property
 * chain: validate the declared parent against the current property hash,
 * merge the provided fields into the current record, store it with the old
 * hash as parent and swap the head. The snapshot chain is left untouched.
 */

import type { PropertyUpdateResult, UpdatePropertyRequest } from "../commits/commit-types.js";
import type { ScoreId } from "../common/id/index.js";
import { scoreKey } from "../common/id/index.js";
import {
  ConcurrencyConflictError,
  NoChangeError,
  ObjectNotFoundError,
  ScoreNotFoundError,
} from "../errors/index.js";
import type { ScoreHistoryLogger } from "../logging/index.js";
import { loadProperty } from "../objects/object-batch.js";
import {
  createPropertyObject,
  type PropertyObject,
  type ScoreProperty,
  toScoreProperty,
} from "../objects/object-types.js";
import type { ScoreStorage } from "../storage/score-storage.js";
import { ScoreLock } from "./score-lock.js";

export interface PropertyEngineOptions {
  logger?: ScoreHistoryLogger;
  /** Lock shared with the score engine (created when omitted) */
  lock?: ScoreLock;
}

/**
 * Overlay the fields present in `update` on `current`.
 */
export function mergeProperty(current: ScoreProperty, update: ScoreProperty): ScoreProperty {
  const merged: ScoreProperty = { ...current };
  if (update.title !== undefined) merged.title = update.title;
  if (update.description !== undefined) merged.description = update.description;
  return merged;
}

export function propertiesEqual(a: ScoreProperty, b: ScoreProperty): boolean {
  return a.title === b.title && a.description === b.description;
}

export class PropertyEngine {
  private readonly lock: ScoreLock;
  private readonly logger?: ScoreHistoryLogger;

  constructor(
    private readonly storage: ScoreStorage,
    options: PropertyEngineOptions = {},
  ) {
    this.lock = options.lock ?? new ScoreLock();
    this.logger = options.logger;
  }

  /**
   * Update the property record of a score.
   *
   * @throws ScoreNotFoundError, ConcurrencyConflictError, NoChangeError
   */
  async update(score: ScoreId, request: UpdatePropertyRequest): Promise<PropertyUpdateResult> {
    return this.lock.run(score, async () => {
      const head = await this.storage.heads.get(score);
      if (!head) {
        throw new ScoreNotFoundError(score);
      }
      if (head.property !== request.parent) {
        throw new ConcurrencyConflictError(score, "stale-parent", {
          expected: request.parent,
          actual: head.property,
        });
      }

      const current = toScoreProperty(await this.load(score, head.property));
      const value = mergeProperty(current, request.property);
      if (propertiesEqual(current, value)) {
        throw new NoChangeError("Property is unchanged");
      }

      const property = await this.storage.objects.put(createPropertyObject(value, head.property));
      const update = await this.storage.heads.compareAndSwap(score, head, {
        snapshot: head.snapshot,
        property,
      });
      if (!update.success) {
        throw new ConcurrencyConflictError(score, "head-moved", {
          expected: head.property,
          actual: update.previousValue?.property,
        });
      }

      this.logger?.debug?.(`Updated property of ${scoreKey(score)}: ${property}`);
      return { property, value };
    });
  }

  private async load(score: ScoreId, id: string): Promise<PropertyObject> {
    try {
      return await loadProperty(this.storage.objects, id);
    } catch (error) {
      if (error instanceof ObjectNotFoundError) {
        this.logger?.error?.(
          `Store corruption: property head of ${scoreKey(score)} is missing`,
          error.missing,
        );
      }
      throw error;
    }
  }
}
