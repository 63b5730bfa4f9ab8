/**
 * Head store interface
 *
 * The head is the only mutable record of a score: it names the current
 * snapshot and the current property record. Everything it points to is
 * immutable. Updates go through compare-and-swap so that a writer whose
 * view is stale cannot overwrite a concurrent change.
 */

import type { ObjectId, ScoreId } from "../../common/id/index.js";

export interface ScoreHead {
  /** Current snapshot hash */
  snapshot: ObjectId;
  /** Current property hash */
  property: ObjectId;
}

/**
 * Result of a compare-and-swap update operation
 */
export interface HeadUpdateResult {
  success: boolean;
  /** Head found in storage when the update was attempted */
  previousValue?: ScoreHead;
  errorMessage?: string;
}

export interface HeadStore {
  /**
   * Read the head of a score
   *
   * @returns The head, or undefined if the score does not exist
   */
  get(score: ScoreId): Promise<ScoreHead | undefined>;

  /**
   * Compare-and-swap update
   *
   * Atomically replaces the head only if it currently equals `expected`
   * (field by field). Pass `undefined` to create a head that must not
   * exist yet.
   */
  compareAndSwap(
    score: ScoreId,
    expected: ScoreHead | undefined,
    next: ScoreHead,
  ): Promise<HeadUpdateResult>;

  /**
   * List scores that have a head, optionally limited to one owner
   */
  list(owner?: string): AsyncIterable<ScoreId>;
}

export function headsEqual(a: ScoreHead | undefined, b: ScoreHead | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined) return false;
  return a.snapshot === b.snapshot && a.property === b.property;
}
