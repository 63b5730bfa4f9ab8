import type { ObjectId, ScoreId } from "../common/id/index.js";
import { scoreKey } from "../common/id/index.js";
import { ScoreHistoryError } from "./score-history-error.js";

/**
 * Why a write lost the optimistic-concurrency race.
 *
 * - `stale-parent`: the declared parent is not the current head
 * - `head-moved`: the head changed between validation and compare-and-swap
 * - `lock-timeout`: another writer held the score for too long
 */
export type ConflictReason = "stale-parent" | "head-moved" | "lock-timeout";

/**
 * Thrown when a write was based on a state that is no longer current.
 *
 * Recoverable: re-read the head, recompute the edits and submit again.
 * The engine never retries on the caller's behalf.
 */
export class ConcurrencyConflictError extends ScoreHistoryError {
  readonly kind = "concurrency-conflict";
  readonly score: ScoreId;
  readonly reason: ConflictReason;
  /** Parent declared by the caller */
  readonly expected?: ObjectId;
  /** Head found in storage */
  readonly actual?: ObjectId;

  constructor(
    score: ScoreId,
    reason: ConflictReason,
    details: { expected?: ObjectId; actual?: ObjectId } = {},
    options?: ErrorOptions,
  ) {
    super(ConcurrencyConflictError.formatMessage(score, reason, details), options);
    this.name = "ConcurrencyConflictError";
    this.score = score;
    this.reason = reason;
    this.expected = details.expected;
    this.actual = details.actual;
  }

  private static formatMessage(
    score: ScoreId,
    reason: ConflictReason,
    details: { expected?: ObjectId; actual?: ObjectId },
  ): string {
    const key = scoreKey(score);
    switch (reason) {
      case "stale-parent":
        return `Stale parent for ${key}: expected ${details.expected}, head is ${details.actual}`;
      case "head-moved":
        return `Head of ${key} changed concurrently`;
      case "lock-timeout":
        return `Timed out waiting for a concurrent write on ${key}`;
    }
  }
}
