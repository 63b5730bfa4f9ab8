/**
 * Version index interface
 *
 * Maps human-facing version numbers to snapshot hashes, per score.
 * Numbers are allocated as `max + 1` (or the first version when empty),
 * never repeat and never decrease. The Score Engine records a version
 * before it swaps the head and discards it when the swap loses, so a
 * discarded number stays allocated and is never handed out again.
 */

import type { ObjectId, ScoreId } from "../../common/id/index.js";

export interface VersionEntry {
  /** Version number (strictly increasing per score) */
  version: number;
  /** Snapshot recorded under this version */
  snapshot: ObjectId;
}

export interface VersionStoreOptions {
  /** Number allocated to the first version of a score (default: 1) */
  firstVersion?: number;
}

export interface VersionStore {
  /**
   * Append a version for `snapshot`
   *
   * Allocation is atomic per score: concurrent callers always receive
   * distinct numbers.
   *
   * @returns The allocated version number
   */
  recordVersion(score: ScoreId, snapshot: ObjectId): Promise<number>;

  /**
   * Withdraw a version whose snapshot never became the head
   *
   * The entry disappears from `resolve`, `list` and `latest`; its number
   * is not reused. Discarding an unknown version does nothing.
   */
  discardVersion(score: ScoreId, version: number): Promise<void>;

  /**
   * Resolve a version label (stringified number) to its snapshot
   *
   * @throws VersionNotFoundError if the label names no recorded version
   */
  resolve(score: ScoreId, label: string): Promise<ObjectId>;

  /**
   * List versions in ascending order
   *
   * Lazy: entries are read while iterating. Every call starts over.
   */
  list(score: ScoreId): AsyncIterable<VersionEntry>;

  /**
   * Most recent version, or undefined when none was recorded
   */
  latest(score: ScoreId): Promise<VersionEntry | undefined>;
}

/**
 * Parse a version label. Only canonical decimal integers are accepted
 * ("7", not "07", "7.0" or " 7").
 */
export function parseVersionLabel(label: string): number | undefined {
  if (!/^(0|[1-9]\d*)$/.test(label)) {
    return undefined;
  }
  const version = Number(label);
  return Number.isSafeInteger(version) ? version : undefined;
}

export const DEFAULT_FIRST_VERSION = 1;
