/**
 * Scores - public entry point of the versioning engine
 *
 * Combines the read path (heads, versions, page lists) with the two write
 * paths (page commits and property updates). Every write follows the
 * optimistic-concurrency contract: the caller declares the hash it read as
 * current and the write fails with ConcurrencyConflictError if that hash
 * is no longer the head.
 *
 * Use createScores() to build an instance over a ScoreStorage backend.
 */

import type {
  CommitRequest,
  CommitResult,
  PropertyUpdateResult,
  UpdatePropertyRequest,
} from "../commits/commit-types.js";
import type { ScoreId } from "../common/id/index.js";
import type { ScoreHead } from "../history/heads/head-store.js";
import type { VersionEntry } from "../history/versions/version-store.js";
import type { ChainEntry, WalkChainOptions } from "../history/walk-chain.js";
import type { ScoreHistoryLogger } from "../logging/logger.js";
import type {
  Page,
  PropertyObject,
  ScoreProperty,
  SnapshotObject,
} from "../objects/object-types.js";
import type { ScoreStorage } from "../storage/score-storage.js";

export interface ScoreSummary {
  owner: string;
  scoreName: string;
  property: ScoreProperty;
}

export interface ScoreDetail {
  summary: ScoreSummary;
  /** Current hashes; pass them back as `parent` when writing */
  head: ScoreHead;
  /** Recorded version labels, ascending */
  versions: string[];
}

/**
 * Outcome of Scores.commit. Each part is present when the batch carried
 * operations for that chain.
 */
export interface ScoreCommitResult {
  pages?: CommitResult;
  property?: PropertyUpdateResult;
}

export interface Scores {
  /** Backend the instance works on */
  readonly storage: ScoreStorage;

  /**
   * Create a score with an empty page list and the given property.
   * No version is recorded until the first commit.
   *
   * @throws ScoreAlreadyExistsError, InvalidOperationError (bad name)
   */
  createScore(score: ScoreId, property?: ScoreProperty): Promise<ScoreDetail>;

  /**
   * @throws ScoreNotFoundError
   */
  getScore(score: ScoreId): Promise<ScoreDetail>;

  /**
   * Summaries of all scores, or of one owner's scores.
   */
  listScores(owner?: string): Promise<ScoreSummary[]>;

  /**
   * @throws ScoreNotFoundError
   */
  getHead(score: ScoreId): Promise<ScoreHead>;

  /**
   * Ordered pages of a version, or of the current head when `version`
   * is omitted.
   *
   * @throws ScoreNotFoundError, VersionNotFoundError
   */
  getPages(score: ScoreId, version?: string): Promise<Page[]>;

  /**
   * Versions in ascending order. Lazy and restartable.
   */
  listVersions(score: ScoreId): AsyncIterable<VersionEntry>;

  /**
   * Apply a batch of operations.
   *
   * Page operations are committed against `request.parent`. update_property
   * operations are merged in order and applied to the independent property
   * chain against `request.propertyParent`. The page operations are checked
   * against the head first, so a stale parent or an invalid page operation
   * leaves both chains untouched. The property update then lands before the
   * page commit and is not rolled back if a concurrent writer moves the
   * head in between.
   */
  commit(score: ScoreId, request: CommitRequest): Promise<ScoreCommitResult>;

  /**
   * Validate an untyped request body and commit it.
   */
  commitPayload(score: ScoreId, payload: unknown): Promise<ScoreCommitResult>;

  /**
   * @throws ScoreNotFoundError, ConcurrencyConflictError, NoChangeError
   */
  updateProperty(score: ScoreId, request: UpdatePropertyRequest): Promise<PropertyUpdateResult>;

  /**
   * Snapshots from the head back to the root, newest first.
   */
  getSnapshotHistory(
    score: ScoreId,
    options?: WalkChainOptions,
  ): AsyncIterable<ChainEntry<SnapshotObject>>;

  /**
   * Property records from the head back to the root, newest first.
   */
  getPropertyHistory(
    score: ScoreId,
    options?: WalkChainOptions,
  ): AsyncIterable<ChainEntry<PropertyObject>>;
}

/**
 * Configuration of a Scores instance
 */
export interface ScoresOptions {
  /** Logger for commits, dropped operations and store corruption */
  logger?: ScoreHistoryLogger;
  /**
   * Reject unknown operation types with UnsupportedOperationError
   * (default: true). When false they are dropped with a warning.
   */
  strictOperations?: boolean;
  /** Maximum wait for a concurrent write on the same score (default: 5000) */
  lockTimeoutMs?: number;
  /** Number of materialized snapshots kept in memory (default: 64) */
  snapshotCacheSize?: number;
}
