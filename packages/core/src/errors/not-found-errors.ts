import type { ObjectId, ScoreId } from "../common/id/index.js";
import { scoreKey } from "../common/id/index.js";
import { ScoreHistoryError } from "./score-history-error.js";

/**
 * Base class for lookups that found nothing.
 */
export class NotFoundError extends ScoreHistoryError {
  readonly kind = "not-found";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

/**
 * Thrown when no head exists for (owner, scoreName).
 */
export class ScoreNotFoundError extends NotFoundError {
  readonly score: ScoreId;

  constructor(score: ScoreId) {
    super(`Score ${scoreKey(score)} not found`);
    this.name = "ScoreNotFoundError";
    this.score = score;
  }
}

/**
 * Thrown when a version label does not name a recorded version.
 */
export class VersionNotFoundError extends NotFoundError {
  readonly score: ScoreId;
  readonly version: string;

  constructor(score: ScoreId, version: string) {
    super(`Version '${version}' of score ${scoreKey(score)} not found`);
    this.name = "VersionNotFoundError";
    this.score = score;
    this.version = version;
  }
}

/**
 * Thrown when referenced objects are missing from the object store.
 *
 * Objects are only ever referenced after they were written, so this
 * indicates store corruption rather than a client mistake.
 */
export class ObjectNotFoundError extends NotFoundError {
  readonly missing: ObjectId[];

  constructor(missing: Iterable<ObjectId>) {
    const ids = [...missing];
    super(`Objects not found: ${ids.join(", ")}`);
    this.name = "ObjectNotFoundError";
    this.missing = ids;
  }
}
