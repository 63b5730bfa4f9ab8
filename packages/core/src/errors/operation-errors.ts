import type { ScoreId } from "../common/id/index.js";
import { scoreKey } from "../common/id/index.js";
import { ScoreHistoryError } from "./score-history-error.js";

/**
 * Thrown for malformed requests: out-of-range indices, missing or
 * mistyped payload fields, invalid score names. Never worth retrying.
 */
export class InvalidOperationError extends ScoreHistoryError {
  readonly kind = "invalid-operation";
  /** Position of the offending operation within its batch, when known */
  readonly operationIndex?: number;

  constructor(message: string, operationIndex?: number, options?: ErrorOptions) {
    super(operationIndex === undefined ? message : `Operation #${operationIndex}: ${message}`, options);
    this.name = "InvalidOperationError";
    this.operationIndex = operationIndex;
  }
}

/**
 * Thrown when creating a score that already exists.
 */
export class ScoreAlreadyExistsError extends InvalidOperationError {
  readonly score: ScoreId;

  constructor(score: ScoreId) {
    super(`Score ${scoreKey(score)} already exists`);
    this.name = "ScoreAlreadyExistsError";
    this.score = score;
  }
}

/**
 * Thrown when an update would not change anything (an identical property
 * record, or an empty operation list).
 */
export class NoChangeError extends ScoreHistoryError {
  readonly kind = "no-change";

  constructor(message?: string) {
    super(message ?? "Nothing to change");
    this.name = "NoChangeError";
  }
}

/**
 * Thrown in strict mode for operation kinds the engine does not know.
 */
export class UnsupportedOperationError extends ScoreHistoryError {
  readonly kind = "unsupported-operation";
  readonly operationType: string;
  readonly operationIndex?: number;

  constructor(operationType: string, operationIndex?: number) {
    super(
      operationIndex === undefined
        ? `Unsupported operation '${operationType}'`
        : `Operation #${operationIndex}: unsupported operation '${operationType}'`,
    );
    this.name = "UnsupportedOperationError";
    this.operationType = operationType;
    this.operationIndex = operationIndex;
  }
}
