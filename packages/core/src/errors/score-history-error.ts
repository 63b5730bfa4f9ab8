/**
 * Stable machine-readable error kinds.
 *
 * Each kind maps to one user-facing message category (see describeError),
 * so a UI can tell "refresh and retry" apart from "this request is malformed".
 */
export type ScoreHistoryErrorKind =
  | "not-found"
  | "concurrency-conflict"
  | "invalid-operation"
  | "no-change"
  | "unsupported-operation";

/**
 * Base class for all errors raised by the versioning engine.
 */
export abstract class ScoreHistoryError extends Error {
  abstract readonly kind: ScoreHistoryErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ScoreHistoryError";
  }
}

export function isScoreHistoryError(error: unknown): error is ScoreHistoryError {
  return error instanceof ScoreHistoryError;
}
