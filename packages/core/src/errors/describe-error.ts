import { ScoreHistoryError, type ScoreHistoryErrorKind } from "./score-history-error.js";

/**
 * User-facing error categories.
 */
export type ErrorCategory =
  | "not-found"
  | "conflict"
  | "invalid-request"
  | "no-change"
  | "unsupported"
  | "internal";

export interface ErrorDescription {
  category: ErrorCategory;
  /** Stable message suitable for display */
  message: string;
  /** Whether re-reading the current state and resubmitting can succeed */
  retryable: boolean;
}

const CATEGORY_BY_KIND: Record<ScoreHistoryErrorKind, ErrorCategory> = {
  "not-found": "not-found",
  "concurrency-conflict": "conflict",
  "invalid-operation": "invalid-request",
  "no-change": "no-change",
  "unsupported-operation": "unsupported",
};

const DESCRIPTIONS: Record<ErrorCategory, ErrorDescription> = {
  "not-found": {
    category: "not-found",
    message: "The requested score or version does not exist.",
    retryable: false,
  },
  conflict: {
    category: "conflict",
    message: "The score was changed by someone else. Refresh it and try again.",
    retryable: true,
  },
  "invalid-request": {
    category: "invalid-request",
    message: "The request is malformed and cannot be applied.",
    retryable: false,
  },
  "no-change": {
    category: "no-change",
    message: "There are no changes to save.",
    retryable: false,
  },
  unsupported: {
    category: "unsupported",
    message: "The request contains an operation that is not supported.",
    retryable: false,
  },
  internal: {
    category: "internal",
    message: "An unexpected error occurred.",
    retryable: false,
  },
};

/**
 * Map any thrown value to its user-facing category and message.
 */
export function describeError(error: unknown): ErrorDescription {
  if (error instanceof ScoreHistoryError) {
    return DESCRIPTIONS[CATEGORY_BY_KIND[error.kind]];
  }
  return DESCRIPTIONS.internal;
}
