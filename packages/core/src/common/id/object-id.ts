/**
 * Object identifier (content hash in hex format)
 *
 * SHA-256: 64 lowercase hex characters.
 */
export type ObjectId = string;

/**
 * Reference to binary content (page image or thumbnail) held by a BlobStore.
 * The engine stores and compares these, it never reads the bytes behind them.
 */
export type BlobRef = string;

/**
 * Identity of a score: unique per (owner, scoreName), immutable once created.
 */
export interface ScoreId {
  /** Opaque owner id, resolved by the caller's authentication layer */
  owner: string;
  /** Score name, unique within the owner */
  scoreName: string;
}

/**
 * Hash format constants
 */
export const HashFormat = {
  /** SHA-256 hash string length (hex) */
  OBJECT_ID_STRING_LENGTH: 64,
} as const;

/**
 * Separator between owner and score name in storage keys.
 */
export const SCORE_KEY_SEPARATOR = "/";

/**
 * Storage key of a score (`owner/scoreName`).
 */
export function scoreKey(score: ScoreId): string {
  return `${score.owner}${SCORE_KEY_SEPARATOR}${score.scoreName}`;
}

/**
 * Inverse of scoreKey. Returns undefined for keys without a separator.
 */
export function parseScoreKey(key: string): ScoreId | undefined {
  const index = key.indexOf(SCORE_KEY_SEPARATOR);
  if (index <= 0 || index === key.length - 1) {
    return undefined;
  }
  return { owner: key.slice(0, index), scoreName: key.slice(index + 1) };
}
