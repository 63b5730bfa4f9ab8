/**
 * Optional logger accepted by engines and stores.
 *
 * Every method is optional so `console`, a structured logger or a partial
 * test spy can be passed as is. Nothing is logged when omitted.
 */
export interface ScoreHistoryLogger {
  debug?: (...args: unknown[]) => void;
  info?: (...args: unknown[]) => void;
  warn?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}
