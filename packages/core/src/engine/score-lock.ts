import { KeyedMutex, LockTimeoutError } from "@score-history/utils";

import { type ScoreId, scoreKey } from "../common/id/index.js";
import { ConcurrencyConflictError } from "../errors/index.js";

/**
 * Serializes writes per score within this process.
 *
 * Page commits and property updates share one lock per score because they
 * swap the same head record. Across processes the head store's
 * compare-and-swap remains the serialization point.
 */
export class ScoreLock {
  private readonly mutex: KeyedMutex;

  /**
   * @param timeoutMs Maximum wait for the lock (default: 5000)
   */
  constructor(private readonly timeoutMs = 5000) {
    this.mutex = new KeyedMutex({ timeoutMs });
  }

  /**
   * Run `operation` while holding the score.
   *
   * @throws ConcurrencyConflictError (lock-timeout) when the wait exceeds
   * the timeout; the operation is not run in that case
   */
  async run<T>(score: ScoreId, operation: () => Promise<T>): Promise<T> {
    try {
      return await this.mutex.run(scoreKey(score), operation, this.timeoutMs);
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        throw new ConcurrencyConflictError(score, "lock-timeout", {}, { cause: error });
      }
      throw error;
    }
  }
}
