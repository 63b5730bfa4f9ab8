/**
 * In-memory HeadStore implementation
 *
 * Compare-and-swap runs without any await between the comparison and the
 * write, so it is atomic on the single JavaScript thread.
 */

import type { HeadStore, HeadUpdateResult, ScoreHead, ScoreId } from "@score-history/core";
import { headsEqual, parseScoreKey, scoreKey } from "@score-history/core";

export class MemoryHeadStore implements HeadStore {
  private heads = new Map<string, ScoreHead>();

  async get(score: ScoreId): Promise<ScoreHead | undefined> {
    const head = this.heads.get(scoreKey(score));
    return head ? { ...head } : undefined;
  }

  async compareAndSwap(
    score: ScoreId,
    expected: ScoreHead | undefined,
    next: ScoreHead,
  ): Promise<HeadUpdateResult> {
    const key = scoreKey(score);
    const current = this.heads.get(key);

    if (!headsEqual(current, expected)) {
      return {
        success: false,
        previousValue: current ? { ...current } : undefined,
        errorMessage: current ? "Head was modified concurrently" : "Score does not exist",
      };
    }

    this.heads.set(key, { snapshot: next.snapshot, property: next.property });
    return { success: true, previousValue: current };
  }

  async *list(owner?: string): AsyncIterable<ScoreId> {
    for (const key of this.heads.keys()) {
      const score = parseScoreKey(key);
      if (score && (owner === undefined || score.owner === owner)) {
        yield score;
      }
    }
  }
}
