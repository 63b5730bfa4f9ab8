import type { ScoreStorage } from "../storage/score-storage.js";
import { ScoresImpl } from "./scores.impl.js";
import type { Scores, ScoresOptions } from "./scores.js";

/**
 * Create a Scores instance over a storage backend.
 *
 * @example
 * ```typescript
 * const scores = createScores(createMemoryScoreStorage(), { logger: console });
 * const { head } = await scores.createScore({ owner: "u1", scoreName: "s1" }, { title: "Sonata" });
 * await scores.commit({ owner: "u1", scoreName: "s1" }, {
 *   parent: head.snapshot,
 *   operations: [{ type: "add_page", image: "img-1", thumbnail: "thumb-1", number: "1" }],
 * });
 * ```
 */
export function createScores(storage: ScoreStorage, options: ScoresOptions = {}): Scores {
  return new ScoresImpl(storage, options);
}
