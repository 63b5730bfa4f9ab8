/**
 * KV-based HeadStore implementation
 *
 * Heads are stored as compact JSON under `head:<owner>/<scoreName>` and
 * swapped through KVStore.compareAndSwap. The expected value is encoded
 * the same way the stored one was, so byte equality matches head equality.
 */

import type { HeadStore, HeadUpdateResult, ScoreHead, ScoreId } from "@score-history/core";
import { parseScoreKey, SCORE_KEY_SEPARATOR, scoreKey } from "@score-history/core";
import { z } from "zod";
import { decodeText, encodeText, type KVStore } from "./kv-store.js";

const HEAD_PREFIX = "head:";

/**
 * Serialized head format
 */
const serializedHeadSchema = z.object({
  s: z.string(), // snapshot
  p: z.string(), // property
});

function encodeHead(head: ScoreHead): Uint8Array {
  return encodeText(JSON.stringify({ s: head.snapshot, p: head.property }));
}

function decodeHead(data: Uint8Array): ScoreHead {
  const result = serializedHeadSchema.safeParse(JSON.parse(decodeText(data)));
  if (!result.success) {
    throw new Error(`Malformed head record: ${result.error.message}`);
  }
  return { snapshot: result.data.s, property: result.data.p };
}

export class KVHeadStore implements HeadStore {
  constructor(private readonly kv: KVStore) {}

  async get(score: ScoreId): Promise<ScoreHead | undefined> {
    const data = await this.kv.get(`${HEAD_PREFIX}${scoreKey(score)}`);
    return data ? decodeHead(data) : undefined;
  }

  async compareAndSwap(
    score: ScoreId,
    expected: ScoreHead | undefined,
    next: ScoreHead,
  ): Promise<HeadUpdateResult> {
    const key = `${HEAD_PREFIX}${scoreKey(score)}`;
    const success = await this.kv.compareAndSwap(
      key,
      expected ? encodeHead(expected) : undefined,
      encodeHead(next),
    );
    if (success) {
      return { success: true, previousValue: expected };
    }

    const current = await this.kv.get(key);
    return {
      success: false,
      previousValue: current ? decodeHead(current) : undefined,
      errorMessage: current ? "Head was modified concurrently" : "Score does not exist",
    };
  }

  async *list(owner?: string): AsyncIterable<ScoreId> {
    const prefix =
      owner === undefined ? HEAD_PREFIX : `${HEAD_PREFIX}${owner}${SCORE_KEY_SEPARATOR}`;
    for await (const key of this.kv.list(prefix)) {
      const score = parseScoreKey(key.slice(HEAD_PREFIX.length));
      if (score) {
        yield score;
      }
    }
  }
}
