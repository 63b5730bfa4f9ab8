/**
 * KV-based VersionStore implementation
 *
 * Key layout per score:
 * - `version-counter:<owner>/<scoreName>` - last allocated number (decimal text)
 * - `version:<owner>/<scoreName>/<zero-padded number>` - snapshot hash
 *
 * Numbers are allocated by compare-and-swap on the counter, so concurrent
 * writers (even across processes sharing the backend) never receive the
 * same number. The entry is written after the counter moves; readers only
 * trust entries, never the counter.
 */

import type {
  ObjectId,
  ScoreId,
  VersionEntry,
  VersionStore,
  VersionStoreOptions,
} from "@score-history/core";
import {
  DEFAULT_FIRST_VERSION,
  parseVersionLabel,
  SCORE_KEY_SEPARATOR,
  scoreKey,
  VersionNotFoundError,
} from "@score-history/core";
import { decodeText, encodeText, type KVStore } from "./kv-store.js";

const COUNTER_PREFIX = "version-counter:";
const VERSION_PREFIX = "version:";
const VERSION_KEY_WIDTH = 12;

export interface KVVersionStoreOptions extends VersionStoreOptions {
  /** Attempts at the counter swap before giving up (default: 16) */
  maxRetries?: number;
}

export class KVVersionStore implements VersionStore {
  private readonly firstVersion: number;
  private readonly maxRetries: number;

  constructor(
    private readonly kv: KVStore,
    options: KVVersionStoreOptions = {},
  ) {
    this.firstVersion = options.firstVersion ?? DEFAULT_FIRST_VERSION;
    this.maxRetries = options.maxRetries ?? 16;
  }

  async recordVersion(score: ScoreId, snapshot: ObjectId): Promise<number> {
    const counterKey = `${COUNTER_PREFIX}${scoreKey(score)}`;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      const current = await this.kv.get(counterKey);
      const version = current ? Number(decodeText(current)) + 1 : this.firstVersion;
      if (await this.kv.compareAndSwap(counterKey, current, encodeText(String(version)))) {
        await this.kv.set(this.entryKey(score, version), encodeText(snapshot));
        return version;
      }
    }

    throw new Error(
      `Could not allocate a version for ${scoreKey(score)} after ${this.maxRetries} attempts`,
    );
  }

  async discardVersion(score: ScoreId, version: number): Promise<void> {
    await this.kv.delete(this.entryKey(score, version));
  }

  async resolve(score: ScoreId, label: string): Promise<ObjectId> {
    const version = parseVersionLabel(label);
    const data =
      version === undefined ? undefined : await this.kv.get(this.entryKey(score, version));
    if (!data) {
      throw new VersionNotFoundError(score, label);
    }
    return decodeText(data);
  }

  async *list(score: ScoreId): AsyncIterable<VersionEntry> {
    const prefix = this.entryPrefix(score);
    for (const key of await this.entryKeys(prefix)) {
      const data = await this.kv.get(key);
      if (data) {
        yield { version: Number(key.slice(prefix.length)), snapshot: decodeText(data) };
      }
    }
  }

  async latest(score: ScoreId): Promise<VersionEntry | undefined> {
    const prefix = this.entryPrefix(score);
    // Newest first; an entry whose number is still being written is skipped
    for (const key of (await this.entryKeys(prefix)).reverse()) {
      const data = await this.kv.get(key);
      if (data) {
        return { version: Number(key.slice(prefix.length)), snapshot: decodeText(data) };
      }
    }
    return undefined;
  }

  private async entryKeys(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    for await (const key of this.kv.list(prefix)) {
      keys.push(key);
    }
    // Zero-padded numbers sort lexicographically in numeric order
    return keys.sort();
  }

  private entryPrefix(score: ScoreId): string {
    // The separator cannot occur in a score name, so prefixes never overlap
    return `${VERSION_PREFIX}${scoreKey(score)}${SCORE_KEY_SEPARATOR}`;
  }

  private entryKey(score: ScoreId, version: number): string {
    return `${this.entryPrefix(score)}${String(version).padStart(VERSION_KEY_WIDTH, "0")}`;
  }
}
