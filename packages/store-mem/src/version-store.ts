/**
 * In-memory VersionStore implementation
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
  scoreKey,
  VersionNotFoundError,
} from "@score-history/core";

export class MemoryVersionStore implements VersionStore {
  // Entries per score, ascending; updated synchronously so allocation is atomic
  private versions = new Map<string, VersionEntry[]>();
  // Highest number handed out per score, discarded ones included
  private allocated = new Map<string, number>();
  private readonly firstVersion: number;

  constructor(options: VersionStoreOptions = {}) {
    this.firstVersion = options.firstVersion ?? DEFAULT_FIRST_VERSION;
  }

  async recordVersion(score: ScoreId, snapshot: ObjectId): Promise<number> {
    const key = scoreKey(score);
    let entries = this.versions.get(key);
    if (!entries) {
      entries = [];
      this.versions.set(key, entries);
    }
    const last = this.allocated.get(key);
    const version = last === undefined ? this.firstVersion : last + 1;
    this.allocated.set(key, version);
    entries.push({ version, snapshot });
    return version;
  }

  async discardVersion(score: ScoreId, version: number): Promise<void> {
    const entries = this.versions.get(scoreKey(score));
    const index = entries?.findIndex((e) => e.version === version) ?? -1;
    if (entries && index >= 0) {
      entries.splice(index, 1);
    }
  }

  async resolve(score: ScoreId, label: string): Promise<ObjectId> {
    const version = parseVersionLabel(label);
    const entry =
      version === undefined
        ? undefined
        : this.versions.get(scoreKey(score))?.find((e) => e.version === version);
    if (!entry) {
      throw new VersionNotFoundError(score, label);
    }
    return entry.snapshot;
  }

  async *list(score: ScoreId): AsyncIterable<VersionEntry> {
    const key = scoreKey(score);
    // Resume after the last yielded number: entries recorded or discarded
    // while iterating are picked up or skipped
    let after = Number.NEGATIVE_INFINITY;
    while (true) {
      const next = this.versions.get(key)?.find((e) => e.version > after);
      if (!next) return;
      after = next.version;
      yield { ...next };
    }
  }

  async latest(score: ScoreId): Promise<VersionEntry | undefined> {
    const entries = this.versions.get(scoreKey(score));
    const last = entries?.[entries.length - 1];
    return last ? { ...last } : undefined;
  }
}
