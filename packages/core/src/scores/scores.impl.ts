import { toArray } from "@score-history/utils";

import type {
  CommitRequest,
  PageOperation,
  PropertyUpdateResult,
  ScoreOperation,
  UpdatePropertyRequest,
} from "../commits/commit-types.js";
import { parseCommitRequest } from "../commits/parse-commit.js";
import { SCORE_KEY_SEPARATOR, type ScoreId, scoreKey } from "../common/id/index.js";
import { mergeProperty, PropertyEngine } from "../engine/property-engine.js";
import { ScoreEngine } from "../engine/score-engine.js";
import { ScoreLock } from "../engine/score-lock.js";
import { SnapshotReader } from "../engine/snapshot-reader.js";
import {
  InvalidOperationError,
  NoChangeError,
  ScoreAlreadyExistsError,
  ScoreNotFoundError,
  UnsupportedOperationError,
} from "../errors/index.js";
import type { ScoreHead } from "../history/heads/head-store.js";
import type { VersionEntry } from "../history/versions/version-store.js";
import {
  type ChainEntry,
  type WalkChainOptions,
  walkProperties,
  walkSnapshots,
} from "../history/walk-chain.js";
import type { ScoreHistoryLogger } from "../logging/logger.js";
import { loadProperty } from "../objects/object-batch.js";
import {
  createPropertyObject,
  type Page,
  type PropertyObject,
  type ScoreProperty,
  type SnapshotObject,
  toScoreProperty,
} from "../objects/object-types.js";
import type { ScoreStorage } from "../storage/score-storage.js";
import type {
  ScoreCommitResult,
  ScoreDetail,
  Scores,
  ScoreSummary,
  ScoresOptions,
} from "./scores.js";

/**
 * Check owner and score name before a score is created.
 *
 * @throws InvalidOperationError for empty names or names containing "/"
 */
export function validateScoreId(score: ScoreId): void {
  for (const [field, value] of [
    ["owner", score.owner],
    ["scoreName", score.scoreName],
  ] as const) {
    if (typeof value !== "string" || value.length === 0) {
      throw new InvalidOperationError(`${field} must be a non-empty string`);
    }
    if (value.includes(SCORE_KEY_SEPARATOR)) {
      throw new InvalidOperationError(`${field} must not contain '${SCORE_KEY_SEPARATOR}'`);
    }
  }
}

interface PartitionedOperations {
  pageOperations: PageOperation[];
  propertyUpdate?: ScoreProperty;
}

export class ScoresImpl implements Scores {
  private readonly reader: SnapshotReader;
  private readonly scoreEngine: ScoreEngine;
  private readonly propertyEngine: PropertyEngine;
  private readonly logger?: ScoreHistoryLogger;
  private readonly strict: boolean;

  constructor(
    readonly storage: ScoreStorage,
    options: ScoresOptions = {},
  ) {
    const { logger, strictOperations = true, lockTimeoutMs = 5000, snapshotCacheSize = 64 } =
      options;
    const lock = new ScoreLock(lockTimeoutMs);
    this.logger = logger;
    this.strict = strictOperations;
    this.reader = new SnapshotReader(storage.objects, snapshotCacheSize);
    this.scoreEngine = new ScoreEngine(storage, { logger, lock, reader: this.reader });
    this.propertyEngine = new PropertyEngine(storage, { logger, lock });
  }

  async createScore(score: ScoreId, property: ScoreProperty = {}): Promise<ScoreDetail> {
    validateScoreId(score);

    const propertyObject = createPropertyObject(property, null);
    const propertyId = await this.storage.objects.put(propertyObject);
    const snapshotId = await this.storage.objects.put({ type: "snapshot", parent: null, pages: [] });
    const head: ScoreHead = { snapshot: snapshotId, property: propertyId };

    const result = await this.storage.heads.compareAndSwap(score, undefined, head);
    if (!result.success) {
      throw new ScoreAlreadyExistsError(score);
    }

    this.logger?.info?.(`Created score ${scoreKey(score)}`);
    return {
      summary: {
        owner: score.owner,
        scoreName: score.scoreName,
        property: toScoreProperty(propertyObject),
      },
      head,
      versions: [],
    };
  }

  async getScore(score: ScoreId): Promise<ScoreDetail> {
    const head = await this.getHead(score);
    const property = await loadProperty(this.storage.objects, head.property);
    const versions = await toArray(this.storage.versions.list(score));

    return {
      summary: {
        owner: score.owner,
        scoreName: score.scoreName,
        property: toScoreProperty(property),
      },
      head,
      versions: versions.map((entry) => String(entry.version)),
    };
  }

  async listScores(owner?: string): Promise<ScoreSummary[]> {
    const entries: Array<{ score: ScoreId; head: ScoreHead }> = [];
    for await (const score of this.storage.heads.list(owner)) {
      const head = await this.storage.heads.get(score);
      if (head) {
        entries.push({ score, head });
      }
    }
    if (entries.length === 0) return [];

    const objects = await this.storage.objects.getBatch(entries.map((e) => e.head.property));
    const summaries: ScoreSummary[] = [];
    for (const { score, head } of entries) {
      const object = objects.get(head.property);
      summaries.push({
        owner: score.owner,
        scoreName: score.scoreName,
        property: object?.type === "property" ? toScoreProperty(object) : {},
      });
    }
    return summaries;
  }

  async getHead(score: ScoreId): Promise<ScoreHead> {
    const head = await this.storage.heads.get(score);
    if (!head) {
      throw new ScoreNotFoundError(score);
    }
    return head;
  }

  async getPages(score: ScoreId, version?: string): Promise<Page[]> {
    const head = await this.getHead(score);
    const snapshot =
      version === undefined ? head.snapshot : await this.storage.versions.resolve(score, version);
    const slots = await this.reader.materialize(snapshot);
    return slots.map((slot) => ({ ...slot.page }));
  }

  async *listVersions(score: ScoreId): AsyncGenerator<VersionEntry> {
    await this.getHead(score);
    yield* this.storage.versions.list(score);
  }

  async commit(score: ScoreId, request: CommitRequest): Promise<ScoreCommitResult> {
    const { pageOperations, propertyUpdate } = this.partition(request.operations);
    if (pageOperations.length === 0 && propertyUpdate === undefined) {
      throw new NoChangeError("No operations to commit");
    }

    const result: ScoreCommitResult = {};

    if (propertyUpdate !== undefined) {
      if (request.propertyParent === undefined) {
        throw new InvalidOperationError("propertyParent is required for update_property operations");
      }
      if (pageOperations.length > 0) {
        // Reject a stale parent or invalid page operation before the property chain moves.
        await this.scoreEngine.validate(score, request.parent, pageOperations);
      }
      result.property = await this.propertyEngine.update(score, {
        parent: request.propertyParent,
        property: propertyUpdate,
      });
    }

    if (pageOperations.length > 0) {
      result.pages = await this.scoreEngine.commit(score, request.parent, pageOperations);
    }

    return result;
  }

  async commitPayload(score: ScoreId, payload: unknown): Promise<ScoreCommitResult> {
    const request = parseCommitRequest(payload, { strict: this.strict, logger: this.logger });
    return this.commit(score, request);
  }

  async updateProperty(
    score: ScoreId,
    request: UpdatePropertyRequest,
  ): Promise<PropertyUpdateResult> {
    return this.propertyEngine.update(score, request);
  }

  async *getSnapshotHistory(
    score: ScoreId,
    options: WalkChainOptions = {},
  ): AsyncGenerator<ChainEntry<SnapshotObject>> {
    const head = await this.getHead(score);
    yield* walkSnapshots(this.storage.objects, head.snapshot, options);
  }

  async *getPropertyHistory(
    score: ScoreId,
    options: WalkChainOptions = {},
  ): AsyncGenerator<ChainEntry<PropertyObject>> {
    const head = await this.getHead(score);
    yield* walkProperties(this.storage.objects, head.property, options);
  }

  /**
   * Split a mixed batch into page operations (order kept) and one merged
   * property update.
   */
  private partition(operations: readonly ScoreOperation[]): PartitionedOperations {
    const pageOperations: PageOperation[] = [];
    let propertyUpdate: ScoreProperty | undefined;

    operations.forEach((operation, i) => {
      switch (operation.type) {
        case "add_page":
        case "insert_page":
        case "delete_page":
          pageOperations.push(operation);
          break;
        case "update_property":
          propertyUpdate = mergeProperty(propertyUpdate ?? {}, {
            title: operation.title,
            description: operation.description,
          });
          break;
        default: {
          const unhandled: never = operation;
          this.rejectUnknown(unhandled, i);
        }
      }
    });

    return { pageOperations, propertyUpdate };
  }

  private rejectUnknown(operation: { type?: unknown }, operationIndex: number): void {
    const type = String(operation.type);
    if (this.strict) {
      throw new UnsupportedOperationError(type, operationIndex);
    }
    this.logger?.warn?.(`Dropping unsupported operation #${operationIndex} '${type}'`);
  }
}
