/**
 * Commit model
 *
 * A commit request bundles an ordered list of operations with the hash
 * the caller believes is current. Operations form a closed tagged union;
 * every consumer switches over `type` exhaustively.
 */

import type { BlobRef, ObjectId } from "../common/id/index.js";
import type { Page, ScoreProperty } from "../objects/object-types.js";

/** Append a page to the end of the sequence */
export interface AddPageOperation {
  type: "add_page";
  image: BlobRef;
  thumbnail: BlobRef;
  number: string;
}

/** Insert a page at `index` (0-based, `index <= length`) */
export interface InsertPageOperation {
  type: "insert_page";
  index: number;
  image: BlobRef;
  thumbnail: BlobRef;
  number: string;
}

/** Remove the page at `index` (`index < length`) */
export interface DeletePageOperation {
  type: "delete_page";
  index: number;
}

/** Update property fields; omitted fields keep their current value */
export interface UpdatePropertyOperation {
  type: "update_property";
  title?: string;
  description?: string;
}

export type PageOperation = AddPageOperation | InsertPageOperation | DeletePageOperation;

export type ScoreOperation = PageOperation | UpdatePropertyOperation;

export type ScoreOperationType = ScoreOperation["type"];

export const SCORE_OPERATION_TYPES: readonly ScoreOperationType[] = [
  "add_page",
  "insert_page",
  "delete_page",
  "update_property",
];

/**
 * Request to apply operations against a declared parent snapshot.
 */
export interface CommitRequest {
  /** Snapshot hash the caller read as current head */
  parent: ObjectId;
  /** Operations applied in array order */
  operations: ScoreOperation[];
  /**
   * Property hash the caller read as current. Required when `operations`
   * contains update_property entries, ignored otherwise.
   */
  propertyParent?: ObjectId;
}

/**
 * Request to update the property record against a declared parent.
 */
export interface UpdatePropertyRequest {
  /** Property hash the caller read as current */
  parent: ObjectId;
  /** Fields to override; omitted fields keep their current value */
  property: ScoreProperty;
}

/**
 * Outcome of a successful page commit.
 */
export interface CommitResult {
  /** Hash of the new snapshot (the new head) */
  snapshot: ObjectId;
  /** Version number allocated for the new snapshot */
  version: number;
  /** Final ordered page list */
  pages: Page[];
}

/**
 * Outcome of a successful property update.
 */
export interface PropertyUpdateResult {
  /** Hash of the new property record (the new property head) */
  property: ObjectId;
  /** Merged property content */
  value: ScoreProperty;
}

export function isPageOperation(operation: ScoreOperation): operation is PageOperation {
  return operation.type !== "update_property";
}
