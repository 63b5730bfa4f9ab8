/**
 * Page operation application
 *
 * Pure transformation of an ordered page list. Each operation sees the
 * sequence produced by the previous one in the same batch, so indices are
 * relative to intermediate state. Input arrays are never mutated.
 */

import type { ObjectId } from "../common/id/index.js";
import { InvalidOperationError, UnsupportedOperationError } from "../errors/index.js";
import type { Page } from "../objects/object-types.js";
import type { PageOperation } from "./commit-types.js";

/**
 * One position of a page sequence being edited.
 *
 * Pages loaded from a snapshot carry their stored id; pages created by
 * add/insert have none until they are persisted.
 */
export interface PageSlot {
  id?: ObjectId;
  page: Page;
}

function checkIndex(index: unknown, operationIndex: number): number {
  if (typeof index !== "number" || !Number.isInteger(index) || index < 0) {
    throw new InvalidOperationError(
      `index must be a non-negative integer, got ${String(index)}`,
      operationIndex,
    );
  }
  return index;
}

function toPage(operation: { image: string; thumbnail: string; number: string }): Page {
  return { image: operation.image, thumbnail: operation.thumbnail, number: operation.number };
}

function unsupported(operation: { type?: unknown }, operationIndex: number): Error {
  return new UnsupportedOperationError(String(operation.type), operationIndex);
}

/**
 * Apply one operation, returning a new sequence.
 *
 * @param operationIndex Position of the operation in its batch (for errors)
 * @throws InvalidOperationError for out-of-range indices
 */
export function applyPageOperation(
  slots: readonly PageSlot[],
  operation: PageOperation,
  operationIndex = 0,
): PageSlot[] {
  switch (operation.type) {
    case "add_page":
      return [...slots, { page: toPage(operation) }];

    case "insert_page": {
      const index = checkIndex(operation.index, operationIndex);
      if (index > slots.length) {
        throw new InvalidOperationError(
          `insert index ${index} is out of range for ${slots.length} pages`,
          operationIndex,
        );
      }
      return [...slots.slice(0, index), { page: toPage(operation) }, ...slots.slice(index)];
    }

    case "delete_page": {
      const index = checkIndex(operation.index, operationIndex);
      if (index >= slots.length) {
        throw new InvalidOperationError(
          `delete index ${index} is out of range for ${slots.length} pages`,
          operationIndex,
        );
      }
      return [...slots.slice(0, index), ...slots.slice(index + 1)];
    }

    default: {
      const unhandled: never = operation;
      throw unsupported(unhandled, operationIndex);
    }
  }
}

/**
 * Apply operations strictly in array order.
 *
 * Either every operation applies or the first failing one throws; the
 * input sequence is left untouched in both cases.
 */
export function applyPageOperations(
  slots: readonly PageSlot[],
  operations: readonly PageOperation[],
): PageSlot[] {
  let current: PageSlot[] = [...slots];
  operations.forEach((operation, i) => {
    current = applyPageOperation(current, operation, i);
  });
  return current;
}
