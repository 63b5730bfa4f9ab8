/**
 * Shared helpers for the storage and engine test suites
 */

import type {
  AddPageOperation,
  DeletePageOperation,
  InsertPageOperation,
  Page,
  ScoreId,
} from "@score-history/core";

export function encode(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

export function decode(data: Uint8Array): string {
  return new TextDecoder().decode(data);
}

/**
 * Page whose blob references are derived from a short label
 */
export function fakePage(label: string): Page {
  return { image: `img-${label}`, thumbnail: `thumb-${label}`, number: label };
}

export function addPage(label: string): AddPageOperation {
  return { type: "add_page", ...fakePage(label) };
}

export function insertPage(index: number, label: string): InsertPageOperation {
  return { type: "insert_page", index, ...fakePage(label) };
}

export function deletePage(index: number): DeletePageOperation {
  return { type: "delete_page", index };
}

/**
 * Page labels of a page list, in order
 */
export function labels(pages: readonly Page[]): string[] {
  return pages.map((page) => page.number);
}

export function scoreId(owner: string, scoreName: string): ScoreId {
  return { owner, scoreName };
}

/**
 * Collect an async iterable into an array
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
