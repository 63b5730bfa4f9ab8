/**
 * Blob store interface
 *
 * Holds the binary content behind page images and thumbnails. The engine
 * only stores and compares the returned references; it never interprets
 * the bytes. How blobs are physically persisted is up to the backend.
 */

import { sha256Hex } from "@score-history/utils";

import type { BlobRef } from "../common/id/index.js";

export interface BlobStore {
  /**
   * Store binary content
   *
   * @returns Stable reference; identical content yields the same reference
   */
  put(content: Uint8Array): Promise<BlobRef>;

  /**
   * Load binary content
   *
   * @returns The content, or undefined if the reference is unknown
   */
  get(ref: BlobRef): Promise<Uint8Array | undefined>;

  /**
   * Check if content exists for a reference
   */
  has(ref: BlobRef): Promise<boolean>;
}

/**
 * Content-addressed reference of binary content (`sha256:<hex>`).
 */
export async function computeBlobRef(content: Uint8Array): Promise<BlobRef> {
  return `sha256:${await sha256Hex(content)}`;
}
