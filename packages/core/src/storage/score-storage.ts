/**
 * Storage bundle consumed by the engines
 *
 * The three logical tables of the versioning model plus the blob store:
 * - objects: hash -> immutable object (append-only)
 * - versions: (score, version number) -> snapshot hash (append-only)
 * - heads: score -> current pointers (mutable, compare-and-swap)
 * - blobs: page image and thumbnail content
 *
 * Backends (memory, key-value, SQL) provide factory functions returning
 * this bundle so engines stay independent of the storage technology.
 */

import type { BlobStore } from "../blobs/blob-store.js";
import type { HeadStore } from "../history/heads/head-store.js";
import type { VersionStore } from "../history/versions/version-store.js";
import type { ObjectStore } from "../objects/object-store.js";

export interface ScoreStorage {
  readonly objects: ObjectStore;
  readonly heads: HeadStore;
  readonly versions: VersionStore;
  readonly blobs: BlobStore;

  /**
   * Release backend resources
   *
   * Optional - in-memory backends don't need explicit cleanup.
   */
  close?(): Promise<void>;
}
