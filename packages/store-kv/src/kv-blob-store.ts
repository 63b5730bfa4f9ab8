/**
 * KV-based BlobStore implementation
 */

import type { BlobRef, BlobStore } from "@score-history/core";
import { computeBlobRef } from "@score-history/core";
import type { KVStore } from "./kv-store.js";

const BLOB_PREFIX = "blob:";

export class KVBlobStore implements BlobStore {
  constructor(private readonly kv: KVStore) {}

  async put(content: Uint8Array): Promise<BlobRef> {
    const ref = await computeBlobRef(content);
    const key = `${BLOB_PREFIX}${ref}`;
    if (!(await this.kv.has(key))) {
      await this.kv.set(key, content);
    }
    return ref;
  }

  async get(ref: BlobRef): Promise<Uint8Array | undefined> {
    return this.kv.get(`${BLOB_PREFIX}${ref}`);
  }

  async has(ref: BlobRef): Promise<boolean> {
    return this.kv.has(`${BLOB_PREFIX}${ref}`);
  }
}
