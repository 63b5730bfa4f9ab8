/**
 * In-memory BlobStore implementation
 */

import type { BlobRef, BlobStore } from "@score-history/core";
import { computeBlobRef } from "@score-history/core";

export class MemoryBlobStore implements BlobStore {
  private blobs = new Map<BlobRef, Uint8Array>();

  async put(content: Uint8Array): Promise<BlobRef> {
    const ref = await computeBlobRef(content);
    if (!this.blobs.has(ref)) {
      // Store a copy to prevent external mutation
      this.blobs.set(ref, new Uint8Array(content));
    }
    return ref;
  }

  async get(ref: BlobRef): Promise<Uint8Array | undefined> {
    const content = this.blobs.get(ref);
    return content ? new Uint8Array(content) : undefined;
  }

  async has(ref: BlobRef): Promise<boolean> {
    return this.blobs.has(ref);
  }
}
