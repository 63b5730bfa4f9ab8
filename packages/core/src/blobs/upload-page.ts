import type { AddPageOperation } from "../commits/commit-types.js";
import type { BlobStore } from "./blob-store.js";

/**
 * Binary content of a page about to be added.
 */
export interface PageUpload {
  image: Uint8Array;
  thumbnail: Uint8Array;
  /** Display label */
  number: string;
}

/**
 * Store the image and thumbnail of a page and build the add_page
 * operation that references them.
 */
export async function uploadPage(blobs: BlobStore, upload: PageUpload): Promise<AddPageOperation> {
  const [image, thumbnail] = await Promise.all([
    blobs.put(upload.image),
    blobs.put(upload.thumbnail),
  ]);
  return { type: "add_page", image, thumbnail, number: upload.number };
}

/**
 * Upload several pages, numbering them from `firstNumber` when they
 * carry no label of their own.
 */
export async function uploadPages(
  blobs: BlobStore,
  uploads: readonly (Omit<PageUpload, "number"> & { number?: string })[],
  firstNumber = 1,
): Promise<AddPageOperation[]> {
  const operations: AddPageOperation[] = [];
  for (const [i, upload] of uploads.entries()) {
    operations.push(
      await uploadPage(blobs, { ...upload, number: upload.number ?? String(firstNumber + i) }),
    );
  }
  return operations;
}
