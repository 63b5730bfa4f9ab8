/**
 * SQL-based BlobStore implementation
 */

import type { BlobRef, BlobStore } from "@score-history/core";
import { computeBlobRef } from "@score-history/core";
import type { DatabaseClient } from "./database-client.js";

export class SqlBlobStore implements BlobStore {
  constructor(private readonly db: DatabaseClient) {}

  async put(content: Uint8Array): Promise<BlobRef> {
    const ref = await computeBlobRef(content);
    await this.db.execute("INSERT OR IGNORE INTO blobs (ref, content) VALUES (?, ?)", [
      ref,
      content,
    ]);
    return ref;
  }

  async get(ref: BlobRef): Promise<Uint8Array | undefined> {
    const rows = await this.db.query<{ content: unknown }>(
      "SELECT content FROM blobs WHERE ref = ?",
      [ref],
    );
    const content = rows[0]?.content;
    return content instanceof Uint8Array ? new Uint8Array(content) : undefined;
  }

  async has(ref: BlobRef): Promise<boolean> {
    const rows = await this.db.query("SELECT 1 FROM blobs WHERE ref = ?", [ref]);
    return rows.length > 0;
  }
}
