/**
 * Factory function for SQL-based score storage
 */

import type { ScoreStorage, VersionStoreOptions } from "@score-history/core";
import type { DatabaseClient } from "./database-client.js";
import { initializeSchema } from "./migrations/index.js";
import { SqlBlobStore } from "./sql-blob-store.js";
import { SqlHeadStore } from "./sql-head-store.js";
import { SqlObjectStore } from "./sql-object-store.js";
import { SqlVersionStore } from "./sql-version-store.js";

export interface SqlStorageOptions extends VersionStoreOptions {
  /** Run migrations on initialization (default: true) */
  autoMigrate?: boolean;
}

/**
 * Create SQL-backed score storage
 *
 * @example
 * ```typescript
 * const db = await SqlJsAdapter.create();
 * const storage = await createSqlScoreStorage(db);
 * const scores = createScores(storage);
 * ```
 */
export async function createSqlScoreStorage(
  db: DatabaseClient,
  options: SqlStorageOptions = {},
): Promise<ScoreStorage> {
  if (options.autoMigrate ?? true) {
    await initializeSchema(db);
  }

  return {
    objects: new SqlObjectStore(db),
    heads: new SqlHeadStore(db),
    versions: new SqlVersionStore(db, options),
    blobs: new SqlBlobStore(db),
    close: () => db.close(),
  };
}
