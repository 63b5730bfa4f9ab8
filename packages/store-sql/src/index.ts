export * from "./adapters/sql-js-adapter.js";
export * from "./create-sql-storage.js";
export * from "./database-client.js";
export * from "./migrations/index.js";
export * from "./sql-blob-store.js";
export * from "./sql-head-store.js";
export * from "./sql-object-store.js";
export * from "./sql-version-store.js";
