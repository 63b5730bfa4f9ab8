export * from "./adapters/memory-adapter.js";
export * from "./create-kv-storage.js";
export * from "./kv-blob-store.js";
export * from "./kv-head-store.js";
export * from "./kv-object-store.js";
export * from "./kv-store.js";
export * from "./kv-version-store.js";
