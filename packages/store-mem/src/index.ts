export * from "./blob-store.js";
export * from "./create-memory-storage.js";
export * from "./head-store.js";
export * from "./object-store.js";
export * from "./version-store.js";
