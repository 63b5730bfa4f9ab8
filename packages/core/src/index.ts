// Blob references and upload helpers
export * from "./blobs/index.js";
// Operations, commit requests and their application
export * from "./commits/index.js";
// Hashing
export * from "./common/hash/index.js";
// Object and score ids
export * from "./common/id/index.js";
// Score and property write paths
export * from "./engine/index.js";
// Error taxonomy
export * from "./errors/index.js";
// Heads, versions and chain traversal
export * from "./history/index.js";
// Logger contract
export * from "./logging/index.js";
// Object model and object store
export * from "./objects/index.js";
// Public facade
export * from "./scores/index.js";
// Storage bundle
export * from "./storage/index.js";
