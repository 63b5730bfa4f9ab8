export * from "./cache/index.js";
export * from "./canonical/index.js";
export * from "./concurrency/index.js";
export * from "./hash/index.js";
export * from "./streams/index.js";
