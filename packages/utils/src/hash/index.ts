export * from "./sha256/sha256-async.js";
export * from "./utils/index.js";
