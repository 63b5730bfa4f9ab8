export * from "./lru-cache.js";
