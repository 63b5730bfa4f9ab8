export * from "./object-batch.js";
export * from "./object-codec.js";
export * from "./object-store.js";
export * from "./object-types.js";
