export * from "./create-scores.js";
export * from "./scores.impl.js";
export * from "./scores.js";
