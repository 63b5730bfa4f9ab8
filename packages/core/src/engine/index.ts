export * from "./property-engine.js";
export * from "./score-engine.js";
export * from "./score-lock.js";
export * from "./snapshot-reader.js";
