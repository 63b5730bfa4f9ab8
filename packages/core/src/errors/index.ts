export * from "./conflict-errors.js";
export * from "./describe-error.js";
export * from "./not-found-errors.js";
export * from "./operation-errors.js";
export * from "./score-history-error.js";
