export * from "./apply-operations.js";
export * from "./commit-types.js";
export * from "./parse-commit.js";
