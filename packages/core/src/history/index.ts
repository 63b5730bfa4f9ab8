export * from "./heads/index.js";
export * from "./versions/index.js";
export * from "./walk-chain.js";
