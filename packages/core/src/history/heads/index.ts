export * from "./head-store.js";
