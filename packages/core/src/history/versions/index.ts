export * from "./version-store.js";
