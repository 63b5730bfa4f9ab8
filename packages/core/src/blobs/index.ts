export * from "./blob-store.js";
export * from "./upload-page.js";
