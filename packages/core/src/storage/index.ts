export * from "./score-storage.js";
