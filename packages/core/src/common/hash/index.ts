export * from "./object-hash.js";
