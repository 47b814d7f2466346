export * from "./loader.js";
export * from "./schema.js";
export * from "./types.js";
