export * from "./types/index.js";
export * from "./constants/index.js";
export * from "./utils/index.js";
