export * from "./types.js";
export * from "./functions.js";
export * from "./injection-state.js";
export * from "./disabled-state.js";
export * from "./registry.js";
