export * from "./types.js";
export * from "./probe.js";
