export * from "./types.js";
export * from "./call-site.js";
export * from "./format.js";
