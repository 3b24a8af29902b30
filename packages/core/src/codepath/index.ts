export * from "./types.js";
export * from "./result.js";
export * from "./report.js";
export * from "./exhauster.js";
