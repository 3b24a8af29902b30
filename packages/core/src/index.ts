/**
 * faultpath: deterministic fault injection and exhaustive error-path testing.
 *
 * - Probes (`probe`, `probeAsync`) mark where an operation may fail.
 * - The injection state counts probes or forces one of them to fail.
 * - `exhaustCodePath` drives a codepath through every probe it visits.
 */

export * from "./errors.js";
export * from "./location/index.js";
export * from "./state/index.js";
export * from "./probe/index.js";
export * from "./codepath/index.js";
export * from "./testing/index.js";
export { getLogger, log, createPinoSink } from "./logger.js";
