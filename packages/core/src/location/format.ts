/**
 * Human-readable rendering of locations and probe events.
 */

import { inspect } from "node:util";
import type { Location } from "./types.js";

export function formatFileRef(location: Location): string {
  const ref = `${location.file}:${location.line}`;
  return location.module ? `${ref} in module ${location.module}` : ref;
}

/**
 * e.g. `probe "read config" at src/config.ts:42 in module app`
 */
export function formatLocation(location: Location): string {
  const ref = formatFileRef(location);
  return location.description !== undefined
    ? `probe "${location.description}" at ${ref}`
    : `probe at ${ref}`;
}

/**
 * Render an error or result payload for log lines and reports.
 */
export function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return `${value.name}(${JSON.stringify(value.message)})`;
  }
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  return inspect(value, { depth: 4, breakLength: Infinity });
}

export function formatTriggered(location: Location, error: unknown): string {
  return `Triggered ${formatLocation(location)} injecting Err(${formatValue(error)})`;
}

export function formatUnexpectedFailure(location: Location, error: unknown): string {
  return `Unexpected error in ${formatLocation(location)} got Err(${formatValue(error)})`;
}
