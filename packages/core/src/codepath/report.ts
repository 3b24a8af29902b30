/**
 * Report rendering for exhaustion runs.
 */

import type { Result } from "neverthrow";
import { formatLocation, formatValue } from "../location/format.js";
import type { Location } from "../location/types.js";
import { meetsVerbosity } from "../state/functions.js";
import type { CodePathResult } from "./result.js";

export function formatResult<T, E>(result: Result<T, E>): string {
  return result.isOk() ? `Ok(${formatValue(result.value)})` : `Err(${formatValue(result.error)})`;
}

function formatLocationList(heading: string, locations: readonly Location[]): string[] {
  return [
    `  ${heading} (${locations.length}):`,
    ...locations.map((location, index) => `    ${index + 1}. ${formatLocation(location)}`),
  ];
}

/**
 * Render a run as report lines.
 *
 * @example
 * Codepath "load config" failed: triggered 1 of 2 probes
 *   unexpected result: Ok(undefined)
 */
export function formatReport<T, E>(name: string, result: CodePathResult<T, E>): string[] {
  const expected = result.expectedTriggerCount ?? "?";
  const lines = [
    `Codepath "${name}" ${result.success() ? "passed" : "failed"}: triggered ${result.triggerCount} of ${expected} probes`,
  ];

  if (!result.injectionEnabled) {
    lines.push("  fault injection disabled; codepath ran once");
  }

  if (result.unexpectedResult !== undefined) {
    lines.push(`  unexpected result: ${formatResult(result.unexpectedResult)}`);
  }

  if (meetsVerbosity(result.verbosity, "extreme")) {
    lines.push(...formatLocationList("counted probes", result.countedLocations));
    lines.push(...formatLocationList("triggered probes", result.triggeredLocations));
  }

  return lines;
}
