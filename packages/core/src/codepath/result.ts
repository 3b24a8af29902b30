import type { Result } from "neverthrow";
import type { Location } from "../location/types.js";
import { log } from "../logger.js";
import type { Verbosity } from "../state/types.js";
import { formatReport } from "./report.js";
import type { CodePathResultInit } from "./types.js";

/**
 * Outcome of one exhaustion run. Immutable.
 */
export class CodePathResult<T, E> {
  readonly expectedTriggerCount: number | null;
  readonly triggerCount: number;
  readonly unexpectedResult: Result<T, E> | undefined;
  readonly countedLocations: readonly Location[];
  readonly triggeredLocations: readonly Location[];
  readonly verbosity: Verbosity;
  readonly injectionEnabled: boolean;

  constructor(init: CodePathResultInit<T, E>) {
    this.expectedTriggerCount = init.expectedTriggerCount;
    this.triggerCount = init.triggerCount;
    this.unexpectedResult = init.unexpectedResult;
    this.countedLocations = Object.freeze([...init.countedLocations]);
    this.triggeredLocations = Object.freeze([...init.triggeredLocations]);
    this.verbosity = init.verbosity;
    this.injectionEnabled = init.injectionEnabled;
    Object.freeze(this);
  }

  /**
   * Every discovered ordinal was triggered on its own and no pass deviated.
   * A degraded run (injection disabled) never succeeds.
   */
  success(): boolean {
    return (
      this.unexpectedResult === undefined &&
      this.triggerCount === this.expectedTriggerCount
    );
  }

  formatReport(name: string): string[] {
    return formatReport(name, this);
  }

  /**
   * Print the report, one line per call to `print` (defaults to the pino
   * report logger).
   */
  report(name: string, print: (line: string) => void = (line) => log.report.info(line)): void {
    for (const line of this.formatReport(name)) {
      print(line);
    }
  }
}
