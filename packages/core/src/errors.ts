/**
 * Errors raised for misuse of the injection state.
 *
 * Injected faults and codepath anomalies are never thrown: they travel as
 * `Result` values and `CodePathResult` fields.
 */

export class FaultPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FaultPathError";
  }
}

/**
 * `startTrigger` was given something other than a positive integer.
 */
export class InvalidOrdinalError extends FaultPathError {
  constructor(public readonly ordinal: number) {
    super(`Trigger ordinal must be a positive integer, got ${ordinal}`);
    this.name = "InvalidOrdinalError";
  }
}

/**
 * The injection state was entered while already locked, most often from a
 * log sink that evaluates a probe or queries the state.
 */
export class ReentrantStateError extends FaultPathError {
  constructor(public readonly operation: string) {
    super(
      `Injection state re-entered during ${operation}; log sinks must not evaluate probes or call into the state`
    );
    this.name = "ReentrantStateError";
  }
}

/**
 * An exhaustion run was started while another was still in progress on the
 * same injection state.
 */
export class ConcurrentRunError extends FaultPathError {
  constructor() {
    super("An exhaustion run is already in progress on this injection state");
    this.name = "ConcurrentRunError";
  }
}
