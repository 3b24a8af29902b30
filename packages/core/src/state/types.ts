/**
 * Injection state types.
 */

import type { Result } from "neverthrow";
import type { Location } from "../location/types.js";

/** Count mode tallies probes; trigger mode fails one of them. */
export type Mode = "count" | "trigger";

export type Verbosity = "none" | "moderate" | "extreme";

export type LogEventKind =
  /** A probe substituted its candidate error */
  | "triggered"
  /** The selected probe wrapped an operation that had already failed */
  | "unexpected-failure"
  /** An exhaustion pass deviated from its expected outcome */
  | "anomaly"
  /** Exhaustion progress chatter */
  | "progress";

export interface LogEvent {
  kind: LogEventKind;
  /** Minimum verbosity at which the message is emitted */
  level: Verbosity;
  location?: Location;
}

/**
 * Receives human-readable event messages. Called while the state is locked:
 * it must not evaluate probes or call back into the state.
 */
export type LogSink = (message: string, event: LogEvent) => void;

/** One to three alternative errors a probe may inject. */
export type Candidates<E> = readonly [E] | readonly [E, E] | readonly [E, E, E];

/** Candidates, or a function building them only when injection is enabled. */
export type CandidateSource<E> = Candidates<E> | (() => Candidates<E>);

export interface InjectionStateOptions {
  /** Defaults to FAULTPATH_ENABLED */
  enabled?: boolean;
  /** Defaults to FAULTPATH_VERBOSITY ("moderate" when unset) */
  verbosity?: Verbosity;
  logger?: LogSink;
}

/**
 * Shared contract of the active and disabled injection states.
 */
export interface InjectionState {
  /** Whether probes can inject faults at all */
  isEnabled(): boolean;

  /** Enter count mode, zero the counter and clear history */
  startCounter(): void;
  /** Enter trigger mode, failing the probe visit at 1-based `ordinal` */
  startTrigger(ordinal: number): void;
  /** Probe ordinals counted since the last `startCounter` */
  getCount(): number;
  getMode(): Mode;

  setVerbosity(level: Verbosity): void;
  getVerbosity(): Verbosity;
  /** Install or remove (undefined) the log sink */
  setLogger(logger: LogSink | undefined): void;

  /** Snapshot of count-mode visits (recorded at "extreme" only) */
  getCountedLocations(): Location[];
  /** Snapshot of triggered probes (recorded at "extreme" only) */
  getTriggeredLocations(): Location[];
  /** The probe that injected since the last `startTrigger`, at any verbosity */
  getLastTriggered(): Location | undefined;

  /**
   * Record one probe visit and decide its outcome.
   * `result` must already be evaluated; candidates are already resolved.
   */
  visit<T, E>(result: Result<T, E>, candidates: Candidates<E>, location: Location): Result<T, E>;

  /** Send `message` to the sink when verbosity reaches `level` */
  log(level: Verbosity, message: string, kind: LogEventKind): void;

  /**
   * Claim the state for one exhaustion run.
   * @returns release function
   */
  acquireRun(): () => void;
}
