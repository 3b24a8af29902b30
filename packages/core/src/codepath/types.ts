/**
 * Codepath exhaustion types.
 */

import type { Result } from "neverthrow";
import type { Location } from "../location/types.js";
import type { InjectionState, Verbosity } from "../state/types.js";

/** The code under test. Must report failure through its Result. */
export type CodePath<T, E> = () => Result<T, E> | PromiseLike<Result<T, E>>;

/** Setup or teardown step run around each pass. */
export type PassHook = () => void | PromiseLike<void>;

export interface ExhaustOptions<T, E> {
  /** Label used in log context */
  name?: string;
  /** Runs before every pass */
  setup?: PassHook;
  codePath: CodePath<T, E>;
  /** Runs after every pass that behaved as expected */
  teardown?: PassHook;
  /** State to drive instead of the process-wide one */
  state?: InjectionState;
}

export interface CodePathResultInit<T, E> {
  /** Ordinals found by discovery; null when discovery itself failed */
  expectedTriggerCount: number | null;
  /** Ordinals that individually made the codepath fail */
  triggerCount: number;
  /** The outcome of the pass that deviated, if any */
  unexpectedResult: Result<T, E> | undefined;
  countedLocations: Location[];
  triggeredLocations: Location[];
  /** Verbosity in force when the run ended */
  verbosity: Verbosity;
  injectionEnabled: boolean;
}
