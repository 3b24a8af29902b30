/**
 * Injection state pure functions.
 * Counter and countdown arithmetic, no side effects.
 */

import type { Verbosity } from "./types.js";

const VERBOSITY_RANK: Record<Verbosity, number> = {
  none: 0,
  moderate: 1,
  extreme: 2,
};

/** Countdown value meaning "nothing selected". */
export const IDLE_TRIGGER = Number.MAX_SAFE_INTEGER;

/**
 * Check whether the configured verbosity admits a message of `level`.
 */
export function meetsVerbosity(current: Verbosity, level: Verbosity): boolean {
  return VERBOSITY_RANK[current] >= VERBOSITY_RANK[level];
}

/**
 * Count-mode visit: every candidate contributes one ordinal.
 */
export function countVisit(counter: number, candidateCount: number): number {
  return counter + candidateCount;
}

export interface TriggerVisit {
  /** Countdown after this probe */
  trigger: number;
  /** Index of the candidate that fires, if this probe holds the ordinal */
  firedIndex?: number;
}

/**
 * Trigger-mode visit: decrement once per candidate in declaration order.
 * The candidate whose decrement lands exactly on zero fires. Past zero the
 * countdown only goes negative, so nothing fires twice in a run.
 *
 * @param trigger - Countdown before this probe
 * @param candidateCount - Number of candidates at the probe (1-3)
 */
export function triggerVisit(trigger: number, candidateCount: number): TriggerVisit {
  let remaining = trigger;
  let firedIndex: number | undefined;

  for (let index = 0; index < candidateCount; index++) {
    remaining -= 1;
    if (remaining === 0) {
      firedIndex = index;
    }
  }

  return firedIndex === undefined
    ? { trigger: remaining }
    : { trigger: remaining, firedIndex };
}

/**
 * Validate a trigger ordinal.
 */
export function isValidOrdinal(ordinal: number): boolean {
  return Number.isSafeInteger(ordinal) && ordinal >= 1;
}
