/**
 * Process-wide injection state.
 *
 * Created lazily from config on first use. Tests and harnesses that want an
 * explicit instance build one with `createInjectionState` and either pass it
 * to probes directly or install it with `setInjectionState`.
 */

import { loadConfig } from "@faultpath/config";
import type { Location } from "../location/types.js";
import { DisabledInjectionState } from "./disabled-state.js";
import { ActiveInjectionState } from "./injection-state.js";
import type { InjectionState, InjectionStateOptions, LogSink, Verbosity } from "./types.js";

let current: InjectionState | null = null;

/**
 * Build an injection state without touching the process-wide one.
 * Unset options fall back to FAULTPATH_ENABLED and FAULTPATH_VERBOSITY.
 */
export function createInjectionState(options: InjectionStateOptions = {}): InjectionState {
  const config = loadConfig();
  const enabled = options.enabled ?? config.FAULTPATH_ENABLED;

  if (!enabled) {
    return new DisabledInjectionState();
  }

  return new ActiveInjectionState({
    verbosity: options.verbosity ?? config.FAULTPATH_VERBOSITY,
    logger: options.logger,
  });
}

export function getInjectionState(): InjectionState {
  if (current === null) {
    current = createInjectionState();
  }
  return current;
}

export function setInjectionState(state: InjectionState): void {
  current = state;
}

/** For testing: drop the process-wide state so the next use recreates it */
export function resetInjectionState(): void {
  current = null;
}

// =============================================================================
// Facade over the process-wide state
// =============================================================================

export function isEnabled(): boolean {
  return getInjectionState().isEnabled();
}

export function startCounter(): void {
  getInjectionState().startCounter();
}

export function startTrigger(ordinal: number): void {
  getInjectionState().startTrigger(ordinal);
}

export function getCount(): number {
  return getInjectionState().getCount();
}

export function setVerbosity(level: Verbosity): void {
  getInjectionState().setVerbosity(level);
}

export function setLogger(logger: LogSink | undefined): void {
  getInjectionState().setLogger(logger);
}

export function getCountedLocations(): Location[] {
  return getInjectionState().getCountedLocations();
}

export function getTriggeredLocations(): Location[] {
  return getInjectionState().getTriggeredLocations();
}

export function getLastTriggered(): Location | undefined {
  return getInjectionState().getLastTriggered();
}
