import type { Result } from "neverthrow";
import type { Location } from "../location/types.js";
import type {
  Candidates,
  InjectionState,
  LogEventKind,
  LogSink,
  Mode,
  Verbosity,
} from "./types.js";

/**
 * Injection state for builds with fault injection switched off.
 * Probes pass results through untouched; configuration calls do nothing.
 */
export class DisabledInjectionState implements InjectionState {
  isEnabled(): boolean {
    return false;
  }

  startCounter(): void {}

  startTrigger(_ordinal: number): void {}

  getCount(): number {
    return 0;
  }

  getMode(): Mode {
    return "count";
  }

  setVerbosity(_level: Verbosity): void {}

  getVerbosity(): Verbosity {
    return "none";
  }

  setLogger(_logger: LogSink | undefined): void {}

  getCountedLocations(): Location[] {
    return [];
  }

  getTriggeredLocations(): Location[] {
    return [];
  }

  getLastTriggered(): Location | undefined {
    return undefined;
  }

  visit<T, E>(result: Result<T, E>, _candidates: Candidates<E>, _location: Location): Result<T, E> {
    return result;
  }

  log(_level: Verbosity, _message: string, _kind: LogEventKind): void {}

  acquireRun(): () => void {
    return () => {};
  }
}
