import { err, type Result } from "neverthrow";
import { ConcurrentRunError, InvalidOrdinalError, ReentrantStateError } from "../errors.js";
import { formatTriggered, formatUnexpectedFailure } from "../location/format.js";
import type { Location } from "../location/types.js";
import { log } from "../logger.js";
import {
  IDLE_TRIGGER,
  countVisit,
  isValidOrdinal,
  meetsVerbosity,
  triggerVisit,
} from "./functions.js";
import type {
  Candidates,
  InjectionState,
  LogEventKind,
  LogSink,
  Mode,
  Verbosity,
} from "./types.js";

/**
 * Stateful injection state.
 *
 * Every operation runs in a short synchronous critical section. Sections are
 * atomic on the event loop; the lock only detects re-entrance, which would
 * otherwise corrupt the counters mid-visit.
 */
export class ActiveInjectionState implements InjectionState {
  private mode: Mode = "count";
  private counter = 0;
  private trigger = IDLE_TRIGGER;
  private verbosity: Verbosity;
  private logger: LogSink | undefined;
  private countedLocations: Location[] = [];
  private triggeredLocations: Location[] = [];
  private lastTriggered: Location | undefined;

  private locked = false;
  private running = false;

  constructor(options: { verbosity?: Verbosity; logger?: LogSink } = {}) {
    this.verbosity = options.verbosity ?? "moderate";
    this.logger = options.logger;
  }

  private withLock<R>(operation: string, fn: () => R): R {
    if (this.locked) {
      throw new ReentrantStateError(operation);
    }
    this.locked = true;
    try {
      return fn();
    } finally {
      this.locked = false;
    }
  }

  /** Emit to the sink; caller holds the lock. */
  private emit(level: Verbosity, kind: LogEventKind, message: string, location?: Location): void {
    if (this.logger && meetsVerbosity(this.verbosity, level)) {
      this.logger(message, location ? { kind, level, location } : { kind, level });
    }
  }

  isEnabled(): boolean {
    return true;
  }

  startCounter(): void {
    this.withLock("startCounter", () => {
      this.mode = "count";
      this.counter = 0;
      this.countedLocations = [];
      this.triggeredLocations = [];
    });
    log.state.debug("count mode");
  }

  startTrigger(ordinal: number): void {
    if (!isValidOrdinal(ordinal)) {
      throw new InvalidOrdinalError(ordinal);
    }
    this.withLock("startTrigger", () => {
      this.mode = "trigger";
      this.trigger = ordinal;
      this.lastTriggered = undefined;
    });
    log.state.debug({ ordinal }, "trigger mode");
  }

  getCount(): number {
    return this.withLock("getCount", () => this.counter);
  }

  getMode(): Mode {
    return this.withLock("getMode", () => this.mode);
  }

  setVerbosity(level: Verbosity): void {
    this.withLock("setVerbosity", () => {
      this.verbosity = level;
    });
  }

  getVerbosity(): Verbosity {
    return this.withLock("getVerbosity", () => this.verbosity);
  }

  setLogger(logger: LogSink | undefined): void {
    this.withLock("setLogger", () => {
      this.logger = logger;
    });
  }

  getCountedLocations(): Location[] {
    return this.withLock("getCountedLocations", () => [...this.countedLocations]);
  }

  getTriggeredLocations(): Location[] {
    return this.withLock("getTriggeredLocations", () => [...this.triggeredLocations]);
  }

  getLastTriggered(): Location | undefined {
    return this.withLock("getLastTriggered", () => this.lastTriggered);
  }

  visit<T, E>(result: Result<T, E>, candidates: Candidates<E>, location: Location): Result<T, E> {
    return this.withLock<Result<T, E>>("probe evaluation", () => {
      if (this.mode === "count") {
        this.counter = countVisit(this.counter, candidates.length);
        if (meetsVerbosity(this.verbosity, "extreme")) {
          this.countedLocations.push(location);
        }
        return result;
      }

      const { trigger, firedIndex } = triggerVisit(this.trigger, candidates.length);
      this.trigger = trigger;

      if (firedIndex === undefined) {
        return result;
      }

      // The selected probe wraps an operation that already failed: keep its error
      if (result.isErr()) {
        this.emit(
          "moderate",
          "unexpected-failure",
          formatUnexpectedFailure(location, result.error),
          location
        );
        return result;
      }

      const candidate = candidates[firedIndex];
      this.lastTriggered = location;
      this.emit("moderate", "triggered", formatTriggered(location, candidate), location);
      if (meetsVerbosity(this.verbosity, "extreme")) {
        this.triggeredLocations.push(location);
      }
      return err(candidate);
    });
  }

  log(level: Verbosity, message: string, kind: LogEventKind): void {
    this.withLock("log", () => {
      this.emit(level, kind, message);
    });
  }

  acquireRun(): () => void {
    return this.withLock("acquireRun", () => {
      if (this.running) {
        throw new ConcurrentRunError();
      }
      this.running = true;

      let released = false;
      return () => {
        if (released) return;
        released = true;
        this.running = false;
      };
    });
  }
}
