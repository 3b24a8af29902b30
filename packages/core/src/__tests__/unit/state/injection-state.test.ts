import { describe, it, expect, vi, beforeEach } from "vitest";
import { err, ok } from "neverthrow";
import {
  ConcurrentRunError,
  InvalidOrdinalError,
  ReentrantStateError,
} from "../../../errors.js";
import type { Location } from "../../../location/index.js";
import { ActiveInjectionState } from "../../../state/index.js";
import { createLogCollector } from "../../../testing/index.js";

const WRITE: Location = { file: "store.ts", line: 10, description: "write" };
const FLUSH: Location = { file: "store.ts", line: 20, description: "flush" };

describe("ActiveInjectionState", () => {
  let state: ActiveInjectionState;

  beforeEach(() => {
    state = new ActiveInjectionState();
  });

  describe("count mode", () => {
    it("should start in count mode with a zero counter", () => {
      expect(state.getMode()).toBe("count");
      expect(state.getCount()).toBe(0);
    });

    it("should be idempotent when started twice", () => {
      state.startCounter();
      expect(state.getCount()).toBe(0);

      state.startCounter();
      expect(state.getCount()).toBe(0);
    });

    it("should count one ordinal per candidate", () => {
      state.startCounter();

      state.visit(ok(1), ["E1"], WRITE);
      expect(state.getCount()).toBe(1);

      state.visit(ok(1), ["E1", "E2", "E3"], FLUSH);
      expect(state.getCount()).toBe(4);
    });

    it("should return the original result unchanged", () => {
      state.startCounter();
      const success = ok(1);
      const failure = err("real");

      expect(state.visit(success, ["E1"], WRITE)).toBe(success);
      expect(state.visit(failure, ["E1"], WRITE)).toBe(failure);
      expect(state.getCount()).toBe(2);
    });

    it("should reset the counter on startCounter", () => {
      state.startCounter();
      state.visit(ok(1), ["E1"], WRITE);
      state.startCounter();

      expect(state.getCount()).toBe(0);
    });
  });

  describe("trigger mode", () => {
    it("should inject the candidate at the selected ordinal", () => {
      state.startTrigger(1);

      const result = state.visit(ok(1), ["E1"], WRITE);

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr()).toBe("E1");
    });

    it("should pass through probes before and after the selected one", () => {
      state.startTrigger(2);
      const first = ok(1);
      const third = ok(3);

      expect(state.visit(first, ["E1"], WRITE)).toBe(first);
      expect(state.visit(ok(2), ["E2"], FLUSH)._unsafeUnwrapErr()).toBe("E2");
      expect(state.visit(third, ["E3"], WRITE)).toBe(third);
    });

    it("should select candidates of one probe in declaration order", () => {
      const run = (ordinal: number) => {
        state.startTrigger(ordinal);
        const a = state.visit(ok("a"), ["A1", "A2"], WRITE);
        const b = state.visit(ok("b"), ["B1"], FLUSH);
        return [a, b];
      };

      const [a1, b1] = run(1);
      expect(a1?._unsafeUnwrapErr()).toBe("A1");
      expect(b1?.isOk()).toBe(true);

      const [a2, b2] = run(2);
      expect(a2?._unsafeUnwrapErr()).toBe("A2");
      expect(b2?.isOk()).toBe(true);

      const [a3, b3] = run(3);
      expect(a3?.isOk()).toBe(true);
      expect(b3?._unsafeUnwrapErr()).toBe("B1");
    });

    it("should keep an already-failing result instead of injecting", () => {
      state.startTrigger(1);
      const failure = err("real");

      const result = state.visit(failure, ["E1"], WRITE);

      expect(result).toBe(failure);
      expect(result._unsafeUnwrapErr()).toBe("real");
    });

    it("should reject ordinals that are not positive integers", () => {
      expect(() => state.startTrigger(0)).toThrow(InvalidOrdinalError);
      expect(() => state.startTrigger(2.5)).toThrow(InvalidOrdinalError);
      expect(state.getMode()).toBe("count");
    });
  });

  describe("logging", () => {
    it("should log triggered probes at moderate verbosity", () => {
      const collector = createLogCollector();
      state.setVerbosity("moderate");
      state.setLogger(collector.sink);
      state.startTrigger(1);

      state.visit(ok(1), ["E1"], WRITE);

      expect(collector.entries()).toEqual([
        {
          message: 'Triggered probe "write" at store.ts:10 injecting Err("E1")',
          event: { kind: "triggered", level: "moderate", location: WRITE },
        },
      ]);
    });

    it("should log masked probes as unexpected failures", () => {
      const collector = createLogCollector();
      state.setVerbosity("moderate");
      state.setLogger(collector.sink);
      state.startTrigger(1);

      state.visit(err("real"), ["E1"], WRITE);

      expect(collector.lines()).toEqual([
        'Unexpected error in probe "write" at store.ts:10 got Err("real")',
      ]);
      expect(collector.entries()[0]?.event.kind).toBe("unexpected-failure");
    });

    it("should log injections with only a logger installed", () => {
      const collector = createLogCollector();
      state.setLogger(collector.sink);
      state.startTrigger(1);

      state.visit(ok(1), ["E1"], WRITE);

      expect(state.getVerbosity()).toBe("moderate");
      expect(collector.lines()).toEqual(['Triggered probe "write" at store.ts:10 injecting Err("E1")']);
    });

    it("should stay silent at verbosity none", () => {
      const collector = createLogCollector();
      state.setVerbosity("none");
      state.setLogger(collector.sink);
      state.startTrigger(1);

      state.visit(ok(1), ["E1"], WRITE);

      expect(collector.count()).toBe(0);
    });

    it("should stop logging once the logger is removed", () => {
      const collector = createLogCollector();
      state.setVerbosity("moderate");
      state.setLogger(collector.sink);
      state.setLogger(undefined);
      state.startTrigger(1);

      state.visit(ok(1), ["E1"], WRITE);

      expect(collector.count()).toBe(0);
    });

    it("should gate explicit log calls by level", () => {
      const sink = vi.fn();
      state.setVerbosity("none");
      state.setLogger(sink);

      state.log("none", "always", "anomaly");
      state.log("moderate", "hidden", "progress");

      expect(sink).toHaveBeenCalledTimes(1);
      expect(sink).toHaveBeenCalledWith("always", { kind: "anomaly", level: "none" });
    });
  });

  describe("history", () => {
    it("should record counted and triggered locations at extreme verbosity", () => {
      state.setVerbosity("extreme");

      state.startCounter();
      state.visit(ok(1), ["E1"], WRITE);
      state.visit(ok(2), ["E2"], FLUSH);
      expect(state.getCountedLocations()).toEqual([WRITE, FLUSH]);

      state.startTrigger(2);
      state.visit(ok(1), ["E1"], WRITE);
      state.visit(ok(2), ["E2"], FLUSH);
      state.startTrigger(1);
      state.visit(ok(1), ["E1"], WRITE);

      expect(state.getTriggeredLocations()).toEqual([FLUSH, WRITE]);
      expect(state.getCountedLocations()).toEqual([WRITE, FLUSH]);
    });

    it("should record nothing below extreme verbosity", () => {
      state.setVerbosity("moderate");

      state.startCounter();
      state.visit(ok(1), ["E1"], WRITE);
      state.startTrigger(1);
      state.visit(ok(1), ["E1"], WRITE);

      expect(state.getCountedLocations()).toEqual([]);
      expect(state.getTriggeredLocations()).toEqual([]);
    });

    it("should not record masked probes as triggered", () => {
      state.setVerbosity("extreme");
      state.startTrigger(1);

      state.visit(err("real"), ["E1"], WRITE);

      expect(state.getTriggeredLocations()).toEqual([]);
    });

    it("should clear history on startCounter", () => {
      state.setVerbosity("extreme");
      state.startCounter();
      state.visit(ok(1), ["E1"], WRITE);
      state.startTrigger(1);
      state.visit(ok(1), ["E1"], WRITE);

      state.startCounter();

      expect(state.getCountedLocations()).toEqual([]);
      expect(state.getTriggeredLocations()).toEqual([]);
    });

    it("should hand out copies", () => {
      state.setVerbosity("extreme");
      state.startCounter();
      state.visit(ok(1), ["E1"], WRITE);

      state.getCountedLocations().push(FLUSH);

      expect(state.getCountedLocations()).toEqual([WRITE]);
    });
  });

  describe("last triggered", () => {
    it("should be empty before anything fires", () => {
      state.startTrigger(1);

      expect(state.getLastTriggered()).toBeUndefined();
    });

    it("should remember the last injection at verbosity none", () => {
      state.setVerbosity("none");
      state.startTrigger(2);

      state.visit(ok(1), ["E1"], WRITE);
      state.visit(ok(2), ["E2"], FLUSH);

      expect(state.getLastTriggered()).toEqual(FLUSH);
      expect(state.getTriggeredLocations()).toEqual([]);
    });

    it("should not count a real failure as an injection", () => {
      state.startTrigger(1);

      state.visit(err("real"), ["E1"], WRITE);

      expect(state.getLastTriggered()).toBeUndefined();
    });

    it("should be cleared by startTrigger", () => {
      state.startTrigger(1);
      state.visit(ok(1), ["E1"], WRITE);
      expect(state.getLastTriggered()).toEqual(WRITE);

      state.startTrigger(1);

      expect(state.getLastTriggered()).toBeUndefined();
    });
  });

  describe("lock", () => {
    it("should reject a logger that calls back into the state", () => {
      state.setVerbosity("moderate");
      state.setLogger(() => {
        state.getCount();
      });
      state.startTrigger(1);

      expect(() => state.visit(ok(1), ["E1"], WRITE)).toThrow(ReentrantStateError);
    });

    it("should release the lock after a reentrant failure", () => {
      state.setVerbosity("moderate");
      state.setLogger(() => {
        state.getCount();
      });
      state.startTrigger(1);
      expect(() => state.visit(ok(1), ["E1"], WRITE)).toThrow(ReentrantStateError);

      state.setLogger(undefined);
      state.startCounter();

      expect(state.getCount()).toBe(0);
    });
  });

  describe("acquireRun", () => {
    it("should reject a second concurrent run", () => {
      state.acquireRun();

      expect(() => state.acquireRun()).toThrow(ConcurrentRunError);
    });

    it("should allow a new run after release", () => {
      const release = state.acquireRun();
      release();
      release();

      const next = state.acquireRun();
      expect(() => state.acquireRun()).toThrow(ConcurrentRunError);
      next();
    });
  });
});
