/**
 * Codepath exhaustion.
 *
 * Runs a codepath once in count mode to discover its probe ordinals, then
 * once per ordinal in trigger mode, expecting every forced fault to surface
 * as a failure. The first deviation ends the run and is returned as data.
 *
 * @example
 * const result = await exhaustCodePath({
 *   setup: () => store.reset(),
 *   codePath: () => saveOrder(store, order),
 * });
 * expect(result.success()).toBe(true);
 */

import type { Result } from "neverthrow";
import { log } from "../logger.js";
import { getInjectionState } from "../state/registry.js";
import type { InjectionState } from "../state/types.js";
import { formatResult } from "./report.js";
import { CodePathResult } from "./result.js";
import type { CodePath, CodePathResultInit, ExhaustOptions } from "./types.js";

const SEPARATOR = "------------------------------------------------------------";

type RunOutcome<T, E> = Pick<
  CodePathResultInit<T, E>,
  "expectedTriggerCount" | "triggerCount" | "unexpectedResult"
>;

/**
 * Run one pass: setup, enter the mode, execute the codepath.
 *
 * @param ordinal - undefined for the discovery pass
 */
async function runPass<T, E>(
  state: InjectionState,
  options: ExhaustOptions<T, E>,
  ordinal: number | undefined
): Promise<Result<T, E>> {
  state.log("extreme", SEPARATOR, "progress");
  state.log("extreme", `Testing codepath in ${ordinal === undefined ? "COUNT" : "TRIGGER"} mode`, "progress");
  state.log("extreme", "Running setup", "progress");

  await options.setup?.();

  if (ordinal === undefined) {
    state.startCounter();
    state.log("extreme", "Running codepath in COUNT mode", "progress");
  } else {
    state.startTrigger(ordinal);
    state.log("extreme", `Running codepath in TRIGGER mode, will trigger probe ${ordinal}`, "progress");
  }

  return await options.codePath();
}

async function runTeardown<T, E>(state: InjectionState, options: ExhaustOptions<T, E>): Promise<void> {
  state.log("moderate", "Running teardown", "progress");
  await options.teardown?.();
}

async function runPasses<T, E>(
  state: InjectionState,
  options: ExhaustOptions<T, E>
): Promise<RunOutcome<T, E>> {
  const discovery = await runPass(state, options, undefined);
  if (discovery.isErr()) {
    state.log(
      "none",
      "Error returned by codepath in count mode. Expected codepath to succeed.",
      "anomaly"
    );
    return { expectedTriggerCount: null, triggerCount: 0, unexpectedResult: discovery };
  }

  const expected = state.getCount();
  await runTeardown(state, options);

  for (let ordinal = 1; ordinal <= expected; ordinal++) {
    const outcome = await runPass(state, options, ordinal);
    if (outcome.isOk()) {
      state.log(
        "none",
        `Codepath did not fail in trigger mode for probe ${ordinal}. Expected codepath to fail.`,
        "anomaly"
      );
      return { expectedTriggerCount: expected, triggerCount: ordinal - 1, unexpectedResult: outcome };
    }
    await runTeardown(state, options);
  }

  return { expectedTriggerCount: expected, triggerCount: expected, unexpectedResult: undefined };
}

/**
 * Without fault injection the codepath runs once and its outcome is handed
 * back as unexpected, so the run never reports success.
 */
async function runDegraded<T, E>(options: ExhaustOptions<T, E>): Promise<CodePathResult<T, E>> {
  await options.setup?.();
  const outcome = await options.codePath();
  await options.teardown?.();

  log.codepath.debug({ name: options.name }, "fault injection disabled, codepath ran once");

  return new CodePathResult({
    expectedTriggerCount: 0,
    triggerCount: 0,
    unexpectedResult: outcome,
    countedLocations: [],
    triggeredLocations: [],
    verbosity: "none",
    injectionEnabled: false,
  });
}

/**
 * Drive a codepath through every probe it visits.
 *
 * Exceptions thrown by setup, teardown or the codepath are not anomalies:
 * they reject the returned promise.
 */
export async function exhaustCodePath<T, E>(
  codePathOrOptions: CodePath<T, E> | ExhaustOptions<T, E>
): Promise<CodePathResult<T, E>> {
  const options: ExhaustOptions<T, E> =
    typeof codePathOrOptions === "function" ? { codePath: codePathOrOptions } : codePathOrOptions;
  const state = options.state ?? getInjectionState();

  if (!state.isEnabled()) {
    return runDegraded(options);
  }

  const release = state.acquireRun();
  const outcome = await runPasses(state, options).finally(release);

  const expected = outcome.expectedTriggerCount ?? "?";
  state.log("moderate", `Triggered ${outcome.triggerCount} of ${expected} probes`, "progress");

  const result = new CodePathResult({
    ...outcome,
    countedLocations: state.getCountedLocations(),
    triggeredLocations: state.getTriggeredLocations(),
    verbosity: state.getVerbosity(),
    injectionEnabled: true,
  });

  if (result.success()) {
    log.codepath.info(
      { name: options.name, expected: outcome.expectedTriggerCount, triggered: outcome.triggerCount },
      "exhausted"
    );
  } else {
    log.codepath.warn(
      {
        name: options.name,
        expected: outcome.expectedTriggerCount,
        triggered: outcome.triggerCount,
        unexpected: outcome.unexpectedResult && formatResult(outcome.unexpectedResult),
      },
      "codepath anomaly"
    );
  }

  return result;
}
