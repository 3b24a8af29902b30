/**
 * Probes: points where an operation's result may be replaced by an injected
 * error.
 *
 * The operation is evaluated by the caller, before the probe runs and
 * outside the state lock, so operations that contain probes of their own
 * are safe to wrap.
 *
 * @example
 * const res = probe(readFileResult(path), [new Error("EACCES")], "read config");
 * if (res.isErr()) return err(new ConfigLoadError(res.error));
 */

import { ResultAsync, type Result } from "neverthrow";
import { captureCallSite } from "../location/call-site.js";
import { UNKNOWN_CALL_SITE, type Location } from "../location/types.js";
import { meetsVerbosity } from "../state/functions.js";
import { getInjectionState } from "../state/registry.js";
import type { CandidateSource, Candidates, InjectionState } from "../state/types.js";
import type { ProbeOptions } from "./types.js";

function normalizeOptions(options: string | ProbeOptions | undefined): ProbeOptions {
  if (typeof options === "string") {
    return { description: options };
  }
  return options ?? {};
}

function resolveCandidates<E>(source: CandidateSource<E>): Candidates<E> {
  return typeof source === "function" ? source() : source;
}

/**
 * Build the probe's location. The stack is only walked when something will
 * read the result (verbosity above "none") and no explicit location is given.
 */
function resolveLocation(
  state: InjectionState,
  options: ProbeOptions,
  boundary: (...args: never[]) => unknown
): Location {
  const site =
    options.location ??
    (meetsVerbosity(state.getVerbosity(), "moderate") ? captureCallSite(boundary) : undefined) ??
    UNKNOWN_CALL_SITE;

  return {
    file: site.file,
    line: site.line,
    ...(options.module !== undefined && { module: options.module }),
    ...(options.description !== undefined && { description: options.description }),
  };
}

/**
 * Pass `result` through, or substitute one of `candidates` when this probe
 * holds the ordinal selected by `startTrigger`.
 *
 * @param result - Already-evaluated outcome of the guarded operation
 * @param candidates - One to three errors, in ordinal order, or a function
 *   building them (never called when injection is disabled)
 * @param options - Description string, or full probe options
 */
export function probe<T, E>(
  result: Result<T, E>,
  candidates: CandidateSource<E>,
  options?: string | ProbeOptions
): Result<T, E> {
  const opts = normalizeOptions(options);
  const state = opts.state ?? getInjectionState();

  if (!state.isEnabled()) {
    return result;
  }

  const location = resolveLocation(state, opts, probe);
  return state.visit(result, resolveCandidates(candidates), location);
}

/**
 * `probe` for an operation that is still pending. The call site is captured
 * now; the state is consulted once the operation settles.
 */
export function probeAsync<T, E>(
  pending: PromiseLike<Result<T, E>>,
  candidates: CandidateSource<E>,
  options?: string | ProbeOptions
): ResultAsync<T, E> {
  const opts = normalizeOptions(options);
  const state = opts.state ?? getInjectionState();

  if (!state.isEnabled()) {
    return new ResultAsync(Promise.resolve(pending));
  }

  const location = resolveLocation(state, opts, probeAsync);
  return new ResultAsync(
    Promise.resolve(pending).then((result) =>
      state.visit(result, resolveCandidates(candidates), location)
    )
  );
}
