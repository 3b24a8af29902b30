/**
 * Location types.
 */

/**
 * Where a probe was visited. Used for logging and history only, never for
 * control flow.
 */
export interface Location {
  /** Package or module the probe belongs to */
  readonly module?: string;
  /** Source file of the probe */
  readonly file: string;
  /** Line of the probe in `file` (0 when unknown) */
  readonly line: number;
  /** Human description given at the probe */
  readonly description?: string;
}

/**
 * Explicit probe identity supplied by the caller instead of a captured
 * call site.
 */
export interface CallSite {
  file: string;
  line: number;
}

export const UNKNOWN_CALL_SITE: CallSite = { file: "<unknown>", line: 0 };
