import type { CallSite } from "../location/types.js";
import type { InjectionState } from "../state/types.js";

export interface ProbeOptions {
  /** Human description shown in log lines and reports */
  description?: string;
  /** Explicit identity; skips call-stack capture */
  location?: CallSite;
  /** Package or module the probe belongs to */
  module?: string;
  /** State to consult instead of the process-wide one */
  state?: InjectionState;
}
