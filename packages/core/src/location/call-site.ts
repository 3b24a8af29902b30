/**
 * Call-site capture from V8 stack traces.
 */

import { fileURLToPath } from "node:url";
import type { CallSite } from "./types.js";

// "at fn (/path/file.ts:12:5)", "at /path/file.ts:12:5", "at file:///path/file.ts:12:5"
const FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/;

/**
 * Parse one line of a V8 stack trace into a file and line.
 *
 * @returns undefined for frames without a source position (native code,
 * `Promise.all` indices and the like)
 */
export function parseStackFrame(frame: string): CallSite | undefined {
  const match = FRAME_PATTERN.exec(frame);
  if (!match) return undefined;

  const [, rawFile, rawLine] = match;
  if (rawFile === undefined || rawLine === undefined) return undefined;

  const file = rawFile.startsWith("file://") ? fileURLToPath(rawFile) : rawFile;
  return { file, line: Number(rawLine) };
}

/**
 * Capture the call site of `boundary`'s caller.
 *
 * Frames from `boundary` upwards are dropped by V8, so the first parseable
 * frame is the code that called it.
 */
export function captureCallSite(boundary: (...args: never[]) => unknown): CallSite | undefined {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);

  const frames = (holder.stack ?? "").split("\n").slice(1);
  for (const frame of frames) {
    const site = parseStackFrame(frame);
    if (site) return site;
  }
  return undefined;
}
