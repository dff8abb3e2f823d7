/**
 * logTime — writes a timestamp line after each call. Observes only.
 */

import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import type { ConsoleOutput } from "./console.js";
import { LiveConsoleOutput } from "./console-live.js";
import { DEFAULT_CONFIG } from "./constants.js";
import type { CaptureMoment } from "./types.js";

export type LogTimeOptions = {
  out?: ConsoleOutput;
  clock?: Clock;
  prefix?: string;
  /** Read the clock before the call (default) or after it returns */
  capture?: CaptureMoment;
  formatTime?: (time: Date) => string;
};

/**
 * The line is written only once the inner call returns; a throw propagates
 * and nothing is logged.
 */
export function logTime<A extends unknown[], R>(
  fn: (...args: A) => R,
  options: LogTimeOptions = {},
): (...args: A) => R {
  const out = options.out ?? new LiveConsoleOutput();
  const clock = options.clock ?? systemClock;
  const prefix = options.prefix ?? DEFAULT_CONFIG.timing.prefix;
  const capture = options.capture ?? DEFAULT_CONFIG.timing.capture;
  const formatTime = options.formatTime ?? ((time: Date) => time.toISOString());

  return (...args) => {
    let time = capture === "before" ? clock.now() : undefined;
    const result = fn(...args);
    time ??= clock.now();
    const text = formatTime(time);
    out.info(prefix === "" ? text : `${prefix} ${text}`);
    return result;
  };
}
