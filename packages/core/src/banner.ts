/**
 * banner — frames whatever the inner call prints between two border lines.
 */

import type { ConsoleOutput } from "./console.js";
import { LiveConsoleOutput } from "./console-live.js";
import { DEFAULT_CONFIG } from "./constants.js";

export type BannerOptions = {
  out?: ConsoleOutput;
  border?: string;
};

export function banner<A extends unknown[], R>(
  fn: (...args: A) => R,
  options: BannerOptions = {},
): (...args: A) => R {
  const out = options.out ?? new LiveConsoleOutput();
  const border = options.border ?? DEFAULT_CONFIG.banner.border;

  return (...args) => {
    out.write(border);
    const result = fn(...args);
    out.write(border);
    return result;
  };
}
