/**
 * guard — checks arguments before the call and short-circuits to a
 * fallback when the check names a reason.
 */

import type { ConsoleOutput } from "./console.js";
import { LiveConsoleOutput } from "./console-live.js";

/** Returns a rejection reason, or undefined to let the call through. */
export type GuardCheck<A extends unknown[]> = (...args: A) => string | undefined;

export type GuardOptions<R> = {
  /** Returned instead of calling the inner function when the check rejects */
  fallback: R;
  out?: ConsoleOutput;
};

export function guard<A extends unknown[], R>(
  fn: (...args: A) => R,
  check: GuardCheck<A>,
  options: GuardOptions<R>,
): (...args: A) => R {
  const out = options.out ?? new LiveConsoleOutput();

  return (...args) => {
    const reason = check(...args);
    if (reason !== undefined) {
      out.warn(reason);
      return options.fallback;
    }
    return fn(...args);
  };
}
