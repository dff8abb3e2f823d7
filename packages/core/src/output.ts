/**
 * output — renders what a callable returned, then hands it back untouched.
 *
 * A failed Result renders as `<errorPrefix> <message>` on the error channel;
 * anything else renders as `<label> <value>`.
 */

import type { ConsoleOutput } from "./console.js";
import { LiveConsoleOutput } from "./console-live.js";
import { DEFAULT_CONFIG, UNIT_TEXT } from "./constants.js";
import { isResult } from "./result.js";

export type OutputOptions = {
  out?: ConsoleOutput;
  label?: string;
  errorPrefix?: string;
  /** Text for a value. Default: String(value), with undefined as "OK". */
  format?: (value: unknown) => string;
};

export function formatValue(value: unknown): string {
  return value === undefined ? UNIT_TEXT : String(value);
}

/** Message text of a Result error, whatever shape it has. */
export function errorText(error: unknown): string {
  if (typeof error === "string") return error;
  if (typeof error === "object" && error !== null && "message" in error) {
    if (typeof error.message === "string") return error.message;
  }
  return String(error);
}

function joinLine(prefix: string, text: string): string {
  return prefix === "" ? text : `${prefix} ${text}`;
}

export function output<A extends unknown[], R>(
  fn: (...args: A) => R,
  options: OutputOptions = {},
): (...args: A) => R {
  const out = options.out ?? new LiveConsoleOutput();
  const label = options.label ?? DEFAULT_CONFIG.output.label;
  const errorPrefix = options.errorPrefix ?? DEFAULT_CONFIG.output.errorPrefix;
  const format = options.format ?? formatValue;

  return (...args) => {
    const outcome = fn(...args);

    if (!isResult(outcome)) {
      out.write(joinLine(label, format(outcome)));
    } else if (outcome.ok) {
      out.write(joinLine(label, format(outcome.value)));
    } else {
      out.error(joinLine(errorPrefix, errorText(outcome.error)));
    }

    return outcome;
  };
}
