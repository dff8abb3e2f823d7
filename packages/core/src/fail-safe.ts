/**
 * failSafe — turns a throwing callable into one that returns a Result.
 *
 * Normal returns become `ok(value)`; intercepted throws become an
 * `operation_failed` error. A callable that already returns a Result is
 * passed through as is, so nesting never double-wraps.
 */

import { DEFAULT_CONFIG } from "./constants.js";
import { describeThrown } from "./errors.js";
import type { OperationFailed } from "./errors.js";
import { failure, isResult, ok } from "./result.js";
import type { Result } from "./result.js";

export type FailSafeOptions = {
  /**
   * Which thrown values to convert. Anything it rejects is re-thrown.
   * Default: everything.
   */
  intercept?: (thrown: unknown) => boolean;
  /** Message for throws that carry no description */
  unknownMessage?: string;
};

type ErrorClass = abstract new (...args: never[]) => Error;

/** Intercept predicate matching instances of the given error classes. */
export function instancesOf(...classes: ErrorClass[]): (thrown: unknown) => boolean {
  return (thrown) => classes.some((cls) => thrown instanceof cls);
}

export function failSafe<A extends unknown[], T, E>(
  fn: (...args: A) => Result<T, E>,
  options?: FailSafeOptions,
): (...args: A) => Result<T, E | OperationFailed>;
export function failSafe<A extends unknown[], R>(
  fn: (...args: A) => R,
  options?: FailSafeOptions,
): (...args: A) => Result<R, OperationFailed>;
export function failSafe<A extends unknown[]>(
  fn: (...args: A) => unknown,
  options: FailSafeOptions = {},
): (...args: A) => Result<unknown, unknown> {
  const { intercept } = options;
  const unknownMessage = options.unknownMessage ?? DEFAULT_CONFIG.failSafe.unknownMessage;

  return (...args) => {
    let value: unknown;
    try {
      value = fn(...args);
    } catch (e) {
      if (intercept !== undefined && !intercept(e)) throw e;
      return failure(describeThrown(e) ?? unknownMessage, e instanceof Error ? e.name : undefined);
    }
    return isResult(value) ? value : ok(value);
  };
}
