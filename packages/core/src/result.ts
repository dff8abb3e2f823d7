/**
 * Generic Result pattern for explicit error handling.
 * Wrappers hand these around instead of throwing; see fail-safe.ts.
 */

import { InvalidStateError } from "./errors.js";
import type { OperationFailed } from "./errors.js";

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Result<T, never> {
  const result: Ok<T> = { ok: true, value };
  return Object.freeze(result);
}

export function err<E>(error: E): Result<never, E> {
  const result: Err<E> = { ok: false, error };
  return Object.freeze(result);
}

/** Failure carrying the single fail-safe error kind. */
export function failure(message: string, name?: string): Result<never, OperationFailed> {
  const error: OperationFailed =
    name === undefined
      ? { kind: "operation_failed", message }
      : { kind: "operation_failed", message, name };
  return err(Object.freeze(error));
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/**
 * Structural check: an object with a boolean `ok` and the matching
 * `value`/`error` key.
 */
export function isResult(candidate: unknown): candidate is Result<unknown, unknown> {
  if (typeof candidate !== "object" || candidate === null || !("ok" in candidate)) {
    return false;
  }
  if (candidate.ok === true) return "value" in candidate;
  if (candidate.ok === false) return "error" in candidate;
  return false;
}

/** Get the value of a Success. Throws InvalidStateError on a Failure. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new InvalidStateError("unwrap() called on a failed result");
  }
  return result.value;
}

/** Get the error of a Failure. Throws InvalidStateError on a Success. */
export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new InvalidStateError("unwrapErr() called on a successful result");
  }
  return result.error;
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

/** Message of an OperationFailed failure. */
export function failureMessage<T>(result: Result<T, OperationFailed>): string {
  return unwrapErr(result).message;
}
