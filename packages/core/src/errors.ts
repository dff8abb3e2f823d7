/**
 * Error types.
 *
 * Recoverable failures are plain tagged objects carried in a Result.
 * The classes below are thrown for misuse only.
 */

// ── Recoverable ────────────────────────────────────────────────────────

/** The one failure kind produced by failSafe(). */
export type OperationFailed = {
  kind: "operation_failed";
  message: string;
  /** `name` of the thrown Error (e.g. "RangeError"); absent for non-Error throws */
  name?: string;
};

export type ConfigLoadError = {
  kind: "not_found" | "permission_denied" | "io_error" | "invalid_json" | "invalid_config";
  path: string;
  message: string;
};

// ── Thrown ─────────────────────────────────────────────────────────────

/** Extracting the wrong variant of a Result. */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Best-effort description of a thrown value, or undefined when there is none.
 */
export function describeThrown(thrown: unknown): string | undefined {
  if (thrown instanceof Error) {
    return thrown.message === "" ? undefined : thrown.message;
  }
  if (typeof thrown === "string") {
    return thrown === "" ? undefined : thrown;
  }
  return undefined;
}
