/**
 * createDecorators — one-time setup for a family of wrappers.
 *
 * Validates config and fixes the sink and clock once; the returned
 * wrappers apply them by default. Options passed per wrapper still win.
 */

import { banner } from "./banner.js";
import type { BannerOptions } from "./banner.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import type { ConsoleOutput } from "./console.js";
import { LiveConsoleOutput } from "./console-live.js";
import type { OperationFailed } from "./errors.js";
import { failSafe } from "./fail-safe.js";
import type { FailSafeOptions } from "./fail-safe.js";
import { guard } from "./guard.js";
import type { GuardCheck, GuardOptions } from "./guard.js";
import { logTime } from "./log-time.js";
import type { LogTimeOptions } from "./log-time.js";
import { output } from "./output.js";
import type { OutputOptions } from "./output.js";
import type { Result } from "./result.js";
import { parseConfig } from "./schema.js";
import type { CallwrapConfig, CallwrapConfigInput } from "./types.js";

export type DecoratorsOptions = {
  out?: ConsoleOutput;
  clock?: Clock;
  config?: CallwrapConfigInput;
};

export type Decorators = {
  readonly out: ConsoleOutput;
  readonly config: CallwrapConfig;

  failSafe<A extends unknown[], T, E>(
    fn: (...args: A) => Result<T, E>,
    options?: FailSafeOptions,
  ): (...args: A) => Result<T, E | OperationFailed>;
  failSafe<A extends unknown[], R>(
    fn: (...args: A) => R,
    options?: FailSafeOptions,
  ): (...args: A) => Result<R, OperationFailed>;

  output<A extends unknown[], R>(fn: (...args: A) => R, options?: OutputOptions): (...args: A) => R;
  logTime<A extends unknown[], R>(fn: (...args: A) => R, options?: LogTimeOptions): (...args: A) => R;
  banner<A extends unknown[], R>(fn: (...args: A) => R, options?: BannerOptions): (...args: A) => R;
  guard<A extends unknown[], R>(
    fn: (...args: A) => R,
    check: GuardCheck<A>,
    options: GuardOptions<R>,
  ): (...args: A) => R;
};

/**
 * Throws ConfigError when `options.config` does not validate.
 */
export function createDecorators(options: DecoratorsOptions = {}): Decorators {
  const config = parseConfig(options.config ?? {});
  const out = options.out ?? new LiveConsoleOutput();
  const clock = options.clock ?? systemClock;

  function configuredFailSafe<A extends unknown[], T, E>(
    fn: (...args: A) => Result<T, E>,
    opts?: FailSafeOptions,
  ): (...args: A) => Result<T, E | OperationFailed>;
  function configuredFailSafe<A extends unknown[], R>(
    fn: (...args: A) => R,
    opts?: FailSafeOptions,
  ): (...args: A) => Result<R, OperationFailed>;
  function configuredFailSafe<A extends unknown[]>(
    fn: (...args: A) => unknown,
    opts: FailSafeOptions = {},
  ): (...args: A) => Result<unknown, unknown> {
    return failSafe(fn, {
      intercept: opts.intercept,
      unknownMessage: opts.unknownMessage ?? config.failSafe.unknownMessage,
    });
  }

  return {
    out,
    config,
    failSafe: configuredFailSafe,
    output: (fn, opts = {}) =>
      output(fn, {
        out: opts.out ?? out,
        label: opts.label ?? config.output.label,
        errorPrefix: opts.errorPrefix ?? config.output.errorPrefix,
        format: opts.format,
      }),
    logTime: (fn, opts = {}) =>
      logTime(fn, {
        out: opts.out ?? out,
        clock: opts.clock ?? clock,
        prefix: opts.prefix ?? config.timing.prefix,
        capture: opts.capture ?? config.timing.capture,
        formatTime: opts.formatTime,
      }),
    banner: (fn, opts = {}) =>
      banner(fn, {
        out: opts.out ?? out,
        border: opts.border ?? config.banner.border,
      }),
    guard: (fn, check, opts) => guard(fn, check, { fallback: opts.fallback, out: opts.out ?? out }),
  };
}
