// Shared primitives
export type {
  CallwrapConfig,
  CallwrapConfigInput,
  CaptureMoment,
  OutputConfig,
  TimingConfig,
  FailSafeConfig,
  BannerConfig,
} from "./types.js";

// Result (generic pattern)
export type { Result, Ok, Err } from "./result.js";
export {
  ok,
  err,
  failure,
  isOk,
  isErr,
  isResult,
  unwrap,
  unwrapErr,
  unwrapOr,
  failureMessage,
} from "./result.js";

// Errors
export type { OperationFailed, ConfigLoadError } from "./errors.js";
export { InvalidStateError, ConfigError, describeThrown } from "./errors.js";

// Config
export { callwrapConfigSchema, parseConfig } from "./schema.js";
export { loadConfig, CONFIG_FILENAME } from "./config.js";
export { DEFAULT_CONFIG, UNIT_TEXT } from "./constants.js";

// Console output
export type { ConsoleOutput } from "./console.js";
export { LiveConsoleOutput } from "./console-live.js";
export type { LiveConsoleStreams } from "./console-live.js";
export { MockConsoleOutput } from "./console-mock.js";
export type { CapturedLine } from "./console-mock.js";

// Clock
export type { Clock } from "./clock.js";
export { systemClock, fixedClock } from "./clock.js";

// Wrappers
export { failSafe, instancesOf } from "./fail-safe.js";
export type { FailSafeOptions } from "./fail-safe.js";
export { output, formatValue, errorText } from "./output.js";
export type { OutputOptions } from "./output.js";
export { logTime } from "./log-time.js";
export type { LogTimeOptions } from "./log-time.js";
export { banner } from "./banner.js";
export type { BannerOptions } from "./banner.js";
export { guard } from "./guard.js";
export type { GuardCheck, GuardOptions } from "./guard.js";

// Argument adapters
export { visit, bindReceiver, bindMethod, partial } from "./adapt.js";
export type { MethodKey, BoundMethod } from "./adapt.js";

// Composition
export { pipe } from "./compose.js";
export { createDecorators } from "./decorators.js";
export type { Decorators, DecoratorsOptions } from "./decorators.js";
