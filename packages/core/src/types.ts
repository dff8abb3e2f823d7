/**
 * callwrap core types
 */

// ── Config ─────────────────────────────────────────────────────────────

/** When logTime() reads the clock relative to the wrapped call */
export type CaptureMoment = "before" | "after";

export type OutputConfig = {
  /** Text placed before a rendered value; empty renders the value alone */
  label: string;
  /** Text placed before a failure message */
  errorPrefix: string;
};

export type TimingConfig = {
  /** Text placed before the timestamp */
  prefix: string;
  capture: CaptureMoment;
};

export type FailSafeConfig = {
  /** Message used when a thrown value carries no description */
  unknownMessage: string;
};

export type BannerConfig = {
  border: string;
};

export type CallwrapConfig = {
  output: OutputConfig;
  timing: TimingConfig;
  failSafe: FailSafeConfig;
  banner: BannerConfig;
};

/** Config as written by a caller: every section and field optional */
export type CallwrapConfigInput = {
  [Section in keyof CallwrapConfig]?: Partial<CallwrapConfig[Section]>;
};
