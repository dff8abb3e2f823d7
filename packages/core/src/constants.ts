/**
 * Shared constants for callwrap.
 */

import type { CallwrapConfig } from "./types.js";

/** Rendered for a successful call that returned nothing */
export const UNIT_TEXT = "OK";

/** Defaults for every configurable wrapper */
export const DEFAULT_CONFIG: CallwrapConfig = {
  output: {
    label: "",
    errorPrefix: "There was an error:",
  },
  timing: {
    prefix: "> Logged at",
    capture: "before",
  },
  failSafe: {
    unknownMessage: "unknown failure",
  },
  banner: {
    border: "*******",
  },
};
