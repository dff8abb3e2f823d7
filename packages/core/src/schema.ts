/**
 * callwrap config schema — runtime validation via Zod.
 *
 * The canonical type is CallwrapConfig in types.ts. Every field is optional
 * on input and filled from DEFAULT_CONFIG.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_CONFIG } from "./constants.js";
import type { CallwrapConfig } from "./types.js";

const outputSchema = z
  .object({
    label: z.string().default(DEFAULT_CONFIG.output.label),
    errorPrefix: z.string().default(DEFAULT_CONFIG.output.errorPrefix),
  })
  .strict();

const timingSchema = z
  .object({
    prefix: z.string().default(DEFAULT_CONFIG.timing.prefix),
    capture: z.enum(["before", "after"]).default(DEFAULT_CONFIG.timing.capture),
  })
  .strict();

const failSafeSchema = z
  .object({
    unknownMessage: z.string().min(1).default(DEFAULT_CONFIG.failSafe.unknownMessage),
  })
  .strict();

const bannerSchema = z
  .object({
    border: z.string().default(DEFAULT_CONFIG.banner.border),
  })
  .strict();

export const callwrapConfigSchema: z.ZodType<CallwrapConfig, z.ZodTypeDef, unknown> = z
  .object({
    output: outputSchema.default({}),
    timing: timingSchema.default({}),
    failSafe: failSafeSchema.default({}),
    banner: bannerSchema.default({}),
  })
  .strict();

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Parse and validate a callwrap config object. Throws ConfigError.
 */
export function parseConfig(raw: unknown): CallwrapConfig {
  const parsed = callwrapConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid callwrap config: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
