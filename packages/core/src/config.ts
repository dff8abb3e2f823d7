/**
 * Config loading — reads a callwrap.json file and validates it.
 */

import { readFile } from "node:fs/promises";
import type { ConfigLoadError } from "./errors.js";
import { ConfigError } from "./errors.js";
import { ok, err } from "./result.js";
import type { Result } from "./result.js";
import { parseConfig } from "./schema.js";
import type { CallwrapConfig } from "./types.js";

export const CONFIG_FILENAME = "callwrap.json";

/** Map a read failure's errno to a typed load error */
function mapReadError(e: unknown, path: string): ConfigLoadError {
  const message = e instanceof Error ? e.message : String(e);
  if (e instanceof Error && "code" in e) {
    if (e.code === "ENOENT") {
      return { kind: "not_found", path, message: `No ${CONFIG_FILENAME} found at ${path}` };
    }
    if (e.code === "EACCES" || e.code === "EPERM") {
      return { kind: "permission_denied", path, message };
    }
  }
  return { kind: "io_error", path, message };
}

/**
 * Load and validate a config file. A missing file is a `not_found` error,
 * not a fallback to defaults; callers decide.
 */
export async function loadConfig(path: string): Promise<Result<CallwrapConfig, ConfigLoadError>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (e) {
    return err(mapReadError(e, path));
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return err({ kind: "invalid_json", path, message });
  }

  try {
    return ok(parseConfig(json));
  } catch (e) {
    if (e instanceof ConfigError) {
      return err({ kind: "invalid_config", path, message: e.message });
    }
    throw e;
  }
}
