/**
 * Reads the parser config named by ARGLOOM_CONFIG.
 */

import { readFileSync } from "node:fs";
import { defaultArgConfig, loadArgConfig } from "@argloom/core";
import { ConfigError, ErrorCode } from "@argloom/sdk";
import type { ArgConfig } from "@argloom/sdk";
import { createLogger } from "@argloom/shared";

const logger = createLogger("ConfigLoader");

export const CONFIG_ENV_VAR = "ARGLOOM_CONFIG";

export function readArgConfigFile(path: string): ArgConfig {
  let input: unknown;
  try {
    input = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new ConfigError(`Cannot read parser config ${path}: ${cause.message}`, {
      code: ErrorCode.CONFIG_ERROR,
      cause,
    });
  }
  return loadArgConfig(input);
}

/** The config from the file in ARGLOOM_CONFIG, or the default config when unset. */
export function resolveArgConfig(env: NodeJS.ProcessEnv = process.env): ArgConfig {
  const path = env[CONFIG_ENV_VAR];
  if (!path) return defaultArgConfig;

  logger.debug("Loading parser config", { path });
  return readArgConfigFile(path);
}
