/**
 * Builds an ArgConfig from serialized input (e.g. a parsed JSON file).
 */

import { ConfigError, ErrorCode } from "@argloom/sdk";
import type { ArgConfig } from "@argloom/sdk";
import { ArgConfigSchema, createLogger, validateInput } from "@argloom/shared";
import { defaultArgConfig, goArgConfig, withArgConfig } from "./arg-config.js";
import { prefixInverseGenerator } from "./inverse.js";

const logger = createLogger("ArgConfig");

/**
 * Validate `input` and layer it over its preset.
 * A `null` prefix or separator turns that feature off; an omitted one keeps the preset's.
 */
export function loadArgConfig(input: unknown): ArgConfig {
  const result = validateInput(ArgConfigSchema, input);
  if (!result.success) {
    throw new ConfigError(`Invalid parser config: ${result.error}`, {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }

  const data = result.data;
  const base = data.preset === "go" ? goArgConfig : defaultArgConfig;
  const overrides: { -readonly [K in keyof ArgConfig]?: ArgConfig[K] } = {};

  if (data.longPrefix !== undefined) overrides.longPrefix = data.longPrefix;
  if (data.shortPrefix !== undefined) overrides.shortPrefix = data.shortPrefix ?? undefined;
  if (data.disableOptionsAfter !== undefined) {
    overrides.disableOptionsAfter = data.disableOptionsAfter ?? undefined;
  }
  if (data.noOptionsAfterPositional !== undefined) {
    overrides.noOptionsAfterPositional = data.noOptionsAfterPositional;
  }
  if (data.inverse !== undefined) {
    overrides.inverseGenerator = data.inverse === "prefix" ? prefixInverseGenerator : undefined;
  }

  const config = withArgConfig(base, overrides);
  if (config.shortPrefix === config.longPrefix) {
    throw new ConfigError(`Invalid parser config: short and long option prefixes are both "${config.longPrefix}"`, {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }

  logger.debug("Loaded parser config", { preset: data.preset ?? "default", keys: Object.keys(overrides) });
  return config;
}
