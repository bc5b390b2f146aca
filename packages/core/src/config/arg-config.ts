import type { ArgConfig } from "@argloom/sdk";

export const defaultArgConfig: ArgConfig = Object.freeze({
  longPrefix: "--",
  shortPrefix: "-",
  disableOptionsAfter: "--",
  noOptionsAfterPositional: false,
  inverseGenerator: undefined,
});

/** Single-dash long options, no clustering, options end at the first positional. */
export const goArgConfig: ArgConfig = Object.freeze({
  longPrefix: "-",
  shortPrefix: undefined,
  disableOptionsAfter: "--",
  noOptionsAfterPositional: true,
  inverseGenerator: undefined,
});

export function withArgConfig(base: ArgConfig, overrides: Partial<ArgConfig>): ArgConfig {
  return Object.freeze({ ...base, ...overrides });
}
