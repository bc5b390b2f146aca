export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { ArgConfigSchema, InverseStrategySchema } from "./utils/config-schema.js";
export type { SerializedArgConfig, InverseStrategy } from "./utils/config-schema.js";

export { longestCommonSubstring, formatCommonSubstring } from "./utils/substring.js";
export type { CommonSubstring } from "./utils/substring.js";

export { wrapText } from "./utils/text.js";
export type { TextWrapper } from "./utils/text.js";
