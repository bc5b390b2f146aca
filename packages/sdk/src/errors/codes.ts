/**
 * String codes carried by every ArgloomError.
 */
export const ErrorCode = {
  ARGLOOM_ERROR: "ARGLOOM_ERROR",

  // Registration (schema construction)
  REGISTRATION_ERROR: "REGISTRATION_ERROR",
  DUPLICATE_ARGUMENT: "DUPLICATE_ARGUMENT",
  INVALID_SHORT_OPTION: "INVALID_SHORT_OPTION",
  POSITIONAL_ORDER: "POSITIONAL_ORDER",
  DUPLICATE_COMMAND: "DUPLICATE_COMMAND",
  DUPLICATE_COMMAND_SET: "DUPLICATE_COMMAND_SET",
  DUPLICATE_USAGE_GROUP: "DUPLICATE_USAGE_GROUP",

  // Parsing
  UNKNOWN_OPTION: "UNKNOWN_OPTION",
  UNKNOWN_COMMAND: "UNKNOWN_COMMAND",
  MISSING_COMMAND: "MISSING_COMMAND",
  MISSING_POSITIONALS: "MISSING_POSITIONALS",
  MISSING_OPTION_VALUE: "MISSING_OPTION_VALUE",
  TOO_MANY_POSITIONALS: "TOO_MANY_POSITIONALS",
  VALUE_PARSING_FAILED: "VALUE_PARSING_FAILED",

  // Values
  INVALID_VALUE: "INVALID_VALUE",
  EMPTY_VALUE: "EMPTY_VALUE",

  // Dispatch
  HANDLER_NOT_FOUND: "HANDLER_NOT_FOUND",

  // Config
  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_VALIDATION_ERROR: "CONFIG_VALIDATION_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
