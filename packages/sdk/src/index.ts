// Types
export type { ValueParser, ValuePrinter, Accumulator } from "./types/value.js";
export type { ArgConfig, InverseGenerator } from "./types/config.js";

// Errors
export {
  ArgloomError,
  RegistrationError,
  ValueParserError,
  EmptyValueError,
  ConfigError,
  ArgParsingError,
} from "./errors/base.js";
export type { ArgParsingErrorKind, ArgParsingErrorDetail } from "./errors/base.js";
export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
