// Values
export * from "./value/index.js";

// Definitions
export * from "./definition/index.js";

// Config
export * from "./config/index.js";

// Registry
export * from "./registry/index.js";

// Parsing
export * from "./parsing/index.js";

// Usage
export * from "./usage/index.js";

// Parsers
export { ArgParser, AppArgParser, CommandParser, CommandSet } from "./parser.js";
export type {
  AppArgParserOptions,
  ExitFunction,
  FlagOptions,
  HelpOptions,
  MultiFlagOptions,
  MultiOptionOptions,
  MultiPositionalOptions,
  OptionOptions,
  PositionalOptions,
  PrintUsageOptions,
} from "./parser.js";

// Dispatch
export * from "./dispatch/index.js";
