/**
 * Error hierarchy for argloom.
 *
 * Registration errors are programmer bugs raised while a schema is built.
 * Parsing errors are the normal outcome of bad command-line input and carry
 * a closed `kind` callers can switch on.
 */

import { ErrorCode } from "./codes.js";

export class ArgloomError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "ArgloomError";
  }
}

/**
 * Thrown while registering arguments, never while parsing.
 * Common causes:
 * - Duplicate long name, short alias or command name
 * - A mandatory positional after an optional one
 * - Any positional after a multi-valued one
 */
export class RegistrationError extends ArgloomError {
  constructor(
    public readonly argument: string,
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(`Invalid argument "${argument}": ${message}`, options?.code ?? ErrorCode.REGISTRATION_ERROR, options);
    this.name = "RegistrationError";
  }
}

/**
 * Thrown by a ValueParser that cannot make sense of its input.
 * The reason ends up in ArgParsingError's `valueParsingFailed` detail.
 */
export class ValueParserError extends ArgloomError {
  constructor(public readonly reason: string) {
    super(reason, ErrorCode.INVALID_VALUE);
    this.name = "ValueParserError";
  }
}

/** A value holder was read before parsing filled it. */
export class EmptyValueError extends ArgloomError {
  constructor(public readonly holderName: string) {
    super(`Value of "${holderName}" was read before it was parsed`, ErrorCode.EMPTY_VALUE);
    this.name = "EmptyValueError";
  }
}

export class ConfigError extends ArgloomError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

export type ArgParsingErrorKind =
  | "unknownOption"
  | "unknownCommand"
  | "missingCommand"
  | "missingPositionals"
  | "missingOptionValue"
  | "tooManyPositionals"
  | "valueParsingFailed";

export type ArgParsingErrorDetail =
  | { kind: "unknownOption"; option: string }
  | { kind: "unknownCommand"; command: string }
  | { kind: "missingCommand" }
  | { kind: "missingPositionals"; positionals: readonly string[] }
  | { kind: "missingOptionValue"; option: string }
  | { kind: "tooManyPositionals"; positional: string }
  | { kind: "valueParsingFailed"; argument: string; value: string; reason: string };

const KIND_CODES: Record<ArgParsingErrorKind, string> = {
  unknownOption: ErrorCode.UNKNOWN_OPTION,
  unknownCommand: ErrorCode.UNKNOWN_COMMAND,
  missingCommand: ErrorCode.MISSING_COMMAND,
  missingPositionals: ErrorCode.MISSING_POSITIONALS,
  missingOptionValue: ErrorCode.MISSING_OPTION_VALUE,
  tooManyPositionals: ErrorCode.TOO_MANY_POSITIONALS,
  valueParsingFailed: ErrorCode.VALUE_PARSING_FAILED,
};

function describe(detail: ArgParsingErrorDetail): string {
  switch (detail.kind) {
    case "unknownOption":
      return `Unknown option: ${detail.option}`;
    case "unknownCommand":
      return `Unknown command: ${detail.command}`;
    case "missingCommand":
      return "A command is required";
    case "missingPositionals":
      return `Missing required positional argument(s): ${detail.positionals.join(", ")}`;
    case "missingOptionValue":
      return `Option ${detail.option} requires a value`;
    case "tooManyPositionals":
      return `Too many positional arguments: ${detail.positional}`;
    case "valueParsingFailed":
      return `Failed to parse ${detail.argument}[=${detail.value}]: ${detail.reason}`;
  }
}

/**
 * Error thrown when parsing a token vector fails. The first error wins;
 * holders filled before it keep their values.
 */
export class ArgParsingError extends ArgloomError {
  constructor(
    public readonly detail: ArgParsingErrorDetail,
    options?: { cause?: Error },
  ) {
    super(describe(detail), KIND_CODES[detail.kind], options);
    this.name = "ArgParsingError";
  }

  get kind(): ArgParsingErrorKind {
    return this.detail.kind;
  }

  static unknownOption(option: string): ArgParsingError {
    return new ArgParsingError({ kind: "unknownOption", option });
  }

  static unknownCommand(command: string): ArgParsingError {
    return new ArgParsingError({ kind: "unknownCommand", command });
  }

  static missingCommand(): ArgParsingError {
    return new ArgParsingError({ kind: "missingCommand" });
  }

  static missingPositionals(positionals: readonly string[]): ArgParsingError {
    return new ArgParsingError({ kind: "missingPositionals", positionals });
  }

  static missingOptionValue(option: string): ArgParsingError {
    return new ArgParsingError({ kind: "missingOptionValue", option });
  }

  static tooManyPositionals(positional: string): ArgParsingError {
    return new ArgParsingError({ kind: "tooManyPositionals", positional });
  }

  static valueParsingFailed(argument: string, value: string, cause: ValueParserError): ArgParsingError {
    return new ArgParsingError(
      { kind: "valueParsingFailed", argument, value, reason: cause.reason },
      { cause },
    );
  }
}
