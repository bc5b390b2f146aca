/**
 * Standard value parsers and printers, and helpers to compose them.
 *
 * Parsers are plain functions: compose them with `mapValue`/`also` rather than
 * wrapping them in classes.
 */

import { ValueParserError } from "@argloom/sdk";
import type { ValueParser, ValuePrinter } from "@argloom/sdk";

/**
 * Calls `parser`, then `fn` with its result.
 *
 * ```ts
 * const port = mapValue(intValueParser, (n) => ({ port: n }));
 * ```
 */
export function mapValue<T, S>(parser: ValueParser<T>, fn: (value: T) => S): ValueParser<S> {
  return (text) => fn(parser(text));
}

/** Calls `parser`, hands the result to `fn` for side effects, and returns it. */
export function also<T>(parser: ValueParser<T>, fn: (value: T) => void): ValueParser<T> {
  return mapValue(parser, (value) => {
    fn(value);
    return value;
  });
}

/** Rejects parsed values failing `check` with `reason`. */
export function validated<T>(
  parser: ValueParser<T>,
  check: (value: T) => boolean,
  reason: string,
): ValueParser<T> {
  return also(parser, (value) => {
    if (!check(value)) throw new ValueParserError(reason);
  });
}

export const toStringValuePrinter = <T>(value: T): string => String(value);

export const stringValueParser: ValueParser<string> = (text) => text;

const DECIMAL_INT = /^[+-]?\d+$/;
const DECIMAL_NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function digitPattern(radix: number): RegExp {
  const digits = "0123456789abcdefghijklmnopqrstuvwxyz".slice(0, radix);
  return new RegExp(`^[+-]?[${digits}]+$`, "i");
}

/** Integers in the given radix (2–36); rejects partial input like `12abc`. */
export function intValueParserWithRadix(radix: number): ValueParser<number> {
  if (!Number.isInteger(radix) || radix < 2 || radix > 36) {
    throw new RangeError(`Radix must be an integer between 2 and 36, got ${radix}`);
  }
  const pattern = radix === 10 ? DECIMAL_INT : digitPattern(radix);
  return (text) => {
    if (!pattern.test(text)) throw new ValueParserError("Invalid int");
    const value = Number.parseInt(text, radix);
    if (!Number.isSafeInteger(value)) throw new ValueParserError("Invalid int");
    return value === 0 ? 0 : value;
  };
}

export const intValueParser: ValueParser<number> = intValueParserWithRadix(10);

/** Decimal numbers with an optional exponent, e.g. `-1.5` or `2e3`. No hex, no padding. */
export const numberValueParser: ValueParser<number> = (text) => {
  const value = DECIMAL_NUMBER.test(text) ? Number(text) : Number.NaN;
  if (!Number.isFinite(value)) throw new ValueParserError("Invalid number");
  return value === 0 ? 0 : value;
};

/**
 * Maps the printed form of each choice back to the choice.
 *
 * ```ts
 * const level = stringChoiceValueParser(["low", "high"]);
 * level("low");  // "low"
 * level("mid");  // throws: Value not in available choices: low, high
 * ```
 */
export function stringChoiceValueParser<T>(
  choices: readonly T[],
  printer: ValuePrinter<T> = toStringValuePrinter,
): ValueParser<T> {
  const entries = choices.map((choice) => [printer(choice), choice] as const);
  const formatted = entries.map(([printed]) => printed).join(", ");

  return (text) => {
    const match = entries.find(([printed]) => printed === text);
    if (!match) {
      throw new ValueParserError(`Value not in available choices: ${formatted}`);
    }
    return match[1];
  };
}

export const boolValueParser: ValueParser<boolean> = stringChoiceValueParser([true, false]);

/** Flips the result of a boolean parser. */
export function negateFlag(parser: ValueParser<boolean>): ValueParser<boolean> {
  return mapValue(parser, (value) => !value);
}

/**
 * Restricts an already-parsed value to `choices`.
 *
 * ```ts
 * const twoOrFour = choiceValueParser([2, 4], intValueParser);
 * twoOrFour("3");  // throws: Value not in available choices: 2, 4
 * ```
 */
export function choiceValueParser<T>(
  choices: readonly T[],
  parser: ValueParser<T>,
  printer: ValuePrinter<T> = toStringValuePrinter,
): ValueParser<T> {
  const formatted = choices.map(printer).join(", ");
  return also(parser, (value) => {
    if (!choices.includes(value)) {
      throw new ValueParserError(`Value not in available choices: ${formatted}`);
    }
  });
}

type EnumLike = Record<string, string | number>;

// Numeric members also map value -> name (`"-1" -> "Back"`); only names count.
function enumEntries<E extends EnumLike>(enumObject: E): Array<[string, E[keyof E]]> {
  const lookup: EnumLike = enumObject;
  const entries: Array<[string, E[keyof E]]> = [];
  for (const key in enumObject) {
    const value = enumObject[key];
    if (typeof value === "string" && typeof lookup[value] === "number") continue;
    entries.push([key, value]);
  }
  return entries;
}

/** Prints an enum value as its member name. */
export function enumValuePrinter<E extends EnumLike>(enumObject: E): ValuePrinter<E[keyof E]> {
  const entries = enumEntries(enumObject);
  return (value) => entries.find(([, member]) => member === value)?.[0] ?? String(value);
}

/**
 * Parses member names of a TypeScript enum.
 *
 * ```ts
 * enum Mode { Fast = "fast", Safe = "safe" }
 * const mode = enumChoiceValueParser(Mode);
 * mode("Fast");  // Mode.Fast
 * ```
 */
export function enumChoiceValueParser<E extends EnumLike>(
  enumObject: E,
  intercept?: (name: string) => string,
): ValueParser<E[keyof E]> {
  const print = enumValuePrinter(enumObject);
  const values = enumEntries(enumObject).map(([, member]) => member);
  return stringChoiceValueParser(values, intercept ? (value) => intercept(print(value)) : print);
}
