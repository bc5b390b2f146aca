/**
 * Function shapes every argument is generic over.
 *
 * - `T` is the type of one parsed occurrence.
 * - `U` is the type stored in the argument's holder after accumulation.
 */

/**
 * Parses one raw token into a value. Rejects input by throwing a
 * `ValueParserError` carrying a human-readable reason.
 */
export type ValueParser<T> = (text: string) => T;

/** Renders a value back to text, for usage output and command lookup. */
export type ValuePrinter<T> = (value: T) => string;

/**
 * Merges a newly parsed occurrence into the previously stored value.
 * `previous` is the default (or `undefined`) on the first occurrence.
 *
 * ```ts
 * const sum: Accumulator<number, number> = (n, total) => (total ?? 0) + n;
 * ```
 */
export type Accumulator<T, U> = (value: T, previous: U | undefined) => U;
