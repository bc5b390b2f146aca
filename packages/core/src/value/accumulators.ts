/**
 * Standard accumulators. Each reduces repeated occurrences of one argument
 * into the value stored in its holder. A default passed in as `previous` is
 * copied, never mutated.
 */

import type { Accumulator } from "@argloom/sdk";

/** Keeps only the last value given. */
export function discardAccumulator<T>(value: T): T {
  return value;
}

/** Collects every value, in order. */
export function listAccumulator<T>(value: T, previous: readonly T[] | undefined): T[] {
  return [...(previous ?? []), value];
}

/** Collects distinct values. */
export function setAccumulator<T>(value: T, previous: ReadonlySet<T> | undefined): Set<T> {
  const next = new Set(previous);
  next.add(value);
  return next;
}

/**
 * Counts `true` as +1 and `false` as -1, so a flag's inverse decrements.
 * May go below zero.
 */
export const flagCountAccumulator: Accumulator<boolean, number> = (value, previous) =>
  (previous ?? 0) + (value ? 1 : -1);
