/**
 * Synthesizes the inverse name of a flag (e.g. `color` → `no-color`).
 * Returning `undefined` leaves the flag without an inverse.
 */
export type InverseGenerator = (name: string) => string | undefined;

/** Tokenizer policy consumed by the parsing state machine. */
export interface ArgConfig {
  /** Prefix of long options. Default: "--" */
  readonly longPrefix: string;

  /** Prefix of short options and clusters; `undefined` disables them. Default: "-" */
  readonly shortPrefix: string | undefined;

  /** Token that turns off option recognition for the rest of the scope. Default: "--" */
  readonly disableOptionsAfter: string | undefined;

  /** Whether the first positional turns off option recognition. Default: false */
  readonly noOptionsAfterPositional: boolean;

  /** Used for flags registered with an "auto" inverse. Default: none */
  readonly inverseGenerator: InverseGenerator | undefined;
}
