/** Requirement rule of a positional: mandatory, or optional with a default. */
export type Requires<U> =
  | { readonly mandatory: true }
  | { readonly mandatory: false; readonly defaultValue: U };

export const Requires = {
  mandatory<U>(): Requires<U> {
    return { mandatory: true };
  },
  optional<U>(defaultValue: U): Requires<U> {
    return { mandatory: false, defaultValue };
  },
};
