/** An option token split into its name and optional inline value. */
export interface OptionSplit {
  name: string;
  value: string | undefined;
}

/** `name=value` splits on the first `=`; later ones stay in the value. */
export function splitLongOption(text: string): OptionSplit {
  const eq = text.indexOf("=");
  if (eq === -1) {
    return { name: text, value: undefined };
  }
  return { name: text.slice(0, eq), value: text.slice(eq + 1) };
}

/** `xvalue` or `x=value`, where `x` is a single short option character. */
export function splitShortOption(text: string): OptionSplit {
  if (text.length < 2) {
    return { name: text, value: undefined };
  }
  if (text[1] === "=") {
    return splitLongOption(text);
  }
  return { name: text[0], value: text.slice(1) };
}
