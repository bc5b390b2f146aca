import type { InverseGenerator } from "@argloom/sdk";

const PREFIX_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ["with-", "without-"],
  ["enable-", "disable-"],
];

/**
 * Inverse names built from well-known prefixes:
 * `with-x` ↔ `without-x`, `enable-x` ↔ `disable-x`, `no-x` → `x`, otherwise `no-x`.
 */
export const prefixInverseGenerator: InverseGenerator = (name) => {
  for (const [positive, negative] of PREFIX_PAIRS) {
    if (name.startsWith(positive)) return negative + name.slice(positive.length);
    if (name.startsWith(negative)) return positive + name.slice(negative.length);
  }
  if (name.startsWith("no-") && name.length > 3) return name.slice(3);
  return `no-${name}`;
};
