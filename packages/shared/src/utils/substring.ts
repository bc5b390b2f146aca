/**
 * Longest common substring of two strings, with the parts around it.
 * Used to render a flag and its inverse compactly, e.g. `{no-}color`.
 */

export interface CommonSubstring {
  /** Text before the substring in the first string. */
  readonly firstPrefix: string;
  /** Text before the substring in the second string. */
  readonly secondPrefix: string;
  /** Text after the substring in the first string. */
  readonly firstSuffix: string;
  /** Text after the substring in the second string. */
  readonly secondSuffix: string;
  readonly substring: string;
}

function showChoice(a: string, b: string): string {
  if (a === "" && b === "") return "";
  const choice = a === "" ? b : b === "" ? a : `${a},${b}`;
  return `{${choice}}`;
}

/** `{first,second}` alternatives around the shared middle part. */
export function formatCommonSubstring(common: CommonSubstring): string {
  const prefix = showChoice(common.firstPrefix, common.secondPrefix);
  const suffix = showChoice(common.firstSuffix, common.secondSuffix);
  return `${prefix}${common.substring}${suffix}`;
}

// Dynamic programming over code points; the earliest longest match wins.
export function longestCommonSubstring(s: string, t: string): CommonSubstring {
  const sr = Array.from(s);
  const tr = Array.from(t);
  const lengths = sr.map(() => new Array<number>(tr.length).fill(0));

  let longest = 0;
  let sEnd = 0;
  let tEnd = 0;

  for (let i = 0; i < sr.length; i++) {
    for (let j = 0; j < tr.length; j++) {
      if (sr[i] !== tr[j]) continue;
      const run = i === 0 || j === 0 ? 1 : lengths[i - 1][j - 1] + 1;
      lengths[i][j] = run;
      if (run > longest) {
        longest = run;
        sEnd = i + 1;
        tEnd = j + 1;
      }
    }
  }

  const sBegin = sEnd - longest;
  const tBegin = tEnd - longest;

  return {
    firstPrefix: sr.slice(0, sBegin).join(""),
    secondPrefix: tr.slice(0, tBegin).join(""),
    firstSuffix: sr.slice(sEnd).join(""),
    secondSuffix: tr.slice(tEnd).join(""),
    substring: sr.slice(sBegin, sEnd).join(""),
  };
}
