/**
 * Wraps `text` into lines no wider than `width`.
 */
export type TextWrapper = (text: string, width: number) => string[];

/**
 * Word wrapping on whitespace, splitting words longer than a full line.
 * Existing newlines are kept; lines that already fit are left untouched.
 */
export const wrapText: TextWrapper = (text, width) => {
  const lines: string[] = [];

  for (const line of text.split("\n")) {
    if (line.length < width) {
      lines.push(line);
      continue;
    }

    let buffer = "";
    for (let word of line.split(/\s+/).filter((w) => w !== "")) {
      let needsSpace = buffer !== "";
      const spaceNeeded = word.length + (needsSpace ? 1 : 0);

      if (width - buffer.length < spaceNeeded) {
        if (buffer !== "") lines.push(buffer);
        buffer = "";
        needsSpace = false;

        if (word.length > width) {
          const whole = word.length - (word.length % width);
          for (let i = 0; i < whole; i += width) {
            lines.push(word.slice(i, i + width));
          }
          word = word.slice(whole);
        }
      }

      if (needsSpace) buffer += " ";
      buffer += word;
    }

    if (buffer !== "") lines.push(buffer);
  }

  return lines;
};
