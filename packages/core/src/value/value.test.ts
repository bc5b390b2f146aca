import { describe, it, expect } from "vitest";
import { ValueParserError } from "@argloom/sdk";
import {
  also,
  boolValueParser,
  choiceValueParser,
  enumChoiceValueParser,
  enumValuePrinter,
  intValueParser,
  intValueParserWithRadix,
  negateFlag,
  numberValueParser,
  stringChoiceValueParser,
  mapValue,
  validated,
} from "./parsers.js";
import {
  discardAccumulator,
  flagCountAccumulator,
  listAccumulator,
  setAccumulator,
} from "./accumulators.js";

enum Mode {
  Fast = "fast",
  Safe = "safe",
}

enum Level {
  Low,
  High,
}

enum Offset {
  Back = -1,
  Half = 0.5,
  Ahead = 1,
}

function reasonOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValueParserError) return err.reason;
    throw err;
  }
  return undefined;
}

describe("value parsers", () => {
  describe("intValueParser", () => {
    it("parses signed decimal integers", () => {
      expect(intValueParser("42")).toBe(42);
      expect(intValueParser("-7")).toBe(-7);
    });

    it("rejects partial and fractional input", () => {
      expect(reasonOf(() => intValueParser("12abc"))).toBe("Invalid int");
      expect(reasonOf(() => intValueParser("1.5"))).toBe("Invalid int");
      expect(reasonOf(() => intValueParser(""))).toBe("Invalid int");
    });

    it("normalises negative zero", () => {
      expect(intValueParser("-0")).toBe(0);
    });

    it("supports other radixes", () => {
      expect(intValueParserWithRadix(16)("ff")).toBe(255);
      expect(reasonOf(() => intValueParserWithRadix(2)("102"))).toBe("Invalid int");
    });

    it("rejects an invalid radix at construction", () => {
      expect(() => intValueParserWithRadix(1)).toThrow(RangeError);
    });
  });

  describe("numberValueParser", () => {
    it("parses finite numbers", () => {
      expect(numberValueParser("2.5")).toBe(2.5);
    });

    it("rejects blanks and infinities", () => {
      expect(reasonOf(() => numberValueParser(" "))).toBe("Invalid number");
      expect(reasonOf(() => numberValueParser("Infinity"))).toBe("Invalid number");
    });

    it("accepts decimal and exponent forms only", () => {
      expect(numberValueParser("-.5")).toBe(-0.5);
      expect(numberValueParser("2e3")).toBe(2000);
      expect(numberValueParser("-0")).toBe(0);
      expect(reasonOf(() => numberValueParser("0x10"))).toBe("Invalid number");
      expect(reasonOf(() => numberValueParser("0b11"))).toBe("Invalid number");
      expect(reasonOf(() => numberValueParser(" 5 "))).toBe("Invalid number");
      expect(reasonOf(() => numberValueParser("1e999"))).toBe("Invalid number");
    });
  });

  describe("choices", () => {
    it("boolValueParser accepts true and false only", () => {
      expect(boolValueParser("true")).toBe(true);
      expect(boolValueParser("false")).toBe(false);
      expect(reasonOf(() => boolValueParser("yes"))).toBe("Value not in available choices: true, false");
    });

    it("stringChoiceValueParser uses the printer", () => {
      const parser = stringChoiceValueParser([1, 2], (n) => `n${n}`);
      expect(parser("n2")).toBe(2);
      expect(reasonOf(() => parser("2"))).toBe("Value not in available choices: n1, n2");
    });

    it("choiceValueParser restricts a parsed value", () => {
      const parser = choiceValueParser([2, 4], intValueParser);
      expect(parser("4")).toBe(4);
      expect(reasonOf(() => parser("3"))).toBe("Value not in available choices: 2, 4");
    });

    it("enumChoiceValueParser parses member names", () => {
      const parser = enumChoiceValueParser(Mode);
      expect(parser("Safe")).toBe(Mode.Safe);
      expect(reasonOf(() => parser("safe"))).toBe("Value not in available choices: Fast, Safe");
    });

    it("enumChoiceValueParser skips numeric reverse mappings", () => {
      const parser = enumChoiceValueParser(Level, (name) => name.toLowerCase());
      expect(parser("high")).toBe(Level.High);
      expect(reasonOf(() => parser("1"))).toBe("Value not in available choices: low, high");
    });

    it("enumChoiceValueParser ignores reverse mappings of negative and fractional members", () => {
      const parser = enumChoiceValueParser(Offset);
      expect(parser("Back")).toBe(Offset.Back);
      expect(parser("Half")).toBe(Offset.Half);
      expect(reasonOf(() => parser("-1"))).toBe("Value not in available choices: Back, Half, Ahead");
      expect(reasonOf(() => parser("0.5"))).toBe("Value not in available choices: Back, Half, Ahead");
      expect(enumValuePrinter(Offset)(Offset.Back)).toBe("Back");
    });

    it("enumValuePrinter prints member names", () => {
      expect(enumValuePrinter(Mode)(Mode.Fast)).toBe("Fast");
      expect(enumValuePrinter(Level)(Level.Low)).toBe("Low");
    });
  });

  describe("composition", () => {
    it("mapValue maps the parsed value", () => {
      expect(mapValue(intValueParser, (n) => n * 2)("3")).toBe(6);
    });

    it("also runs a side effect and keeps the value", () => {
      const seen: number[] = [];
      expect(also(intValueParser, (n) => seen.push(n))("5")).toBe(5);
      expect(seen).toEqual([5]);
    });

    it("validated rejects with the given reason", () => {
      const positive = validated(intValueParser, (n) => n > 0, "Must be >0");
      expect(positive("1")).toBe(1);
      expect(reasonOf(() => positive("0"))).toBe("Must be >0");
    });

    it("negateFlag flips a boolean parser", () => {
      const negated = negateFlag(boolValueParser);
      expect(negated("true")).toBe(false);
      expect(negated("false")).toBe(true);
    });
  });
});

describe("accumulators", () => {
  it("discardAccumulator keeps the last value", () => {
    expect(discardAccumulator("b")).toBe("b");
  });

  it("listAccumulator appends without mutating the previous list", () => {
    const defaults = ["a"];
    const next = listAccumulator("b", defaults);
    expect(next).toEqual(["a", "b"]);
    expect(defaults).toEqual(["a"]);
    expect(listAccumulator("x", undefined)).toEqual(["x"]);
  });

  it("setAccumulator collects distinct values", () => {
    const once = setAccumulator("a", undefined);
    const twice = setAccumulator("a", once);
    expect([...setAccumulator("b", twice)]).toEqual(["a", "b"]);
  });

  it("flagCountAccumulator counts true up and false down", () => {
    let count = flagCountAccumulator(true, undefined);
    count = flagCountAccumulator(true, count);
    count = flagCountAccumulator(false, count);
    expect(count).toBe(1);
    expect(flagCountAccumulator(false, undefined)).toBe(-1);
  });
});
