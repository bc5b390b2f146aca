import { CommandHandler, Requires, intValueParser, listAccumulator, stringValueParser, validated } from "@argloom/core";
import type { Arg, ArgParser } from "@argloom/core";

export class EchoCommand extends CommandHandler<string> {
  readonly id = "echo";
  readonly description = "Print words back";
  private words!: Arg<string[]>;
  private count!: Arg<number>;
  private upper!: Arg<boolean>;
  private separator!: Arg<string>;

  register(parser: ArgParser): void {
    this.words = parser.addMultiPositional<string, string[]>("words", {
      description: "Words to print; everything from here on is a word",
      parser: stringValueParser,
      accumulator: listAccumulator,
      requires: Requires.optional([]),
      noOptionsFollowing: true,
    });
    this.count = parser.addOption("count", {
      short: "c",
      description: "How many times to print the line",
      valueDescription: "N",
      parser: validated(intValueParser, (n) => n > 0, "Must be >0"),
      defaultValue: 1,
    });
    this.upper = parser.addFlag("upper", {
      short: "u",
      description: "Upper-case the output",
      inverse: { name: "lower" },
    });
    this.separator = parser.addOption("separator", {
      short: "s",
      description: "Text between words",
      valueDescription: "TEXT",
      parser: stringValueParser,
      defaultValue: " ",
    });
  }

  run(): void {
    let line = this.words.value.join(this.separator.value);
    if (this.upper.value) line = line.toUpperCase();

    for (let i = 0; i < this.count.value; i++) {
      console.log(line);
    }
  }
}
