import { CommandHandler, intValueParser, listAccumulator } from "@argloom/core";
import type { Arg, ArgParser, HandlerContext } from "@argloom/core";
import { DemoApp } from "./app.js";

export class AddCommand extends CommandHandler<string> {
  readonly id = "add";
  readonly description = "Print the sum of some integers";
  private numbers!: Arg<number[]>;

  register(parser: ArgParser): void {
    this.numbers = parser.addMultiPositional<number, number[]>("numbers", {
      description: "Integers to add",
      parser: intValueParser,
      accumulator: listAccumulator,
    });
  }

  run(context: HandlerContext): void {
    const numbers = this.numbers.value;
    const sum = numbers.reduce((total, n) => total + n, 0);

    if (context.parent(DemoApp).verbose.value > 0) {
      console.log(`${numbers.join(" + ")} = ${sum}`);
    } else {
      console.log(String(sum));
    }
  }
}
