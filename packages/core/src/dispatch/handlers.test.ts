import { describe, it, expect, vi, beforeEach } from "vitest";
import { ArgloomError, ArgParsingError } from "@argloom/sdk";
import type { Arg } from "../definition/value-holder.js";
import type { ArgParser } from "../parser.js";
import { Requires } from "../definition/requires.js";
import { createBufferSink } from "../usage/sink.js";
import { flagCountAccumulator } from "../value/accumulators.js";
import { stringValueParser } from "../value/parsers.js";
import { AppHandler, CommandHandler, CommandHandlerSet, HandlerContext } from "./handlers.js";

class ExitSignal extends Error {
  constructor(readonly code: number) {
    super(`exit ${code}`);
  }
}

let out: string[] = [];

const exitSpy = () =>
  vi.fn((code: number): never => {
    throw new ExitSignal(code);
  });

class Greet extends CommandHandler<string> {
  readonly id = "greet";
  readonly description = "Say hello";
  private name!: Arg<string>;

  register(parser: ArgParser): void {
    this.name = parser.addPositional("name", { parser: stringValueParser, requires: Requires.optional("world") });
  }

  run(context: HandlerContext): void {
    const root = context.parent(Root);
    out.push(`hello ${this.name.value} (verbosity ${root.verbose.value})`);
  }
}

class RemoteAdd extends CommandHandler<string> {
  readonly id = "add";
  private remote!: Arg<string>;

  register(parser: ArgParser): void {
    this.remote = parser.addPositional("remote", { parser: stringValueParser });
  }

  async run(context: HandlerContext): Promise<void> {
    await Promise.resolve();
    out.push(`add ${this.remote.value} under ${context.parent(Remote).id}`);
  }
}

class Remote extends CommandHandler<string> {
  readonly id = "remote";
  readonly commands = CommandHandlerSet.from([new RemoteAdd()]);

  register(): void {}

  run(): void {
    out.push("remote");
  }
}

class Root extends AppHandler {
  readonly usageInfo = { application: "tool" };
  readonly commands = CommandHandlerSet.from([new Greet(), new Remote()]);
  verbose!: Arg<number>;

  register(parser: ArgParser): void {
    this.verbose = parser.addMultiFlag("verbose", {
      short: "v",
      defaultValue: 0,
      accumulator: flagCountAccumulator,
    });
  }

  run(): void {
    out.push(`root ${this.commands.selected}`);
  }
}

beforeEach(() => {
  out = [];
});

describe("AppHandler", () => {
  it("runs the app handler, then the selected command", async () => {
    await new Root().runApp(["-vv", "greet", "bob"]);

    expect(out).toEqual(["root greet", "hello bob (verbosity 2)"]);
  });

  it("runs nested commands outermost first and awaits async handlers", async () => {
    await new Root().runApp(["remote", "add", "origin"]);

    expect(out).toEqual(["root remote", "remote", "add origin under remote"]);
  });

  it("rejects with the parse error", async () => {
    await expect(new Root().runApp(["deploy"])).rejects.toBeInstanceOf(ArgParsingError);
  });

  it("prints the error and exits with 1 in runAppOrQuit", async () => {
    const stderr = createBufferSink();
    const exit = exitSpy();

    await expect(new Root().runAppOrQuit([], { stderr, exit })).rejects.toBeInstanceOf(ExitSignal);

    expect(exit).toHaveBeenCalledWith(1);
    expect(stderr.text().split("\n")[0]).toBe("A command is required");
  });

  it("adds a help option that prints the selected command's usage", async () => {
    const stdout = createBufferSink();
    const exit = exitSpy();

    await expect(new Root().runApp(["greet", "-h"], { stdout, exit })).rejects.toBeInstanceOf(ExitSignal);

    expect(exit).toHaveBeenCalledWith(0);
    expect(stdout.text().split("\n")[0]).toBe(
      "Usage: tool greet <name> [-h|--help[=true|false]] [-v|--verbose[=true|false]]",
    );
  });
});

describe("HandlerContext", () => {
  it("fails for a handler type that is not on the path", () => {
    const context = new HandlerContext();

    expect(() => context.parent(Root)).toThrow(ArgloomError);
    expect(() => context.parent(Root)).toThrow("No parent handler of type Root");
  });

  it("returns the nearest matching parent", () => {
    const context = new HandlerContext();
    const outer = new Remote();
    const inner = new Remote();
    context.push(outer);
    context.push(inner);

    expect(context.parent(Remote)).toBe(inner);
  });
});

describe("CommandHandlerSet", () => {
  it("throws when read before a command was selected", () => {
    const set = CommandHandlerSet.from([]);

    expect(() => set.selected).toThrow("No command has been selected yet");
  });
});
