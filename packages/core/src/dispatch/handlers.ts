/**
 * Class-based dispatch on top of ArgParser.
 *
 * Each handler registers its arguments, and after parsing the handlers on
 * the selected command path run outermost first. A handler with commands
 * becomes visible to the handlers below it through HandlerContext.
 */

import { ArgloomError, ErrorCode } from "@argloom/sdk";
import type { ArgConfig, ValueParser, ValuePrinter } from "@argloom/sdk";
import { createLogger } from "@argloom/shared";
import { defaultArgConfig } from "../config/arg-config.js";
import { AppArgParser } from "../parser.js";
import type { ArgParser, ExitFunction } from "../parser.js";
import type { TextSink } from "../usage/sink.js";
import type { UsageGroup } from "../usage/usage-group.js";
import type { UsageInfo } from "../usage/usage-info.js";
import type { UsagePrinter } from "../usage/usage-printer.js";
import { stringValueParser, toStringValuePrinter } from "../value/parsers.js";

const logger = createLogger("Dispatch");

/** The handlers above the one currently running, like a small service container. */
export class HandlerContext {
  private readonly parents: Handler[] = [];

  /** Nearest enclosing handler of the given class. */
  parent<H extends Handler>(type: abstract new (...args: never[]) => H): H {
    for (let i = this.parents.length - 1; i >= 0; i--) {
      const handler = this.parents[i];
      if (handler instanceof type) return handler;
    }
    throw new ArgloomError(`No parent handler of type ${type.name}`, ErrorCode.HANDLER_NOT_FOUND);
  }

  /** @internal */
  push(handler: Handler): void {
    this.parents.push(handler);
  }
}

type RegisterHandler = (handler: Handler, parser: ArgParser) => void;

/** Subcommands of a handler, with their id type erased. */
export interface CommandHandlers {
  /**
   * Register every command on `parser` and return a function that yields
   * the selected handler after parsing, or `undefined` when there are none.
   */
  attach(parser: ArgParser, register: RegisterHandler): (() => Handler) | undefined;
}

export abstract class Handler {
  /** Subcommands. When set, this handler runs before the selected one. */
  readonly commands: CommandHandlers | undefined = undefined;

  abstract register(parser: ArgParser): void;
  abstract run(context: HandlerContext): void | Promise<void>;
}

export abstract class CommandHandler<T> extends Handler {
  abstract readonly id: T;
  readonly description: string | undefined = undefined;
  readonly usageGroup: UsageGroup | undefined = undefined;
}

export class CommandHandlerSet<T> implements CommandHandlers {
  private readonly handlerList: CommandHandler<T>[];
  private readonly parser: ValueParser<T>;
  private readonly printer: ValuePrinter<T>;
  private selection: { id: T } | undefined;

  constructor(handlers: CommandHandler<T>[], options: { parser: ValueParser<T>; printer?: ValuePrinter<T> }) {
    this.handlerList = [...handlers];
    this.parser = options.parser;
    this.printer = options.printer ?? toStringValuePrinter;
  }

  static from(handlers: CommandHandler<string>[]): CommandHandlerSet<string> {
    return new CommandHandlerSet(handlers, { parser: stringValueParser });
  }

  get handlers(): readonly CommandHandler<T>[] {
    return [...this.handlerList];
  }

  add(handler: CommandHandler<T>): void {
    this.handlerList.push(handler);
  }

  addAll(handlers: Iterable<CommandHandler<T>>): void {
    this.handlerList.push(...handlers);
  }

  /** Id of the selected command. Throws before dispatch selected one. */
  get selected(): T {
    if (!this.selection) {
      throw new ArgloomError("No command has been selected yet", ErrorCode.EMPTY_VALUE);
    }
    return this.selection.id;
  }

  attach(parser: ArgParser, register: RegisterHandler): (() => Handler) | undefined {
    if (this.handlerList.length === 0) return undefined;

    const commandSet = parser.addCommands<T>({ parser: this.parser, printer: this.printer });
    const byName = new Map<string, CommandHandler<T>>();

    for (const handler of this.handlerList) {
      const commandParser = commandSet.addCommand(handler.id, {
        description: handler.description,
        usageGroup: handler.usageGroup,
      });
      byName.set(commandParser.command.name, handler);
      register(handler, commandParser);
    }

    return () => {
      const id = commandSet.selected;
      const handler = byName.get(this.printer(id));
      if (!handler) {
        throw new ArgloomError(`No handler for command ${this.printer(id)}`, ErrorCode.HANDLER_NOT_FOUND);
      }
      this.selection = { id };
      return handler;
    };
  }
}

export interface RunAppOptions {
  /** Receives help output. Defaults to process.stdout. */
  stdout?: TextSink;
  /** Receives parse errors in runAppOrQuit. Defaults to process.stderr. */
  stderr?: TextSink;
  exit?: ExitFunction;
}

export abstract class AppHandler extends Handler {
  readonly addHelp: boolean = true;
  readonly usageInfo: UsageInfo = {};
  readonly usagePrinter: UsagePrinter | undefined = undefined;
  readonly config: ArgConfig = defaultArgConfig;

  /** Parse `tokens` (throwing ArgParsingError on bad input), then run the handlers. */
  runApp(tokens: readonly string[], options: RunAppOptions = {}): Promise<void> {
    return this.dispatch(options, (parser) => parser.parse(tokens));
  }

  /** Like runApp(), but bad input prints the error and usage and exits with 1. */
  runAppOrQuit(tokens: readonly string[], options: RunAppOptions = {}): Promise<void> {
    return this.dispatch(options, (parser) => parser.parseOrQuit(tokens, { sink: options.stderr }));
  }

  private async dispatch(options: RunAppOptions, parse: (parser: AppArgParser) => void): Promise<void> {
    const parser = new AppArgParser({
      info: this.usageInfo,
      usagePrinter: this.usagePrinter,
      config: this.config,
      exit: options.exit,
    });
    if (this.addHelp) {
      parser.addHelpOption({ sink: options.stdout });
    }

    const resolvers = new Map<Handler, () => Handler>();
    const register: RegisterHandler = (handler, target) => {
      handler.register(target);
      const resolve = handler.commands?.attach(target, register);
      if (resolve) resolvers.set(handler, resolve);
    };
    register(this, parser);

    parse(parser);

    const context = new HandlerContext();
    let current: Handler | undefined = this;
    while (current) {
      // Resolve first so a parent can read its `commands.selected` while running.
      const next: Handler | undefined = resolvers.get(current)?.();

      logger.debug("Running handler", { handler: current.constructor.name });
      await current.run(context);

      if (next) context.push(current);
      current = next;
    }
  }
}
