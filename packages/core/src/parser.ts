/**
 * ArgParser facade: the typed entry point applications register arguments
 * through, plus the CLI-wrapper behavior (parse-or-quit, help option).
 */

import { ArgParsingError } from "@argloom/sdk";
import type { Accumulator, ArgConfig, ValueParser, ValuePrinter } from "@argloom/sdk";
import { createLogger } from "@argloom/shared";
import { defaultArgConfig } from "./config/arg-config.js";
import type { FrozenArgumentSet } from "./definition/argument-set.js";
import type { CommandDefinition, FlagInverse } from "./definition/definitions.js";
import type { Requires } from "./definition/requires.js";
import type { Arg } from "./definition/value-holder.js";
import { parseArguments } from "./parsing/parser-context.js";
import { createArgRegistry } from "./registry/arg-registry.js";
import type { AddedCommand, ArgRegistry, CommandRegistration, CommandSetRegistrar } from "./registry/arg-registry.js";
import type { TextSink } from "./usage/sink.js";
import type { UsageGroup } from "./usage/usage-group.js";
import { UsageContext } from "./usage/usage-info.js";
import type { UsageInfo } from "./usage/usage-info.js";
import { createDefaultUsagePrinter } from "./usage/usage-printer.js";
import type { UsagePrinter } from "./usage/usage-printer.js";
import { discardAccumulator } from "./value/accumulators.js";
import { also, boolValueParser, stringValueParser, toStringValuePrinter } from "./value/parsers.js";

const logger = createLogger("ArgParser");

/** Terminates the process. Injectable so tests can observe the exit code. */
export type ExitFunction = (code: number) => never;

const processExit: ExitFunction = (code) => process.exit(code);

interface DescribedArgument {
  description?: string;
  usageGroup?: UsageGroup;
}

export interface PositionalOptions<T> extends DescribedArgument {
  parser: ValueParser<T>;
  /** Defaults to mandatory. */
  requires?: Requires<T>;
  /** Parse every later token as a positional. Falls back to the config. */
  noOptionsFollowing?: boolean;
}

export interface MultiPositionalOptions<T, U> extends DescribedArgument {
  parser: ValueParser<T>;
  accumulator: Accumulator<T, U>;
  requires?: Requires<U>;
  noOptionsFollowing?: boolean;
}

export interface OptionOptions<T> extends DescribedArgument {
  parser: ValueParser<T>;
  defaultValue: T;
  short?: string;
  /** Shown as `--name=VALUE_DESCRIPTION`. */
  valueDescription?: string;
}

export interface MultiOptionOptions<T, U> extends DescribedArgument {
  parser: ValueParser<T>;
  accumulator: Accumulator<T, U>;
  defaultValue: U;
  short?: string;
  valueDescription?: string;
}

export interface FlagOptions extends DescribedArgument {
  short?: string;
  /** Defaults to "auto", which asks the config's inverse generator. */
  inverse?: FlagInverse;
  defaultValue?: boolean;
  /** Called with every parsed occurrence, before it is stored. */
  onParse?: (value: boolean) => void;
}

export interface MultiFlagOptions<U> extends Omit<FlagOptions, "defaultValue"> {
  accumulator: Accumulator<boolean, U>;
  defaultValue: U;
}

export interface PrintUsageOptions {
  sink?: TextSink;
  showShortUsage?: boolean;
}

interface ParserState {
  info: UsageInfo;
  usageContext: UsageContext;
  usagePrinter: UsagePrinter;
  registry: ArgRegistry;
  exit: ExitFunction;
}

/** Shared base of AppArgParser and CommandParser. */
export abstract class ArgParser {
  readonly info: UsageInfo;
  readonly usageContext: UsageContext;
  readonly usagePrinter: UsagePrinter;
  protected readonly registry: ArgRegistry;
  protected readonly exit: ExitFunction;
  private readonly commandParserMap = new Map<string, CommandParser>();

  protected constructor(state: ParserState) {
    this.info = state.info;
    this.usageContext = state.usageContext;
    this.usagePrinter = state.usagePrinter;
    this.registry = state.registry;
    this.exit = state.exit;
  }

  get config(): ArgConfig {
    return this.registry.config;
  }

  get args(): FrozenArgumentSet {
    return this.registry.args;
  }

  /** Parsers of this scope's commands, keyed by printed id. */
  get commandParsers(): ReadonlyMap<string, CommandParser> {
    return new Map(this.commandParserMap);
  }

  get usageGroups(): readonly UsageGroup[] {
    return this.registry.usageGroups;
  }

  createUsageGroup(name: string): UsageGroup {
    return this.registry.createUsageGroup(name);
  }

  addPositional<T>(name: string, options: PositionalOptions<T>): Arg<T> {
    return this.registry.addPositional<T, T>({
      ...options,
      name,
      accumulator: discardAccumulator,
      isMulti: false,
    });
  }

  addMultiPositional<T, U>(name: string, options: MultiPositionalOptions<T, U>): Arg<U> {
    return this.registry.addPositional({ ...options, name, isMulti: true });
  }

  addOption<T>(name: string, options: OptionOptions<T>): Arg<T> {
    return this.registry.addOption<T, T>({ ...options, name, accumulator: discardAccumulator });
  }

  addMultiOption<T, U>(name: string, options: MultiOptionOptions<T, U>): Arg<U> {
    return this.registry.addOption({ ...options, name });
  }

  addFlag(name: string, options: FlagOptions = {}): Arg<boolean> {
    return this.addMultiFlag<boolean>(name, {
      ...options,
      defaultValue: options.defaultValue ?? false,
      accumulator: discardAccumulator,
    });
  }

  addMultiFlag<U>(name: string, options: MultiFlagOptions<U>): Arg<U> {
    const onParse = options.onParse;
    return this.registry.addOption<boolean, U>({
      name,
      description: options.description,
      usageGroup: options.usageGroup,
      short: options.short,
      flag: { inverse: options.inverse ?? "auto" },
      defaultValue: options.defaultValue,
      parser: onParse ? also(boolValueParser, onParse) : boolValueParser,
      accumulator: options.accumulator,
    });
  }

  addCommands<T>(options: { parser: ValueParser<T>; printer?: ValuePrinter<T> }): CommandSet<T> {
    const registrar = this.registry.addCommandSet<T>({
      parser: options.parser,
      printer: options.printer ?? toStringValuePrinter,
    });
    return new CommandSet<T>(registrar, (added) => {
      const parser = new CommandParser(
        {
          info: this.info,
          usageContext: this.usageContext.subCommand(added.command),
          usagePrinter: this.usagePrinter,
          registry: added.registry,
          exit: this.exit,
        },
        added.command,
      );
      this.commandParserMap.set(added.command.name, parser);
      return parser;
    });
  }

  addStringCommands(): CommandSet<string> {
    return this.addCommands({ parser: stringValueParser });
  }

  printUsage(options: PrintUsageOptions = {}): void {
    this.usagePrinter(this.args, this.info, this.usageContext, {
      sink: options.sink ?? process.stdout,
      showShortUsage: options.showShortUsage ?? false,
      config: this.config,
    });
  }
}

/** The commands of one scope. */
export class CommandSet<T> {
  constructor(
    private readonly registrar: CommandSetRegistrar<T>,
    private readonly createParser: (added: AddedCommand) => CommandParser,
  ) {}

  addCommand(id: T, options?: CommandRegistration): CommandParser {
    return this.createParser(this.registrar.addCommand(id, options));
  }

  /** The selected command's id. Throws EmptyValueError before parsing. */
  get selected(): T {
    return this.registrar.holder.value;
  }
}

/** Registers the arguments of a single command. */
export class CommandParser extends ArgParser {
  constructor(
    state: ParserState,
    readonly command: CommandDefinition,
  ) {
    super(state);
  }
}

export interface AppArgParserOptions {
  info?: UsageInfo;
  usagePrinter?: UsagePrinter;
  config?: ArgConfig;
  /** Called by parseOrQuit and the help option. Defaults to process.exit. */
  exit?: ExitFunction;
}

export interface HelpOptions {
  name?: string;
  short?: string;
  description?: string;
  sink?: TextSink;
}

/** Root parser of an application. */
export class AppArgParser extends ArgParser {
  constructor(options: AppArgParserOptions = {}) {
    super({
      info: options.info ?? {},
      usageContext: new UsageContext(),
      usagePrinter: options.usagePrinter ?? createDefaultUsagePrinter(),
      registry: createArgRegistry(options.config ?? defaultArgConfig),
      exit: options.exit ?? processExit,
    });
  }

  /** Fill every holder from `tokens`. Throws ArgParsingError on bad input. */
  parse(tokens: readonly string[]): void {
    parseArguments(this.config, this.args, tokens);
  }

  /** Like parse(), but prints the error and usage to `sink` and exits with 1. */
  parseOrQuit(tokens: readonly string[], options: PrintUsageOptions = {}): void {
    try {
      this.parse(tokens);
    } catch (err) {
      if (!(err instanceof ArgParsingError)) throw err;

      logger.debug("Parsing failed", { kind: err.kind });
      const sink = options.sink ?? process.stderr;
      sink.write(`${err.message}\n`);
      this.printUsage({ sink, showShortUsage: options.showShortUsage ?? true });
      this.exit(1);
    }
  }

  /**
   * Adds a flag that prints the full usage of the innermost selected
   * command and exits with 0.
   */
  addHelpOption(options: HelpOptions = {}): Arg<boolean> {
    return this.addFlag(options.name ?? "help", {
      short: options.short ?? "h",
      description: options.description ?? "Show this help",
      inverse: "disabled",
      onParse: (value) => {
        if (!value) return;
        this.innermostParser().printUsage({ sink: options.sink ?? process.stdout, showShortUsage: false });
        this.exit(0);
      },
    });
  }

  private innermostParser(): ArgParser {
    let current: ArgParser = this;
    for (;;) {
      const selected = current.args.commandSet?.selectedName();
      const next = selected === undefined ? undefined : current.commandParsers.get(selected);
      if (!next) return current;
      current = next;
    }
  }
}
