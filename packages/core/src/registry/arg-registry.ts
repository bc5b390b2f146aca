/**
 * Definition registry: validates registrations and hands back the holders
 * callers read after parsing.
 */

import { ErrorCode, RegistrationError } from "@argloom/sdk";
import type { Accumulator, ArgConfig, ValueParser, ValuePrinter } from "@argloom/sdk";
import { createLogger } from "@argloom/shared";
import { ArgumentSet } from "../definition/argument-set.js";
import type { FrozenArgumentSet } from "../definition/argument-set.js";
import {
  createCommandDefinition,
  createCommandSetDefinition,
  createOptionDefinition,
  createPositionalDefinition,
} from "../definition/definitions.js";
import type { CommandDefinition, CommandSetDefinition, FlagInverse } from "../definition/definitions.js";
import { Requires } from "../definition/requires.js";
import type { Arg, ValueHolder } from "../definition/value-holder.js";
import { UsageGroup } from "../usage/usage-group.js";

const logger = createLogger("ArgRegistry");

export interface PositionalRegistration<T, U> {
  name: string;
  description?: string;
  usageGroup?: UsageGroup;
  /** Defaults to mandatory. */
  requires?: Requires<U>;
  parser: ValueParser<T>;
  accumulator: Accumulator<T, U>;
  isMulti: boolean;
  noOptionsFollowing?: boolean;
}

export interface OptionRegistration<T, U> {
  name: string;
  description?: string;
  valueDescription?: string;
  usageGroup?: UsageGroup;
  short?: string;
  /** Present for boolean flags. */
  flag?: { inverse: FlagInverse };
  defaultValue: U;
  parser: ValueParser<T>;
  accumulator: Accumulator<T, U>;
}

export interface CommandRegistration {
  description?: string;
  usageGroup?: UsageGroup;
}

export interface AddedCommand {
  command: CommandDefinition;
  /** Registry of the command's own scope. */
  registry: ArgRegistry;
}

export interface CommandSetRegistrar<T> {
  readonly definition: CommandSetDefinition;
  readonly holder: ValueHolder<T>;
  readonly printer: ValuePrinter<T>;
  addCommand(id: T, options?: CommandRegistration): AddedCommand;
}

export interface ArgRegistry {
  readonly config: ArgConfig;
  /** Frozen snapshot of everything registered so far. */
  readonly args: FrozenArgumentSet;
  readonly usageGroups: readonly UsageGroup[];
  createUsageGroup(name: string): UsageGroup;
  addPositional<T, U>(registration: PositionalRegistration<T, U>): Arg<U>;
  addOption<T, U>(registration: OptionRegistration<T, U>): Arg<U>;
  addCommandSet<T>(options: { parser: ValueParser<T>; printer: ValuePrinter<T> }): CommandSetRegistrar<T>;
}

export function createArgRegistry(config: ArgConfig): ArgRegistry {
  return buildRegistry(config, ArgumentSet.create());
}

function resolveInverse(config: ArgConfig, name: string, inverse: FlagInverse): string | undefined {
  if (inverse === "disabled") return undefined;
  if (inverse === "auto") return config.inverseGenerator?.(name);
  return inverse.name;
}

function buildRegistry(config: ArgConfig, set: ArgumentSet): ArgRegistry {
  const usageGroups: UsageGroup[] = [];

  function addPositional<T, U>(registration: PositionalRegistration<T, U>): Arg<U> {
    const { name } = registration;
    const requires = registration.requires ?? Requires.mandatory<U>();

    if (set.positionals.some((p) => p.name === name)) {
      throw new RegistrationError(name, "Duplicate argument", { code: ErrorCode.DUPLICATE_ARGUMENT });
    }

    const last = set.positionals[set.positionals.length - 1];
    if (last) {
      if (!last.isMandatory && requires.mandatory) {
        throw new RegistrationError(name, "Mandatory positionals cannot come after optional ones", {
          code: ErrorCode.POSITIONAL_ORDER,
        });
      }
      if (last.isMulti) {
        throw new RegistrationError(name, "A multi-valued positional argument must be last", {
          code: ErrorCode.POSITIONAL_ORDER,
        });
      }
    }

    const { definition, holder } = createPositionalDefinition({ ...registration, requires });
    set.positionals.push(definition);
    logger.debug("Registered positional", { name, mandatory: requires.mandatory, multi: registration.isMulti });
    return holder;
  }

  function addOption<T, U>(registration: OptionRegistration<T, U>): Arg<U> {
    const { name, short } = registration;

    if (set.options.has(name)) {
      throw new RegistrationError(name, "Duplicate argument", { code: ErrorCode.DUPLICATE_ARGUMENT });
    }
    if (short !== undefined) {
      if (set.shortToLong.has(short)) {
        throw new RegistrationError(short, "Duplicate argument", { code: ErrorCode.DUPLICATE_ARGUMENT });
      }
      if (short.length !== 1) {
        throw new RegistrationError(short, "Must be a single character", { code: ErrorCode.INVALID_SHORT_OPTION });
      }
    }

    const inverse = registration.flag ? resolveInverse(config, name, registration.flag.inverse) : undefined;
    if (inverse !== undefined && (inverse === name || set.options.has(inverse))) {
      throw new RegistrationError(inverse, "Duplicate argument", { code: ErrorCode.DUPLICATE_ARGUMENT });
    }

    const { definition, holder } = createOptionDefinition({
      name,
      description: registration.description,
      valueDescription: registration.valueDescription,
      usageGroup: registration.usageGroup,
      short,
      flag: registration.flag ? { inverse } : undefined,
      defaultValue: registration.defaultValue,
      parser: registration.parser,
      accumulator: registration.accumulator,
    });

    set.options.set(name, definition);
    if (inverse !== undefined) set.options.set(inverse, definition);
    if (short !== undefined) set.shortToLong.set(short, name);

    logger.debug("Registered option", { name, short, flag: registration.flag !== undefined, inverse });
    return holder;
  }

  function addCommandSet<T>(options: { parser: ValueParser<T>; printer: ValuePrinter<T> }): CommandSetRegistrar<T> {
    if (set.commandSet) {
      throw new RegistrationError("command", "Already added a command set", {
        code: ErrorCode.DUPLICATE_COMMAND_SET,
      });
    }

    const { definition, holder } = createCommandSetDefinition(options.parser, options.printer);
    set.commandSet = definition;

    return {
      definition,
      holder,
      printer: options.printer,
      addCommand(id: T, registration: CommandRegistration = {}): AddedCommand {
        const name = options.printer(id);
        if (set.commands.has(name)) {
          throw new RegistrationError(name, "Duplicate command", { code: ErrorCode.DUPLICATE_COMMAND });
        }

        const childSet = ArgumentSet.subCommand(set);
        const command = createCommandDefinition({
          name,
          description: registration.description,
          usageGroup: registration.usageGroup,
          scope: childSet,
        });
        set.commands.set(name, command);

        logger.debug("Registered command", { name });
        return { command, registry: buildRegistry(config, childSet) };
      },
    };
  }

  return {
    config,
    get args(): FrozenArgumentSet {
      return set.freeze();
    },
    get usageGroups(): readonly UsageGroup[] {
      return [...usageGroups];
    },
    createUsageGroup(name: string): UsageGroup {
      const group = new UsageGroup(name);
      if (usageGroups.some((existing) => existing.equals(group))) {
        throw new RegistrationError(name, "Duplicate usage group", { code: ErrorCode.DUPLICATE_USAGE_GROUP });
      }
      usageGroups.push(group);
      return group;
    },
    addPositional,
    addOption,
    addCommandSet,
  };
}
