/**
 * Definition model: a closed union of positional, option and command
 * definitions, switched on by `kind`.
 *
 * Argument definitions are built by generic factories that close over the
 * typed parser and accumulator; the parser only sees the erased `fill()`.
 */

import type { Accumulator, ValueParser, ValuePrinter } from "@argloom/sdk";
import type { UsageGroup } from "../usage/usage-group.js";
import type { FrozenArgumentSet } from "./argument-set.js";
import type { Requires } from "./requires.js";
import { Arg, ValueHolder, createValueCell, fillCell, peekCell } from "./value-holder.js";
import type { ValueCell } from "./value-holder.js";

/** Something a raw token can be parsed into. */
export interface ValueTarget {
  readonly name: string;
  /** Parse `raw` and store the result. Throws ValueParserError on bad input. */
  fill(raw: string): void;
}

interface DefinitionBase {
  readonly name: string;
  readonly description: string | undefined;
  readonly usageGroup: UsageGroup | undefined;
}

interface ArgumentDefinitionBase extends DefinitionBase, ValueTarget {
  readonly isMandatory: boolean;
  readonly holder: Arg<unknown>;
}

export interface PositionalDefinition extends ArgumentDefinitionBase {
  readonly kind: "positional";
  readonly isMulti: boolean;
  /** Overrides the config's noOptionsAfterPositional when set. */
  readonly noOptionsFollowing: boolean | undefined;
}

/**
 * How a flag's inverse name is chosen at registration: generated by the
 * config, given explicitly, or not at all.
 */
export type FlagInverse = "auto" | "disabled" | { readonly name: string };

/** Resolved flag metadata; `inverse` is final once registered. */
export interface FlagInfo {
  readonly inverse: string | undefined;
}

export interface OptionDefinition extends ArgumentDefinitionBase {
  readonly kind: "option";
  readonly short: string | undefined;
  readonly flag: FlagInfo | undefined;
  readonly valueDescription: string | undefined;
}

export interface CommandDefinition extends DefinitionBase {
  readonly kind: "command";
  /** Everything parseable once this command is selected. */
  readonly args: FrozenArgumentSet;
}

export type ArgumentDefinition = PositionalDefinition | OptionDefinition;
export type Definition = ArgumentDefinition | CommandDefinition;

/** The single "one of these commands" slot of a scope. */
export interface CommandSetDefinition extends ValueTarget {
  readonly holder: ValueHolder<unknown>;
  /** Printed id of the selected command, if one was parsed. */
  selectedName(): string | undefined;
}

interface ArgumentSpec<T, U> {
  name: string;
  description?: string;
  usageGroup?: UsageGroup;
  parser: ValueParser<T>;
  accumulator: Accumulator<T, U>;
}

export interface PositionalSpec<T, U> extends ArgumentSpec<T, U> {
  requires: Requires<U>;
  isMulti: boolean;
  noOptionsFollowing?: boolean;
}

export interface OptionSpec<T, U> extends ArgumentSpec<T, U> {
  defaultValue: U;
  short?: string;
  flag?: FlagInfo;
  valueDescription?: string;
}

export interface Defined<D, U> {
  definition: D;
  holder: Arg<U>;
}

function accumulatingFill<T, U>(spec: ArgumentSpec<T, U>, cell: ValueCell<U>) {
  return (raw: string): void => {
    const value = spec.parser(raw);
    fillCell(cell, spec.accumulator(value, peekCell(cell)));
  };
}

export function createPositionalDefinition<T, U>(
  spec: PositionalSpec<T, U>,
): Defined<PositionalDefinition, U> {
  const requires = spec.requires;
  const cell = createValueCell<U>(requires.mandatory ? undefined : { value: requires.defaultValue });
  const holder = new Arg<U>(spec.name, cell);

  return {
    holder,
    definition: {
      kind: "positional",
      name: spec.name,
      description: spec.description,
      usageGroup: spec.usageGroup,
      isMandatory: requires.mandatory,
      isMulti: spec.isMulti,
      noOptionsFollowing: spec.noOptionsFollowing,
      holder,
      fill: accumulatingFill(spec, cell),
    },
  };
}

/** Options are always optional: they start filled with their default. */
export function createOptionDefinition<T, U>(spec: OptionSpec<T, U>): Defined<OptionDefinition, U> {
  const cell = createValueCell<U>({ value: spec.defaultValue });
  const holder = new Arg<U>(spec.name, cell);

  return {
    holder,
    definition: {
      kind: "option",
      name: spec.name,
      description: spec.description,
      usageGroup: spec.usageGroup,
      isMandatory: false,
      short: spec.short,
      flag: spec.flag,
      valueDescription: spec.valueDescription,
      holder,
      fill: accumulatingFill(spec, cell),
    },
  };
}

export function createCommandSetDefinition<T>(
  parser: ValueParser<T>,
  printer: ValuePrinter<T>,
): { definition: CommandSetDefinition; holder: ValueHolder<T> } {
  const cell = createValueCell<T>();
  const holder = new ValueHolder<T>("command", cell);

  return {
    holder,
    definition: {
      name: "command",
      holder,
      fill(raw: string): void {
        fillCell(cell, parser(raw));
      },
      selectedName(): string | undefined {
        return cell.state.kind === "filled" ? printer(cell.state.value) : undefined;
      },
    },
  };
}

export function createCommandDefinition(options: {
  name: string;
  description?: string;
  usageGroup?: UsageGroup;
  scope: { freeze(): FrozenArgumentSet };
}): CommandDefinition {
  const { scope } = options;
  return {
    kind: "command",
    name: options.name,
    description: options.description,
    usageGroup: options.usageGroup,
    get args(): FrozenArgumentSet {
      return scope.freeze();
    },
  };
}
