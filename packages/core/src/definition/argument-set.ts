/**
 * ArgumentSet: the registered schema of one parsing scope.
 *
 * Registration mutates an `ArgumentSet`; the parser only ever sees the
 * `FrozenArgumentSet` snapshot returned by `freeze()`.
 */

import type {
  CommandDefinition,
  CommandSetDefinition,
  Definition,
  OptionDefinition,
  PositionalDefinition,
} from "./definitions.js";

export interface FrozenArgumentSet {
  readonly positionals: readonly PositionalDefinition[];
  /** Long name to option. A flag's inverse is a second key for the same definition. */
  readonly options: ReadonlyMap<string, OptionDefinition>;
  readonly shortToLong: ReadonlyMap<string, string>;
  readonly commands: ReadonlyMap<string, CommandDefinition>;
  readonly commandSet: CommandSetDefinition | undefined;
  allDefinitions(options: { includeInverse: boolean }): Array<[string, Definition]>;
}

function listDefinitions(set: FrozenArgumentSet | ArgumentSet, includeInverse: boolean): Array<[string, Definition]> {
  const entries: Array<[string, Definition]> = [];
  for (const entry of set.commands) entries.push(entry);
  for (const positional of set.positionals) entries.push([positional.name, positional]);
  for (const [key, option] of set.options) {
    if (!includeInverse && key === option.flag?.inverse) continue;
    entries.push([key, option]);
  }
  return entries;
}

export class ArgumentSet {
  readonly positionals: PositionalDefinition[];
  readonly options: Map<string, OptionDefinition>;
  readonly shortToLong: Map<string, string>;
  readonly commands: Map<string, CommandDefinition>;
  commandSet: CommandSetDefinition | undefined;

  private constructor(parent?: ArgumentSet) {
    this.positionals = parent ? [...parent.positionals] : [];
    this.options = new Map(parent?.options);
    this.shortToLong = new Map(parent?.shortToLong);
    // Commands never inherit.
    this.commands = new Map();
    this.commandSet = undefined;
  }

  static create(): ArgumentSet {
    return new ArgumentSet();
  }

  /** Child scope holding a snapshot of the parent's positionals and options. */
  static subCommand(parent: ArgumentSet): ArgumentSet {
    return new ArgumentSet(parent);
  }

  freeze(): FrozenArgumentSet {
    const frozen: FrozenArgumentSet = {
      positionals: Object.freeze([...this.positionals]),
      options: new Map(this.options),
      shortToLong: new Map(this.shortToLong),
      commands: new Map(this.commands),
      commandSet: this.commandSet,
      allDefinitions: ({ includeInverse }) => listDefinitions(frozen, includeInverse),
    };
    return Object.freeze(frozen);
  }

  allDefinitions({ includeInverse }: { includeInverse: boolean }): Array<[string, Definition]> {
    return listDefinitions(this, includeInverse);
  }
}
