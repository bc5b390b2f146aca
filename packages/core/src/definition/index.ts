export { ArgumentSet } from "./argument-set.js";
export type { FrozenArgumentSet } from "./argument-set.js";
export {
  createCommandDefinition,
  createCommandSetDefinition,
  createOptionDefinition,
  createPositionalDefinition,
} from "./definitions.js";
export type {
  ArgumentDefinition,
  CommandDefinition,
  CommandSetDefinition,
  Defined,
  Definition,
  FlagInfo,
  FlagInverse,
  OptionDefinition,
  OptionSpec,
  PositionalDefinition,
  PositionalSpec,
  ValueTarget,
} from "./definitions.js";
export { Requires } from "./requires.js";
export { Arg, ValueHolder, createValueCell, fillCell, peekCell } from "./value-holder.js";
export type { HolderState, ValueCell } from "./value-holder.js";
