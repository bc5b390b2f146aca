export { createArgRegistry } from "./arg-registry.js";
export type {
  AddedCommand,
  ArgRegistry,
  CommandRegistration,
  CommandSetRegistrar,
  OptionRegistration,
  PositionalRegistration,
} from "./arg-registry.js";
