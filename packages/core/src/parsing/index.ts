export { parseArguments } from "./parser-context.js";
export { splitLongOption, splitShortOption } from "./option-split.js";
export type { OptionSplit } from "./option-split.js";
