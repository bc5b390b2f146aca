export {
  mapValue,
  also,
  validated,
  negateFlag,
  toStringValuePrinter,
  enumValuePrinter,
  stringValueParser,
  intValueParser,
  intValueParserWithRadix,
  numberValueParser,
  boolValueParser,
  stringChoiceValueParser,
  choiceValueParser,
  enumChoiceValueParser,
} from "./parsers.js";

export {
  discardAccumulator,
  listAccumulator,
  setAccumulator,
  flagCountAccumulator,
} from "./accumulators.js";
