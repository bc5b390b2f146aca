export { UsageGroup } from "./usage-group.js";
export { UsageContext } from "./usage-info.js";
export type { UsageInfo } from "./usage-info.js";
export { createBufferSink, defaultTerminalAttributesFactory, fixedTerminalAttributes } from "./sink.js";
export type { BufferSink, TerminalAttributes, TerminalAttributesFactory, TextSink } from "./sink.js";
export { createDefaultUsagePrinter } from "./usage-printer.js";
export type { UsagePrinter, UsagePrintOptions } from "./usage-printer.js";
