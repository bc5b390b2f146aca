/**
 * Output targets for usage text and error messages.
 */

/** Anything text can be written to. `process.stdout` and `process.stderr` qualify. */
export interface TextSink {
  write(chunk: string): unknown;
  readonly isTTY?: boolean;
  readonly columns?: number;
}

export interface TerminalAttributes {
  /** Line width to wrap to; `undefined` disables wrapping. */
  readonly width: number | undefined;
}

export type TerminalAttributesFactory = (sink: TextSink) => TerminalAttributes;

export const fixedTerminalAttributes: TerminalAttributes = Object.freeze({ width: 80 });

/** The sink's own width when it is a terminal, otherwise a fixed 80 columns. */
export const defaultTerminalAttributesFactory: TerminalAttributesFactory = (sink) =>
  sink.isTTY ? { width: sink.columns } : fixedTerminalAttributes;

export interface BufferSink extends TextSink {
  text(): string;
}

/** Collects everything written to it. */
export function createBufferSink(): BufferSink {
  const chunks: string[] = [];
  return {
    write(chunk: string): void {
      chunks.push(chunk);
    },
    text: () => chunks.join(""),
  };
}
