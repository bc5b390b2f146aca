/**
 * Holders for values filled in by the parser.
 *
 * A holder is a read-only view over a cell that only the owning definition
 * writes to. Before parsing, a mandatory argument's cell is explicitly
 * empty and reading it throws.
 */

import { EmptyValueError } from "@argloom/sdk";

export type HolderState<T> = { readonly kind: "empty" } | { readonly kind: "filled"; readonly value: T };

export interface ValueCell<T> {
  state: HolderState<T>;
  wasGiven: boolean;
}

export function createValueCell<T>(initial?: { value: T }): ValueCell<T> {
  return {
    state: initial ? { kind: "filled", value: initial.value } : { kind: "empty" },
    wasGiven: false,
  };
}

/** Current value of a cell, or `undefined` while it is empty. */
export function peekCell<T>(cell: ValueCell<T>): T | undefined {
  return cell.state.kind === "filled" ? cell.state.value : undefined;
}

export function fillCell<T>(cell: ValueCell<T>, value: T): void {
  cell.state = { kind: "filled", value };
  cell.wasGiven = true;
}

export class ValueHolder<T> {
  constructor(
    public readonly name: string,
    protected readonly cell: ValueCell<T>,
  ) {}

  /** The parsed (or default) value. Throws EmptyValueError if nothing was filled yet. */
  get value(): T {
    const state = this.cell.state;
    if (state.kind === "empty") {
      throw new EmptyValueError(this.name);
    }
    return state.value;
  }

  get isEmpty(): boolean {
    return this.cell.state.kind === "empty";
  }

  toString(): string {
    const state = this.cell.state;
    return state.kind === "empty" ? "<empty>" : String(state.value);
  }
}

/** Holder of a positional or option. */
export class Arg<T> extends ValueHolder<T> {
  /** Whether the value came from the command line rather than the default. */
  get wasGiven(): boolean {
    return this.cell.wasGiven;
  }
}
