import type { CommandDefinition } from "../definition/definitions.js";

/** Text printed around the generated usage. */
export interface UsageInfo {
  readonly application?: string;
  readonly prologue?: string;
  readonly epilogue?: string;
}

/** The chain of commands selected so far, outermost first. */
export class UsageContext {
  readonly path: readonly CommandDefinition[];

  constructor(path: readonly CommandDefinition[] = []) {
    this.path = Object.freeze([...path]);
  }

  subCommand(command: CommandDefinition): UsageContext {
    return new UsageContext([...this.path, command]);
  }
}
