/**
 * Parsing state machine.
 *
 * Walks the token vector of one scope, fills value holders in place and
 * hands the remaining tokens to a selected command's scope. The first
 * error wins; holders filled before it keep their values.
 */

import { ArgParsingError, ValueParserError } from "@argloom/sdk";
import type { ArgConfig } from "@argloom/sdk";
import { createLogger } from "@argloom/shared";
import type { FrozenArgumentSet } from "../definition/argument-set.js";
import type { CommandSetDefinition, OptionDefinition, ValueTarget } from "../definition/definitions.js";
import { splitLongOption, splitShortOption } from "./option-split.js";

const logger = createLogger("Parser");

type Token =
  | { kind: "positional"; text: string }
  | { kind: "long"; text: string }
  | { kind: "short"; text: string };

/** Parse `tokens` against a frozen scope. Throws ArgParsingError on bad input. */
export function parseArguments(config: ArgConfig, args: FrozenArgumentSet, tokens: readonly string[]): void {
  new ParserContext(config, args).parse(tokens);
}

class ParserContext {
  /** Option whose value arrives in the next token. */
  private pending: OptionDefinition | undefined;
  private optionsAvailable = true;
  private nextPositional = 0;

  constructor(
    private readonly config: ArgConfig,
    private readonly args: FrozenArgumentSet,
  ) {}

  parse(tokens: readonly string[]): void {
    logger.debug("Parsing scope", { tokens: tokens.length });

    for (let i = 0; i < tokens.length; i++) {
      const raw = tokens[i];

      if (this.pending) {
        this.fill(this.pending, raw);
        this.pending = undefined;
        continue;
      }

      if (raw === this.config.disableOptionsAfter) {
        this.optionsAvailable = false;
        continue;
      }

      const token = this.classify(raw);
      switch (token.kind) {
        case "positional": {
          const commandSet = this.args.commandSet;
          if (commandSet) {
            this.selectCommand(commandSet, token.text, tokens.slice(i + 1));
            return;
          }
          this.parsePositional(token.text);
          break;
        }
        case "long":
          this.parseLongOption(raw, token.text);
          break;
        case "short":
          this.parseShortCluster(token.text);
          break;
      }
    }

    this.finish();
  }

  private classify(raw: string): Token {
    if (this.optionsAvailable) {
      const { longPrefix, shortPrefix } = this.config;
      if (raw.startsWith(longPrefix)) {
        return { kind: "long", text: raw.slice(longPrefix.length) };
      }
      if (shortPrefix !== undefined && raw.startsWith(shortPrefix)) {
        return { kind: "short", text: raw.slice(shortPrefix.length) };
      }
    }
    return { kind: "positional", text: raw };
  }

  private finish(): void {
    const commandSet = this.args.commandSet;
    if (commandSet && commandSet.holder.isEmpty) {
      throw ArgParsingError.missingCommand();
    }

    // The cursor can still point at a multi-valued positional that already got values.
    const missing: string[] = [];
    for (const positional of this.args.positionals.slice(this.nextPositional)) {
      if (missing.length === 0 && positional.holder.wasGiven) continue;
      if (!positional.isMandatory) break;
      missing.push(positional.name);
    }
    if (missing.length > 0) {
      throw ArgParsingError.missingPositionals(missing);
    }

    if (this.pending) {
      throw ArgParsingError.missingOptionValue(this.pending.name);
    }
  }

  private selectCommand(commandSet: CommandSetDefinition, name: string, rest: readonly string[]): void {
    const command = this.args.commands.get(name);
    if (!command) {
      throw ArgParsingError.unknownCommand(name);
    }

    this.fill(commandSet, name);
    logger.debug("Selected command", { command: name, remaining: rest.length });
    parseArguments(this.config, command.args, rest);
  }

  private parsePositional(text: string): void {
    const positional = this.args.positionals[this.nextPositional];
    if (!positional) {
      throw ArgParsingError.tooManyPositionals(text);
    }

    this.fill(positional, text);

    if (!positional.isMulti) {
      this.nextPositional++;
    }
    if (positional.noOptionsFollowing ?? this.config.noOptionsAfterPositional) {
      this.optionsAvailable = false;
    }
  }

  private parseLongOption(raw: string, text: string): void {
    const split = splitLongOption(text);
    const option = this.args.options.get(split.name);
    if (!option) {
      throw ArgParsingError.unknownOption(raw);
    }

    if (split.value !== undefined) {
      this.fill(option, split.value);
    } else if (option.flag) {
      this.fill(option, split.name === option.flag.inverse ? "false" : "true");
    } else {
      this.pending = option;
    }
  }

  private parseShortCluster(text: string): void {
    for (let i = 0; i < text.length; i++) {
      const short = text[i];
      const isLast = i === text.length - 1;
      const option = this.lookupShort(short);

      // Inverses have no short form, so a clustered flag is always `true`.
      if (option.flag && text[i + 1] !== "=") {
        this.fill(option, "true");
        continue;
      }

      if (isLast) {
        this.pending = option;
      } else {
        const split = splitShortOption(text.slice(i));
        this.fill(option, split.value ?? "");
      }
      return;
    }
  }

  private lookupShort(short: string): OptionDefinition {
    const display = `${this.config.shortPrefix ?? ""}${short}`;
    const longName = this.args.shortToLong.get(short);
    const option = longName === undefined ? undefined : this.args.options.get(longName);
    if (!option) {
      throw ArgParsingError.unknownOption(display);
    }
    return option;
  }

  private fill(target: ValueTarget, raw: string): void {
    try {
      target.fill(raw);
    } catch (err) {
      if (err instanceof ValueParserError) {
        throw ArgParsingError.valueParsingFailed(target.name, raw, err);
      }
      throw err;
    }
  }
}
