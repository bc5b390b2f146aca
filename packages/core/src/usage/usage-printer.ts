/**
 * Default usage renderer.
 *
 * Output shape:
 *
 *   Usage: app cmd <command> <input> [-v|--{no-}verbose[=true|false]]
 *
 *   Prologue
 *
 *   Commands:
 *
 *     build  Build the project
 *   ...
 */

import type { ArgConfig } from "@argloom/sdk";
import { formatCommonSubstring, longestCommonSubstring, wrapText } from "@argloom/shared";
import type { TextWrapper } from "@argloom/shared";
import type { FrozenArgumentSet } from "../definition/argument-set.js";
import type { Definition } from "../definition/definitions.js";
import { defaultTerminalAttributesFactory } from "./sink.js";
import type { TerminalAttributes, TerminalAttributesFactory, TextSink } from "./sink.js";
import type { UsageContext, UsageInfo } from "./usage-info.js";
import type { UsageGroup } from "./usage-group.js";

export interface UsagePrintOptions {
  sink: TextSink;
  /** Only print the `Usage:` line. */
  showShortUsage: boolean;
  /** Prefixes used to render options. */
  config: ArgConfig;
}

export type UsagePrinter = (
  args: FrozenArgumentSet,
  info: UsageInfo,
  context: UsageContext,
  options: UsagePrintOptions,
) => void;

const PADDING = "  ";

function formatDefinition(definition: Definition, config: ArgConfig, inShortUsage: boolean): string {
  switch (definition.kind) {
    case "command":
      return definition.name;
    case "positional":
      return inShortUsage ? `<${definition.name}>` : definition.name;
    case "option": {
      let text = "";
      if (definition.short !== undefined && config.shortPrefix !== undefined) {
        text += `${config.shortPrefix}${definition.short}${inShortUsage ? "|" : ", "}`;
      }
      text += config.longPrefix;

      const flag = definition.flag;
      if (!flag) {
        text += `${definition.name}=${definition.valueDescription ?? "VALUE"}`;
      } else {
        text +=
          flag.inverse === undefined
            ? definition.name
            : formatCommonSubstring(longestCommonSubstring(definition.name, flag.inverse));
        text += "[=true|false]";
      }
      return inShortUsage ? `[${text}]` : text;
    }
  }
}

interface Section {
  name: string;
  definitions: Definition[];
}

export function createDefaultUsagePrinter(
  options: { attributesFactory?: TerminalAttributesFactory; wrapper?: TextWrapper } = {},
): UsagePrinter {
  const attributesFactory = options.attributesFactory ?? defaultTerminalAttributesFactory;
  const wrapper = options.wrapper ?? wrapText;

  function wrap(text: string, attributes: TerminalAttributes): string[] {
    return attributes.width !== undefined ? wrapper(text, attributes.width) : [text];
  }

  function usageLine(args: FrozenArgumentSet, config: ArgConfig): string {
    const parts: string[] = [];
    if (args.commands.size > 0) parts.push("<command>");
    for (const [, definition] of args.allDefinitions({ includeInverse: false })) {
      if (definition.kind !== "command") parts.push(formatDefinition(definition, config, true));
    }
    return parts.join(" ");
  }

  function sectionLines(section: Section, config: ArgConfig, attributes: TerminalAttributes): string[] {
    const lines = ["", `${section.name}:`, ""];
    const labels = section.definitions.map((def) => formatDefinition(def, config, false));
    const longest = Math.max(...labels.map((label) => label.length));
    const labelWidth = longest + PADDING.length * 2;

    let descriptionWidth: number | undefined;
    if (attributes.width !== undefined && attributes.width - PADDING.length - labelWidth > 1) {
      descriptionWidth = attributes.width - PADDING.length - labelWidth;
    }

    section.definitions.forEach((definition, i) => {
      const label = labels[i];
      const description = definition.description;
      if (description === undefined || description === "") {
        lines.push(`${PADDING}${label}`);
        return;
      }
      if (descriptionWidth === undefined) {
        lines.push(`${PADDING}${label}${PADDING}${description}`);
        return;
      }

      const [first, ...rest] = wrapper(description, descriptionWidth);
      lines.push(`${PADDING}${label}${" ".repeat(longest - label.length)}${PADDING}${first ?? ""}`);
      for (const line of rest) lines.push(`${" ".repeat(labelWidth)}${line}`);
    });

    return lines;
  }

  return (args, info, context, { sink, showShortUsage, config }) => {
    const attributes = attributesFactory(sink);

    const commands: Section = { name: "Commands", definitions: [] };
    const positionals: Section = { name: "Positional arguments", definitions: [] };
    const optionsSection: Section = { name: "Options", definitions: [] };
    const custom = new Map<string, Section>();

    for (const [, definition] of args.allDefinitions({ includeInverse: false })) {
      const group: UsageGroup | undefined = definition.usageGroup;
      if (group) {
        const section = custom.get(group.name) ?? { name: group.name, definitions: [] };
        section.definitions.push(definition);
        custom.set(group.name, section);
        continue;
      }
      switch (definition.kind) {
        case "command":
          commands.definitions.push(definition);
          break;
        case "positional":
          positionals.definitions.push(definition);
          break;
        case "option":
          optionsSection.definitions.push(definition);
          break;
      }
    }

    const head = [info.application ?? "<this application>", ...context.path.map((c) => c.name)].join(" ");
    const [firstUsage, ...moreUsage] = wrap(usageLine(args, config), attributes);
    const lines = [firstUsage ? `Usage: ${head} ${firstUsage}` : `Usage: ${head}`, ...moreUsage];

    if (!showShortUsage) {
      if (info.prologue !== undefined) {
        lines.push("", ...wrap(info.prologue, attributes));
      }

      for (const section of [commands, positionals, optionsSection, ...custom.values()]) {
        if (section.definitions.length > 0) lines.push(...sectionLines(section, config, attributes));
      }

      lines.push("");
      if (info.epilogue !== undefined) {
        lines.push(...wrap(info.epilogue, attributes), "");
      }
    }

    sink.write(lines.map((line) => `${line}\n`).join(""));
  };
}
