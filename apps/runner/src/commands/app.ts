/**
 * Root handler of the demo CLI.
 */

import { AppHandler, CommandHandlerSet, defaultArgConfig, flagCountAccumulator } from "@argloom/core";
import type { Arg, ArgParser, UsageInfo } from "@argloom/core";
import type { ArgConfig } from "@argloom/sdk";
import { createLogger } from "@argloom/shared";
import { AddCommand } from "./add.js";
import { EchoCommand } from "./echo.js";
import { VersionCommand } from "./version.js";

const logger = createLogger("DemoApp");

export class DemoApp extends AppHandler {
  readonly usageInfo: UsageInfo = {
    application: "argloom-demo",
    prologue: "Small tools that exercise the argloom parser.",
    epilogue: "Set ARGLOOM_CONFIG to a JSON file to change the option syntax.",
  };
  readonly config: ArgConfig = defaultArgConfig;
  readonly commands = CommandHandlerSet.from([new AddCommand(), new EchoCommand(), new VersionCommand()]);
  verbose!: Arg<number>;

  constructor(config?: ArgConfig) {
    super();
    if (config) this.config = config;
  }

  register(parser: ArgParser): void {
    this.verbose = parser.addMultiFlag("verbose", {
      short: "v",
      description: "Print more detail, repeat for even more",
      defaultValue: 0,
      accumulator: flagCountAccumulator,
    });
  }

  run(): void {
    logger.setContext({ app: "argloom-demo", command: this.commands.selected });
    logger.debug("Dispatching", { verbosity: this.verbose.value });
  }
}
