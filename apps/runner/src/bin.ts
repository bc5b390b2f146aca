#!/usr/bin/env node

/**
 * Demo CLI entry point.
 *
 *   argloom-demo add 1 2 3
 *   argloom-demo -v echo -c 2 hello world
 *   argloom-demo version
 */

import { ArgloomError } from "@argloom/sdk";
import { DemoApp } from "./commands/app.js";
import { resolveArgConfig } from "./utils/config-loader.js";

async function main(): Promise<number> {
  const app = new DemoApp(resolveArgConfig());
  await app.runAppOrQuit(process.argv.slice(2));
  return 0;
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    if (err instanceof ArgloomError) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error("Fatal error:", err);
    }
    process.exitCode = 1;
  });
