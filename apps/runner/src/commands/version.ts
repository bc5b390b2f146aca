/**
 * Version command - display version information.
 */

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { CommandHandler } from "@argloom/core";
import type { HandlerContext } from "@argloom/core";
import { validateInput } from "@argloom/shared";
import { z } from "zod";
import { DemoApp } from "./app.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const PackageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export type PackageInfo = z.infer<typeof PackageInfoSchema>;

export function readPackageInfo(path = resolve(__dirname, "../../package.json")): PackageInfo {
  const result = validateInput(PackageInfoSchema, JSON.parse(readFileSync(path, "utf-8")));
  if (!result.success) {
    throw new Error(`Invalid package.json at ${path}: ${result.error}`);
  }
  return result.data;
}

export class VersionCommand extends CommandHandler<string> {
  readonly id = "version";
  readonly description = "Display version information";

  register(): void {}

  run(context: HandlerContext): void {
    const pkg = readPackageInfo();
    console.log(`argloom-demo v${pkg.version}`);

    if (context.parent(DemoApp).verbose.value > 0) {
      console.log(`Node.js ${process.version}`);
      console.log(`Platform: ${process.platform} ${process.arch}`);
    }
  }
}
