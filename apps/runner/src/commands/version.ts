/**
 * Version command - display version information.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { CliCommand, ParsedArgs } from "./base.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const PackageJsonSchema = z.object({ version: z.string() });

/** Nearest package.json at or above `dir`. */
function findPackageJson(dir: string): string {
  const candidate = resolve(dir, "package.json");
  if (existsSync(candidate)) return candidate;
  const parent = dirname(dir);
  if (parent === dir) throw new Error("package.json not found");
  return findPackageJson(parent);
}

export class VersionCommand implements CliCommand {
  name = "version";
  description = "Display version information";

  async execute(args: ParsedArgs): Promise<number> {
    try {
      const pkgPath = findPackageJson(__dirname);
      const pkg = PackageJsonSchema.parse(JSON.parse(readFileSync(pkgPath, "utf-8")));

      console.log(`cmdpal v${pkg.version}`);

      if (args.flags.verbose) {
        console.log(`Node.js ${process.version}`);
        console.log(`Platform: ${process.platform} ${process.arch}`);
      }

      return 0;
    } catch (err) {
      console.error(`Failed to read version information: ${err instanceof Error ? err.message : String(err)}`);
      return 1;
    }
  }
}
