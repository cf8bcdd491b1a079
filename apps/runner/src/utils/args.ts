/**
 * CLI argument parser.
 *
 * Hand-rolled minimal parser - no external CLI framework needed.
 */

import type { ParsedArgs } from "../commands/base.js";

/**
 * Parse CLI arguments into structured ParsedArgs.
 *
 * Supported formats:
 *   - Long flag with value: --settings ./cmdpal-settings.json
 *   - Long flag with inline value: --settings=./cmdpal-settings.json
 *   - Boolean flag: --help
 *   - Short flag: -h (treated as boolean)
 *   - Command: first non-flag argument
 *   - Positional: remaining non-flag arguments
 *
 * Examples:
 *   parseArgs(["run", "text"]) → { command: "run", flags: {}, positional: ["text"] }
 *   parseArgs(["list", "--settings", "s.json"]) → { command: "list", flags: { settings: "s.json" }, positional: [] }
 *   parseArgs(["--help"]) → { command: "", flags: { help: true }, positional: [] }
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  let command = "";

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    // Inline value: --settings=./path
    if (arg.startsWith("--") && arg.includes("=")) {
      const eq = arg.indexOf("=");
      flags[arg.slice(2, eq)] = arg.slice(eq + 1);
      continue;
    }

    // Long flag with value: --settings ./path
    const next = argv[i + 1];
    if (arg.startsWith("--") && next !== undefined && !next.startsWith("-")) {
      flags[arg.slice(2)] = next;
      i++; // Skip value
      continue;
    }

    // Boolean flag: --help
    if (arg.startsWith("--")) {
      flags[arg.slice(2)] = true;
      continue;
    }

    // Short flag: -h
    if (arg.startsWith("-") && arg.length === 2) {
      flags[arg.slice(1)] = true;
      continue;
    }

    if (arg.startsWith("-")) {
      continue;
    }

    // First non-flag = command, the rest are positional
    if (!command) {
      command = arg;
    } else {
      positional.push(arg);
    }
  }

  return { command, flags, positional };
}

/** Read a flag that takes a value; a bare boolean flag counts as absent. */
export function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags[name];
  return typeof value === "string" ? value : undefined;
}
