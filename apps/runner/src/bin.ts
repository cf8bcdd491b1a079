#!/usr/bin/env node

/**
 * Runner Entry Point — CLI subcommand router.
 *
 * Supports:
 *   - cmdpal run [text|window|application] [--settings <path>] [--text <initial>] [--loop]
 *   - cmdpal list [family] [--settings <path>]
 *   - cmdpal version [--verbose]
 *   - cmdpal (no args) → defaults to "run"
 *   - cmdpal text → shorthand for "run text"
 */

import { COMMAND_FAMILIES } from "@cmdpal/sdk";
import { parseArgs } from "./utils/args.js";
import { RunCommand } from "./commands/run.js";
import { ListCommand } from "./commands/list.js";
import { VersionCommand } from "./commands/version.js";

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));

  // Handle --help / -h
  if (parsed.flags.help === true || parsed.flags.h === true) {
    console.log("cmdpal - command palette for the terminal");
    console.log("");
    console.log("Usage: cmdpal <command> [options]");
    console.log("");
    console.log("Commands:");
    console.log("  run [family]   Open the palette for text, window or application commands (default)");
    console.log("  list [family]  Print the command catalog");
    console.log("  version        Show version information");
    console.log("");
    console.log("Options:");
    console.log("  --settings <path>  Path to the settings file (default: ./cmdpal-settings.json)");
    console.log("  --text <initial>   Initial buffer text for text commands");
    console.log("  --loop             Keep the palette open until cancelled");
    console.log("  --verbose          Show detailed output");
    console.log("  --help, -h         Show this help message");
    return 0;
  }

  // A bare family name runs the palette for it
  if (COMMAND_FAMILIES.some(family => family === parsed.command)) {
    parsed.positional.unshift(parsed.command);
    parsed.command = "run";
  }

  // Subcommand routing
  const commands = [new RunCommand(), new ListCommand(), new VersionCommand()];

  const command = commands.find(cmd => cmd.name === parsed.command);

  if (!command) {
    // Default: no command = "run"
    if (parsed.command === "") {
      return new RunCommand().execute(parsed);
    }
    console.error(`Unknown command: ${parsed.command}`);
    console.error(`Available commands: ${commands.map(cmd => cmd.name).join(", ")}`);
    return 1;
  }

  return command.execute(parsed);
}

// Always run — this file is the CLI entry point
main()
  .then(exitCode => process.exit(exitCode))
  .catch(err => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
