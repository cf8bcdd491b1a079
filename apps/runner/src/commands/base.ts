/**
 * Base command interface for all CLI subcommands.
 */

export interface ParsedArgs {
  /** Command name (e.g., "run") */
  command: string;

  /** Named flags (e.g., { settings: "./cmdpal-settings.json", help: true }) */
  flags: Record<string, string | boolean>;

  /** Positional arguments (e.g., ["text"]) */
  positional: string[];
}

export interface CliCommand {
  /** Command name (e.g., "run", "list", "version") */
  name: string;

  /** Command description for help text */
  description: string;

  /** Execute the command with parsed arguments */
  execute(args: ParsedArgs): Promise<number>; // Exit code: 0 = success, 1+ = error
}
