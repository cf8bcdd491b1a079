/**
 * List command - print the catalog of one family, or of all of them.
 */

import { COMMAND_FAMILIES, ConfigError, SchemaError } from "@cmdpal/sdk";
import type { CommandFamily, PaletteSettings } from "@cmdpal/sdk";
import { buildCatalog, describeCommand, FAMILY_IMPLICIT_PARAMS } from "@cmdpal/core";
import type { CommandRegistry } from "@cmdpal/core";
import type { CliCommand, ParsedArgs } from "./base.js";
import { stringFlag } from "../utils/args.js";
import { loadSettings } from "../utils/settings-loader.js";
import { createTerminalHost } from "../host/builtin-commands.js";
import { createTerminalSession } from "../host/session.js";

export class ListCommand implements CliCommand {
  name = "list";
  description = "List the commands of a family (default: all families)";

  async execute(args: ParsedArgs): Promise<number> {
    const requested = args.positional[0];
    const families = requested === undefined
      ? COMMAND_FAMILIES
      : COMMAND_FAMILIES.filter(family => family === requested);
    if (families.length === 0) {
      console.error(`[cli] Unknown command family: ${requested}`);
      return 1;
    }

    let settings: PaletteSettings;
    try {
      settings = await loadSettings(stringFlag(args, "settings"));
    } catch (err) {
      if (err instanceof ConfigError) {
        console.error(`[cli] ${err.message}`);
        return 1;
      }
      throw err;
    }

    const host = createTerminalHost(createTerminalSession());
    try {
      families.forEach((family, index) => {
        if (index > 0) console.log("");
        this.printFamily(family, host, settings);
      });
    } catch (err) {
      if (err instanceof SchemaError) {
        console.error(`[cli] ${err.message}`);
        return 1;
      }
      throw err;
    }
    return 0;
  }

  private printFamily(
    family: CommandFamily,
    host: CommandRegistry,
    settings: PaletteSettings,
  ): void {
    const catalog = buildCatalog({
      family,
      implicitParams: FAMILY_IMPLICIT_PARAMS[family],
      commandClasses: host.commandClasses(family),
      settings,
      runner: host.runnerFor(family),
    });

    console.log(`${family} commands (${catalog.length}):`);
    for (const entry of catalog) {
      const [name, ...details] = describeCommand(entry.descriptor, settings);
      console.log(`  ${name}`);
      for (const detail of details) {
        console.log(`      ${detail}`);
      }
    }
  }
}
