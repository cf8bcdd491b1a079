/**
 * Run command - open the command palette for one family in the terminal.
 */

import { ConfigError, DispatchError, SchemaError } from "@cmdpal/sdk";
import type { PaletteSettings } from "@cmdpal/sdk";
import { createCommandPalette } from "@cmdpal/core";
import type { PaletteOutcome } from "@cmdpal/core";
import { createLogger } from "@cmdpal/shared";
import type { CliCommand, ParsedArgs } from "./base.js";
import { stringFlag } from "../utils/args.js";
import { resolveFamily } from "../utils/families.js";
import { TerminalUI } from "../utils/prompts.js";
import type { PromptOptions } from "../utils/prompts.js";
import { loadSettings } from "../utils/settings-loader.js";
import { createTerminalHost } from "../host/builtin-commands.js";
import { createTerminalSession, renderBuffer } from "../host/session.js";

const logger = createLogger("cli");

export class RunCommand implements CliCommand {
  name = "run";
  description = "Open the command palette for a family (default: window)";

  constructor(private readonly options: PromptOptions = {}) {}

  async execute(args: ParsedArgs): Promise<number> {
    // 1. Resolve family
    const family = resolveFamily(args.positional[0]);
    if (!family) {
      console.error(`[cli] Unknown command family: ${args.positional[0]}`);
      console.error("[cli] Available families: text, window, application");
      return 1;
    }

    // 2. Load settings
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

    // 3. Wire session, host and UI
    const output = this.options.output ?? process.stdout;
    const session = createTerminalSession({
      text: stringFlag(args, "text"),
      print: line => output.write(`${line}\n`),
    });
    const ui = new TerminalUI(this.options);
    const palette = createCommandPalette({ family, host: createTerminalHost(session), ui, settings });
    const loop = args.flags.loop === true;

    // 4. Run until cancelled (once without --loop)
    try {
      let outcome: PaletteOutcome;
      do {
        outcome = await palette.run();
        if (outcome.status === "dispatched" && family === "text") {
          session.print(renderBuffer(session.buffer));
        }
      } while (loop && outcome.status !== "cancelled");
      return outcome.status === "rejected" ? 1 : 0;
    } catch (err) {
      if (err instanceof SchemaError) {
        ui.showError(err.message);
        return 1;
      }
      if (err instanceof DispatchError) {
        // Already shown by the palette
        logger.debug("Run ended by a failed command", { command: err.commandName });
        return 1;
      }
      throw err;
    } finally {
      ui.close();
    }
  }
}
