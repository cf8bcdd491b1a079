/**
 * Host collaborator interfaces — what the palette consumes from the host
 * application.
 */

import type { RegisteredCommandClass } from "./command.js";
import type { NamedArguments } from "./literal.js";

/** The context scopes under which commands are registered and dispatched. */
export type CommandFamily = "text" | "window" | "application";

export const COMMAND_FAMILIES: readonly CommandFamily[] = ["text", "window", "application"];

/** Dispatches a command by name to the host's execution subsystem. */
export interface CommandRunner {
  runCommand(name: string, args: NamedArguments): void | Promise<void>;
}

/**
 * UI surfaces. Cancellation is reported as `undefined`.
 */
export interface PaletteUI {
  /** Present one entry per command (each entry is a list of display rows). */
  listAndChoose(items: string[][]): Promise<number | undefined>;
  /** Capture a single line of free text. */
  promptForText(label: string, initial: string): Promise<string | undefined>;
  showError(message: string): void;
}

/** Where a palette finds the commands and the runner for its family. */
export interface PaletteHost {
  commandClasses(family: CommandFamily): readonly RegisteredCommandClass[];
  runnerFor(family: CommandFamily): CommandRunner;
}
