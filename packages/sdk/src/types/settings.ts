/**
 * Palette settings, read-only once loaded.
 */

import type { DeclaredCommand } from "./command.js";

export interface PaletteSettings {
  /** Append the argument list to each listed command. */
  show_arguments: boolean;
  /** Append the first line of documentation. */
  show_doc: boolean;
  /** Spell out falsy defaults (`name=false`) instead of the bare name. */
  show_boring_defaults: boolean;
  text_commands: DeclaredCommand[];
  window_commands: DeclaredCommand[];
  application_commands: DeclaredCommand[];
}
