/**
 * Per-family palettes. They differ only in the family they target: the
 * host decides which registered classes and which runner each one gets.
 */

import type { CommandPalette, CommandPaletteOptions } from "./palette.js";
import { createCommandPalette } from "./palette.js";

export type FamilyPaletteOptions = Omit<CommandPaletteOptions, "family">;

/** Commands bound to one document; their first parameter is the edit context. */
export function createTextCommandPalette(options: FamilyPaletteOptions): CommandPalette {
  return createCommandPalette({ ...options, family: "text" });
}

/** Commands bound to one window. */
export function createWindowCommandPalette(options: FamilyPaletteOptions): CommandPalette {
  return createCommandPalette({ ...options, family: "window" });
}

/** Commands bound to the application. */
export function createApplicationCommandPalette(options: FamilyPaletteOptions): CommandPalette {
  return createCommandPalette({ ...options, family: "application" });
}
