export { createCommandPalette, FAMILY_IMPLICIT_PARAMS } from "./palette.js";
export type {
  ArgumentError,
  CommandPalette,
  CommandPaletteOptions,
  PaletteOutcome,
} from "./palette.js";
export {
  createTextCommandPalette,
  createWindowCommandPalette,
  createApplicationCommandPalette,
} from "./families.js";
export type { FamilyPaletteOptions } from "./families.js";
