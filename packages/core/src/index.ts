// Catalog
export {
  buildCatalog,
  buildDeclaredDescriptor,
  buildRegisteredDescriptor,
  declaredCommands,
  declaredCommandsKey,
  deriveCommandName,
} from "./catalog/index.js";
export type { BuildCatalogOptions } from "./catalog/index.js";

// Presentation
export {
  NO_ARGUMENTS,
  argumentPromptLabel,
  describeCommand,
  firstDocLine,
  formatArguments,
  hasAnyArgs,
  isBoring,
} from "./catalog/index.js";

// Parsing
export { parseArguments, decodeLiteral, formatLiteral } from "./parser/index.js";
export type { DecodedLiteral } from "./parser/index.js";

// Reconciliation & dispatch
export { declaredParameterOrder, reconcileArguments, dispatchCommand } from "./dispatch/index.js";

// Palette
export {
  createCommandPalette,
  createTextCommandPalette,
  createWindowCommandPalette,
  createApplicationCommandPalette,
  FAMILY_IMPLICIT_PARAMS,
} from "./palette/index.js";
export type {
  ArgumentError,
  CommandPalette,
  CommandPaletteOptions,
  FamilyPaletteOptions,
  PaletteOutcome,
} from "./palette/index.js";

// Infrastructure
export { createCommandRegistry } from "./infrastructure/index.js";
export type { CommandRegistry, CommandRegistryOptions } from "./infrastructure/index.js";
