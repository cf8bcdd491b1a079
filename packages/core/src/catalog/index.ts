export { buildCatalog, declaredCommands, declaredCommandsKey } from "./catalog.js";
export type { BuildCatalogOptions } from "./catalog.js";
export { buildDeclaredDescriptor, buildRegisteredDescriptor, deriveCommandName } from "./descriptor.js";
export {
  NO_ARGUMENTS,
  argumentPromptLabel,
  describeCommand,
  firstDocLine,
  formatArguments,
  hasAnyArgs,
  isBoring,
} from "./format.js";
