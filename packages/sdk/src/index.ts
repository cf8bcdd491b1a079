// Types
export type { Literal, LiteralObject, NamedArguments } from "./types/literal.js";

export type {
  CommandDescriptor,
  OptionalArgument,
  CommandSignature,
  RegisteredCommand,
  RegisteredCommandClass,
  DeclaredCommand,
  ParsedArguments,
  CatalogEntry,
} from "./types/command.js";

export type {
  CommandFamily,
  CommandRunner,
  PaletteUI,
  PaletteHost,
} from "./types/host.js";

export { COMMAND_FAMILIES } from "./types/host.js";

export type { PaletteSettings } from "./types/settings.js";

// Errors
export {
  PaletteError,
  SchemaError,
  ArgumentSyntaxError,
  ConflictError,
  OverflowError,
  DispatchError,
  UnknownCommandError,
  ConfigError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
