export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  LiteralSchema,
  DeclaredCommandSchema,
  PaletteSettingsSchema,
  DEFAULT_SETTINGS,
} from "./utils/settings-schema.js";
