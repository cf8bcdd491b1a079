/**
 * Error codes carried by PaletteError.code.
 */

export const ErrorCode = {
  SCHEMA_ERROR: "SCHEMA_ERROR",
  ARGUMENT_SYNTAX_ERROR: "ARGUMENT_SYNTAX_ERROR",
  ARGUMENT_CONFLICT: "ARGUMENT_CONFLICT",
  ARGUMENT_OVERFLOW: "ARGUMENT_OVERFLOW",
  DISPATCH_ERROR: "DISPATCH_ERROR",
  UNKNOWN_COMMAND: "UNKNOWN_COMMAND",
  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_NOT_FOUND: "CONFIG_NOT_FOUND",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
