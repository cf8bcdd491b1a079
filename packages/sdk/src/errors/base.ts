/**
 * Error hierarchy for the command palette.
 */

import { ErrorCode } from "./codes.js";

export class PaletteError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PaletteError";
  }
}

/** A statically declared command is malformed. */
export class SchemaError extends PaletteError {
  constructor(
    public readonly commandName: string,
    message: string,
  ) {
    super(`Command "${commandName}" is malformed: ${message}`, ErrorCode.SCHEMA_ERROR);
    this.name = "SchemaError";
  }
}

/**
 * Argument text could not be parsed.
 * `position` is the offset into the input where parsing stopped.
 */
export class ArgumentSyntaxError extends PaletteError {
  constructor(
    message: string,
    public readonly position: number,
  ) {
    super(message, ErrorCode.ARGUMENT_SYNTAX_ERROR);
    this.name = "ArgumentSyntaxError";
  }
}

/** A positional value lands on a parameter that was also given by name. */
export class ConflictError extends PaletteError {
  constructor(public readonly argumentName: string) {
    super(`Repeated value for argument "${argumentName}"`, ErrorCode.ARGUMENT_CONFLICT);
    this.name = "ConflictError";
  }
}

/** More positional values than declared parameters. */
export class OverflowError extends PaletteError {
  constructor(
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(
      `Too many positional arguments: expected at most ${expected}, got ${received}`,
      ErrorCode.ARGUMENT_OVERFLOW,
    );
    this.name = "OverflowError";
  }
}

/** The command runner failed while executing a command. */
export class DispatchError extends PaletteError {
  constructor(
    public readonly commandName: string,
    cause: unknown,
  ) {
    super(
      `Command "${commandName}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      ErrorCode.DISPATCH_ERROR,
      { cause },
    );
    this.name = "DispatchError";
  }
}

/** No handler is registered under the requested name. */
export class UnknownCommandError extends PaletteError {
  constructor(public readonly commandName: string) {
    super(`Unknown command "${commandName}"`, ErrorCode.UNKNOWN_COMMAND);
    this.name = "UnknownCommandError";
  }
}

export class ConfigError extends PaletteError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}
