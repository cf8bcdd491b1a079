/**
 * Command descriptor and registration types.
 */

import type { Literal, NamedArguments } from "./literal.js";

/** An optional parameter paired with its default value. */
export type OptionalArgument = readonly [name: string, defaultValue: Literal];

/** Normalized, family-agnostic metadata about one invocable command. */
export interface CommandDescriptor {
  readonly name: string;
  /** Parameters without defaults, in positional order. */
  readonly requiredArgs: readonly string[];
  /** Parameters with defaults; they follow requiredArgs in positional order. */
  readonly optionalArgs: readonly OptionalArgument[];
  readonly doc?: string;
  /** Whether the command accepts named parameters beyond the declared ones. */
  readonly hasArbitraryArgs: boolean;
}

/**
 * Declared invocation signature of a registered command.
 *
 * `params` lists every parameter of the command's `run` method, including the
 * implicit context parameters the family supplies. `defaults` aligns with the
 * tail of `params`, the same way default values trail a parameter list.
 */
export interface CommandSignature {
  readonly params: readonly string[];
  readonly defaults?: readonly Literal[];
  /** The first parameter is the receiver the host binds at call time. */
  readonly receiver?: boolean;
  /** The command takes a catch-all of extra named parameters. */
  readonly arbitraryArgs?: boolean;
  /** Documentation of the `run` method. */
  readonly doc?: string;
}

/** An instance of a registered command. */
export interface RegisteredCommand<TContext = unknown> {
  run(context: TContext, args: NamedArguments): void | Promise<void>;
}

/**
 * A command class registered by an extension.
 *
 * The class describes itself through a static `signature`; its palette name
 * is derived from the class name.
 *
 * @example
 * ```typescript
 * // Listed as "move" with required `by` and optional `extend=false`
 * // in the text family, whose first parameter is the edit context.
 * class MoveCommand {
 *   static readonly signature = { params: ["edit", "by", "extend"], defaults: [false] };
 *   run(edit: Edit, args: NamedArguments): void { ... }
 * }
 * ```
 */
export interface RegisteredCommandClass<TContext = unknown> {
  readonly name: string;
  /** Class-level documentation, used when the signature carries none. */
  readonly doc?: string;
  readonly signature: CommandSignature;
  new (): RegisteredCommand<TContext>;
}

/** A command statically declared in the settings file. */
export interface DeclaredCommand {
  name: string;
  /** Bare names are required; `[name, default]` pairs are optional. */
  args?: unknown[];
  doc?: string;
  has_arbitrary_args?: boolean;
}

/** Positional and named values parsed from one line of argument text. */
export interface ParsedArguments {
  positional: Literal[];
  named: Map<string, Literal>;
}

/** A descriptor bound to the handler that dispatches it. */
export interface CatalogEntry {
  readonly descriptor: CommandDescriptor;
  invoke(args: NamedArguments): Promise<void>;
}
