/**
 * Literal values — the JSON-compatible values accepted as command arguments.
 */

/** A string-keyed mapping of literals. */
export interface LiteralObject {
  [key: string]: Literal;
}

/** Any value expressible by the argument literal grammar. */
export type Literal = null | boolean | number | string | Literal[] | LiteralObject;

/** Final name → value mapping handed to a command runner. */
export type NamedArguments = Record<string, Literal>;
