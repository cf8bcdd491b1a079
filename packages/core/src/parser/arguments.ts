/**
 * Argument text parser.
 *
 * Parses one line of the form
 *
 *   LITERAL1, LITERAL2, ..., nameA = LITERALA, nameB = LITERALB, ...
 *
 * into positional and named values. Positional values come first: once a
 * named value has been given, every following value must be named too.
 */

import { ArgumentSyntaxError } from "@cmdpal/sdk";
import type { Literal, ParsedArguments } from "@cmdpal/sdk";
import { decodeLiteral } from "./literal.js";

const NAME_ASSIGNMENT = /([A-Za-z_][A-Za-z0-9_]*)\s*=\s*/y;
const WHITESPACE = /\s*/y;

function skipWhitespace(text: string, index: number): number {
  WHITESPACE.lastIndex = index;
  WHITESPACE.exec(text);
  return WHITESPACE.lastIndex;
}

/**
 * Parse argument text into positional and named values.
 *
 * Examples:
 *   parseArguments("")             → positional [], named {}
 *   parseArguments("1, 2, name=3") → positional [1, 2], named { name → 3 }
 *   parseArguments('[1, 2], {"x": true}') → positional [[1, 2], { x: true }], named {}
 *
 * @throws ArgumentSyntaxError on a malformed literal, a positional value after
 * a named one, a repeated name, or a missing comma
 */
export function parseArguments(text: string): ParsedArguments {
  const positional: Literal[] = [];
  const named = new Map<string, Literal>();
  let name: string | undefined;

  let cursor = skipWhitespace(text, 0);
  while (cursor < text.length) {
    const argumentStart = cursor;
    NAME_ASSIGNMENT.lastIndex = cursor;
    const assignment = NAME_ASSIGNMENT.exec(text);
    if (assignment) {
      name = assignment[1];
      cursor = NAME_ASSIGNMENT.lastIndex;
    } else if (name !== undefined) {
      throw new ArgumentSyntaxError(`Expected argument name: ${text.slice(cursor)}`, cursor);
    }

    const { value, end } = decodeLiteral(text, cursor);
    if (name === undefined) {
      positional.push(value);
    } else if (named.has(name)) {
      throw new ArgumentSyntaxError(`Repeated name "${name}"`, argumentStart);
    } else {
      named.set(name, value);
    }

    cursor = skipWhitespace(text, end);
    if (text[cursor] === ",") {
      cursor = skipWhitespace(text, cursor + 1);
    } else if (cursor < text.length) {
      throw new ArgumentSyntaxError(`Expected ",": ${text.slice(cursor)}`, cursor);
    }
  }

  return { positional, named };
}
