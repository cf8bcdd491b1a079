/**
 * Literal codec — decodes a single JSON-compatible value from a prefix of a
 * string, and encodes values back for display.
 *
 * Accepts standard JSON plus the non-finite constants NaN, Infinity and
 * -Infinity. Decoding stops right after the value, so callers can continue
 * scanning the rest of the text themselves.
 */

import { ArgumentSyntaxError } from "@cmdpal/sdk";
import type { Literal } from "@cmdpal/sdk";

export interface DecodedLiteral {
  value: Literal;
  /** Index just past the decoded value. */
  end: number;
}

const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][-+]?\d+)?/y;
const JSON_WHITESPACE = /[ \t\n\r]*/y;

const CONSTANTS: ReadonlyArray<readonly [string, Literal]> = [
  ["null", null],
  ["true", true],
  ["false", false],
  ["NaN", NaN],
  ["Infinity", Infinity],
  ["-Infinity", -Infinity],
];

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

/**
 * Decode exactly one literal starting at `start`.
 * Whitespace at `start` is not skipped.
 *
 * @throws ArgumentSyntaxError when no well-formed literal starts at `start`
 */
export function decodeLiteral(text: string, start = 0): DecodedLiteral {
  return new LiteralScanner(text).scanValue(start);
}

class LiteralScanner {
  constructor(private readonly text: string) {}

  scanValue(index: number): DecodedLiteral {
    const ch = this.text[index];
    if (ch === '"') return this.scanString(index);
    if (ch === "[") return this.scanArray(index);
    if (ch === "{") return this.scanObject(index);

    NUMBER.lastIndex = index;
    const number = NUMBER.exec(this.text);
    if (number) {
      const value = Number(number[0]);
      // Integers must survive the conversion exactly.
      if (!/[.eE]/.test(number[0]) && !Number.isSafeInteger(value)) {
        throw this.fail("Integer out of range", index);
      }
      return { value, end: NUMBER.lastIndex };
    }

    for (const [word, value] of CONSTANTS) {
      if (this.text.startsWith(word, index)) {
        return { value, end: index + word.length };
      }
    }
    throw this.fail("Expecting value", index);
  }

  private scanString(start: number): DecodedLiteral {
    let out = "";
    let index = start + 1;
    for (;;) {
      if (index >= this.text.length) {
        throw this.fail("Unterminated string starting", start);
      }
      const ch = this.text[index];
      if (ch === '"') {
        return { value: out, end: index + 1 };
      }
      if (ch < " ") {
        throw this.fail("Invalid control character", index);
      }
      if (ch !== "\\") {
        out += ch;
        index++;
        continue;
      }

      const escape = this.text[index + 1];
      if (escape === undefined) {
        throw this.fail("Unterminated string starting", start);
      }
      if (escape === "u") {
        const hex = this.text.slice(index + 2, index + 6);
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
          throw this.fail("Invalid \\uXXXX escape", index);
        }
        // Surrogate halves are kept as UTF-16 code units, so a pair
        // written as two escapes forms one character.
        out += String.fromCharCode(parseInt(hex, 16));
        index += 6;
        continue;
      }
      const simple = SIMPLE_ESCAPES[escape];
      if (simple === undefined) {
        throw this.fail("Invalid \\escape", index);
      }
      out += simple;
      index += 2;
    }
  }

  private scanArray(start: number): DecodedLiteral {
    const items: Literal[] = [];
    let index = this.skipWhitespace(start + 1);
    if (this.text[index] === "]") {
      return { value: items, end: index + 1 };
    }
    for (;;) {
      const item = this.scanValue(index);
      items.push(item.value);
      index = this.skipWhitespace(item.end);
      const ch = this.text[index];
      if (ch === "]") {
        return { value: items, end: index + 1 };
      }
      if (ch !== ",") {
        throw this.fail("Expecting ',' delimiter", index);
      }
      index = this.skipWhitespace(index + 1);
    }
  }

  private scanObject(start: number): DecodedLiteral {
    const entries: [string, Literal][] = [];
    let index = this.skipWhitespace(start + 1);
    if (this.text[index] === "}") {
      return { value: {}, end: index + 1 };
    }
    for (;;) {
      if (this.text[index] !== '"') {
        throw this.fail("Expecting property name enclosed in double quotes", index);
      }
      const key = this.scanString(index);
      index = this.skipWhitespace(key.end);
      if (this.text[index] !== ":") {
        throw this.fail("Expecting ':' delimiter", index);
      }
      const item = this.scanValue(this.skipWhitespace(index + 1));
      entries.push([String(key.value), item.value]);
      index = this.skipWhitespace(item.end);
      const ch = this.text[index];
      if (ch === "}") {
        // Object.fromEntries defines own properties, so "__proto__" stays a plain key.
        return { value: Object.fromEntries(entries), end: index + 1 };
      }
      if (ch !== ",") {
        throw this.fail("Expecting ',' delimiter", index);
      }
      index = this.skipWhitespace(index + 1);
    }
  }

  private skipWhitespace(index: number): number {
    JSON_WHITESPACE.lastIndex = index;
    JSON_WHITESPACE.exec(this.text);
    return JSON_WHITESPACE.lastIndex;
  }

  private fail(reason: string, index: number): ArgumentSyntaxError {
    return new ArgumentSyntaxError(`${reason}: column ${index + 1}`, index);
  }
}

/**
 * Encode a literal for display: JSON with ", " and ": " separators and the
 * non-finite numbers spelled out.
 */
export function formatLiteral(value: Literal): string {
  if (value === null) return "null";
  if (typeof value === "number") {
    if (Number.isNaN(value)) return "NaN";
    if (value === Infinity) return "Infinity";
    if (value === -Infinity) return "-Infinity";
    return JSON.stringify(value);
  }
  if (typeof value === "boolean" || typeof value === "string") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(formatLiteral).join(", ")}]`;
  }
  const members = Object.entries(value).map(
    ([key, member]) => `${JSON.stringify(key)}: ${formatLiteral(member)}`,
  );
  return `{${members.join(", ")}}`;
}
