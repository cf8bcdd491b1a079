/**
 * Presentation helpers for listing commands and prompting for arguments.
 */

import type { CommandDescriptor, Literal, PaletteSettings } from "@cmdpal/sdk";
import { formatLiteral } from "../parser/literal.js";

export const NO_ARGUMENTS = "No arguments";

export function hasAnyArgs(descriptor: CommandDescriptor): boolean {
  return (
    descriptor.requiredArgs.length > 0 ||
    descriptor.optionalArgs.length > 0 ||
    descriptor.hasArbitraryArgs
  );
}

/** Falsy defaults are abbreviated unless show_boring_defaults is set. */
export function isBoring(value: Literal): boolean {
  if (value === null) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === "object") return Object.keys(value).length === 0;
  return !value;
}

/**
 * Format a descriptor's parameters, e.g. `by, extend, to="eol", ...`.
 */
export function formatArguments(
  descriptor: CommandDescriptor,
  settings: Pick<PaletteSettings, "show_boring_defaults">,
): string {
  const optional = descriptor.optionalArgs.map(([name, value]) =>
    settings.show_boring_defaults || !isBoring(value) ? `${name}=${formatLiteral(value)}` : name,
  );
  if (descriptor.hasArbitraryArgs) {
    optional.push("...");
  }
  return [...descriptor.requiredArgs, ...optional].join(", ");
}

/** First line of a documentation string, or undefined when it is blank. */
export function firstDocLine(doc: string | undefined): string | undefined {
  const trimmed = doc?.trim();
  if (!trimmed) return undefined;
  return trimmed.split("\n", 1)[0];
}

/**
 * Rows shown for one command in the list: its name, then its arguments and
 * the first line of its documentation when the settings ask for them.
 */
export function describeCommand(descriptor: CommandDescriptor, settings: PaletteSettings): string[] {
  const rows = [descriptor.name];
  if (settings.show_arguments) {
    rows.push(hasAnyArgs(descriptor) ? formatArguments(descriptor, settings) : NO_ARGUMENTS);
  }
  const doc = firstDocLine(descriptor.doc);
  if (settings.show_doc && doc) {
    rows.push(doc);
  }
  return rows;
}

/** Label of the argument prompt. */
export function argumentPromptLabel(
  descriptor: CommandDescriptor,
  settings: Pick<PaletteSettings, "show_boring_defaults">,
): string {
  return `${formatArguments(descriptor, settings)}:`;
}
