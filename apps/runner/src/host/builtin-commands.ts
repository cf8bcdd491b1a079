/**
 * Built-in commands of the terminal host, registered per family.
 *
 * Text commands receive the buffer; window and application commands
 * receive the whole session. Arguments are checked with Zod before use.
 */

import { z } from "zod";
import type { ZodType, ZodTypeDef } from "zod";
import { COMMAND_FAMILIES } from "@cmdpal/sdk";
import type { CommandFamily, CommandRunner, NamedArguments, RegisteredCommandClass } from "@cmdpal/sdk";
import { createCommandRegistry, formatLiteral } from "@cmdpal/core";
import type { CommandRegistry } from "@cmdpal/core";
import { LiteralSchema, validateInput } from "@cmdpal/shared";
import { renderBuffer } from "./session.js";
import type { TerminalSession, TextBuffer } from "./session.js";

function readArguments<T>(schema: ZodType<T, ZodTypeDef, unknown>, args: NamedArguments): T {
  const result = validateInput(schema, args);
  if (!result.success) {
    throw new Error(`Invalid arguments: ${result.error}`);
  }
  return result.data;
}

// --- text ---

const InsertArgs = z.object({
  characters: z.string(),
  times: z.number().int().nonnegative().default(1),
});

export class InsertCommand {
  static readonly signature = {
    params: ["edit", "characters", "times"],
    defaults: [1],
    doc: "Insert characters at the caret.\n\nThe characters are repeated `times` times.",
  };

  run(buffer: TextBuffer, args: NamedArguments): void {
    const { characters, times } = readArguments(InsertArgs, args);
    const inserted = characters.repeat(times);
    buffer.text = buffer.text.slice(0, buffer.caret) + inserted + buffer.text.slice(buffer.caret);
    buffer.caret += inserted.length;
  }
}

const MoveArgs = z.object({
  by: z.number().int().nonnegative(),
  forward: z.boolean().default(true),
});

export class MoveCommand {
  static readonly signature = {
    params: ["edit", "by", "forward"],
    defaults: [true],
    doc: "Move the caret by a number of characters.",
  };

  run(buffer: TextBuffer, args: NamedArguments): void {
    const { by, forward } = readArguments(MoveArgs, args);
    const target = forward ? buffer.caret + by : buffer.caret - by;
    buffer.caret = Math.min(Math.max(target, 0), buffer.text.length);
  }
}

export class UpperCaseCommand {
  static readonly doc = "Convert the whole buffer to upper case.";
  static readonly signature = { params: ["edit"] };

  run(buffer: TextBuffer, _args: NamedArguments): void {
    buffer.text = buffer.text.toUpperCase();
  }
}

// --- window ---

export class ShowBufferCommand {
  static readonly signature = { params: [], doc: "Print the buffer with the caret marked by |." };

  run(session: TerminalSession, _args: NamedArguments): void {
    session.print(renderBuffer(session.buffer));
  }
}

const EchoArgs = z.object({ message: z.string() });

export class EchoCommand {
  static readonly signature = {
    params: ["message"],
    arbitraryArgs: true,
    doc: "Print a message followed by any extra named arguments.",
  };

  run(session: TerminalSession, args: NamedArguments): void {
    const { message } = readArguments(EchoArgs, args);
    const details = Object.entries(args)
      .filter(([name]) => name !== "message")
      .map(([name, value]) => `${name}=${formatLiteral(value)}`);
    session.print([message, ...details].join(" "));
  }
}

// --- application ---

const SetPreferenceArgs = z.object({
  key: z.string().min(1),
  value: LiteralSchema,
});

export class SetPreferenceCommand {
  static readonly signature = { params: ["key", "value"], doc: "Set an application preference." };

  run(session: TerminalSession, args: NamedArguments): void {
    const { key, value } = readArguments(SetPreferenceArgs, args);
    session.preferences.set(key, value);
  }
}

export class ShowPreferencesCommand {
  static readonly signature = { params: [], doc: "Print every application preference." };

  run(session: TerminalSession, _args: NamedArguments): void {
    if (session.preferences.size === 0) {
      session.print("No preferences set");
      return;
    }
    for (const [key, value] of [...session.preferences].sort(([a], [b]) => a.localeCompare(b))) {
      session.print(`${key} = ${formatLiteral(value)}`);
    }
  }
}

export const BUILTIN_COMMANDS: Readonly<Record<CommandFamily, readonly RegisteredCommandClass[]>> = {
  text: [InsertCommand, MoveCommand, UpperCaseCommand],
  window: [ShowBufferCommand, EchoCommand],
  application: [SetPreferenceCommand, ShowPreferencesCommand],
};

/**
 * Runner for commands declared in the settings file: the terminal host
 * has nothing to execute for them, so it reports the dispatch.
 */
export function createDeclaredCommandRunner(session: TerminalSession, family: CommandFamily): CommandRunner {
  return {
    runCommand(name: string, args: NamedArguments): void {
      session.print(`Ran ${family} command "${name}" with ${formatLiteral(args)}`);
    },
  };
}

/** A command registry holding the built-ins, bound to one session. */
export function createTerminalHost(session: TerminalSession): CommandRegistry {
  const registry = createCommandRegistry({
    contextFor: family => (family === "text" ? session.buffer : session),
    fallbacks: {
      text: createDeclaredCommandRunner(session, "text"),
      window: createDeclaredCommandRunner(session, "window"),
      application: createDeclaredCommandRunner(session, "application"),
    },
  });

  for (const family of COMMAND_FAMILIES) {
    for (const commandClass of BUILTIN_COMMANDS[family]) {
      registry.register(family, commandClass);
    }
  }
  return registry;
}
