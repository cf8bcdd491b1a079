/**
 * CommandRegistry — an in-process PaletteHost for command classes
 * registered per family.
 *
 * Several classes may share a palette name. All of them are listed; on
 * dispatch the first one registered under the name handles it.
 */

import { UnknownCommandError } from "@cmdpal/sdk";
import type {
  CommandFamily,
  CommandRunner,
  NamedArguments,
  PaletteHost,
  RegisteredCommandClass,
} from "@cmdpal/sdk";
import { createLogger } from "@cmdpal/shared";
import { deriveCommandName } from "../catalog/descriptor.js";

const logger = createLogger("CommandRegistry");

export interface CommandRegistryOptions {
  /** Context handed to a command's `run` (the document, window or application). */
  contextFor?: (family: CommandFamily) => unknown;
  /** Runner for names with no registered class, such as commands declared in settings. */
  fallbacks?: Partial<Record<CommandFamily, CommandRunner>>;
}

export interface CommandRegistry extends PaletteHost {
  register(family: CommandFamily, commandClass: RegisteredCommandClass): void;
  get(family: CommandFamily, name: string): RegisteredCommandClass | undefined;
  list(family: CommandFamily): RegisteredCommandClass[];
}

export function createCommandRegistry(options: CommandRegistryOptions = {}): CommandRegistry {
  const classes = new Map<CommandFamily, RegisteredCommandClass[]>();

  function list(family: CommandFamily): RegisteredCommandClass[] {
    return [...(classes.get(family) ?? [])];
  }

  function handlersByName(family: CommandFamily): Map<string, RegisteredCommandClass> {
    const handlers = new Map<string, RegisteredCommandClass>();
    for (const commandClass of list(family)) {
      const name = deriveCommandName(commandClass.name);
      if (!handlers.has(name)) {
        handlers.set(name, commandClass);
      }
    }
    return handlers;
  }

  return {
    register(family: CommandFamily, commandClass: RegisteredCommandClass): void {
      logger.debug(`Registering ${family} command: ${commandClass.name}`);
      const existing = classes.get(family);
      if (existing) {
        existing.push(commandClass);
      } else {
        classes.set(family, [commandClass]);
      }
    },

    get(family: CommandFamily, name: string): RegisteredCommandClass | undefined {
      return handlersByName(family).get(name);
    },

    list,

    commandClasses(family: CommandFamily): readonly RegisteredCommandClass[] {
      return list(family);
    },

    runnerFor(family: CommandFamily): CommandRunner {
      // Names resolve against the registrations present now, when the
      // catalog is built, not at each dispatch.
      const handlers = handlersByName(family);
      const fallback = options.fallbacks?.[family];

      return {
        async runCommand(name: string, args: NamedArguments): Promise<void> {
          const handler = handlers.get(name);
          if (handler) {
            await new handler().run(options.contextFor?.(family), args);
            return;
          }
          if (fallback) {
            await fallback.runCommand(name, args);
            return;
          }
          throw new UnknownCommandError(name);
        },
      };
    },
  };
}
