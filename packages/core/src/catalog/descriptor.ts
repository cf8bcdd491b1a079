/**
 * Descriptor builders — normalize declared and registered commands into
 * CommandDescriptor values.
 */

import { SchemaError } from "@cmdpal/sdk";
import type {
  CommandDescriptor,
  DeclaredCommand,
  Literal,
  OptionalArgument,
  RegisteredCommandClass,
} from "@cmdpal/sdk";
import { LiteralSchema, formatZodError } from "@cmdpal/shared";

const COMMAND_SUFFIX = "Command";

/**
 * Derive the palette name of a command class.
 *
 *   deriveCommandName("RunTextCommand") → "run_text"
 *   deriveCommandName("MoveCommand")    → "move"
 */
export function deriveCommandName(className: string): string {
  const base = className.endsWith(COMMAND_SUFFIX)
    ? className.slice(0, -COMMAND_SUFFIX.length)
    : className;
  return base.replace(/([a-z])([A-Z])/g, "$1_$2").toLowerCase();
}

/**
 * Build a descriptor from a command declared in the settings file.
 *
 * @throws SchemaError for a required argument after an optional one, a name
 * declared twice, or an entry that is neither a name nor a `[name, default]` pair
 */
export function buildDeclaredDescriptor(declared: DeclaredCommand): CommandDescriptor {
  const requiredArgs: string[] = [];
  const optionalArgs: OptionalArgument[] = [];

  const seen = new Set<string>();
  const claim = (name: string): void => {
    if (seen.has(name)) {
      throw new SchemaError(declared.name, `Argument "${name}" is declared twice`);
    }
    seen.add(name);
  };

  for (const arg of declared.args ?? []) {
    if (Array.isArray(arg)) {
      const optional = parseOptionalArgument(declared.name, arg);
      claim(optional[0]);
      optionalArgs.push(optional);
    } else if (typeof arg !== "string") {
      throw new SchemaError(declared.name, `Argument ${JSON.stringify(arg)} is neither a name nor a [name, default] pair`);
    } else if (optionalArgs.length === 0) {
      claim(arg);
      requiredArgs.push(arg);
    } else {
      throw new SchemaError(declared.name, "Cannot specify required arguments after optional ones");
    }
  }

  return freezeDescriptor({
    name: declared.name,
    requiredArgs,
    optionalArgs,
    doc: declared.doc,
    hasArbitraryArgs: declared.has_arbitrary_args ?? false,
  });
}

function parseOptionalArgument(commandName: string, pair: unknown[]): OptionalArgument {
  if (pair.length !== 2) {
    throw new SchemaError(commandName, "Need exactly argument name and default value");
  }
  const [name, defaultValue] = pair;
  if (typeof name !== "string") {
    throw new SchemaError(commandName, `Argument name ${JSON.stringify(name)} must be a string`);
  }
  const literal = LiteralSchema.safeParse(defaultValue);
  if (!literal.success) {
    throw new SchemaError(commandName, `Default of "${name}" is not a literal: ${formatZodError(literal.error)}`);
  }
  return [name, literal.data];
}

/**
 * Build a descriptor from a registered command class.
 *
 * `implicitParams` is the number of leading parameters the family supplies
 * itself; a receiver declared by the signature is dropped as well.
 */
export function buildRegisteredDescriptor(
  commandClass: RegisteredCommandClass,
  implicitParams: number,
): CommandDescriptor {
  const { signature } = commandClass;
  const name = deriveCommandName(commandClass.name);
  const duplicate = signature.params.find((param, i) => signature.params.indexOf(param) !== i);
  if (duplicate !== undefined) {
    throw new SchemaError(name, `Argument "${duplicate}" is declared twice`);
  }

  const skip = implicitParams + (signature.receiver ? 1 : 0);
  const params = signature.params.slice(skip);

  const defaults: readonly Literal[] =
    params.length > 0 ? (signature.defaults ?? []).slice(-params.length) : [];
  const requiredCount = params.length - defaults.length;

  return freezeDescriptor({
    name,
    requiredArgs: params.slice(0, requiredCount),
    optionalArgs: params.slice(requiredCount).map((param, i): OptionalArgument => [param, defaults[i]]),
    doc: signature.doc || commandClass.doc,
    hasArbitraryArgs: signature.arbitraryArgs ?? false,
  });
}

function freezeDescriptor(descriptor: CommandDescriptor): CommandDescriptor {
  return Object.freeze({
    ...descriptor,
    requiredArgs: Object.freeze([...descriptor.requiredArgs]),
    optionalArgs: Object.freeze(descriptor.optionalArgs.map(arg => Object.freeze([...arg] as const))),
  });
}
