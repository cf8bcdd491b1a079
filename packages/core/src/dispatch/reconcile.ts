/**
 * Reconciler — folds positional values into a command's declared
 * parameter order.
 */

import { ConflictError, OverflowError } from "@cmdpal/sdk";
import type { CommandDescriptor, NamedArguments, ParsedArguments } from "@cmdpal/sdk";

/** Required parameters followed by optional ones. */
export function declaredParameterOrder(descriptor: CommandDescriptor): string[] {
  return [...descriptor.requiredArgs, ...descriptor.optionalArgs.map(([name]) => name)];
}

/**
 * Merge positional values into the named values by declared order.
 *
 * Extra parameters of a command with arbitrary args can only be given by
 * name, so they never absorb positional values.
 *
 * @throws ConflictError if a positional value lands on a name given explicitly
 * @throws OverflowError if there are more positional values than parameters
 */
export function reconcileArguments(
  descriptor: CommandDescriptor,
  parsed: ParsedArguments,
): NamedArguments {
  const order = declaredParameterOrder(descriptor);
  const named = new Map(parsed.named);

  const fill = Math.min(order.length, parsed.positional.length);
  for (let i = 0; i < fill; i++) {
    const name = order[i];
    if (named.has(name)) {
      throw new ConflictError(name);
    }
    named.set(name, parsed.positional[i]);
  }

  if (parsed.positional.length > order.length) {
    throw new OverflowError(order.length, parsed.positional.length);
  }

  return Object.fromEntries(named);
}
