/**
 * Catalog builder — lists every command of one family as descriptors bound
 * to their dispatch handler.
 *
 * The catalog is rebuilt on each listing so it always reflects the current
 * registry and settings.
 */

import type {
  CatalogEntry,
  CommandDescriptor,
  CommandFamily,
  CommandRunner,
  DeclaredCommand,
  PaletteSettings,
  RegisteredCommandClass,
} from "@cmdpal/sdk";
import { buildDeclaredDescriptor, buildRegisteredDescriptor } from "./descriptor.js";

export interface BuildCatalogOptions {
  family: CommandFamily;
  /** Leading parameters of a registered command's signature supplied by the family. */
  implicitParams: number;
  commandClasses: readonly RegisteredCommandClass[];
  settings: PaletteSettings;
  runner: CommandRunner;
}

/** Settings key holding the declared commands of a family. */
export function declaredCommandsKey(family: CommandFamily): `${CommandFamily}_commands` {
  return `${family}_commands`;
}

export function declaredCommands(settings: PaletteSettings, family: CommandFamily): readonly DeclaredCommand[] {
  return settings[declaredCommandsKey(family)];
}

function compareNames(a: CommandDescriptor, b: CommandDescriptor): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Build the sorted catalog of a family.
 *
 * Registered classes come first, then declared commands; the sort is stable,
 * so commands sharing a name keep that relative order. Duplicates are kept.
 *
 * @throws SchemaError if any declared command is malformed
 */
export function buildCatalog(options: BuildCatalogOptions): CatalogEntry[] {
  const { family, implicitParams, commandClasses, settings, runner } = options;

  const descriptors = [
    ...commandClasses.map(commandClass => buildRegisteredDescriptor(commandClass, implicitParams)),
    ...declaredCommands(settings, family).map(buildDeclaredDescriptor),
  ];
  descriptors.sort(compareNames);

  return descriptors.map((descriptor): CatalogEntry => ({
    descriptor,
    invoke: async args => {
      await runner.runCommand(descriptor.name, args);
    },
  }));
}
