/**
 * CommandPalette — the list → prompt → parse → dispatch pipeline for one
 * command family.
 *
 * Each run rebuilds the catalog, lets the user pick a command, collects
 * argument text when the command takes arguments, and dispatches it.
 * Cancelling at any step ends the run without side effects.
 */

import {
  ArgumentSyntaxError,
  ConflictError,
  OverflowError,
} from "@cmdpal/sdk";
import type {
  CatalogEntry,
  CommandFamily,
  NamedArguments,
  PaletteHost,
  PaletteSettings,
  PaletteUI,
} from "@cmdpal/sdk";
import { createLogger } from "@cmdpal/shared";
import type { Logger } from "@cmdpal/shared";
import { buildCatalog } from "../catalog/catalog.js";
import { argumentPromptLabel, describeCommand, hasAnyArgs } from "../catalog/format.js";
import { parseArguments } from "../parser/arguments.js";
import { reconcileArguments } from "../dispatch/reconcile.js";
import { dispatchCommand } from "../dispatch/dispatch.js";

/** Leading signature parameters each family supplies itself. */
export const FAMILY_IMPLICIT_PARAMS: Readonly<Record<CommandFamily, number>> = {
  text: 1,
  window: 0,
  application: 0,
};

/** Errors that reject one invocation attempt; the user may retry. */
export type ArgumentError = ArgumentSyntaxError | ConflictError | OverflowError;

export type PaletteOutcome =
  | { status: "cancelled" }
  | { status: "rejected"; command: string; error: ArgumentError }
  | { status: "dispatched"; command: string; args: NamedArguments };

export interface CommandPaletteOptions {
  family: CommandFamily;
  host: PaletteHost;
  ui: PaletteUI;
  settings: PaletteSettings;
  logger?: Logger;
}

export interface CommandPalette {
  readonly family: CommandFamily;
  /** Build a fresh catalog of the family's commands. */
  list(): CatalogEntry[];
  /** Parse argument text for an entry and dispatch it. */
  invoke(entry: CatalogEntry, text: string): Promise<PaletteOutcome>;
  /** Run the whole interactive pipeline once. */
  run(): Promise<PaletteOutcome>;
}

const CANCELLED: PaletteOutcome = { status: "cancelled" };

function isArgumentError(err: unknown): err is ArgumentError {
  return (
    err instanceof ArgumentSyntaxError ||
    err instanceof ConflictError ||
    err instanceof OverflowError
  );
}

export function createCommandPalette(options: CommandPaletteOptions): CommandPalette {
  const { family, host, ui, settings } = options;
  const logger = (options.logger ?? createLogger("CommandPalette")).child(family);
  logger.setContext({ family });

  function list(): CatalogEntry[] {
    const stop = logger.time("catalog build");
    const catalog = buildCatalog({
      family,
      implicitParams: FAMILY_IMPLICIT_PARAMS[family],
      commandClasses: host.commandClasses(family),
      settings,
      runner: host.runnerFor(family),
    });
    stop();
    logger.debug("Catalog built", { size: catalog.length });
    return catalog;
  }

  async function dispatch(entry: CatalogEntry, args: NamedArguments): Promise<PaletteOutcome> {
    await dispatchCommand(entry, args, ui, logger);
    return { status: "dispatched", command: entry.descriptor.name, args };
  }

  async function invoke(entry: CatalogEntry, text: string): Promise<PaletteOutcome> {
    const command = entry.descriptor.name;
    let args: NamedArguments;
    try {
      args = reconcileArguments(entry.descriptor, parseArguments(text));
    } catch (err) {
      if (!isArgumentError(err)) throw err;
      ui.showError(err.message);
      logger.info("Arguments rejected", { command, reason: err.message });
      return { status: "rejected", command, error: err };
    }
    return dispatch(entry, args);
  }

  async function run(): Promise<PaletteOutcome> {
    const catalog = list();
    const index = await ui.listAndChoose(
      catalog.map(entry => describeCommand(entry.descriptor, settings)),
    );
    if (index === undefined) return CANCELLED;

    const entry = catalog[index];
    if (!entry) {
      logger.warn("Selection out of range", { index, size: catalog.length });
      return CANCELLED;
    }
    if (!hasAnyArgs(entry.descriptor)) {
      return dispatch(entry, {});
    }

    const text = await ui.promptForText(argumentPromptLabel(entry.descriptor, settings), "");
    if (text === undefined) return CANCELLED;
    return invoke(entry, text);
  }

  return { family, list, invoke, run };
}
