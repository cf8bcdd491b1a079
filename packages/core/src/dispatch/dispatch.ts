/**
 * Dispatcher — runs a catalog entry and reports runner failures.
 */

import { DispatchError } from "@cmdpal/sdk";
import type { CatalogEntry, NamedArguments, PaletteUI } from "@cmdpal/sdk";
import type { Logger } from "@cmdpal/shared";

/**
 * Invoke a catalog entry. A failure is shown to the user, logged, and
 * rethrown as a DispatchError so the host can record the full cause.
 */
export async function dispatchCommand(
  entry: CatalogEntry,
  args: NamedArguments,
  ui: Pick<PaletteUI, "showError">,
  logger: Logger,
): Promise<void> {
  const name = entry.descriptor.name;
  try {
    await entry.invoke(args);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    ui.showError(`Command caused an error: ${message}`);
    logger.error("Command failed", { command: name, error: message });
    throw new DispatchError(name, err);
  }
  logger.debug("Command dispatched", { command: name, args });
}
