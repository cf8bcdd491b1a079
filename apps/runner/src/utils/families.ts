import { COMMAND_FAMILIES } from "@cmdpal/sdk";
import type { CommandFamily } from "@cmdpal/sdk";

export const DEFAULT_FAMILY: CommandFamily = "window";

/** Map a CLI word to a command family; undefined when it names none. */
export function resolveFamily(value: string | undefined): CommandFamily | undefined {
  if (value === undefined) return DEFAULT_FAMILY;
  return COMMAND_FAMILIES.find(family => family === value);
}
