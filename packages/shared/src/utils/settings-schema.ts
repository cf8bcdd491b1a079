/**
 * Zod schema for palette settings.
 *
 * Validates the settings file at load time. The shape of each declared
 * command's `args` entries is left to the catalog builder, which reports
 * malformed entries per command.
 */

import { z } from "zod";
import type { Literal, PaletteSettings } from "@cmdpal/sdk";

export const LiteralSchema: z.ZodType<Literal> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(LiteralSchema),
    z.record(LiteralSchema),
  ]),
);

export const DeclaredCommandSchema = z.object({
  name: z.string().min(1, "Command name must not be empty"),
  args: z.array(z.unknown()).optional(),
  doc: z.string().optional(),
  has_arbitrary_args: z.boolean().optional(),
});

export const PaletteSettingsSchema = z.object({
  show_arguments: z.boolean().default(true),
  show_doc: z.boolean().default(true),
  show_boring_defaults: z.boolean().default(false),
  text_commands: z.array(DeclaredCommandSchema).default([]),
  window_commands: z.array(DeclaredCommandSchema).default([]),
  application_commands: z.array(DeclaredCommandSchema).default([]),
});

/** Settings used when no settings file exists. */
export const DEFAULT_SETTINGS: PaletteSettings = PaletteSettingsSchema.parse({});
