/**
 * Settings loading with Zod validation.
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { ConfigError, ErrorCode } from "@cmdpal/sdk";
import type { PaletteSettings } from "@cmdpal/sdk";
import { DEFAULT_SETTINGS, PaletteSettingsSchema, validateInput } from "@cmdpal/shared";

/** Looked up in the working directory when no path is given. */
export const DEFAULT_SETTINGS_FILE = "cmdpal-settings.json";

/**
 * Load palette settings.
 *
 * Without an explicit path a missing default file yields the built-in
 * defaults; an explicit path must exist.
 *
 * @throws ConfigError when the file is missing, unreadable, not JSON, or
 * does not match the settings schema
 */
export async function loadSettings(settingsPath?: string): Promise<PaletteSettings> {
  const target = resolve(settingsPath ?? DEFAULT_SETTINGS_FILE);

  if (!existsSync(target)) {
    if (settingsPath === undefined) {
      return DEFAULT_SETTINGS;
    }
    throw new ConfigError(`Settings file not found: ${target}`, { code: ErrorCode.CONFIG_NOT_FOUND });
  }

  let content: string;
  try {
    content = await readFile(target, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read settings file ${target}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Settings file ${target} is not valid JSON`, { cause: err });
  }

  const result = validateInput(PaletteSettingsSchema, raw);
  if (!result.success) {
    throw new ConfigError(`Invalid settings in ${target}: ${result.error}`);
  }
  return result.data;
}
