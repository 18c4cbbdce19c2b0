import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { z } from "zod";

import { getErrorMessage } from "../utils/errors";
import { logWarn } from "../utils/logger";

export const SETTINGS_DIRECTORY_NAME = ".ferrule";
export const SETTINGS_FILE_NAME = "settings.json";
export const LOCAL_SETTINGS_FILE_NAME = "settings.local.json";

export const userSettingsSchema = z.object({
  apiBaseUrl: z.string().optional(),
  apiKey: z.string().optional(),
  autoSave: z.boolean().default(false),
  model: z.string().min(1).optional(),
  toolsEnabled: z.boolean().default(true),
});

export const localSettingsSchema = z.object({
  authToken: z.string().optional(),
});

export type UserSettings = z.infer<typeof userSettingsSchema>;
export type LocalSettings = z.infer<typeof localSettingsSchema>;

export type LoadedSettings = {
  local: LocalSettings;
  settingsDirectory: string;
  user: UserSettings;
};

export function getDefaultUserSettings(): UserSettings {
  return userSettingsSchema.parse({});
}

export function getSettingsDirectory(baseDirectory: string = process.cwd()): string {
  return resolve(baseDirectory, SETTINGS_DIRECTORY_NAME);
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readJsonFile(filePath: string): Promise<unknown> {
  const parsed: unknown = JSON.parse(await readFile(filePath, "utf8"));
  return parsed;
}

/**
 * Reads `.ferrule/settings.json`, writing the defaults there on first use.
 * A file that cannot be parsed falls back to the defaults with a warning.
 */
export async function loadUserSettings(settingsDirectory: string): Promise<UserSettings> {
  const settingsPath = join(settingsDirectory, SETTINGS_FILE_NAME);

  try {
    return userSettingsSchema.parse(await readJsonFile(settingsPath));
  } catch (error) {
    if (!isMissingFileError(error)) {
      logWarn(`Ignoring unreadable settings file ${settingsPath}: ${getErrorMessage(error)}`);
      return getDefaultUserSettings();
    }
  }

  const defaults = getDefaultUserSettings();
  try {
    await mkdir(settingsDirectory, { recursive: true });
    await writeFile(settingsPath, `${JSON.stringify(defaults, null, 2)}\n`, "utf8");
  } catch (error) {
    logWarn(`Failed to write default settings to ${settingsPath}: ${getErrorMessage(error)}`);
  }
  return defaults;
}

export async function loadLocalSettings(settingsDirectory: string): Promise<LocalSettings> {
  const settingsPath = join(settingsDirectory, LOCAL_SETTINGS_FILE_NAME);

  try {
    return localSettingsSchema.parse(await readJsonFile(settingsPath));
  } catch (error) {
    if (!isMissingFileError(error)) {
      logWarn(`Ignoring unreadable local settings file ${settingsPath}: ${getErrorMessage(error)}`);
    }
    return {};
  }
}

export async function loadSettings(baseDirectory?: string): Promise<LoadedSettings> {
  const settingsDirectory = getSettingsDirectory(baseDirectory);
  const [user, local] = await Promise.all([
    loadUserSettings(settingsDirectory),
    loadLocalSettings(settingsDirectory),
  ]);

  return {
    local,
    settingsDirectory,
    user,
  };
}
