import { readFileSync } from "node:fs";
import { config as loadDotenv } from "dotenv";

// Load .env file from the working directory (won't override existing env vars)
loadDotenv({ quiet: true });

/** Used when neither a flag nor the environment names any settings. */
export const DEFAULT_SETTINGS = "f=argon2id,s=16,k=32,m=64*1024,t=3,p=2";

export interface Config {
  settings: string;
  source: "flag" | "env" | "file" | "default";
}

export interface ConfigOverrides {
  settings?: string;
  settingsFile?: string;
}

/**
 * Read a settings file: the first line that is neither blank nor a `#`
 * comment is the settings string.
 */
export function readSettingsFile(path: string): string {
  const line = readFileSync(path, "utf-8")
    .split(/\r?\n/)
    .map((l) => l.trim())
    .find((l) => l !== "" && !l.startsWith("#"));
  if (line === undefined) {
    throw new Error(`No settings found in ${path}`);
  }
  return line;
}

export function loadConfig(overrides: ConfigOverrides = {}): Config {
  // Precedence: flags > ARGON2_HASHER_SETTINGS > ARGON2_HASHER_SETTINGS_FILE > default
  if (overrides.settings !== undefined && overrides.settingsFile !== undefined) {
    throw new Error("Use either --settings or --settings-file, not both.");
  }
  if (overrides.settings !== undefined) {
    return { settings: overrides.settings, source: "flag" };
  }
  if (overrides.settingsFile !== undefined) {
    return { settings: readSettingsFile(overrides.settingsFile), source: "file" };
  }

  const envSettings = process.env.ARGON2_HASHER_SETTINGS;
  const envFile = process.env.ARGON2_HASHER_SETTINGS_FILE;
  if (envSettings && envFile) {
    throw new Error(
      "Both ARGON2_HASHER_SETTINGS and ARGON2_HASHER_SETTINGS_FILE are set. Set only one.",
    );
  }
  if (envSettings) {
    return { settings: envSettings, source: "env" };
  }
  if (envFile) {
    return { settings: readSettingsFile(envFile), source: "file" };
  }
  return { settings: DEFAULT_SETTINGS, source: "default" };
}
