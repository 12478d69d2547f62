/**
 * User Configuration
 * Stores backend settings in ~/.ferry/config.json and resolves the
 * effective settings from CLI options, environment and file.
 */

import { homedir } from "os";
import { join } from "path";
import { existsSync, mkdirSync, readFileSync, writeFileSync, chmodSync } from "fs";
import { z } from "zod";
import { BACKEND, ENV, GLOBAL_CONFIG, CONFIG_KEYS, type ConfigKey } from "./constants.ts";
import type { Logger } from "./logger.ts";
import { formatIssues } from "./validation.ts";

/**
 * Settings stored in the config file. Unknown keys are dropped on read.
 */
export const UserConfigSchema = z.object({
  base_url: z.string().url().optional().describe("Base URL of the OpenAI-compatible API"),
  model: z.string().min(1).optional().describe("Model identifier"),
});

export type UserConfig = z.infer<typeof UserConfigSchema>;

/**
 * Effective settings for a chat session
 */
export interface Settings {
  baseUrl: string;
  model: string;
}

/**
 * Values given on the command line (highest priority)
 */
export interface SettingsOverrides {
  baseUrl?: string;
  model?: string;
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

/**
 * Get the global Ferry config directory path (~/.ferry)
 * Can be overridden with FERRY_TEST_HOME environment variable for testing
 */
export function getGlobalConfigDir(): string {
  const home = process.env[ENV.TEST_HOME] || homedir();
  return join(home, GLOBAL_CONFIG.DIR);
}

/**
 * Get the config file path (~/.ferry/config.json)
 */
export function getConfigPath(): string {
  return join(getGlobalConfigDir(), GLOBAL_CONFIG.CONFIG_FILE);
}

/**
 * Ensure the global config directory exists with mode 0700 (rwx------)
 */
export function ensureSecureDir(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true, mode: 0o700 });
  } else {
    chmodSync(dirPath, 0o700);
  }
}

/**
 * Read the config file.
 * Returns an empty object if the file doesn't exist; throws if it is
 * not valid JSON or holds values of the wrong shape.
 */
export function readUserConfig(): UserConfig {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return {};
  }

  const content = readFileSync(configPath, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error(`Config file ${configPath} is not valid JSON`, { cause: error });
  }

  const parsed = UserConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Config file ${configPath} is invalid: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Write the config file with mode 0600 inside a 0700 directory
 */
export function writeUserConfig(config: UserConfig): void {
  const configDir = getGlobalConfigDir();
  const configPath = getConfigPath();

  ensureSecureDir(configDir);

  const content = JSON.stringify(config, null, 2) + "\n";
  writeFileSync(configPath, content, { mode: 0o600 });

  // umask may have stripped the requested mode
  chmodSync(configPath, 0o600);
}

/**
 * Validate and store a single value
 */
export function setConfigValue(key: ConfigKey, value: string): void {
  const parsed = UserConfigSchema.shape[key].safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid value for ${key}: ${formatIssues(parsed.error)}`);
  }

  const config = readUserConfig();
  config[key] = value;
  writeUserConfig(config);
}

/**
 * Get a single value, undefined if not set
 */
export function getConfigValue(key: ConfigKey): string | undefined {
  return readUserConfig()[key];
}

/**
 * Remove a value from the config file
 */
export function unsetConfigValue(key: ConfigKey): void {
  const config = readUserConfig();
  delete config[key];
  writeUserConfig(config);
}

/**
 * Resolve effective settings.
 * Priority: CLI options > environment variables > ~/.ferry/config.json > defaults
 */
export function resolveSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  logger?: Logger
): Settings {
  let fileConfig: UserConfig = {};
  try {
    fileConfig = readUserConfig();
  } catch (error) {
    if (!logger) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`${message}; using defaults`);
  }

  return {
    baseUrl: overrides.baseUrl || env[ENV.BASE_URL] || fileConfig.base_url || BACKEND.BASE_URL,
    model: overrides.model || env[ENV.MODEL] || fileConfig.model || BACKEND.MODEL,
  };
}
