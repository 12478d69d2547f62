/**
 * Ferry Constants
 */

/**
 * Inference backend defaults (Ollama's OpenAI-compatible endpoint)
 */
export const BACKEND = {
  /** Base URL of the OpenAI-compatible API */
  BASE_URL: "http://localhost:11434/v1",
  /** Model identifier sent with every request */
  MODEL: "qwen3:8b",
  /** Ollama ignores the key, but the SDK requires one */
  API_KEY: "ollama",
} as const;

/**
 * Environment variables that override the config file
 */
export const ENV = {
  BASE_URL: "FERRY_BASE_URL",
  MODEL: "FERRY_MODEL",
  /** Replaces the home directory when locating the config file (tests) */
  TEST_HOME: "FERRY_TEST_HOME",
} as const;

/**
 * Global Configuration (User's home directory)
 */
export const GLOBAL_CONFIG = {
  /** Global Ferry directory in user's home */
  DIR: ".ferry",
  /** User settings file */
  CONFIG_FILE: "config.json",
} as const;

/**
 * Supported config key names
 */
export const CONFIG_KEYS = [
  "base_url",
  "model",
] as const;

export type ConfigKey = typeof CONFIG_KEYS[number];

/**
 * Console labels, kept from the classic Ollama chat prompt
 */
export const CONSOLE = {
  USER_LABEL: "You",
  ASSISTANT_LABEL: "Ollama",
  TOOL_LABEL: "tool",
  /** Input lines that end the session like end-of-file */
  QUIT_COMMANDS: ["/quit", "/exit"],
  HELP_COMMAND: "/help",
} as const;

/**
 * Fixed result for a tool name missing from the catalog
 */
export const TOOL_NOT_FOUND = "tool not found";
