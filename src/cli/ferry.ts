#!/usr/bin/env tsx
/**
 * Ferry CLI
 * Chat with a local Ollama model that can read files in your workspace
 */

import { Command } from "commander";
import { resolve } from "path";
import { existsSync, statSync } from "fs";
import chalk from "chalk";
import { BACKEND, CONFIG_KEYS, type ConfigKey } from "#shared/constants.ts";
import {
  getConfigPath,
  getConfigValue,
  isConfigKey,
  readUserConfig,
  resolveSettings,
  setConfigValue,
  unsetConfigValue,
  type UserConfig,
} from "#shared/config.ts";
import { getLogger, initLogger } from "#shared/logger.ts";
import { ChatAgent, OpenAIInferenceClient, SYSTEM_PROMPT, ToolRegistry } from "#agent/index.ts";
import { createLineReader } from "./input.ts";
import { printBanner, printHelp, runSession } from "./chat.ts";

interface ChatCommandOptions {
  dir: string;
  baseUrl?: string;
  model?: string;
  system?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name("ferry")
  .description("Ferry - a terminal chat agent for local Ollama models")
  .version("0.1.0");

/**
 * ferry chat (default)
 */
program
  .command("chat", { isDefault: true })
  .description("Start an interactive chat session")
  .option("-d, --dir <path>", "Directory the tools read from", process.cwd())
  .option("--base-url <url>", `OpenAI-compatible API base URL (default: ${BACKEND.BASE_URL})`)
  .option("-m, --model <name>", `Model identifier (default: ${BACKEND.MODEL})`)
  .option("--system <prompt>", "Replace the built-in system prompt")
  .option("-v, --verbose", "Show detailed debug output")
  .action(async (options: ChatCommandOptions) => {
    const logger = initLogger(options.verbose);
    const workspacePath = resolve(options.dir);

    if (!existsSync(workspacePath) || !statSync(workspacePath).isDirectory()) {
      logger.error(`Not a directory: ${workspacePath}`);
      process.exit(1);
    }

    const settings = resolveSettings(
      { baseUrl: options.baseUrl, model: options.model },
      process.env,
      logger
    );
    logger.debug(`Backend ${settings.baseUrl}, model ${settings.model}`);

    const client = new OpenAIInferenceClient({
      baseUrl: settings.baseUrl,
      model: settings.model,
      apiKey: BACKEND.API_KEY,
      systemPrompt: options.system ?? SYSTEM_PROMPT,
      logger,
    });

    const reader = createLineReader({
      input: process.stdin,
      output: process.stdout,
      prompt: logger.userPrompt(),
      onHelp: printHelp,
      onInterrupt: () => {
        logger.stopSpinner();
        console.log("\n\nExiting...");
        process.exit(0);
      },
    });

    const agent = new ChatAgent({
      client,
      registry: new ToolRegistry(),
      readUserMessage: reader.read,
      logger,
      cwd: workspacePath,
    });

    printBanner(settings.model, settings.baseUrl);
    logger.info(`Workspace: ${workspacePath}`);
    const exitCode = await runSession(agent, logger);
    reader.close();
    process.exit(exitCode);
  });

/**
 * ferry config
 */
const configCmd = program
  .command("config")
  .description("Manage Ferry configuration");

function requireConfigKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    getLogger().error(`Error: Invalid key '${key}'`);
    console.error(`Valid keys: ${CONFIG_KEYS.join(", ")}`);
    process.exit(1);
  }
  return key;
}

function fail(error: unknown): never {
  getLogger().error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

/**
 * ferry config set <key> <value>
 */
configCmd
  .command("set")
  .description("Set a configuration value")
  .argument("<key>", `Key name (${CONFIG_KEYS.join(", ")})`)
  .argument("<value>", "Value")
  .action((key: string, value: string) => {
    const configKey = requireConfigKey(key);

    if (value.trim() === "") {
      fail(new Error("Value cannot be empty"));
    }

    try {
      setConfigValue(configKey, value.trim());
    } catch (error) {
      fail(error);
    }
    getLogger().success(`Set ${configKey}`);
  });

/**
 * ferry config get <key>
 */
configCmd
  .command("get")
  .description("Show a configuration value")
  .argument("<key>", `Key name (${CONFIG_KEYS.join(", ")})`)
  .action((key: string) => {
    const configKey = requireConfigKey(key);

    let value: string | undefined;
    try {
      value = getConfigValue(configKey);
    } catch (error) {
      fail(error);
    }

    if (value !== undefined) {
      console.log(`${configKey}: ${value}`);
    } else {
      console.log(`${configKey}: ${chalk.yellow("not set")}`);
    }
  });

/**
 * ferry config list
 */
configCmd
  .command("list")
  .description("List all configuration values")
  .action(() => {
    let config: UserConfig;
    try {
      config = readUserConfig();
    } catch (error) {
      fail(error);
    }

    console.log(chalk.bold("Configuration:\n"));
    for (const key of CONFIG_KEYS) {
      const value = config[key];
      const status = value !== undefined ? chalk.green(value) : chalk.yellow("not set");
      console.log(`  ${key.padEnd(12)} ${status}`);
    }

    console.log(chalk.gray(`\nConfig file: ${getConfigPath()}`));
  });

/**
 * ferry config unset <key>
 */
configCmd
  .command("unset")
  .description("Remove a configuration value")
  .argument("<key>", `Key name (${CONFIG_KEYS.join(", ")})`)
  .action((key: string) => {
    const configKey = requireConfigKey(key);

    try {
      unsetConfigValue(configKey);
    } catch (error) {
      fail(error);
    }
    getLogger().success(`Removed ${configKey}`);
  });

/**
 * ferry config path
 */
configCmd
  .command("path")
  .description("Show path to the config file")
  .action(() => {
    console.log(getConfigPath());
  });

// Parse and execute
await program.parseAsync();
