/**
 * Chat session runner: drives the agent loop and renders its events
 */

import chalk from "chalk";
import type { Logger } from "#shared/logger.ts";
import type { AgentEvent, ChatAgent } from "#agent/index.ts";

const PREVIEW_CHARS = 200;

/**
 * Render agent events to the console
 */
export function renderEvent(event: AgentEvent, logger: Logger): void {
  switch (event.type) {
    case "model_call":
      logger.startSpinner(`Waiting for model (${event.turnCount} turns)...`);
      break;
    case "assistant":
      logger.stopSpinner();
      logger.assistant(event.text);
      break;
    case "tool_call":
      logger.stopSpinner();
      logger.tool(event.name, event.arguments);
      break;
    case "tool_result":
      logger.toolResult(event.name, preview(event.result), event.isError);
      break;
  }
}

/**
 * Run the agent to completion.
 * Returns the process exit code: 0 when input ran out, 1 on a fatal error.
 */
export async function runSession(agent: ChatAgent, logger: Logger): Promise<number> {
  try {
    for await (const event of agent.run()) {
      renderEvent(event, logger);
    }
    return 0;
  } catch (error) {
    logger.failSpinner();
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Error: ${message}`);
    return 1;
  }
}

export function printBanner(model: string, baseUrl: string): void {
  console.log(chalk.cyan("═".repeat(60)));
  console.log(chalk.bold.cyan(`Chat with ${model}`));
  console.log(chalk.gray(`Backend: ${baseUrl}`));
  console.log(chalk.gray("Type your message. /help for commands, /quit or Ctrl+C to exit."));
  console.log(chalk.cyan("═".repeat(60)));
}

export function printHelp(): void {
  console.log("\nCommands:");
  console.log("  /quit, /exit  - End the session");
  console.log("  /help         - Show this help");
  console.log("\nAnything else is sent to the model.\n");
}

function preview(text: string): string {
  const flat = text.replace(/\n/g, " ");
  return flat.length > PREVIEW_CHARS ? `${flat.substring(0, PREVIEW_CHARS - 3)}...` : flat;
}
