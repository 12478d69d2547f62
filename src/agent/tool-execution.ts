import type { Logger } from "#shared/logger.ts";
import { TOOL_NOT_FOUND } from "#shared/constants.ts";
import type { ToolRegistry } from "./tools.ts";
import type { AgentEvent, ToolCallRequest, ToolContext, ToolResult } from "./types.ts";

export interface ExecuteToolCallsArgs {
  toolCalls: readonly ToolCallRequest[];
  registry: ToolRegistry;
  context: ToolContext;
  logger: Logger;
}

/**
 * Run every tool call of one assistant turn, sequentially and in request order.
 * Never throws for tool failures: unknown names and implementation errors
 * become error results the model can react to.
 */
export async function* executeToolCalls(
  args: ExecuteToolCallsArgs
): AsyncGenerator<AgentEvent, ToolResult[]> {
  const { toolCalls, registry, context, logger } = args;

  logger.debug(`executeToolCalls started with ${toolCalls.length} calls`);
  const results: ToolResult[] = [];

  for (const toolCall of toolCalls) {
    const result = yield* executeSingleToolCall({ toolCall, registry, context, logger });
    results.push(result);
  }

  return results;
}

interface ExecuteSingleToolCallArgs {
  toolCall: ToolCallRequest;
  registry: ToolRegistry;
  context: ToolContext;
  logger: Logger;
}

async function* executeSingleToolCall(
  args: ExecuteSingleToolCallArgs
): AsyncGenerator<AgentEvent, ToolResult> {
  const { toolCall, registry, context, logger } = args;
  const toolName = toolCall.name;

  const descriptor = registry.get(toolName);
  if (!descriptor) {
    logger.debug(`Unknown tool requested: ${toolName}`);
    yield { type: "tool_result", name: toolName, result: TOOL_NOT_FOUND, isError: true };
    return { toolCallId: toolCall.id, name: toolName, content: TOOL_NOT_FOUND, isError: true };
  }

  yield { type: "tool_call", name: toolName, arguments: toolCall.arguments };

  try {
    const content = await descriptor.execute(toolCall.arguments, context);
    yield { type: "tool_result", name: toolName, result: content, isError: false };
    return { toolCallId: toolCall.id, name: toolName, content, isError: false };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.debug(`Tool Error: ${errorMessage}`);

    const content = `Error: ${errorMessage}`;
    yield { type: "tool_result", name: toolName, result: content, isError: true };
    return { toolCallId: toolCall.id, name: toolName, content, isError: true };
  }
}
