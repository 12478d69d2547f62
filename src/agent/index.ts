/**
 * Agent module - conversation loop, inference client and tools
 */

// Re-export types
export type {
  AgentEvent,
  AssistantTurn,
  InferenceClient,
  LoopState,
  ToolCallRequest,
  ToolContext,
  ToolDefinition,
  ToolDescriptor,
  ToolResult,
  Turn,
  UserInputSource,
} from "./types.ts";

// Re-export engine
export { ChatAgent, type ChatAgentConfig } from "./engine.ts";

// Re-export the inference client
export { OpenAIInferenceClient, InferenceError } from "./model-caller.ts";

// Re-export the catalog
export { tools, ToolRegistry, readFileTool, listFilesTool } from "./tools.ts";

export { SYSTEM_PROMPT } from "./prompts.ts";
