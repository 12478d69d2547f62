/**
 * Types for the chat agent
 */

/**
 * A tool invocation requested by the model.
 * `arguments` is the raw JSON text from the backend, not yet validated.
 */
export interface ToolCallRequest {
  readonly id: string;
  readonly name: string;
  readonly arguments: string;
}

/**
 * Outcome of one tool call. Failures are text too: the model reads them.
 */
export interface ToolResult {
  readonly toolCallId: string;
  readonly name: string;
  readonly content: string;
  readonly isError: boolean;
}

export interface UserTurn {
  readonly type: "user";
  readonly content: string;
}

export interface AssistantTurn {
  readonly type: "assistant";
  readonly content: string;
  readonly toolCalls: readonly ToolCallRequest[];
}

/**
 * All results for the tool calls of one assistant turn, in request order.
 */
export interface ToolResultsTurn {
  readonly type: "tool_results";
  readonly results: readonly ToolResult[];
}

export type Turn = UserTurn | AssistantTurn | ToolResultsTurn;

/**
 * JSON schema for a tool's parameters. Always an object schema.
 */
export type ToolParameters = {
  type: "object";
  properties: Record<string, { type: string; description: string }>;
  required: string[];
};

/**
 * What the model is told about a tool
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameters;
}

/**
 * Where tool paths are resolved
 */
export interface ToolContext {
  cwd: string;
}

/**
 * A catalog entry: the definition plus the bound implementation.
 * The implementation decodes its own arguments and throws on failure.
 */
export interface ToolDescriptor {
  definition: ToolDefinition;
  execute: (rawArguments: string, context: ToolContext) => Promise<string>;
}

/**
 * Performs one round-trip with the inference backend
 */
export interface InferenceClient {
  chat(transcript: readonly Turn[], tools: readonly ToolDefinition[]): Promise<AssistantTurn>;
}

/**
 * Where the loop is in its cycle
 */
export type LoopState = "awaiting_user_input" | "processing_tool_calls";

/**
 * Returns the next line of user input, or null once input is exhausted
 */
export type UserInputSource = () => Promise<string | null>;

/**
 * Events yielded by the agent loop for rendering
 */
export type AgentEvent =
  | { type: "model_call"; turnCount: number }
  | { type: "assistant"; text: string }
  | { type: "tool_call"; name: string; arguments: string }
  | { type: "tool_result"; name: string; result: string; isError: boolean };
