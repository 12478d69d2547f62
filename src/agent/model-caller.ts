import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessage,
  ChatCompletionMessageFunctionToolCall,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { Logger } from "#shared/logger.ts";
import type {
  AssistantTurn,
  InferenceClient,
  ToolCallRequest,
  ToolDefinition,
  Turn,
} from "./types.ts";

/**
 * Raised when a backend call fails for any reason: transport, HTTP error
 * status, unparseable body, or a response without a message.
 * Fatal to the session.
 */
export class InferenceError extends Error {
  /** HTTP status, when the backend answered */
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.name = "InferenceError";
    this.status = options?.status;
  }
}

/**
 * The slice of the SDK the client uses
 */
export interface ChatCompletionsApi {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

export interface OpenAIInferenceClientConfig {
  baseUrl: string;
  model: string;
  apiKey: string;
  logger: Logger;
  /** Prepended as a system message on every call; not part of the transcript */
  systemPrompt?: string;
  /** Replaces the SDK client (tests) */
  completions?: ChatCompletionsApi;
}

/**
 * Inference client for OpenAI-compatible chat completion endpoints (Ollama's /v1)
 */
export class OpenAIInferenceClient implements InferenceClient {
  private readonly completions: ChatCompletionsApi;
  private readonly model: string;
  private readonly systemPrompt?: string;
  private readonly logger: Logger;

  constructor(config: OpenAIInferenceClientConfig) {
    this.completions =
      config.completions ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        maxRetries: 0,
      }).chat.completions;
    this.model = config.model;
    this.systemPrompt = config.systemPrompt;
    this.logger = config.logger;
  }

  async chat(transcript: readonly Turn[], tools: readonly ToolDefinition[]): Promise<AssistantTurn> {
    const messages = toChatMessages(transcript, this.systemPrompt);
    this.logger.debug(`Calling model API with ${messages.length} messages`);
    this.logger.debug(`Context message sequence: [${describeSequence(messages)}]`);

    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages,
      stream: false,
    };
    if (tools.length > 0) {
      body.tools = toChatTools(tools);
    }

    let response: ChatCompletion;
    try {
      response = await this.completions.create(body);
    } catch (error) {
      throw toInferenceError(error, this.logger);
    }

    const choice = response.choices?.[0];
    if (!choice?.message) {
      throw new InferenceError("No response from model");
    }

    if (response.usage) {
      this.logger.debug(
        `Model API response: finish_reason=${choice.finish_reason}, ` +
          `prompt_tokens=${response.usage.prompt_tokens}, completion_tokens=${response.usage.completion_tokens}`
      );
    } else {
      this.logger.debug(`Model API response: finish_reason=${choice.finish_reason}`);
    }

    return fromChatMessage(choice.message);
  }
}

/**
 * Translate the transcript into chat completion messages.
 * A tool_results turn expands into one `tool` message per result, in order.
 */
export function toChatMessages(
  transcript: readonly Turn[],
  systemPrompt?: string
): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [];
  if (systemPrompt) {
    messages.push({ role: "system", content: systemPrompt });
  }

  for (const turn of transcript) {
    switch (turn.type) {
      case "user":
        messages.push({ role: "user", content: turn.content });
        break;

      case "assistant":
        if (turn.toolCalls.length > 0) {
          messages.push({
            role: "assistant",
            content: turn.content.length > 0 ? turn.content : null,
            tool_calls: turn.toolCalls.map((call) => ({
              id: call.id,
              type: "function" as const,
              function: { name: call.name, arguments: call.arguments },
            })),
          });
        } else {
          // Some providers reject tool_calls: []
          messages.push({ role: "assistant", content: turn.content });
        }
        break;

      case "tool_results":
        for (const result of turn.results) {
          messages.push({
            role: "tool",
            tool_call_id: result.toolCallId,
            content: result.content,
          });
        }
        break;
    }
  }

  return messages;
}

export function toChatTools(tools: readonly ToolDefinition[]): ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: "function" as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  }));
}

/**
 * Turn the backend's message into an assistant turn.
 * Only function tool calls are kept.
 */
export function fromChatMessage(message: ChatCompletionMessage): AssistantTurn {
  const toolCalls: ToolCallRequest[] = (message.tool_calls ?? [])
    .filter((tc): tc is ChatCompletionMessageFunctionToolCall => tc.type === "function")
    .map((tc, index) => ({
      id: tc.id || `call_${index}`,
      name: tc.function.name,
      arguments: tc.function.arguments,
    }));

  return {
    type: "assistant",
    content: message.content ?? "",
    toolCalls,
  };
}

function toInferenceError(error: unknown, logger: Logger): InferenceError {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.debug(`API call failed: ${errorMessage}`);

  if (error instanceof OpenAI.APIError) {
    if (error.status) {
      logger.debug(`API HTTP status: ${error.status}`);
    }
    if (error.error) {
      logger.debug(`API error body: ${JSON.stringify(error.error, null, 2)}`);
    }
    return new InferenceError(`API error: ${errorMessage}`, { cause: error, status: error.status });
  }

  return new InferenceError(`API error: ${errorMessage}`, { cause: error });
}

function describeSequence(messages: ChatCompletionMessageParam[]): string {
  return messages
    .map((m, idx) => {
      let desc: string = m.role;
      if (m.role === "assistant" && m.tool_calls?.length) {
        desc += `(${m.tool_calls.length} tool_calls)`;
      }
      if (m.role === "tool") {
        desc += `(${m.tool_call_id})`;
      }
      return `${idx}:${desc}`;
    })
    .join(", ");
}
