/**
 * Chat Agent
 * Runs the conversation loop: user input, model turns and tool calls
 * interleaved into one transcript.
 */

import type { Logger } from "#shared/logger.ts";
import { Conversation } from "./conversation.ts";
import { executeToolCalls } from "./tool-execution.ts";
import type { ToolRegistry } from "./tools.ts";
import type {
  AgentEvent,
  InferenceClient,
  LoopState,
  ToolContext,
  Turn,
  UserInputSource,
} from "./types.ts";

export interface ChatAgentConfig {
  client: InferenceClient;
  registry: ToolRegistry;
  readUserMessage: UserInputSource;
  logger: Logger;
  /** Directory tool paths resolve against (default: process.cwd()) */
  cwd?: string;
}

export class ChatAgent {
  private readonly client: InferenceClient;
  private readonly registry: ToolRegistry;
  private readonly readUserMessage: UserInputSource;
  private readonly logger: Logger;
  private readonly toolContext: ToolContext;
  private readonly conversation: Conversation;

  private state: LoopState = "awaiting_user_input";
  private running = false;

  constructor(config: ChatAgentConfig) {
    this.client = config.client;
    this.registry = config.registry;
    this.readUserMessage = config.readUserMessage;
    this.logger = config.logger;
    this.toolContext = { cwd: config.cwd ?? process.cwd() };
    this.conversation = new Conversation(config.logger);
  }

  getState(): LoopState {
    return this.state;
  }

  getTranscript(): readonly Turn[] {
    return this.conversation.getAll();
  }

  /**
   * Run until the input source is exhausted.
   * Yields events for rendering; an inference failure is thrown and ends the run.
   */
  async *run(): AsyncGenerator<AgentEvent, void> {
    if (this.running) {
      throw new Error("ChatAgent is already running");
    }
    this.running = true;
    this.logger.debug(`Tools: ${this.registry.names().join(", ")}`);

    try {
      while (true) {
        if (this.state === "awaiting_user_input") {
          const userInput = await this.readUserMessage();
          if (userInput === null) {
            this.logger.debug("Input exhausted, ending session");
            return;
          }
          this.conversation.addUserMessage(userInput);
        }

        yield { type: "model_call", turnCount: this.conversation.length };
        const turn = await this.client.chat(this.conversation.getAll(), this.registry.definitions());
        this.conversation.addAssistantTurn(turn);
        this.logger.debug(
          `Parsed response: ${turn.toolCalls.length} tool calls, text length: ${turn.content.length}`
        );

        if (turn.toolCalls.length > 0) {
          this.state = "processing_tool_calls";
          const results = yield* executeToolCalls({
            toolCalls: turn.toolCalls,
            registry: this.registry,
            context: this.toolContext,
            logger: this.logger,
          });
          this.conversation.addToolResults(results);
          continue;
        }

        yield { type: "assistant", text: turn.content };
        this.state = "awaiting_user_input";
      }
    } finally {
      this.running = false;
    }
  }
}
