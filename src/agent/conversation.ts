import type { Logger } from "#shared/logger.ts";
import type { AssistantTurn, ToolResult, Turn } from "./types.ts";

/**
 * Conversation transcript.
 * Append-only: turns are never edited or removed, and the whole history is
 * replayed to the backend on every call.
 */
export class Conversation {
  private readonly turns: Turn[] = [];

  constructor(private readonly logger: Logger) {}

  getAll(): readonly Turn[] {
    return this.turns;
  }

  get length(): number {
    return this.turns.length;
  }

  addUserMessage(content: string): void {
    this.turns.push({ type: "user", content });
  }

  addAssistantTurn(turn: AssistantTurn): void {
    this.turns.push({
      type: "assistant",
      content: turn.content,
      toolCalls: turn.toolCalls.map((call) => ({ ...call })),
    });
  }

  /**
   * Append the results of one assistant turn's tool calls as a single turn
   */
  addToolResults(results: readonly ToolResult[]): void {
    this.turns.push({ type: "tool_results", results: results.map((result) => ({ ...result })) });
    this.logger.debug(`Appended ${results.length} tool result(s) as one turn`);
  }
}
