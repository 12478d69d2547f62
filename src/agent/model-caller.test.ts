import { describe, test, expect } from "vitest";
import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessage,
} from "openai/resources/chat/completions";
import { Logger } from "#shared/logger.ts";
import {
  InferenceError,
  OpenAIInferenceClient,
  fromChatMessage,
  toChatMessages,
  toChatTools,
  type ChatCompletionsApi,
} from "./model-caller.ts";
import { readFileTool } from "./tools.ts";
import type { Turn } from "./types.ts";

const logger = new Logger(false);

function completion(message: ChatCompletionMessage): ChatCompletion {
  return {
    id: "chatcmpl-1",
    object: "chat.completion",
    created: 1700000000,
    model: "qwen3:8b",
    choices: [{ index: 0, finish_reason: "stop", logprobs: null, message }],
  };
}

class FakeCompletions implements ChatCompletionsApi {
  readonly bodies: ChatCompletionCreateParamsNonStreaming[] = [];

  constructor(private readonly respond: () => Promise<ChatCompletion>) {}

  async create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion> {
    this.bodies.push(body);
    return this.respond();
  }
}

function makeClient(completions: ChatCompletionsApi, systemPrompt?: string): OpenAIInferenceClient {
  return new OpenAIInferenceClient({
    baseUrl: "http://localhost:11434/v1",
    model: "qwen3:8b",
    apiKey: "test-key",
    logger,
    systemPrompt,
    completions,
  });
}

describe("toChatMessages", () => {
  test("translates every turn type in order", () => {
    const transcript: Turn[] = [
      { type: "user", content: "list files in ./data" },
      {
        type: "assistant",
        content: "",
        toolCalls: [
          { id: "call_1", name: "list_files", arguments: '{"path":"./data"}' },
          { id: "call_2", name: "read_file", arguments: '{"path":"data/a.txt"}' },
        ],
      },
      {
        type: "tool_results",
        results: [
          { toolCallId: "call_1", name: "list_files", content: '["a.txt","sub/"]', isError: false },
          { toolCallId: "call_2", name: "read_file", content: "alpha", isError: false },
        ],
      },
      { type: "assistant", content: "There is a.txt and sub/.", toolCalls: [] },
    ];

    expect(toChatMessages(transcript, "be brief")).toEqual([
      { role: "system", content: "be brief" },
      { role: "user", content: "list files in ./data" },
      {
        role: "assistant",
        content: null,
        tool_calls: [
          { id: "call_1", type: "function", function: { name: "list_files", arguments: '{"path":"./data"}' } },
          { id: "call_2", type: "function", function: { name: "read_file", arguments: '{"path":"data/a.txt"}' } },
        ],
      },
      { role: "tool", tool_call_id: "call_1", content: '["a.txt","sub/"]' },
      { role: "tool", tool_call_id: "call_2", content: "alpha" },
      { role: "assistant", content: "There is a.txt and sub/." },
    ]);
  });

  test("omits the system message when no prompt is set", () => {
    expect(toChatMessages([{ type: "user", content: "hi" }])).toEqual([{ role: "user", content: "hi" }]);
  });
});

describe("toChatTools", () => {
  test("wraps definitions as function tools", () => {
    expect(toChatTools([readFileTool.definition])).toEqual([
      {
        type: "function",
        function: {
          name: "read_file",
          description: readFileTool.definition.description,
          parameters: {
            type: "object",
            properties: {
              path: { type: "string", description: "The relative path of a file in the working directory." },
            },
            required: ["path"],
          },
        },
      },
    ]);
  });
});

describe("fromChatMessage", () => {
  test("maps null content to an empty string and keeps function calls", () => {
    const turn = fromChatMessage({
      role: "assistant",
      content: null,
      refusal: null,
      tool_calls: [
        { id: "call_9", type: "function", function: { name: "read_file", arguments: '{"path":"a"}' } },
        { id: "call_10", type: "custom", custom: { name: "freeform", input: "x" } },
      ],
    });

    expect(turn).toEqual({
      type: "assistant",
      content: "",
      toolCalls: [{ id: "call_9", name: "read_file", arguments: '{"path":"a"}' }],
    });
  });

  test("fills in a missing call id", () => {
    const turn = fromChatMessage({
      role: "assistant",
      content: null,
      refusal: null,
      tool_calls: [{ id: "", type: "function", function: { name: "list_files", arguments: "{}" } }],
    });

    expect(turn.toolCalls[0]?.id).toBe("call_0");
  });
});

describe("OpenAIInferenceClient", () => {
  test("sends a non-streaming request with tools and returns the assistant turn", async () => {
    const completions = new FakeCompletions(async () =>
      completion({ role: "assistant", content: "Hello!", refusal: null })
    );
    const client = makeClient(completions, "sys");

    const turn = await client.chat([{ type: "user", content: "hi" }], [readFileTool.definition]);

    expect(turn).toEqual({ type: "assistant", content: "Hello!", toolCalls: [] });
    expect(completions.bodies).toHaveLength(1);
    const body = completions.bodies[0];
    expect(body?.model).toBe("qwen3:8b");
    expect(body?.stream).toBe(false);
    expect(body?.messages).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "hi" },
    ]);
    expect(body?.tools).toEqual(toChatTools([readFileTool.definition]));
  });

  test("omits tools for an empty catalog", async () => {
    const completions = new FakeCompletions(async () =>
      completion({ role: "assistant", content: "ok", refusal: null })
    );

    await makeClient(completions).chat([{ type: "user", content: "hi" }], []);

    expect(completions.bodies[0]).not.toHaveProperty("tools");
  });

  test("wraps a transport failure in InferenceError", async () => {
    const cause = new Error("connect ECONNREFUSED 127.0.0.1:11434");
    const client = makeClient(new FakeCompletions(async () => Promise.reject(cause)));

    const failure = await client.chat([{ type: "user", content: "hi" }], []).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(InferenceError);
    if (failure instanceof InferenceError) {
      expect(failure.message).toBe("API error: connect ECONNREFUSED 127.0.0.1:11434");
      expect(failure.cause).toBe(cause);
    }
  });

  test("wraps SDK errors in InferenceError", async () => {
    const client = makeClient(
      new FakeCompletions(async () => Promise.reject(new OpenAI.APIConnectionError({ message: "Connection error." })))
    );

    await expect(client.chat([{ type: "user", content: "hi" }], [])).rejects.toThrow(
      new InferenceError("API error: Connection error.")
    );
  });

  test("fails when the response has no message", async () => {
    const client = makeClient(
      new FakeCompletions(async () => ({ ...completion({ role: "assistant", content: "", refusal: null }), choices: [] }))
    );

    await expect(client.chat([{ type: "user", content: "hi" }], [])).rejects.toThrow("No response from model");
  });
});
