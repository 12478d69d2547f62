import { describe, test, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { stripVTControlCharacters } from "node:util";
import { Logger } from "./logger.ts";

function printed(spy: MockInstance): string[] {
  return spy.mock.calls.map((args) => stripVTControlCharacters(args.map(String).join(" ")));
}

describe("Logger", () => {
  let log: MockInstance;
  let error: MockInstance;

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    error = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("info and success always print", () => {
    const logger = new Logger(false);

    logger.info("Workspace: /tmp/project");
    logger.success("Set model");

    expect(printed(log)).toEqual(["Workspace: /tmp/project", "✓ Set model"]);
  });

  test("debug prints only in verbose mode", () => {
    new Logger(false).debug("hidden");
    new Logger(true).debug("shown");

    expect(printed(log)).toEqual(["[DEBUG] shown"]);
  });

  test("failSpinner without a spinner is silent outside verbose mode", () => {
    const logger = new Logger(false);

    logger.failSpinner("backend down");

    expect(error).not.toHaveBeenCalled();
  });

  test("failSpinner without a spinner reports its message in verbose mode", () => {
    const logger = new Logger(true);

    logger.failSpinner("backend down");

    expect(printed(error)).toEqual(["✗ backend down"]);
  });

  test("renders the chat lines", () => {
    const logger = new Logger(false);

    logger.assistant("Hello!");
    logger.tool("read_file", '{"path":"a.txt"}');

    expect(printed(log)).toEqual(["Ollama: Hello!", 'tool: read_file({"path":"a.txt"})']);
    expect(stripVTControlCharacters(logger.userPrompt())).toBe("You: ");
  });
});
