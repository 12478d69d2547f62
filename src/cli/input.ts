/**
 * Console input for the chat loop
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { CONSOLE } from "#shared/constants.ts";
import type { UserInputSource } from "#agent/types.ts";

export interface LineReaderOptions {
  input: Readable;
  output: Writable;
  /** Written before each line is read */
  prompt: string;
  /** Called for /help; the reader then prompts again */
  onHelp?: () => void;
  /** Ctrl+C in a terminal; closes the reader when not given */
  onInterrupt?: () => void;
}

export interface LineReader {
  read: UserInputSource;
  close(): void;
}

/**
 * Read user messages one line at a time.
 * Blank lines are skipped; /quit, /exit and end of input all yield null.
 */
export function createLineReader(options: LineReaderOptions): LineReader {
  const { input, output, prompt, onHelp, onInterrupt } = options;
  const rl = createInterface({ input, output });
  rl.setPrompt(prompt);

  // Created up front so lines arriving before the first read are buffered
  const lines = rl[Symbol.asyncIterator]();
  // The interface closes itself at end of input; buffered lines remain readable
  let interfaceClosed = false;
  let quit = false;

  rl.on("close", () => {
    interfaceClosed = true;
  });

  const close = (): void => {
    quit = true;
    if (!interfaceClosed) {
      rl.close();
    }
  };

  rl.on("SIGINT", () => {
    if (onInterrupt) {
      onInterrupt();
    } else {
      close();
    }
  });

  const read = async (): Promise<string | null> => {
    while (!quit) {
      if (!interfaceClosed) {
        rl.prompt();
      }
      const next = await lines.next();
      if (next.done) {
        quit = true;
        return null;
      }

      const line = next.value.trim();
      if (!line) {
        continue;
      }

      const command = line.toLowerCase();
      if (CONSOLE.QUIT_COMMANDS.some((quitCommand) => quitCommand === command)) {
        close();
        return null;
      }
      if (command === CONSOLE.HELP_COMMAND) {
        onHelp?.();
        continue;
      }

      return next.value;
    }
    return null;
  };

  return { read, close };
}
