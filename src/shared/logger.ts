/**
 * Logger utility for CLI
 * Handles verbose mode, colors, and spinners
 */

import chalk from "chalk";
import ora, { type Ora } from "ora";
import { CONSOLE } from "./constants.ts";

export class Logger {
  private verbose: boolean;
  private spinner: Ora | null = null;

  constructor(verbose: boolean = false) {
    this.verbose = verbose;
  }

  /**
   * Log debug information (only in verbose mode)
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  /**
   * Log informational message
   */
  info(message: string): void {
    console.log(chalk.blue(message));
  }

  /**
   * Log success message
   */
  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }

  /**
   * Log error message
   */
  error(message: string): void {
    console.error(chalk.red(`✗ ${message}`));
  }

  /**
   * Log warning message
   */
  warn(message: string): void {
    console.warn(chalk.yellow(`⚠ ${message}`));
  }

  /**
   * Start a spinner with a message.
   * Skipped in verbose mode and when stdout is not a terminal.
   */
  startSpinner(message: string): void {
    this.stopSpinner();

    if (this.verbose) {
      this.debug(message);
      return;
    }

    if (process.stdout.isTTY) {
      this.spinner = ora({
        text: message,
        color: "cyan",
      }).start();
    }
  }

  /**
   * Stop spinner with failure
   */
  failSpinner(message?: string): void {
    if (this.spinner) {
      if (message) {
        this.spinner.fail(message);
      } else {
        this.spinner.fail();
      }
      this.spinner = null;
    } else if (this.verbose && message) {
      this.error(message);
    }
  }

  /**
   * Stop spinner without status
   */
  stopSpinner(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  /**
   * The prompt written before each line of user input
   */
  userPrompt(): string {
    return `${chalk.blueBright(CONSOLE.USER_LABEL)}: `;
  }

  /**
   * Print the assistant's reply
   */
  assistant(text: string): void {
    console.log(`${chalk.yellowBright(CONSOLE.ASSISTANT_LABEL)}: ${text}`);
  }

  /**
   * Trace a tool invocation with its raw arguments
   */
  tool(name: string, rawArguments: string): void {
    console.log(`${chalk.greenBright(CONSOLE.TOOL_LABEL)}: ${name}(${rawArguments})`);
  }

  /**
   * Log tool result (only in verbose mode)
   */
  toolResult(name: string, preview: string, isError: boolean = false): void {
    if (this.verbose) {
      const line = `[Result] ${name}: ${preview}`;
      console.log(isError ? chalk.red(line) : chalk.gray(line));
    }
  }
}

// Global logger instance
let globalLogger: Logger | null = null;

/**
 * Initialize global logger
 */
export function initLogger(verbose: boolean = false): Logger {
  globalLogger = new Logger(verbose);
  return globalLogger;
}

/**
 * Get the global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger(false);
  }
  return globalLogger;
}
