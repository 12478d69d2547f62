/**
 * Tool catalog for the OpenAI-compatible API
 */

import {
  ListFilesInputSchema,
  ReadFileInputSchema,
  decodeToolInput,
  listFiles,
  readFileContents,
} from "./tool-handlers.ts";
import type { ToolDefinition, ToolDescriptor } from "./types.ts";

export const readFileTool: ToolDescriptor = {
  definition: {
    name: "read_file",
    description:
      "Read the contents of a given relative file path. Use this when you want to see what's inside a file. Do not use this with directory names.",
    parameters: {
      type: "object",
      properties: {
        path: {
          type: "string",
          description: "The relative path of a file in the working directory.",
        },
      },
      required: ["path"],
    },
  },
  execute: async (rawArguments, context) => {
    const input = decodeToolInput(ReadFileInputSchema, rawArguments);
    return await readFileContents(input, context);
  },
};

export const listFilesTool: ToolDescriptor = {
  definition: {
    name: "list_files",
    description:
      "List files and directories at a given path. If no path is provided, lists files in the current directory.",
    parameters: {
      type: "object",
      properties: {
        path: {
          type: "string",
          description:
            "Optional relative path to list files from. Defaults to current directory if not provided.",
        },
      },
      required: [],
    },
  },
  execute: async (rawArguments, context) => {
    const input = decodeToolInput(ListFilesInputSchema, rawArguments);
    return JSON.stringify(await listFiles(input, context));
  },
};

/**
 * The default catalog, in the order it is advertised to the model
 */
export const tools: readonly ToolDescriptor[] = [readFileTool, listFilesTool];

/**
 * Tool registry: a fixed name-to-descriptor map built once at startup.
 */
export class ToolRegistry {
  private readonly byName: ReadonlyMap<string, ToolDescriptor>;

  constructor(descriptors: readonly ToolDescriptor[] = tools) {
    const byName = new Map<string, ToolDescriptor>();
    for (const descriptor of descriptors) {
      if (byName.has(descriptor.definition.name)) {
        throw new Error(`Duplicate tool name: ${descriptor.definition.name}`);
      }
      byName.set(descriptor.definition.name, descriptor);
    }
    this.byName = byName;
  }

  get(name: string): ToolDescriptor | undefined {
    return this.byName.get(name);
  }

  /**
   * Definitions sent to the model, in registration order
   */
  definitions(): ToolDefinition[] {
    return Array.from(this.byName.values()).map((descriptor) => descriptor.definition);
  }

  names(): string[] {
    return Array.from(this.byName.keys());
  }
}
