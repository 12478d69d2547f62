/**
 * Tool handlers: the local actions behind the tool catalog
 */

import { readFile, readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { z } from "zod";
import { formatIssues } from "#shared/validation.ts";
import type { ToolContext } from "./types.ts";

export const ReadFileInputSchema = z.object({
  path: z.string().min(1).describe("The relative path of a file in the working directory."),
});

export type ReadFileInput = z.infer<typeof ReadFileInputSchema>;

export const ListFilesInputSchema = z.object({
  path: z
    .string()
    // Local models often send null for an omitted optional parameter
    .nullish()
    .describe("Optional relative path to list files from. Defaults to current directory if not provided."),
});

export type ListFilesInput = z.infer<typeof ListFilesInputSchema>;

/**
 * Decode a tool's raw JSON arguments into its typed input.
 * Throws a descriptive error for malformed JSON or a payload of the wrong shape.
 */
export function decodeToolInput<T extends z.ZodTypeAny>(schema: T, rawArguments: string): z.infer<T> {
  let data: unknown;
  try {
    // Some models send "" for a call without arguments
    data = rawArguments.trim().length > 0 ? JSON.parse(rawArguments) : {};
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON arguments: ${reason}`);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Invalid arguments: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Return the full text of a file
 */
export async function readFileContents(input: ReadFileInput, context: ToolContext): Promise<string> {
  return await readFile(resolve(context.cwd, input.path), "utf-8");
}

/**
 * Recursively list a directory.
 * Depth-first, entries of each directory in lexical order, paths relative
 * to the root joined with "/", directories suffixed with "/", root excluded.
 */
export async function listFiles(input: ListFilesInput, context: ToolContext): Promise<string[]> {
  const dir = input.path && input.path.length > 0 ? input.path : ".";
  const root = resolve(context.cwd, dir);

  const info = await stat(root);
  if (!info.isDirectory()) {
    throw new Error(`not a directory: ${dir}`);
  }

  const files: string[] = [];
  await walk(root, "", files);
  return files;
}

async function walk(absolute: string, relative: string, files: string[]): Promise<void> {
  const entries = await readdir(absolute, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const entryPath = relative ? `${relative}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(`${entryPath}/`);
      await walk(join(absolute, entry.name), entryPath, files);
    } else {
      files.push(entryPath);
    }
  }
}
