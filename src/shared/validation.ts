import type { z } from "zod";

/**
 * Flatten zod issues into one line, e.g. "path: Required; depth: Expected number"
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
