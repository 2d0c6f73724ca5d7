import type { z } from "zod";
import { ConfigurationError } from "./errors.js";

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

/** Validates caller-supplied options, raising ConfigurationError with every issue listed. */
export function parseOrThrow<Schema extends z.ZodTypeAny>(
  schema: Schema,
  value: unknown,
  label: string
): z.output<Schema> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${label}: ${formatIssues(result.error)}`);
  }
  return result.data;
}
