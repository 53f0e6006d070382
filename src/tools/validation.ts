import type { z } from "zod";
import { ValidationError } from "./errors";

/**
 * Parses tool input against a zod schema, converting failures into a
 * ValidationError that lists every offending field.
 */
export function parseToolInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  toolName: string,
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid input: ${details}`, toolName);
  }
  return result.data;
}
