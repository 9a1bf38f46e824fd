import { ValidationError } from "@middleware/errorHandler";
import type { z } from "zod";

/**
 * Parses a request payload with a zod schema, turning schema issues into a
 * ValidationError whose message names every offending field.
 */
export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown
): z.output<S> {
  const parsed = schema.safeParse(payload);

  if (!parsed.success) {
    const issues = parsed.error.issues;
    const summary = issues
      .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      .join("; ");

    throw new ValidationError(`Invalid request: ${summary}`, { issues });
  }

  return parsed.data;
}
