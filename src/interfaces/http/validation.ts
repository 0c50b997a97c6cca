import { ValidationError } from "@typesLocal/AppError";
import type { z } from "zod";

/** Parses an HTTP input with a zod schema, mapping failures to a 400. */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what = "request"
): z.infer<S> {
  const parsed = schema.safeParse(input);

  if (!parsed.success) {
    throw new ValidationError(`Invalid ${what}`, {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return parsed.data;
}
