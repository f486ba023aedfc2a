import type { z } from "zod";
import { validationError } from "./errors.js";

/**
 * Parses untrusted request input, turning zod issues into a VALIDATION_FAILED
 * AppError with one detail per issue.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw validationError(
      parsed.error.issues.map((issue) => ({
        field: issue.path.join(".") || undefined,
        rule: issue.code,
        message: issue.message,
      })),
    );
  }
  return parsed.data;
}
