/**
 * Request Validation
 * Request body validation using Zod schemas
 */

import type { z } from "zod";
import { AppValidationError } from "../../shared/errors";

/**
 * Validate request body against a Zod schema
 */
export function validateRequest<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.errors.map((err) => ({
      path: err.path.join("."),
      message: err.message,
    }));
    const errorMessage = issues.map((issue) => `${issue.path}: ${issue.message}`).join(", ");
    throw new AppValidationError(
      `Validation failed: ${errorMessage}`,
      issues[0]?.path,
      issues.map((issue) => issue.path),
      { issues },
    );
  }
  return result.data;
}
