import type { z } from "zod";

import type { ValidationResult } from "./validation";

import { ToolExecutionError, ValidationError } from "../utils/errors";

/**
 * Parses raw tool input against its manifest shape. A missing or mistyped
 * field becomes a `missing_field` failure naming that field.
 */
export function parseToolArguments<T>(toolName: string, schema: z.ZodType<T>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.map(String).join(".") : undefined;
  const message = field
    ? `${toolName}: missing or invalid field '${field}'`
    : `${toolName}: input must be an object`;
  throw new ToolExecutionError(message, "missing_field", parsed.error);
}

export function requireValid<T>(result: ValidationResult<T>): T {
  if (!result.ok) {
    throw new ValidationError(result.reason);
  }
  return result.value;
}
