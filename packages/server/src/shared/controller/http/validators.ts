import { zValidator as baseZValidator } from "@hono/zod-validator";
import type { ValidationTargets } from "hono";
import type { z } from "zod";
import { ValidationError } from "../../../types.js";

/**
 * zod validation that fails through the shared error envelope
 */
export const zValidator = <TSchema extends z.ZodSchema, TTarget extends keyof ValidationTargets>(
  target: TTarget,
  schema: TSchema
) =>
  baseZValidator(target, schema, result => {
    if (!result.success) {
      const firstIssue = result.error.issues[0];
      const firstPathSegment =
        typeof firstIssue?.path?.[0] === "string" ? firstIssue.path[0] : undefined;

      const message = firstPathSegment ? `Invalid ${firstPathSegment}` : "Invalid request";

      throw new ValidationError(
        message,
        result.error.issues.map(issue => ({
          path: issue.path.join("."),
          message: issue.message,
        }))
      );
    }
  });
