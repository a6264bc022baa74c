import { z } from "zod";
import { InvalidInputError } from "../errors.js";

/** Parse a request body or query string, turning zod failures into a 400. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
      .join("; ");
    throw new InvalidInputError(problems);
  }
  return result.data;
}

/** Optional integer from a query string. */
export const queryInt = z.coerce.number().int().optional();

/** `a,b,c` into trimmed, non-empty ids. */
export const idList = z
  .string()
  .optional()
  .transform((raw) =>
    raw === undefined
      ? undefined
      : raw
          .split(",")
          .map((id) => id.trim())
          .filter((id) => id.length > 0)
  );
