import type { Response } from "express";
import { z } from "zod";

/** Parses `value` or answers 400 with the zod issues; null means the response is already sent. */
export function parseOr400<S extends z.ZodTypeAny>(schema: S, value: unknown, res: Response): z.infer<S> | null {
  const result = schema.safeParse(value);
  if (!result.success) {
    res.status(400).json({
      error: "Invalid request",
      issues: result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
    return null;
  }
  return result.data;
}

export const idParam = z.object({ id: z.coerce.number().int().positive() });

export const optionalInt = z.coerce.number().int().optional();

export const booleanQuery = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((v) => v === "true" || v === "1");
