import { z } from "zod";

export const idParamsSchema = z.object({
  id: z.string().min(1),
});

/**
 * A decimal given as a JSON string or number, kept as a string. Range and
 * scale are domain rules checked by the services (422, not 400).
 */
export const decimalInput = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().regex(/^-?\d+(\.\d+)?$/, "Expected a decimal number"));

export const optionalText = (max: number) => z.string().trim().max(max).nullish();

/** Query-string booleans: only "true" and "1" are true. */
export const queryFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

export const dateRangeQuery = {
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
};
