import { z } from "zod";
import { transactionDirections } from "../../../utils/constants.js";
import { paginationSchema } from "../../../utils/pagination.js";
import { dateRangeQuery, optionalText, queryFlag } from "../../../utils/validation.js";

export const transactionCreateSchema = z
  .object({
    occurredAt: z.coerce.date().optional(),
    description: z.string().trim().min(1).max(500),
    direction: z.enum(transactionDirections),
    currency: z
      .string()
      .trim()
      .regex(/^[A-Za-z]{3}$/, "Currency must be a 3-letter ISO 4217 code")
      .transform((value) => value.toUpperCase())
      .default("USD"),
    createdBy: z.string().trim().min(1).max(100),
    periodId: z.string().min(1).nullish(),
    category: optionalText(100),
  })
  .strict();

export const transactionUpdateSchema = z
  .object({
    occurredAt: z.coerce.date().optional(),
    description: z.string().trim().min(1).max(500).optional(),
    direction: z.enum(transactionDirections).optional(),
    periodId: z.string().min(1).nullish(),
    category: optionalText(100),
  })
  .strict()
  .refine((input) => Object.values(input).some((value) => value !== undefined), {
    message: "At least one field must be provided",
  });

export const listTransactionsQuerySchema = paginationSchema.extend({
  periodId: z.string().min(1).optional(),
  direction: z.enum(transactionDirections).optional(),
  ...dateRangeQuery,
});

export const deleteTransactionQuerySchema = z.object({
  cascade: queryFlag,
});

export type TransactionCreatePayload = z.infer<typeof transactionCreateSchema>;
export type TransactionUpdatePayload = z.infer<typeof transactionUpdateSchema>;
export type ListTransactionsQuery = z.infer<typeof listTransactionsQuerySchema>;
export type DeleteTransactionQuery = z.infer<typeof deleteTransactionQuerySchema>;
