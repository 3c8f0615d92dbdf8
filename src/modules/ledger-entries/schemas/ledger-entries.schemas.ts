import { z } from "zod";
import { paginationSchema } from "../../../utils/pagination.js";
import { decimalInput } from "../../../utils/validation.js";

export const ledgerEntryCreateSchema = z
  .object({
    transactionId: z.string().min(1),
    accountId: z.string().min(1),
    debit: decimalInput.default("0"),
    credit: decimalInput.default("0"),
  })
  .strict();

export const ledgerEntryUpdateSchema = z
  .object({
    accountId: z.string().min(1).optional(),
    debit: decimalInput.optional(),
    credit: decimalInput.optional(),
  })
  .strict()
  .refine((input) => Object.values(input).some((value) => value !== undefined), {
    message: "At least one field must be provided",
  });

export const listLedgerEntriesQuerySchema = paginationSchema.extend({
  transactionId: z.string().min(1).optional(),
  accountId: z.string().min(1).optional(),
});

export type LedgerEntryCreatePayload = z.infer<typeof ledgerEntryCreateSchema>;
export type LedgerEntryUpdatePayload = z.infer<typeof ledgerEntryUpdateSchema>;
export type ListLedgerEntriesQuery = z.infer<typeof listLedgerEntriesQuerySchema>;
