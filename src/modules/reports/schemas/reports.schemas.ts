import { z } from "zod";
import { queryFlag } from "../../../utils/validation.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a date as YYYY-MM-DD")
  .transform((value) => new Date(`${value}T00:00:00.000Z`))
  .refine((value) => !Number.isNaN(value.getTime()), "Invalid date");

/** Whole UTC days: `from` starts at 00:00, `to` runs through 23:59:59.999. */
const dayRange = {
  from: isoDate.optional(),
  to: isoDate.transform((value) => new Date(value.getTime() + DAY_MS - 1)).optional(),
};

export const generalLedgerQuerySchema = z.object({
  digits: z.coerce.number().int().min(1).max(10).default(4),
  includeDetail: queryFlag,
  ...dayRange,
});

export const journalQuerySchema = z.object({
  periodId: z.string().min(1).optional(),
});

export const invoiceStatsQuerySchema = z.object(dayRange);

export const topClientsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
  ...dayRange,
});

export const periodBalanceQuerySchema = z.object({
  periodId: z.string().min(1),
});

export type GeneralLedgerQuery = z.infer<typeof generalLedgerQuerySchema>;
export type JournalQuery = z.infer<typeof journalQuerySchema>;
export type InvoiceStatsQuery = z.infer<typeof invoiceStatsQuerySchema>;
export type TopClientsQuery = z.infer<typeof topClientsQuerySchema>;
export type PeriodBalanceQuery = z.infer<typeof periodBalanceQuerySchema>;
