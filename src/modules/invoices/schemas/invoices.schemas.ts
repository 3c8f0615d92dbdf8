import { z } from "zod";
import { paymentTerms } from "../../../utils/constants.js";
import { paginationSchema } from "../../../utils/pagination.js";
import { dateRangeQuery, decimalInput, optionalText } from "../../../utils/validation.js";

export const invoiceLineCreateSchema = z
  .object({
    productId: z.string().min(1),
    description: optionalText(500),
    quantity: decimalInput,
    /** Defaults to the product's unit price. */
    unitPrice: decimalInput.optional(),
    discountPercentage: decimalInput.optional(),
    discountAmount: decimalInput.optional(),
  })
  .strict();

export const invoiceLineUpdateSchema = invoiceLineCreateSchema
  .partial()
  .refine((input) => Object.values(input).some((value) => value !== undefined), {
    message: "At least one field must be provided",
  });

// Strict objects: subtotal, tax and grandTotal are derived and rejected as unknown keys.
const headerFields = {
  invoiceNumber: z.string().trim().min(1).max(50),
  clientId: z.string().min(1).nullable(),
  transactionId: z.string().min(1).nullable(),
  discount: decimalInput,
  paymentTerms: z.enum(paymentTerms),
  salesperson: optionalText(100),
  issuedAt: z.coerce.date(),
  dueAt: z.coerce.date().nullable(),
  notes: optionalText(2000),
};

export const invoiceCreateSchema = z
  .object({
    ...headerFields,
    invoiceNumber: headerFields.invoiceNumber.optional(),
    clientId: headerFields.clientId.optional(),
    transactionId: headerFields.transactionId.optional(),
    discount: headerFields.discount.default("0"),
    paymentTerms: headerFields.paymentTerms.default("cash"),
    issuedAt: headerFields.issuedAt.optional(),
    dueAt: headerFields.dueAt.optional(),
    lines: z.array(invoiceLineCreateSchema).max(500).default([]),
  })
  .strict();

export const invoiceUpdateSchema = z
  .object(headerFields)
  .partial()
  .strict()
  .refine((input) => Object.values(input).some((value) => value !== undefined), {
    message: "At least one field must be provided",
  });

export const listInvoicesQuerySchema = paginationSchema.extend({
  clientId: z.string().min(1).optional(),
  ...dateRangeQuery,
});

export const invoiceNumberParamsSchema = z.object({
  invoiceNumber: z.string().trim().min(1).max(50),
});

export const invoiceLineParamsSchema = z.object({
  id: z.string().min(1),
  lineId: z.string().min(1),
});

export type InvoiceLineCreatePayload = z.infer<typeof invoiceLineCreateSchema>;
export type InvoiceLineUpdatePayload = z.infer<typeof invoiceLineUpdateSchema>;
export type InvoiceCreatePayload = z.infer<typeof invoiceCreateSchema>;
export type InvoiceUpdatePayload = z.infer<typeof invoiceUpdateSchema>;
export type ListInvoicesQuery = z.infer<typeof listInvoicesQuerySchema>;
