import { z } from "zod";
import { accountClassifications } from "../../../utils/constants.js";

export const accountCreateSchema = z
  .object({
    code: z.string().trim().min(1).max(20).regex(/^[0-9A-Za-z.-]+$/, "Account codes use letters, digits, '.' and '-'"),
    name: z.string().trim().min(1).max(100),
    classification: z.enum(accountClassifications),
  })
  .strict();

export const accountUpdateSchema = accountCreateSchema
  .partial()
  .refine((input) => Object.values(input).some((value) => value !== undefined), {
    message: "At least one field must be provided",
  });

export const listAccountsQuerySchema = z.object({
  classification: z.enum(accountClassifications).optional(),
});

export type AccountCreatePayload = z.infer<typeof accountCreateSchema>;
export type AccountUpdatePayload = z.infer<typeof accountUpdateSchema>;
export type ListAccountsQuery = z.infer<typeof listAccountsQuerySchema>;
