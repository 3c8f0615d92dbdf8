import { z } from "zod";
import { clientTypes } from "../../../utils/constants.js";
import { optionalText, queryFlag } from "../../../utils/validation.js";

const clientFields = {
  name: z.string().trim().min(1).max(200),
  taxId: optionalText(50),
  address: optionalText(500),
  phone: optionalText(30),
  email: z.string().trim().email().nullish(),
  clientType: z.enum(clientTypes),
  notes: optionalText(2000),
  isActive: z.boolean(),
};

export const clientCreateSchema = z
  .object({
    ...clientFields,
    clientType: clientFields.clientType.default("individual"),
    isActive: clientFields.isActive.default(true),
  })
  .strict();

export const clientUpdateSchema = z
  .object(clientFields)
  .partial()
  .strict()
  .refine((input) => Object.values(input).some((value) => value !== undefined), {
    message: "At least one field must be provided",
  });

export const listClientsQuerySchema = z.object({
  search: z.string().trim().min(1).optional(),
  activeOnly: queryFlag,
});

export const taxIdParamsSchema = z.object({
  taxId: z.string().trim().min(1).max(50),
});

export type ClientCreatePayload = z.infer<typeof clientCreateSchema>;
export type ClientUpdatePayload = z.infer<typeof clientUpdateSchema>;
export type ListClientsQuery = z.infer<typeof listClientsQuerySchema>;
