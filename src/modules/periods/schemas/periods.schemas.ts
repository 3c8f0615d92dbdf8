import { z } from "zod";
import { periodStates, periodTypes } from "../../../utils/constants.js";

export const periodCreateSchema = z
  .object({
    startDate: z.coerce.date(),
    endDate: z.coerce.date(),
    periodType: z.enum(periodTypes),
    state: z.enum(periodStates).default("open"),
  })
  .strict();

export const periodUpdateSchema = z
  .object({
    startDate: z.coerce.date().optional(),
    endDate: z.coerce.date().optional(),
    periodType: z.enum(periodTypes).optional(),
    state: z.enum(periodStates).optional(),
  })
  .strict()
  .refine((input) => Object.values(input).some((value) => value !== undefined), {
    message: "At least one field must be provided",
  });

export const listPeriodsQuerySchema = z.object({
  state: z.enum(periodStates).optional(),
});

export type PeriodCreatePayload = z.infer<typeof periodCreateSchema>;
export type PeriodUpdatePayload = z.infer<typeof periodUpdateSchema>;
export type ListPeriodsQuery = z.infer<typeof listPeriodsQuerySchema>;
