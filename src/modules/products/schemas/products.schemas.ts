import { z } from "zod";
import { productTypes, stockOperations } from "../../../utils/constants.js";
import { decimalInput, optionalText, queryFlag } from "../../../utils/validation.js";

const productFields = {
  code: optionalText(30),
  name: z.string().trim().min(1).max(200),
  description: optionalText(2000),
  productType: z.enum(productTypes),
  category: optionalText(100),
  unitPrice: decimalInput,
  unitOfMeasure: z.string().trim().min(1).max(20),
  taxable: z.boolean(),
  isActive: z.boolean(),
  currentStock: decimalInput,
  minimumStock: decimalInput,
};

export const productCreateSchema = z
  .object({
    ...productFields,
    productType: productFields.productType.default("product"),
    unitOfMeasure: productFields.unitOfMeasure.default("unit"),
    taxable: productFields.taxable.default(true),
    isActive: productFields.isActive.default(true),
    currentStock: productFields.currentStock.default("0"),
    minimumStock: productFields.minimumStock.default("0"),
  })
  .strict();

export const productUpdateSchema = z
  .object(productFields)
  .partial()
  .strict()
  .refine((input) => Object.values(input).some((value) => value !== undefined), {
    message: "At least one field must be provided",
  });

export const listProductsQuerySchema = z.object({
  search: z.string().trim().min(1).optional(),
  activeOnly: queryFlag,
});

export const stockAdjustmentSchema = z
  .object({
    quantity: decimalInput,
    operation: z.enum(stockOperations).default("add"),
  })
  .strict();

export const productCodeParamsSchema = z.object({
  code: z.string().trim().min(1).max(30),
});

export type ProductCreatePayload = z.infer<typeof productCreateSchema>;
export type ProductUpdatePayload = z.infer<typeof productUpdateSchema>;
export type ListProductsQuery = z.infer<typeof listProductsQuerySchema>;
export type StockAdjustmentPayload = z.infer<typeof stockAdjustmentSchema>;
